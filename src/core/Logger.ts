/**
 * Console-backed logger.
 *
 * Every line carries a `[Component]` prefix so that output from the crawler,
 * the two browser sessions and the RPC layer can be told apart in one stream.
 */

export type LogLevel = 'debug' | 'verbose' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    verbose: 1,
    info: 2,
    warn: 3,
    error: 4
};

export interface Logger {
    readonly level: LogLevel;
    debug(message: string): void;
    verbose(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
    /** Same sink and level, different component prefix. */
    child(component: string): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
    if (!value) return fallback;
    const normalized = value.trim().toLowerCase();
    return isLogLevel(normalized) ? normalized : fallback;
}

/** Anything with console's shape; tests pass a recorder. */
export interface LogSink {
    log(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export class ConsoleLogger implements Logger {
    constructor(
        readonly level: LogLevel = 'info',
        private readonly component: string = 'Crawler',
        private readonly sink: LogSink = console
    ) { }

    debug(message: string): void {
        this.write('debug', message);
    }

    verbose(message: string): void {
        this.write('verbose', message);
    }

    info(message: string): void {
        this.write('info', message);
    }

    warn(message: string): void {
        this.write('warn', `⚠️ ${message}`);
    }

    error(message: string): void {
        this.write('error', `❌ ${message}`);
    }

    child(component: string): Logger {
        return new ConsoleLogger(this.level, component, this.sink);
    }

    private write(level: LogLevel, message: string): void {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;
        const line = `[${this.component}] ${message}`;
        if (level === 'error') this.sink.error(line);
        else if (level === 'warn') this.sink.warn(line);
        else this.sink.log(line);
    }
}

/** Collects lines in memory. */
export class MemorySink implements LogSink {
    readonly lines: string[] = [];

    log(message: string): void {
        this.lines.push(message);
    }

    warn(message: string): void {
        this.lines.push(message);
    }

    error(message: string): void {
        this.lines.push(message);
    }
}
