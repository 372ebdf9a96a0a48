import * as path from 'path';
import type { CompareConfig, RoleSettings } from '../config/CompareConfig.js';
import type { Logger } from './Logger.js';
import type { SiteSide } from './types.js';

/**
 * Where the current code runs: inside the comparing process, or inside a
 * worker that owns one of the two browser sessions.
 */
export type CallOrigin =
    | { kind: 'in-process' }
    | { kind: 'daemon'; which: SiteSide; port: number };

/**
 * Explicit execution context handed to every long-lived component.
 */
export class Context {
    constructor(
        readonly config: CompareConfig,
        readonly role: RoleSettings,
        readonly logger: Logger,
        readonly origin: CallOrigin = { kind: 'in-process' }
    ) { }

    /** Output directory of the current role. */
    get roleDir(): string {
        return path.join(this.config.dirs.root, this.role.name);
    }

    baseUrl(which: SiteSide): string {
        return this.config.bases[which];
    }

    /** Directory name of one side's artifacts. */
    sideDir(which: SiteSide): string {
        return which === 'ref' ? this.config.dirs.ref : this.config.dirs.new;
    }

    describe(): string {
        return this.origin.kind === 'daemon'
            ? `${this.role.name}/${this.origin.which}@${this.origin.port}`
            : this.role.name;
    }
}
