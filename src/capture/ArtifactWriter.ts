import { createHash } from 'crypto';
import * as path from 'path';
import { DIRS } from '../config/constants.js';
import type { Context } from '../core/Context.js';
import type { SiteSide } from '../core/types.js';
import type { NetworkEvent } from '../browser/adapters/BrowserDriver.js';
import { signatureDetails } from '../browser/PageSignature.js';
import { FileSystemHelper } from '../shared/utils/FileSystemHelper.js';

/** What an artifact name is derived from. */
export interface ArtifactPlace {
    visited: number;
    path: string;
    signature: string;
    locator?: string;
}

const UNSAFE = /[/|:"*]/g;
const MAX_NAME_BODY = 180;

/**
 * Lays out per-visit artifacts under the role directory:
 *
 *   <role>/<ref|new>/htmls/NNNNNN_<which>_<place>[_<suffix>].html
 *   <role>/<ref|new>/screenshots/NNNNNN_<which>_<place>[_<suffix>].png
 *   <role>/diffs/...
 *   <role>/perf_logs/NNNNNN_<which>.log
 *   <role>/results/summary.json
 */
export class ArtifactWriter {
    constructor(private readonly ctx: Context) { }

    fileName(which: SiteSide, place: ArtifactPlace, ext: string, suffix?: string): string {
        const parts = [place.path, ...signatureDetails(place.signature)];
        if (place.locator) parts.push(place.locator);

        let body = parts.join('|');
        if (body.length > MAX_NAME_BODY) {
            const digest = createHash('md5').update(body).digest('hex').slice(0, 8);
            body = `${body.slice(0, MAX_NAME_BODY)}~${digest}`;
        }

        const counter = String(place.visited).padStart(6, '0');
        const name = `${counter}_${which}_${body}${suffix ? `_${suffix}` : ''}${ext}`;
        return name.replace(UNSAFE, '_');
    }

    /** Undefined when the side's directory is configured empty. */
    sideDir(which: SiteSide, kind: 'htmls' | 'screenshots'): string | undefined {
        const dir = this.ctx.sideDir(which);
        if (!dir) return undefined;
        return path.join(this.ctx.roleDir, dir, kind === 'htmls' ? DIRS.HTMLS : DIRS.SCREENSHOTS);
    }

    writeHtml(which: SiteSide, place: ArtifactPlace, html: string, suffix?: string): string | undefined {
        const dir = this.sideDir(which, 'htmls');
        if (!dir) return undefined;
        return FileSystemHelper.safeWrite(path.join(dir, this.fileName(which, place, '.html', suffix)), html, this.ctx.logger);
    }

    writeScreenshot(which: SiteSide, place: ArtifactPlace, png: Buffer, suffix?: string): string | undefined {
        const dir = this.sideDir(which, 'screenshots');
        if (!dir) return undefined;
        return FileSystemHelper.safeWrite(path.join(dir, this.fileName(which, place, '.png', suffix)), png, this.ctx.logger);
    }

    /**
     * Both screenshots of a failed visual comparison, plus the highlighted diff when given.
     */
    writeDiffs(place: ArtifactPlace, refPng: Buffer, newPng: Buffer, diffPng?: Buffer): string[] {
        const dir = path.join(this.ctx.roleDir, this.ctx.config.dirs.diffs);
        const written = [
            FileSystemHelper.safeWrite(path.join(dir, this.fileName('ref', place, '.png')), refPng, this.ctx.logger),
            FileSystemHelper.safeWrite(path.join(dir, this.fileName('new', place, '.png')), newPng, this.ctx.logger)
        ];
        if (diffPng) {
            written.push(FileSystemHelper.safeWrite(path.join(dir, this.fileName('ref', place, '.png', 'diff')), diffPng, this.ctx.logger));
        }
        return written.filter((file): file is string => file !== undefined);
    }

    /** One JSON line per network event. */
    writePerfLog(which: SiteSide, visited: number, events: NetworkEvent[]): string | undefined {
        const counter = String(visited).padStart(6, '0');
        const file = path.join(this.ctx.roleDir, DIRS.PERF_LOGS, `${counter}_${which}.log`);
        return FileSystemHelper.safeWrite(file, events.map(event => JSON.stringify(event)).join('\n'), this.ctx.logger);
    }

    writeSummary(summary: unknown): string | undefined {
        return FileSystemHelper.safeWriteJSON(path.join(this.ctx.roleDir, DIRS.RESULTS, 'summary.json'), summary, this.ctx.logger);
    }
}
