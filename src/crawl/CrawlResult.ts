/**
 * Outcome bookkeeping for one role's crawl. Every resolved step is recorded
 * once; comparison failures, cancellations and unexpected outcomes are kept
 * apart and reported with the visited ordinals that locate their artifacts.
 */

import type { Capture } from '../capture/Capture.js';
import { ContractError } from '../shared/utils/errors.js';
import type { QueueItem } from './QueueItem.js';

export interface VisitRecord {
    visited: number;
    item: QueueItem;
    refStatus: number;
    newStatus: number;
    refUrl: string;
    newUrl: string;
    compare: string[];
}

export interface ReasonSummary {
    count: number;
    visited: number[];
}

export interface CrawlSummary {
    role: string;
    outputDir: string;
    visited: number;
    byLink: number;
    byClick: number;
    maxDepth: number;
    perStatus: Record<string, number>;
    errors: number;
    differences: Record<string, ReasonSummary>;
    cancelled: Record<string, ReasonSummary>;
    unexpected: Record<string, ReasonSummary>;
}

function summarize(buckets: Map<string, number[]>): Record<string, ReasonSummary> {
    const result: Record<string, ReasonSummary> = {};
    for (const reason of [...buckets.keys()].sort()) {
        const visited = [...(buckets.get(reason) ?? [])].sort((a, b) => a - b);
        result[reason] = { count: visited.length, visited };
    }
    return result;
}

function push(buckets: Map<string, number[]>, reason: string, visited: number): void {
    const list = buckets.get(reason) ?? [];
    list.push(visited);
    buckets.set(reason, list);
}

export class CrawlResult {
    readonly counters = { visited: 0, byLink: 0, byClick: 0, maxDepth: 0 };

    private readonly seen = new Map<string, VisitRecord>();
    private readonly byStatus = new Map<number, VisitRecord[]>();
    private readonly errorRecords: VisitRecord[] = [];
    private readonly cancelledVisits = new Map<string, number[]>();
    private readonly unexpectedVisits = new Map<string, number[]>();

    /** Counts a resolution attempt and returns its visited ordinal. */
    countVisit(item: QueueItem): number {
        this.counters.visited++;
        if (item.kind === 'link') this.counters.byLink++;
        else this.counters.byClick++;
        this.counters.maxDepth = Math.max(this.counters.maxDepth, item.depth);
        return this.counters.visited;
    }

    /**
     * @throws ContractError when the step was recorded before
     */
    record(item: QueueItem, ref: Capture, next: Capture, compare: string[]): VisitRecord {
        const key = item.signature();
        if (this.seen.has(key)) {
            throw new ContractError('visit recorded twice', { signature: key });
        }
        const record: VisitRecord = {
            visited: item.visited ?? 0,
            item,
            refStatus: ref.status,
            newStatus: next.status,
            refUrl: ref.url,
            newUrl: next.url,
            compare: [...compare]
        };
        this.seen.set(key, record);

        const bucket = this.byStatus.get(ref.status) ?? [];
        bucket.push(record);
        this.byStatus.set(ref.status, bucket);

        if (compare.length > 0) this.errorRecords.push(record);
        return record;
    }

    cancel(item: QueueItem, reason: string): void {
        push(this.cancelledVisits, reason, item.visited ?? 0);
    }

    unexpected(item: QueueItem, reason: string): void {
        push(this.unexpectedVisits, reason, item.visited ?? 0);
    }

    recordFor(item: QueueItem): VisitRecord | undefined {
        return this.seen.get(item.signature());
    }

    statusBucket(status: number): readonly VisitRecord[] {
        return this.byStatus.get(status) ?? [];
    }

    get errors(): readonly VisitRecord[] {
        return this.errorRecords;
    }

    get recordedCount(): number {
        return this.seen.size;
    }

    /** Differences or unexpected outcomes; cancellations alone do not fail a run. */
    hasFailures(): boolean {
        return this.errorRecords.length > 0 || this.unexpectedVisits.size > 0;
    }

    summary(role: string, outputDir: string): CrawlSummary {
        const perStatus: Record<string, number> = {};
        for (const status of [...this.byStatus.keys()].sort((a, b) => a - b)) {
            perStatus[String(status)] = this.byStatus.get(status)?.length ?? 0;
        }

        const differences = new Map<string, number[]>();
        for (const record of this.errorRecords) {
            for (const reason of record.compare) push(differences, reason, record.visited);
        }

        return {
            role,
            outputDir,
            ...this.counters,
            perStatus,
            errors: this.errorRecords.length,
            differences: summarize(differences),
            cancelled: summarize(this.cancelledVisits),
            unexpected: summarize(this.unexpectedVisits)
        };
    }
}

export function formatSummary(summary: CrawlSummary): string[] {
    const lines = [
        `📊 Role ${summary.role} → ${summary.outputDir}`,
        `   visited: ${summary.visited} (links: ${summary.byLink}, clicks: ${summary.byClick}, depth: ${summary.maxDepth})`
    ];
    for (const [status, count] of Object.entries(summary.perStatus)) {
        lines.push(`   status ${status}: ${count}`);
    }
    const section = (label: string, reasons: Record<string, ReasonSummary>) => {
        for (const [reason, entry] of Object.entries(reasons)) {
            lines.push(`   ${label} ${reason}: ${entry.count} [${entry.visited.join(', ')}]`);
        }
    };
    section('cancelled', summary.cancelled);
    section('difference', summary.differences);
    section('unexpected', summary.unexpected);
    if (summary.errors === 0 && Object.keys(summary.unexpected).length === 0) {
        lines.push('   ✅ no differences');
    }
    return lines;
}
