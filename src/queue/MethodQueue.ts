import { MethodCoverageInfo, overallCoverage } from '../models/CoverageModels';
import { MethodEntry, MethodStatus, TerminalStatus } from '../models/WorkflowModels';

export class MethodQueueError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'MethodQueueError';
    }
}

export interface QueueProgress {
    total: number;
    counts: Record<MethodStatus, number>;
    /** Mean coverage of SUCCESS entries, 0 when there are none */
    averageCoverage: number;
}

const STATUS_MARKS: Record<MethodStatus, string> = {
    SUCCESS: '✓',
    FAILED: '✗',
    SKIPPED: '⊘',
    PARTIAL: '◐',
    IN_PROGRESS: '►',
    PENDING: '○',
};

/**
 * Ordered worklist of target methods, lowest coverage first
 */
export class MethodQueue {
    private items: MethodEntry[] = [];
    private cursor = -1;

    build(methods: readonly MethodCoverageInfo[]): void {
        // Array.prototype.sort is stable, so ties keep discovery order
        this.items = [...methods]
            .sort((a, b) => overallCoverage(a) - overallCoverage(b))
            .map((method): MethodEntry => ({ method, status: 'PENDING', coverageAchieved: method.lineCoverage, notes: '' }));
        this.cursor = -1;
    }

    /**
     * The entry being worked on. Asking again before complete() returns the same one.
     */
    next(): MethodEntry | null {
        const current = this.current();
        if (current && current.status === 'IN_PROGRESS') {
            return current;
        }

        while (this.cursor + 1 < this.items.length) {
            this.cursor++;
            const entry = this.items[this.cursor];
            if (entry.status === 'PENDING') {
                entry.status = 'IN_PROGRESS';
                return entry;
            }
        }

        this.cursor = this.items.length;
        return null;
    }

    complete(status: TerminalStatus, coverage: number, notes: string = ''): MethodEntry {
        const current = this.current();
        if (!current) {
            throw new MethodQueueError('complete() called with no current method');
        }
        current.status = status;
        current.coverageAchieved = coverage;
        current.notes = notes;
        return current;
    }

    /**
     * Mark every still-pending P2 method SKIPPED. Returns how many were skipped.
     */
    skipLowPriority(): number {
        let skipped = 0;
        for (const entry of this.items) {
            if (entry.status === 'PENDING' && entry.method.priority === 'P2') {
                entry.status = 'SKIPPED';
                entry.notes = 'Low priority, skipped';
                skipped++;
            }
        }
        return skipped;
    }

    current(): MethodEntry | null {
        return this.cursor >= 0 && this.cursor < this.items.length ? this.items[this.cursor] : null;
    }

    entries(): readonly MethodEntry[] {
        return this.items;
    }

    size(): number {
        return this.items.length;
    }

    isComplete(): boolean {
        return this.items.every(e => e.status !== 'PENDING' && e.status !== 'IN_PROGRESS');
    }

    progress(): QueueProgress {
        const counts: Record<MethodStatus, number> = {
            PENDING: 0,
            IN_PROGRESS: 0,
            SUCCESS: 0,
            FAILED: 0,
            SKIPPED: 0,
            PARTIAL: 0,
        };
        let successCoverage = 0;
        for (const entry of this.items) {
            counts[entry.status]++;
            if (entry.status === 'SUCCESS') {
                successCoverage += entry.coverageAchieved;
            }
        }
        return {
            total: this.items.length,
            counts,
            averageCoverage: counts.SUCCESS > 0 ? successCoverage / counts.SUCCESS : 0,
        };
    }

    progressSummary(): string {
        const p = this.progress();
        const lines = [
            `Progress: ${p.total - p.counts.PENDING - p.counts.IN_PROGRESS}/${p.total} `
            + `(success ${p.counts.SUCCESS}, failed ${p.counts.FAILED}, partial ${p.counts.PARTIAL}, skipped ${p.counts.SKIPPED})`,
        ];
        for (const entry of this.items) {
            lines.push(
                `  ${STATUS_MARKS[entry.status]} [${entry.method.priority}] ${entry.method.signature} `
                + `${entry.coverageAchieved.toFixed(1)}%${entry.notes ? ` - ${entry.notes}` : ''}`
            );
        }
        return lines.join('\n');
    }
}
