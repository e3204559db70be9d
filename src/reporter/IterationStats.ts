import { v4 as uuidv4 } from 'uuid';
import { MethodCoverageInfo, Priority } from '../models/CoverageModels';
import { MethodEntry, MethodStatus, RunStatus } from '../models/WorkflowModels';
import { TokenUsage } from '../llm/types';

export type RunMode = 'traditional' | 'iterative' | 'fallback';

export interface MethodStats {
    name: string;
    signature: string;
    priority: Priority;
    initialCoverage: number;
    finalCoverage: number;
    iterations: number;
    status: MethodStatus;
    notes: string;
    promptTokens: number;
    completionTokens: number;
    durationMs: number;
}

export interface RunReport {
    runId: string;
    mode: RunMode;
    status: RunStatus;
    sourceFile: string;
    className: string;
    projectRoot: string;
    threshold: number;
    startedAt: string;
    finishedAt: string;
    durationMs: number;
    counts: {
        total: number;
        success: number;
        failed: number;
        partial: number;
        skipped: number;
    };
    tokens: {
        prompt: number;
        completion: number;
        total: number;
    };
    methods: MethodStats[];
    feedbackSummary?: string;
    errorMessage?: string;
}

export interface ReportContext {
    mode: RunMode;
    status: RunStatus;
    sourceFile: string;
    className: string;
    projectRoot: string;
    threshold: number;
    errorMessage?: string;
}

/**
 * Run-wide counters, filled in by the orchestrator as it goes
 */
export class IterationStats {
    readonly runId: string;
    private readonly startedAt: number;
    private readonly byMethod = new Map<string, MethodStats>();
    private readonly methodStart = new Map<string, number>();
    private current?: MethodStats;
    private promptTokens = 0;
    private completionTokens = 0;
    private feedbackSummary?: string;

    constructor(runId: string = uuidv4(), private readonly now: () => number = Date.now) {
        this.runId = runId;
        this.startedAt = now();
    }

    recordTokens(usage: TokenUsage): void {
        this.promptTokens += usage.promptTokens;
        this.completionTokens += usage.completionTokens;
        if (this.current) {
            this.current.promptTokens += usage.promptTokens;
            this.current.completionTokens += usage.completionTokens;
        }
    }

    startMethod(method: MethodCoverageInfo): void {
        const stats: MethodStats = {
            name: method.name,
            signature: method.signature,
            priority: method.priority,
            initialCoverage: method.lineCoverage,
            finalCoverage: method.lineCoverage,
            iterations: 0,
            status: 'IN_PROGRESS',
            notes: '',
            promptTokens: 0,
            completionTokens: 0,
            durationMs: 0,
        };
        this.byMethod.set(method.signature, stats);
        this.methodStart.set(method.signature, this.now());
        this.current = stats;
    }

    recordIteration(): void {
        if (this.current) {
            this.current.iterations++;
        }
    }

    finishMethod(entry: MethodEntry): void {
        const stats = this.byMethod.get(entry.method.signature);
        if (!stats) {
            return;
        }
        stats.status = entry.status;
        stats.finalCoverage = entry.coverageAchieved;
        stats.notes = entry.notes;
        stats.durationMs = this.now() - (this.methodStart.get(entry.method.signature) ?? this.now());
        if (this.current === stats) {
            this.current = undefined;
        }
    }

    /**
     * Record an entry that never went through startMethod (bulk skips, aborted runs)
     */
    recordOutcome(entry: MethodEntry): void {
        if (!this.byMethod.has(entry.method.signature)) {
            this.startMethod(entry.method);
        }
        this.finishMethod(entry);
    }

    setFeedbackSummary(summary: string): void {
        this.feedbackSummary = summary;
    }

    methods(): MethodStats[] {
        return [...this.byMethod.values()];
    }

    totalTokens(): { prompt: number; completion: number; total: number } {
        return {
            prompt: this.promptTokens,
            completion: this.completionTokens,
            total: this.promptTokens + this.completionTokens,
        };
    }

    toReport(context: ReportContext): RunReport {
        const methods = this.methods();
        const count = (status: MethodStatus) => methods.filter(m => m.status === status).length;
        const finished = this.now();

        return {
            runId: this.runId,
            ...context,
            startedAt: new Date(this.startedAt).toISOString(),
            finishedAt: new Date(finished).toISOString(),
            durationMs: finished - this.startedAt,
            counts: {
                total: methods.length,
                success: count('SUCCESS'),
                failed: count('FAILED'),
                partial: count('PARTIAL'),
                skipped: count('SKIPPED'),
            },
            tokens: this.totalTokens(),
            methods,
            feedbackSummary: this.feedbackSummary,
        };
    }
}
