import path from 'path';
import { pathToFileURL } from 'url';
import { CompileGuard } from '../guard/CompileGuard';
import { sleep } from '../utils/async';
import logger from '../utils/logger';

export type DiagnosticSeverity = 'error' | 'warning' | 'information' | 'hint';

export interface Diagnostic {
    severity: DiagnosticSeverity;
    message: string;
    line?: number;
    source?: string;
}

export type DiagnosticListener = (uri: string, diagnostics: Diagnostic[]) => void;

/**
 * A language server or similar that pushes diagnostics asynchronously
 */
export interface DiagnosticCollaborator {
    open(uri: string, content: string): Promise<void>;
    /** Returns an unsubscribe function */
    onDiagnostics(listener: DiagnosticListener): () => void;
}

export interface StabilizerTimings {
    firstDiagnosticTimeoutMs: number;
    stabilityWindowMs: number;
    pollIntervalMs: number;
    maxWaitMs: number;
    graceMs: number;
}

export const DEFAULT_TIMINGS: StabilizerTimings = {
    firstDiagnosticTimeoutMs: 10000,
    stabilityWindowMs: 500,
    pollIntervalMs: 100,
    maxWaitMs: 5000,
    graceMs: 1000,
};

export interface DiagnosticCheckResult {
    uri: string;
    errors: Diagnostic[];
    warnings: Diagnostic[];
    firstDiagnosticReceived: boolean;
    /** Starts with LSP_OK, LSP_WARNINGS or LSP_ERRORS */
    text: string;
}

export function toDocumentUri(filePath: string): string {
    return pathToFileURL(path.resolve(filePath)).href;
}

function formatDiagnostics(items: Diagnostic[]): string {
    return items
        .map(d => `  ${d.line !== undefined ? `line ${d.line}: ` : ''}${d.message}`)
        .join('\n');
}

/**
 * Waits until a diagnostic collaborator has stopped pushing results for a
 * document, then records the outcome in the compile guard.
 *
 * Servers often publish in batches while indexing, so the first push is not
 * the final answer. Arrivals are cached per URI and stamped globally; the
 * first arrival for the checked document resolves a one-shot signal that is
 * registered before the document is opened.
 */
export class DiagnosticStabilizer {
    private readonly cache = new Map<string, Diagnostic[]>();
    private readonly firstArrival = new Map<string, () => void>();
    private readonly timings: StabilizerTimings;
    private readonly unsubscribe: () => void;
    private lastArrival = 0;

    constructor(
        private readonly collaborator: DiagnosticCollaborator,
        private readonly guard: CompileGuard,
        timings: Partial<StabilizerTimings> = {}
    ) {
        this.timings = { ...DEFAULT_TIMINGS, ...timings };
        this.unsubscribe = collaborator.onDiagnostics((uri, diagnostics) => this.receive(uri, diagnostics));
    }

    async check(filePath: string, content: string): Promise<DiagnosticCheckResult> {
        const uri = toDocumentUri(filePath);
        const arrived = new Promise<void>(resolve => this.firstArrival.set(uri, resolve));

        await this.collaborator.open(uri, content);

        const firstDiagnosticReceived = await this.waitForFirst(uri, arrived);
        if (!firstDiagnosticReceived) {
            logger.warn(`No diagnostics for ${uri} within ${this.timings.firstDiagnosticTimeoutMs}ms`);
        }

        await this.waitForStability();

        const diagnostics = this.cache.get(uri) ?? [];
        const errors = diagnostics.filter(d => d.severity === 'error');
        const warnings = diagnostics.filter(d => d.severity === 'warning');

        let text: string;
        if (errors.length > 0) {
            text = `LSP_ERRORS: ${errors.length} error(s) in ${filePath}\n${formatDiagnostics(errors)}`;
            this.guard.markSyntaxFailed(filePath, errors.map(e => e.message).join('; '));
        } else {
            text = warnings.length > 0
                ? `LSP_WARNINGS: ${warnings.length} warning(s) in ${filePath}\n${formatDiagnostics(warnings)}`
                : `LSP_OK: no errors in ${filePath}`;
            this.guard.markSyntaxPassed(filePath);
        }

        return { uri, errors, warnings, firstDiagnosticReceived, text };
    }

    latest(uri: string): Diagnostic[] | undefined {
        return this.cache.get(uri);
    }

    dispose(): void {
        this.unsubscribe();
        this.firstArrival.clear();
    }

    private receive(uri: string, diagnostics: Diagnostic[]): void {
        this.cache.set(uri, diagnostics);
        this.lastArrival = Date.now();

        const signal = this.firstArrival.get(uri);
        if (signal) {
            this.firstArrival.delete(uri);
            signal();
        }
    }

    private async waitForFirst(uri: string, arrived: Promise<void>): Promise<boolean> {
        let timer: NodeJS.Timeout | undefined;
        const timedOut = new Promise<boolean>(resolve => {
            timer = setTimeout(() => resolve(false), this.timings.firstDiagnosticTimeoutMs);
        });
        try {
            return await Promise.race([arrived.then(() => true), timedOut]);
        } finally {
            clearTimeout(timer);
            this.firstArrival.delete(uri);
        }
    }

    private async waitForStability(): Promise<void> {
        const { stabilityWindowMs, pollIntervalMs, maxWaitMs, graceMs } = this.timings;
        const start = Date.now();

        while (Date.now() - this.lastArrival < stabilityWindowMs) {
            if (Date.now() - start >= maxWaitMs) {
                logger.debug(`Diagnostics still arriving after ${maxWaitMs}ms, granting ${graceMs}ms grace`);
                await sleep(graceMs);
                return;
            }
            await sleep(pollIntervalMs);
        }
    }
}
