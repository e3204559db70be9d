import path from 'path';
import logger from '../utils/logger';

export interface FileSyntaxStatus {
    readonly syntaxPassed: boolean;
    readonly lastChecked: number;
    readonly lastError?: string;
}

export type CompileCheck =
    | { canCompile: true }
    | { canCompile: false; blockReason: string };

const ERROR_PREVIEW = 100;
const NOT_CHECKED = 'modified since last syntax check';

/**
 * Refuses build actions while any tracked file has not passed a syntax check.
 * One instance per run, shared by the pipeline and the build tools.
 */
export class CompileGuard {
    private readonly statuses = new Map<string, FileSyntaxStatus>();
    private enabled: boolean;

    constructor(enabled: boolean = true) {
        this.enabled = enabled;
    }

    setEnabled(enabled: boolean): void {
        this.enabled = enabled;
        logger.debug(`Compile guard ${enabled ? 'enabled' : 'disabled'}`);
    }

    isEnabled(): boolean {
        return this.enabled;
    }

    /**
     * A write happened; the file needs a fresh syntax check
     */
    markFileModified(filePath: string): void {
        this.record(filePath, { syntaxPassed: false, lastChecked: Date.now(), lastError: NOT_CHECKED });
    }

    markSyntaxPassed(filePath: string): void {
        this.record(filePath, { syntaxPassed: true, lastChecked: Date.now() });
    }

    markSyntaxFailed(filePath: string, errorSummary: string): void {
        this.record(filePath, { syntaxPassed: false, lastChecked: Date.now(), lastError: errorSummary });
    }

    getStatus(filePath: string): FileSyntaxStatus | undefined {
        return this.statuses.get(CompileGuard.normalize(filePath));
    }

    clearStatus(filePath: string): void {
        this.statuses.delete(CompileGuard.normalize(filePath));
    }

    clearAll(): void {
        this.statuses.clear();
    }

    canCompile(): CompileCheck {
        if (!this.enabled) {
            return { canCompile: true };
        }

        const failing = [...this.statuses.entries()].filter(([, status]) => !status.syntaxPassed);
        if (failing.length === 0) {
            return { canCompile: true };
        }

        const lines = [`COMPILE_BLOCKED: ${failing.length} file(s) have not passed syntax check.`];
        for (const [file, status] of failing) {
            lines.push(`  - ${file}: ${CompileGuard.preview(status.lastError ?? NOT_CHECKED)}`);
        }
        lines.push(
            '',
            '⚠️ REQUIRED ACTION:',
            '1. Run checkSyntax on each file listed above',
            '2. Fix every reported error',
            '3. Re-run checkSyntax until it reports SYNTAX_OK',
            '4. Call compileProject again'
        );

        return { canCompile: false, blockReason: lines.join('\n') };
    }

    statusSummary(): string {
        if (this.statuses.size === 0) {
            return 'Compile guard: no tracked files';
        }
        const passed = [...this.statuses.values()].filter(s => s.syntaxPassed).length;
        return `Compile guard: ${passed}/${this.statuses.size} tracked file(s) passed syntax check`
            + (this.enabled ? '' : ' (disabled)');
    }

    static normalize(filePath: string): string {
        return path.resolve(filePath);
    }

    private record(filePath: string, status: FileSyntaxStatus): void {
        if (!this.enabled) {
            return;
        }
        // Whole-entry replacement; readers never see a half-updated status
        this.statuses.set(CompileGuard.normalize(filePath), Object.freeze(status));
    }

    private static preview(error: string): string {
        const oneLine = error.replace(/\s+/g, ' ').trim();
        return oneLine.length > ERROR_PREVIEW ? `${oneLine.slice(0, ERROR_PREVIEW)}...` : oneLine;
    }
}
