import path from 'path';
import { CoverageParser } from '../analyzer/CoverageParser';
import { CovloopConfig, SessionLimits } from '../config/schema';
import { FeedbackCollaborator } from '../feedback/CoverageFeedbackEngine';
import { CompileGuard } from '../guard/CompileGuard';
import { LlmResponse, LlmSession, SessionFactory } from '../llm/types';
import { DiagnosticStabilizer } from '../lsp/DiagnosticStabilizer';
import { CoverageReportSource, MethodCoverageInfo } from '../models/CoverageModels';
import { MethodEntry, PreCheckResult, RunStatus } from '../models/WorkflowModels';
import { PhaseManager } from '../phase/PhaseManager';
import { FixPromptBuilder } from '../pipeline/FixPromptBuilder';
import { VerificationPipeline, VerificationRequest } from '../pipeline/VerificationPipeline';
import { PreCheckExecutor } from '../precheck/PreCheckExecutor';
import { PromptBuilder, TargetContext } from '../prompt/PromptBuilder';
import { MethodQueue } from '../queue/MethodQueue';
import { IterationStats, RunMode, RunReport } from '../reporter/IterationStats';
import { ReportGenerator, ReportPaths } from '../reporter/ReportGenerator';
import { ToolInvoker } from '../tools/ToolRegistry';
import logger from '../utils/logger';

/**
 * Run state
 */
export type RunState =
    | 'PRECHECK'
    | 'TRADITIONAL'
    | 'ITERATIVE'
    | 'FALLBACK'
    | 'SUMMARY'
    | 'COMPLETE'
    | 'FAILED';

export interface OrchestratorDependencies {
    config: CovloopConfig;
    sessions: SessionFactory;
    /** Full tool dispatch, used by the core itself */
    tools: ToolInvoker;
    /** Every registered tool name, for the FULL capability set */
    toolNames: readonly string[];
    guard: CompileGuard;
    coverageSource: CoverageReportSource;
    stabilizer?: DiagnosticStabilizer;
    feedback?: FeedbackCollaborator;
    reportGenerator?: ReportGenerator;
    prompts?: PromptBuilder;
}

export interface RunResult {
    runId: string;
    status: RunStatus;
    mode?: RunMode;
    precheck: PreCheckResult;
    methods: readonly MethodEntry[];
    report?: RunReport;
    reportPaths?: ReportPaths;
    errorMessage?: string;
}

const COMPLETION_PHRASES = ['iteration_complete', 'iteration complete', 'all methods completed', 'all methods tested'];

/**
 * Completion claims in free text. Only the fallback loop relies on this.
 */
export function isCompletionResponse(content: string): boolean {
    const lower = content.toLowerCase();
    if (COMPLETION_PHRASES.some(p => lower.includes(p))) {
        return true;
    }
    return lower.includes('completed') && lower.includes('successfully') && lower.includes('iterative');
}

/**
 * `METHOD: calc COVERAGE: 75%` style progress lines from the fallback loop
 */
export function extractProgress(content: string): { method?: string; coverage?: number } {
    const method = /METHOD:\s*(\w+)/i.exec(content)?.[1];
    const coverage = /COVERAGE:\s*([\d.]+)%/i.exec(content)?.[1];
    return { method, coverage: coverage === undefined ? undefined : parseFloat(coverage) };
}

interface FallbackOutcome {
    coverage: number;
    failed: boolean;
}

/**
 * Top-level state machine: pre-check, then one of the single-shot, the
 * per-method or the fallback loop, then the summary.
 */
export class AgentOrchestrator {
    private readonly config: CovloopConfig;
    private readonly prompts: PromptBuilder;
    private readonly fixPrompts = new FixPromptBuilder();
    private readonly reportGenerator: ReportGenerator;
    private state: RunState = 'PRECHECK';

    constructor(private readonly deps: OrchestratorDependencies) {
        this.config = deps.config;
        this.prompts = deps.prompts ?? new PromptBuilder(deps.config.prompts.system_prompt);
        this.reportGenerator = deps.reportGenerator ?? new ReportGenerator();
    }

    getState(): RunState {
        return this.state;
    }

    async run(sourceFile: string): Promise<RunResult> {
        const stats = new IterationStats();
        const absoluteSource = path.resolve(sourceFile);
        logger.info(`🚀 Run ${stats.runId} for ${absoluteSource}`);

        this.setState('PRECHECK');
        const precheck = await new PreCheckExecutor({
            config: this.config,
            tools: this.deps.tools,
            coverageSource: this.deps.coverageSource,
            feedback: this.deps.feedback,
        }).execute(absoluteSource);

        if (!precheck.success) {
            this.setState('FAILED');
            return {
                runId: stats.runId,
                status: 'aborted',
                precheck,
                methods: [],
                errorMessage: precheck.errorMessage,
            };
        }

        const target: TargetContext = {
            sourceFile: precheck.sourceFile,
            className: precheck.className,
            testFilePath: precheck.testFilePath,
            testClassName: path.basename(precheck.testFilePath, this.config.layout.source_extension),
            projectRoot: precheck.projectRoot,
        };

        const queue = new MethodQueue();
        queue.build(precheck.methodCoverages);

        let mode: RunMode;
        let status: RunStatus;
        let errorMessage: string | undefined;
        try {
            if (!this.config.workflow.iterative_mode) {
                mode = 'traditional';
                this.setState('TRADITIONAL');
                status = await this.runTraditional(target, precheck, queue, stats);
            } else if (queue.size() === 0) {
                mode = 'fallback';
                this.setState('FALLBACK');
                logger.warn('⚠️ No methods to iterate over, using model-driven fallback loop (degraded mode)');
                status = await this.runFallback(target, stats);
            } else {
                mode = 'iterative';
                this.setState('ITERATIVE');
                status = await this.runIterative(target, precheck, queue, stats);
            }
        } catch (error) {
            // Anything unexpected still ends every method in a terminal status
            errorMessage = error instanceof Error ? error.message : String(error);
            logger.error(`❌ Run failed: ${errorMessage}`);
            mode = this.config.workflow.iterative_mode ? 'iterative' : 'traditional';
            status = 'failed';
            this.failRemaining(queue, stats, `Run aborted: ${errorMessage}`);
        }

        this.setState('SUMMARY');
        const { report, reportPaths } = await this.summarize(target, precheck, queue, stats, mode, status, errorMessage);

        this.setState('COMPLETE');
        return {
            runId: stats.runId,
            status,
            mode,
            precheck,
            methods: queue.entries(),
            report,
            reportPaths,
            errorMessage,
        };
    }

    /**
     * One long session with the whole pre-check picture
     */
    private async runTraditional(
        target: TargetContext,
        precheck: PreCheckResult,
        queue: MethodQueue,
        stats: IterationStats
    ): Promise<RunStatus> {
        const phases = this.phaseManager();
        const session = this.createSession(this.config.sessions.traditional, phases.switchToPhase('FULL'), stats, 'traditional');
        const response = await this.runLlmAndWait(
            session,
            this.prompts.traditional(target, precheck, this.config.workflow.coverage_threshold),
            this.config.sessions.traditional.timeout_ms
        );

        if (!response.success) {
            logger.error(`❌ Session failed: ${response.errorMessage}`);
        }

        const measured = await this.measureMethods(target);
        let entry: MethodEntry | null;
        while ((entry = queue.next()) !== null) {
            const after = measured.get(entry.method.signature) ?? entry.method.lineCoverage;
            if (after >= this.config.workflow.coverage_threshold) {
                queue.complete('SUCCESS', after, entry.method.lineCoverage >= this.config.workflow.coverage_threshold ? 'Already covered' : '');
            } else {
                queue.complete(response.success ? 'PARTIAL' : 'FAILED', after, response.success ? '' : response.errorMessage);
            }
            stats.recordOutcome(entry);
        }

        if (!response.success) {
            return 'failed';
        }
        return this.statusFromQueue(queue);
    }

    /**
     * Skeleton session, then generate/verify/repair per method in queue order
     */
    private async runIterative(
        target: TargetContext,
        precheck: PreCheckResult,
        queue: MethodQueue,
        stats: IterationStats
    ): Promise<RunStatus> {
        const phases = this.phaseManager();
        const threshold = this.config.workflow.coverage_threshold;

        logger.info(`📋 ${queue.size()} method(s) queued for ${target.className}`);

        const init = await this.runLlmAndWait(
            this.createSession(this.config.sessions.init, phases.switchToPhase('ANALYSIS'), stats, 'init'),
            this.prompts.init(target, precheck),
            this.config.sessions.init.timeout_ms
        );
        if (!init.success) {
            logger.error(`❌ Test file initialization failed: ${init.errorMessage}`);
            this.failRemaining(queue, stats, `Test file initialization failed: ${init.errorMessage ?? 'unknown error'}`);
            return 'failed';
        }

        if (this.config.workflow.skip_low_priority && precheck.feedbackResult?.targetMet) {
            const skipped = queue.skipLowPriority();
            logger.info(`⊘ Class already meets ${threshold}%, skipped ${skipped} low-priority method(s)`);
            queue.entries().filter(e => e.status === 'SKIPPED').forEach(e => stats.recordOutcome(e));
        }

        const pipeline = new VerificationPipeline({
            tools: this.deps.tools,
            guard: this.deps.guard,
            threshold,
            stabilizer: this.config.workflow.use_lsp ? this.deps.stabilizer : undefined,
        });

        let entry: MethodEntry | null;
        while ((entry = queue.next()) !== null) {
            stats.startMethod(entry.method);
            await this.processMethod(entry.method, target, queue, pipeline, phases, stats);
            stats.finishMethod(entry);
            logger.info(`${queue.progressSummary()}`);
        }

        return this.statusFromQueue(queue);
    }

    private async processMethod(
        method: MethodCoverageInfo,
        target: TargetContext,
        queue: MethodQueue,
        pipeline: VerificationPipeline,
        phases: PhaseManager,
        stats: IterationStats
    ): Promise<void> {
        const { coverage_threshold: threshold, max_method_retries, max_verification_retries } = this.config.workflow;

        if (method.lineCoverage >= threshold) {
            logger.info(`⊘ ${method.signature} already at ${method.lineCoverage.toFixed(1)}%, skipping`);
            queue.complete('SKIPPED', method.lineCoverage, `Already at ${method.lineCoverage.toFixed(1)}%`);
            return;
        }

        logger.info(`🎯 ${method.signature} [${method.priority}] line ${method.lineCoverage.toFixed(1)}%`);

        const request: VerificationRequest = {
            testFilePath: target.testFilePath,
            testTargetName: target.testClassName,
            targetName: target.className,
            methodName: method.signature,
            projectRoot: target.projectRoot,
        };

        let lastCoverage = method.lineCoverage;
        for (let attempt = 1; attempt <= max_method_retries; attempt++) {
            stats.recordIteration();

            const prompt = attempt === 1
                ? this.fixPrompts.generate(target, method)
                : this.fixPrompts.moreTests(target, method, lastCoverage, threshold);
            const generation = await this.callModel(phases.switchToPhase('GENERATION'), prompt, stats, `generate ${method.name} #${attempt}`);
            if (!generation.success) {
                queue.complete('FAILED', lastCoverage, `Generation failed: ${generation.errorMessage ?? 'no response'}`);
                return;
            }

            phases.switchToPhase('VERIFICATION');
            let result = await pipeline.execute(request);
            let repairs = 0;
            while (!result.success && result.failedStep !== 'COVERAGE' && repairs < max_verification_retries) {
                repairs++;
                logger.info(`🔧 Repair ${repairs}/${max_verification_retries} for ${result.failedStep}`);
                const repair = await this.callModel(
                    phases.switchToPhase('REPAIR'),
                    this.fixPrompts.fixFor(result, target, method),
                    stats,
                    `repair ${method.name} ${result.failedStep}`
                );
                if (!repair.success) {
                    queue.complete('FAILED', lastCoverage, `Repair failed: ${repair.errorMessage ?? 'no response'}`);
                    return;
                }
                phases.switchToPhase('VERIFICATION');
                result = await pipeline.execute(request);
            }

            if (!result.success) {
                if (result.failedStep === 'COVERAGE') {
                    logger.warn(`📉 Coverage for ${method.name} unavailable, counting attempt ${attempt} as below threshold`);
                    continue;
                }
                queue.complete('FAILED', lastCoverage, `Verification failed at ${result.failedStep}: ${result.errorMessage}`);
                return;
            }

            lastCoverage = result.coverage;
            if (result.coverageThresholdMet) {
                logger.info(`✅ ${method.signature} reached ${lastCoverage.toFixed(1)}%`);
                queue.complete('SUCCESS', lastCoverage, `Attempt ${attempt}`);
                return;
            }
            logger.info(`📈 ${method.signature} at ${lastCoverage.toFixed(1)}% after attempt ${attempt}/${max_method_retries}`);
        }

        queue.complete(
            'PARTIAL',
            lastCoverage,
            `Coverage ${lastCoverage.toFixed(1)}% below ${threshold}% after ${max_method_retries} attempts`
        );
    }

    /**
     * Model-driven discovery when there is no method list at all.
     * Completion is read from prose or from measured class coverage and is
     * checked before anything else; the measurement wins when the two disagree.
     * An iteration that keeps failing is recorded FAILED and the loop moves on.
     */
    private async runFallback(target: TargetContext, stats: IterationStats): Promise<RunStatus> {
        const { fallback_max_iterations: maxIterations, fallback_max_retries: maxRetries } = this.config.workflow;
        const threshold = this.config.workflow.coverage_threshold;
        const phases = this.phaseManager();
        const discovered = new Map<string, FallbackOutcome>();

        let iteration = 1;
        let failures = 0;
        let succeeded = 0;
        let completed = false;

        while (iteration <= maxIterations) {
            const session = this.createSession(this.config.sessions.step, phases.switchToPhase('FULL'), stats, `fallback #${iteration}`);
            const response = await this.runLlmAndWait(
                session,
                this.prompts.fallbackIteration(target, iteration, maxIterations, threshold),
                this.config.sessions.step.timeout_ms
            );

            const progress = extractProgress(response.content);
            const claimed = response.success && isCompletionResponse(response.content);
            const measured = await this.classCoverage(target);
            if (claimed || (measured !== null && measured >= threshold)) {
                if (progress.method) {
                    discovered.set(progress.method, { coverage: progress.coverage ?? 0, failed: false });
                }
                logger.info(
                    `✅ Fallback loop done at iteration ${iteration}`
                    + (measured !== null ? ` (class coverage ${measured.toFixed(1)}%)` : '')
                    + (claimed ? '' : ', measured coverage overrides the model')
                );
                completed = true;
                break;
            }

            if (!response.success || /failed/i.test(response.content)) {
                failures++;
                logger.warn(`⚠️ Fallback iteration ${iteration} failed (${failures}/${maxRetries}): ${response.errorMessage ?? 'model reported a failure'}`);
                if (failures < maxRetries) {
                    continue;
                }
                const name = progress.method ?? `iteration ${iteration}`;
                discovered.set(name, { coverage: progress.coverage ?? discovered.get(name)?.coverage ?? 0, failed: true });
                logger.warn(`✗ Giving up on fallback iteration ${iteration} after ${maxRetries} attempts`);
                failures = 0;
                iteration++;
                continue;
            }

            failures = 0;
            succeeded++;
            if (progress.method) {
                discovered.set(progress.method, {
                    coverage: progress.coverage ?? discovered.get(progress.method)?.coverage ?? 0,
                    failed: false,
                });
            }
            iteration++;
        }

        if (!completed) {
            logger.warn(`⚠️ Fallback loop stopped after ${maxIterations} iterations`);
        }

        for (const [name, outcome] of discovered) {
            const method: MethodCoverageInfo = {
                name,
                signature: /^\w+$/.test(name) ? `${name}()` : name,
                priority: 'P0',
                lineCoverage: 0,
                branchCoverage: 0,
            };
            stats.recordOutcome({
                method,
                status: outcome.failed ? 'FAILED' : outcome.coverage >= threshold ? 'SUCCESS' : 'PARTIAL',
                coverageAchieved: outcome.coverage,
                notes: outcome.failed ? `Failed ${maxRetries} times in a row` : 'Reported by the model',
            });
        }

        if (completed) {
            return 'completed';
        }
        return succeeded === 0 ? 'failed' : 'partial';
    }

    private async summarize(
        target: TargetContext,
        precheck: PreCheckResult,
        queue: MethodQueue,
        stats: IterationStats,
        mode: RunMode,
        status: RunStatus,
        errorMessage: string | undefined
    ): Promise<{ report: RunReport; reportPaths?: ReportPaths }> {
        if (this.deps.feedback && this.config.workflow.feedback) {
            try {
                await this.deps.feedback.runFeedbackCycle(target.projectRoot, target.className, this.config.workflow.coverage_threshold);
                stats.setFeedbackSummary(this.deps.feedback.iterationSummary());
            } catch (error) {
                logger.warn(`Final feedback cycle failed: ${error}`);
            }
        }

        const report = stats.toReport({
            mode,
            status,
            sourceFile: target.sourceFile,
            className: precheck.className,
            projectRoot: target.projectRoot,
            threshold: this.config.workflow.coverage_threshold,
            errorMessage,
        });

        logger.info('=== Test generation summary ===');
        logger.info(`Mode: ${mode}, status: ${status.toUpperCase()}`);
        logger.info(
            `Methods: ${report.counts.total} (success ${report.counts.success}, failed ${report.counts.failed}, `
            + `partial ${report.counts.partial}, skipped ${report.counts.skipped})`
        );
        logger.info(`Tokens: prompt ${report.tokens.prompt}, completion ${report.tokens.completion}`);
        if (queue.size() > 0) {
            logger.info(queue.progressSummary());
        }
        logger.info(this.deps.guard.statusSummary());

        try {
            const reportPaths = await this.reportGenerator.generateReports(
                report,
                target.projectRoot,
                this.config.output.format,
                this.config.output.result_dir
            );
            return { report, reportPaths };
        } catch (error) {
            logger.error(`❌ Could not write the run report: ${error}`);
            return { report };
        }
    }

    /**
     * A fresh step session per call; empty or failed replies are re-asked
     * up to llm.max_empty_retries times
     */
    private async callModel(
        capabilities: ReadonlySet<string>,
        prompt: string,
        stats: IterationStats,
        label: string
    ): Promise<LlmResponse> {
        const attempts = this.config.llm.max_empty_retries;
        let last: LlmResponse = { success: false, errorMessage: 'not called', content: '' };

        for (let attempt = 1; attempt <= attempts; attempt++) {
            const session = this.createSession(this.config.sessions.step, capabilities, stats, label);
            last = await this.runLlmAndWait(session, prompt, this.config.sessions.step.timeout_ms);
            if (last.success) {
                return last;
            }
            logger.warn(`⚠️ ${label}: ${last.errorMessage} (attempt ${attempt}/${attempts})`);
        }

        return {
            success: false,
            errorMessage: `${last.errorMessage ?? 'no response'} after ${attempts} attempt(s)`,
            content: '',
        };
    }

    private async runLlmAndWait(session: LlmSession, prompt: string, timeoutMs: number): Promise<LlmResponse> {
        const handler = session.runStream(prompt);
        const finished = await handler.await(timeoutMs);
        if (!finished) {
            session.cancel();
            return { success: false, errorMessage: `No response within ${timeoutMs}ms`, content: '' };
        }
        if (!handler.isSuccess()) {
            return { success: false, errorMessage: handler.getError() ?? 'Session failed', content: handler.getContent() };
        }
        const content = handler.getContent();
        if (!content.trim()) {
            return { success: false, errorMessage: 'Empty response', content: '' };
        }
        return { success: true, content };
    }

    private createSession(
        limits: SessionLimits,
        capabilities: ReadonlySet<string>,
        stats: IterationStats,
        label: string
    ): LlmSession {
        return this.deps.sessions.create({
            systemPrompt: this.prompts.system(),
            maxMessages: limits.max_messages,
            maxIterations: this.config.llm.max_tool_iterations,
            timeoutMs: limits.timeout_ms,
            capabilities,
            onTokens: usage => stats.recordTokens(usage),
            label,
        });
    }

    private phaseManager(): PhaseManager {
        return new PhaseManager(
            this.deps.toolNames,
            this.config.workflow.phase_switching && this.config.workflow.iterative_mode
        );
    }

    private async measureMethods(target: TargetContext): Promise<Map<string, number>> {
        const measured = new Map<string, number>();
        const lookup = await this.deps.coverageSource.getClassCoverage(target.projectRoot, target.className);
        if (lookup.ok) {
            for (const m of new CoverageParser(this.config.workflow.coverage_threshold).parseStructured(lookup.report)) {
                measured.set(m.signature, m.lineCoverage);
            }
        }
        return measured;
    }

    private async classCoverage(target: TargetContext): Promise<number | null> {
        const lookup = await this.deps.coverageSource.getClassCoverage(target.projectRoot, target.className);
        if (!lookup.ok) {
            return null;
        }
        return new CoverageParser(this.config.workflow.coverage_threshold).classLineCoverage(lookup.report);
    }

    private failRemaining(queue: MethodQueue, stats: IterationStats, notes: string): void {
        let entry: MethodEntry | null;
        while ((entry = queue.next()) !== null) {
            queue.complete('FAILED', entry.method.lineCoverage, notes);
            stats.recordOutcome(entry);
        }
    }

    private statusFromQueue(queue: MethodQueue): RunStatus {
        const { counts, total } = queue.progress();
        if (total > 0 && counts.FAILED === total - counts.SKIPPED && counts.FAILED > 0) {
            return 'failed';
        }
        return counts.FAILED > 0 || counts.PARTIAL > 0 ? 'partial' : 'completed';
    }

    private setState(state: RunState): void {
        logger.info(`State: ${this.state} -> ${state}`);
        this.state = state;
    }
}

