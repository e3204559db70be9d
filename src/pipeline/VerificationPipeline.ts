import { CompileGuard } from '../guard/CompileGuard';
import { DiagnosticStabilizer } from '../lsp/DiagnosticStabilizer';
import { VerificationResult, verificationFailure, verificationSuccess } from '../models/WorkflowModels';
import { TOOL } from '../tools/ToolNames';
import { isErrorResult, ToolInvoker } from '../tools/ToolRegistry';
import { readFile } from '../utils/fileUtils';
import logger from '../utils/logger';

export interface VerificationRequest {
    testFilePath: string;
    /** Test class handed to the test runner */
    testTargetName: string;
    /** Class under test, as the coverage report names it */
    targetName: string;
    /** Full signature, so overloads are measured separately */
    methodName: string;
    projectRoot: string;
}

export interface PipelineDependencies {
    tools: ToolInvoker;
    guard: CompileGuard;
    threshold: number;
    stabilizer?: DiagnosticStabilizer;
}

const SYNTAX_ERROR_MARKERS = ['SYNTAX_ERROR', 'LSP_ERRORS', 'INVALID'];
const SYNTAX_OK_MARKERS = ['SYNTAX_OK', 'LSP_OK', 'LSP_WARNINGS', 'VALID', 'No errors'];

function preview(text: string): string {
    const flat = text.replace(/\s+/g, ' ').trim();
    return flat.length > 200 ? `${flat.slice(0, 200)}...` : flat;
}

export function isSyntaxOk(output: string): boolean {
    if (isErrorResult(output) || SYNTAX_ERROR_MARKERS.some(m => output.includes(m))) {
        return false;
    }
    return SYNTAX_OK_MARKERS.some(m => output.includes(m));
}

export function isCompileOk(output: string): boolean {
    if (output.includes('COMPILE_BLOCKED') || isErrorResult(output)) {
        return false;
    }
    const exit = /exitCode=(\d+)/.exec(output);
    if (exit) {
        return exit[1] === '0';
    }
    if (output.includes('BUILD FAILURE') || output.includes('COMPILATION ERROR')) {
        return false;
    }
    return output.includes('BUILD SUCCESS');
}

export interface TestOutcome {
    passed: boolean;
    failures: number;
    errors: number;
}

export function parseTestOutcome(output: string): TestOutcome {
    let failures = 0;
    let errors = 0;
    for (const m of output.matchAll(/Failures:\s*(\d+)/g)) {
        failures = Math.max(failures, parseInt(m[1], 10));
    }
    for (const m of output.matchAll(/Errors:\s*(\d+)/g)) {
        errors = Math.max(errors, parseInt(m[1], 10));
    }
    const exit = /exitCode=(\d+)/.exec(output);
    const exitOk = exit ? exit[1] === '0' : !output.includes('BUILD FAILURE');
    return {
        passed: !isErrorResult(output) && exitOk && failures === 0 && errors === 0,
        failures,
        errors,
    };
}

/**
 * Line coverage out of `name line=NN.N% branch=NN.N%`, or any percentage
 */
export function parseCoverage(output: string): number | null {
    const match = /line[=:]\s*([\d.]+)%/i.exec(output) ?? /([\d.]+)%/.exec(output);
    if (!match) {
        return null;
    }
    const value = parseFloat(match[1]);
    return Number.isNaN(value) ? null : value;
}

/**
 * syntax -> diagnostics -> compile -> test -> coverage. The first failing
 * stage ends the run and its raw output becomes errorDetails.
 */
export class VerificationPipeline {
    constructor(private readonly deps: PipelineDependencies) {}

    async execute(request: VerificationRequest): Promise<VerificationResult> {
        logger.info(`🔍 Verifying tests for ${request.methodName} in ${request.testFilePath}`);

        const syntax = await this.checkSyntaxOnly(request);
        if (syntax) {
            return syntax;
        }

        const diagnostics = await this.checkDiagnostics(request);
        if (diagnostics) {
            return diagnostics;
        }

        const compile = await this.compileOnly(request);
        if (compile) {
            return compile;
        }

        const test = await this.testOnly(request);
        if (test) {
            return test;
        }

        return this.measureCoverage(request);
    }

    /**
     * Returns a failure, or null when the stage passed
     */
    async checkSyntaxOnly(request: VerificationRequest): Promise<VerificationResult | null> {
        const output = await this.deps.tools.invoke(TOOL.checkSyntax, { path: request.testFilePath });
        logger.debug(`checkSyntax: ${preview(output)}`);

        if (!isSyntaxOk(output)) {
            this.deps.guard.markSyntaxFailed(request.testFilePath, output);
            logger.warn(`❌ Syntax check failed: ${preview(output)}`);
            return verificationFailure('SYNTAX_CHECK', 'Syntax check failed', output);
        }
        this.deps.guard.markSyntaxPassed(request.testFilePath);
        return null;
    }

    async compileOnly(request: VerificationRequest): Promise<VerificationResult | null> {
        const check = this.deps.guard.canCompile();
        if (!check.canCompile) {
            logger.warn('❌ Compile blocked by unverified files');
            return verificationFailure('COMPILE', 'Compile blocked by compile guard', check.blockReason);
        }

        const output = await this.deps.tools.invoke(TOOL.compileProject, { projectRoot: request.projectRoot });
        logger.debug(`compileProject: ${preview(output)}`);

        if (!isCompileOk(output)) {
            logger.warn(`❌ Compilation failed: ${preview(output)}`);
            return verificationFailure('COMPILE', 'Compilation failed', output);
        }
        return null;
    }

    async testOnly(request: VerificationRequest): Promise<VerificationResult | null> {
        const output = await this.deps.tools.invoke(TOOL.executeTest, {
            projectRoot: request.projectRoot,
            testClass: request.testTargetName,
        });
        logger.debug(`executeTest: ${preview(output)}`);

        const outcome = parseTestOutcome(output);
        if (!outcome.passed) {
            logger.warn(`❌ Tests failed (failures=${outcome.failures}, errors=${outcome.errors})`);
            return verificationFailure(
                'TEST',
                `Tests failed (failures=${outcome.failures}, errors=${outcome.errors})`,
                output
            );
        }
        return null;
    }

    private async checkDiagnostics(request: VerificationRequest): Promise<VerificationResult | null> {
        const { stabilizer } = this.deps;
        if (!stabilizer) {
            return null;
        }

        let content: string;
        try {
            content = await readFile(request.testFilePath);
        } catch (error) {
            const message = `ERROR: cannot read ${request.testFilePath}: ${error instanceof Error ? error.message : String(error)}`;
            return verificationFailure('LSP_CHECK', 'Diagnostic check failed', message);
        }

        const result = await stabilizer.check(request.testFilePath, content);
        logger.debug(`diagnostics: ${preview(result.text)}`);
        if (result.errors.length > 0) {
            logger.warn(`❌ Language server reported ${result.errors.length} error(s)`);
            return verificationFailure('LSP_CHECK', 'Language server reported errors', result.text);
        }
        return null;
    }

    private async measureCoverage(request: VerificationRequest): Promise<VerificationResult> {
        const output = await this.deps.tools.invoke(TOOL.getSingleMethodCoverage, {
            projectRoot: request.projectRoot,
            className: request.targetName,
            methodName: request.methodName,
        });
        logger.debug(`getSingleMethodCoverage: ${preview(output)}`);

        const coverage = isErrorResult(output) ? null : parseCoverage(output);
        if (coverage === null) {
            logger.warn(`❌ Coverage lookup failed: ${preview(output)}`);
            return verificationFailure('COVERAGE', 'Coverage lookup failed', output);
        }

        const result = verificationSuccess(coverage, this.deps.threshold);
        logger.info(
            `${result.coverageThresholdMet ? '✅' : '📉'} ${request.methodName}: line coverage ${coverage.toFixed(1)}% `
            + `(threshold ${this.deps.threshold}%)`
        );
        return result;
    }
}
