import { MethodCoverageInfo } from './CoverageModels';

export type MethodStatus = 'PENDING' | 'IN_PROGRESS' | 'SUCCESS' | 'FAILED' | 'SKIPPED' | 'PARTIAL';

export type TerminalStatus = Exclude<MethodStatus, 'PENDING' | 'IN_PROGRESS'>;

export interface MethodEntry {
    readonly method: MethodCoverageInfo;
    status: MethodStatus;
    coverageAchieved: number;
    notes: string;
}

export type VerificationStep = 'SYNTAX_CHECK' | 'LSP_CHECK' | 'COMPILE' | 'TEST' | 'COVERAGE';

export interface VerificationResult {
    readonly success: boolean;
    readonly failedStep?: VerificationStep;
    readonly errorMessage?: string;
    /** Raw tool output of the failing stage */
    readonly errorDetails?: string;
    readonly coverage: number;
    readonly coverageThresholdMet: boolean;
}

export function verificationSuccess(coverage: number, threshold: number): VerificationResult {
    return Object.freeze({
        success: true,
        coverage,
        coverageThresholdMet: coverage >= threshold,
    });
}

export function verificationFailure(step: VerificationStep, errorMessage: string, errorDetails: string): VerificationResult {
    return Object.freeze({
        success: false,
        failedStep: step,
        errorMessage,
        errorDetails,
        coverage: 0,
        coverageThresholdMet: false,
    });
}

export interface FeedbackResult {
    iteration: number;
    currentCoverage: number;
    targetCoverage: number;
    targetMet: boolean;
    uncoveredMethods: string[];
    improvements: string[];
    nextAction: string;
}

export interface PreCheckResult {
    readonly success: boolean;
    readonly errorMessage?: string;
    readonly projectRoot: string;
    readonly sourceFile: string;
    /** Dotted name of the class under test */
    readonly className: string;
    readonly testFilePath: string;
    readonly hasExistingTests: boolean;
    /** Rendered summary handed to prompts */
    readonly coverageInfoText: string;
    /** True when methods come from a static scan, not a report */
    readonly staticScan: boolean;
    readonly methodCoverages: readonly MethodCoverageInfo[];
    readonly feedbackResult?: FeedbackResult;
}

export type RunStatus = 'completed' | 'partial' | 'failed' | 'aborted';
