import { MethodCoverageInfo } from '../models/CoverageModels';
import { PreCheckResult } from '../models/WorkflowModels';

/**
 * Where the class under test and its tests live
 */
export interface TargetContext {
    sourceFile: string;
    className: string;
    testFilePath: string;
    testClassName: string;
    projectRoot: string;
}

export const DEFAULT_SYSTEM_PROMPT = [
    'You are a senior engineer writing JUnit 5 unit tests with Mockito where collaborators need mocking.',
    'Work only through the tools you are given. Read the class before writing tests.',
    'After every edit run checkSyntax on the edited file; builds are refused until it passes.',
    'Keep existing passing tests. Never modify the class under test.',
    'When the requested work is done, reply with a short plain-text summary and no tool call.',
].join('\n');

export function methodLine(method: MethodCoverageInfo): string {
    return `${method.signature} [${method.priority}] line ${method.lineCoverage.toFixed(1)}%, branch ${method.branchCoverage.toFixed(1)}%`;
}

/**
 * Prompts for the session-level steps: skeleton, single-shot and fallback runs
 */
export class PromptBuilder {
    constructor(private readonly systemPrompt: string = DEFAULT_SYSTEM_PROMPT) {}

    system(): string {
        return this.systemPrompt;
    }

    init(target: TargetContext, precheck: PreCheckResult): string {
        return [
            `Prepare the test class for ${target.className}.`,
            `Source: ${target.sourceFile}`,
            `Test file: ${target.testFilePath}`,
            precheck.hasExistingTests
                ? 'The test file exists. Read it and make sure it is ready for new tests: package, imports, class declaration and any shared fixtures. Do not add test methods yet.'
                : 'The test file does not exist. Create it with the package declaration, imports, an empty test class and shared fixtures only. Do not add test methods yet.',
            'Then run checkSyntax on the test file.',
        ].join('\n');
    }

    traditional(target: TargetContext, precheck: PreCheckResult, threshold: number): string {
        return [
            `Write unit tests for ${target.className} until line coverage reaches ${threshold}%.`,
            `Source: ${target.sourceFile}`,
            `Test file: ${target.testFilePath} (${precheck.hasExistingTests ? 'exists, extend it' : 'create it'})`,
            `Project root: ${target.projectRoot}`,
            '',
            'Current coverage:',
            precheck.coverageInfoText,
            '',
            'Loop: write tests, checkSyntax, compileProject, executeTest, then check coverage with getMethodCoverageDetails.',
        ].join('\n');
    }

    fallbackIteration(target: TargetContext, iteration: number, maxIterations: number, threshold: number): string {
        return [
            `Iteration ${iteration}/${maxIterations} for ${target.className}. No coverage report was available up front.`,
            `Source: ${target.sourceFile}`,
            `Test file: ${target.testFilePath}`,
            `Project root: ${target.projectRoot}`,
            '1. Call getUncoveredMethods (or analyzeClass if there is no report) and pick ONE method below '
            + `${threshold}% line coverage.`,
            '2. Write tests for it, run checkSyntax, compileProject and executeTest, then getSingleMethodCoverage.',
            '3. Report on one line: `METHOD: <name> COVERAGE: <n>%`.',
            'If every method is at or above the threshold, reply with ITERATION_COMPLETE.',
        ].join('\n');
    }
}
