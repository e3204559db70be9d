import { MethodCoverageInfo } from '../models/CoverageModels';
import { VerificationResult, VerificationStep } from '../models/WorkflowModels';
import { methodLine, TargetContext } from '../prompt/PromptBuilder';

const MAX_ERROR_CHARS = 2000;

function clip(text: string): string {
    return text.length > MAX_ERROR_CHARS ? `${text.slice(0, MAX_ERROR_CHARS)}\n... (truncated)` : text;
}

/**
 * Per-method prompts for generation and for repairing a failed verification step
 */
export class FixPromptBuilder {
    generate(target: TargetContext, method: MethodCoverageInfo): string {
        return [
            `Write unit tests for ONE method: ${methodLine(method)}`,
            `Class under test: ${target.className} (${target.sourceFile})`,
            `Test file: ${target.testFilePath}`,
            'Read the method, cover its normal paths, edge cases and every branch.',
            'Add the tests to the existing test class, then run checkSyntax on the test file.',
        ].join('\n');
    }

    moreTests(target: TargetContext, method: MethodCoverageInfo, currentCoverage: number, threshold: number): string {
        return [
            `Line coverage of ${method.signature} is ${currentCoverage.toFixed(1)}%, below the ${threshold}% target.`,
            `Add tests to ${target.testFilePath} for the lines and branches of ${method.name} that are still missed.`,
            'Do not remove existing tests. Run checkSyntax on the test file when done.',
        ].join('\n');
    }

    syntaxFix(target: TargetContext, errors: string): string {
        return [
            `The test file ${target.testFilePath} has syntax errors:`,
            clip(errors),
            'Fix them with searchReplace or writeFile, then run checkSyntax until it reports SYNTAX_OK.',
        ].join('\n');
    }

    lspFix(target: TargetContext, diagnostics: string): string {
        return [
            `The language server reports errors in ${target.testFilePath}:`,
            clip(diagnostics),
            'Fix unresolved symbols, imports and type errors, then run checkSyntaxWithLsp again.',
        ].join('\n');
    }

    compileFix(target: TargetContext, output: string): string {
        return [
            `Compiling the project failed after editing ${target.testFilePath}:`,
            clip(output),
            'Fix the test code (imports, signatures, types). Do not change the class under test.',
            'Run checkSyntax on the test file afterwards.',
        ].join('\n');
    }

    testFix(target: TargetContext, method: MethodCoverageInfo, output: string): string {
        return [
            `Tests in ${target.testClassName} fail for ${method.signature}:`,
            clip(output),
            'Fix the failing tests so they match the real behaviour of the method. Run checkSyntax afterwards.',
        ].join('\n');
    }

    /**
     * Repair prompt for a failed step; empty for COVERAGE, which is not repaired
     */
    fixFor(result: VerificationResult, target: TargetContext, method: MethodCoverageInfo): string {
        const details = result.errorDetails ?? result.errorMessage ?? '';
        const step: VerificationStep | undefined = result.failedStep;
        switch (step) {
            case 'SYNTAX_CHECK':
                return this.syntaxFix(target, details);
            case 'LSP_CHECK':
                return this.lspFix(target, details);
            case 'COMPILE':
                return this.compileFix(target, details);
            case 'TEST':
                return this.testFix(target, method, details);
            case 'COVERAGE':
            case undefined:
                return '';
        }
    }
}
