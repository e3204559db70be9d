import { TOOL, ToolName } from '../tools/ToolNames';

export type WorkflowPhase = 'ANALYSIS' | 'GENERATION' | 'VERIFICATION' | 'REPAIR' | 'FULL';

/**
 * Tools the model may call in each phase. FULL means every registered tool.
 */
export const PHASE_TOOLS: Record<Exclude<WorkflowPhase, 'FULL'>, readonly ToolName[]> = {
    ANALYSIS: [
        TOOL.analyzeClass,
        TOOL.readFile,
        TOOL.writeFile,
        TOOL.fileExists,
        TOOL.listDirectory,
        TOOL.getMethodCoverageDetails,
        TOOL.getUncoveredMethods,
    ],
    GENERATION: [
        TOOL.readFile,
        TOOL.writeFile,
        TOOL.writeFileFromLine,
        TOOL.searchReplace,
        TOOL.fileExists,
        TOOL.analyzeClass,
        TOOL.checkSyntax,
    ],
    VERIFICATION: [
        TOOL.checkSyntax,
        TOOL.checkSyntaxWithLsp,
        TOOL.compileProject,
        TOOL.executeTest,
        TOOL.getSingleMethodCoverage,
        TOOL.getMethodCoverageDetails,
        TOOL.readFile,
    ],
    REPAIR: [
        TOOL.readFile,
        TOOL.writeFile,
        TOOL.writeFileFromLine,
        TOOL.searchReplace,
        TOOL.analyzeClass,
        TOOL.checkSyntax,
        TOOL.checkSyntaxWithLsp,
    ],
};

export const PHASE_DESCRIPTIONS: Record<WorkflowPhase, string> = {
    ANALYSIS: 'Inspect the class and prepare the test file',
    GENERATION: 'Write tests for one method',
    VERIFICATION: 'Check, build, run and measure',
    REPAIR: 'Fix the reported failure',
    FULL: 'All tools available',
};
