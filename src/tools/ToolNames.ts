export const TOOL = {
    readFile: 'readFile',
    writeFile: 'writeFile',
    writeFileFromLine: 'writeFileFromLine',
    searchReplace: 'searchReplace',
    fileExists: 'fileExists',
    listDirectory: 'listDirectory',
    checkSyntax: 'checkSyntax',
    checkSyntaxWithLsp: 'checkSyntaxWithLsp',
    compileProject: 'compileProject',
    cleanAndTest: 'cleanAndTest',
    executeTest: 'executeTest',
    getMethodCoverageDetails: 'getMethodCoverageDetails',
    getUncoveredMethods: 'getUncoveredMethods',
    getSingleMethodCoverage: 'getSingleMethodCoverage',
    analyzeClass: 'analyzeClass',
} as const;

export type ToolName = typeof TOOL[keyof typeof TOOL];
