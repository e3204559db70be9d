import { createOrchestrator, createRuntime } from '../Runtime';
import { AgentOrchestrator } from '../AgentOrchestrator';
import { DEFAULT_CONFIG } from '../../config/schema';
import { DiagnosticCollaborator } from '../../lsp/DiagnosticStabilizer';

jest.mock('../../utils/logger');

describe('createRuntime', () => {
    it('should register every tool except the language server check', () => {
        const runtime = createRuntime(structuredClone(DEFAULT_CONFIG));

        expect(runtime.registry.names()).toEqual([
            'readFile',
            'writeFile',
            'writeFileFromLine',
            'searchReplace',
            'fileExists',
            'listDirectory',
            'checkSyntax',
            'compileProject',
            'cleanAndTest',
            'executeTest',
            'getMethodCoverageDetails',
            'getUncoveredMethods',
            'getSingleMethodCoverage',
            'analyzeClass',
        ]);
        expect(runtime.stabilizer).toBeUndefined();
    });

    it('should add a stabilizer and the language server check when diagnostics are available', () => {
        const diagnostics: DiagnosticCollaborator = {
            open: async () => undefined,
            onDiagnostics: () => () => undefined,
        };

        const runtime = createRuntime(structuredClone(DEFAULT_CONFIG), diagnostics);

        expect(runtime.stabilizer).toBeDefined();
        expect(runtime.registry.has('checkSyntaxWithLsp')).toBe(true);
        runtime.stabilizer?.dispose();
    });
});

describe('createOrchestrator', () => {
    it('should build an orchestrator over the runtime', () => {
        const config = structuredClone(DEFAULT_CONFIG);
        config.llm.api_key = 'test-secret';

        const orchestrator = createOrchestrator(config, createRuntime(config));

        expect(orchestrator).toBeInstanceOf(AgentOrchestrator);
        expect(orchestrator.getState()).toBe('PRECHECK');
    });
});
