import { AgentOrchestrator, extractProgress, isCompletionResponse } from '../AgentOrchestrator';
import { CovloopConfig, DEFAULT_CONFIG } from '../../config/schema';
import { CompileGuard } from '../../guard/CompileGuard';
import { ResponseStreamingHandler } from '../../llm/StreamingHandler';
import { LlmResponse, SessionFactory, SessionOptions } from '../../llm/types';
import { ClassCoverageReport, CoverageReportSource, MethodCounters } from '../../models/CoverageModels';
import { ReportGenerator } from '../../reporter/ReportGenerator';
import { TOOL } from '../../tools/ToolNames';
import { ToolArgs, ToolInvoker } from '../../tools/ToolRegistry';
import { fileExists } from '../../utils/fileUtils';

jest.mock('../../utils/logger');
jest.mock('../../utils/fileUtils');

const SOURCE = '/proj/src/main/java/com/example/Calc.java';
const TEST_FILE = '/proj/src/test/java/com/example/CalcTest.java';

const CALC: MethodCounters = {
    name: 'calc',
    params: ['int', 'int'],
    counters: [
        { type: 'LINE', covered: 0, missed: 4 },
        { type: 'BRANCH', covered: 0, missed: 2 },
    ],
};
const GET_X: MethodCounters = { name: 'getX', params: [], counters: [{ type: 'LINE', covered: 17, missed: 3 }] };

function report(methods: MethodCounters[], covered: number = 0, missed: number = 10): ClassCoverageReport {
    return { className: 'com.example.Calc', methods, counters: [{ type: 'LINE', covered, missed }] };
}

const ok = (content: string = 'done'): LlmResponse => ({ success: true, content });

/**
 * Scripted model: each created session answers with the next queued response
 */
class ScriptedSessions implements SessionFactory {
    readonly created: SessionOptions[] = [];
    private readonly script: LlmResponse[];

    constructor(script: LlmResponse[] = [], private readonly fallback: LlmResponse = ok()) {
        this.script = [...script];
    }

    create(options: SessionOptions) {
        this.created.push(options);
        const response = this.script.shift() ?? this.fallback;
        return {
            run: async () => response,
            runStream: () => new ResponseStreamingHandler(Promise.resolve(response)),
            cancel: () => undefined,
        };
    }

    labels(): (string | undefined)[] {
        return this.created.map(o => o.label);
    }
}

/**
 * Build and coverage tools with per-tool output queues; the last output repeats
 */
class ScriptedTools implements ToolInvoker {
    readonly calls: { name: string; args: ToolArgs }[] = [];
    private readonly outputs: Record<string, string[]> = {
        [TOOL.compileProject]: ['exitCode=0\nBUILD SUCCESS'],
        [TOOL.checkSyntax]: [`SYNTAX_OK: ${TEST_FILE}`],
        [TOOL.executeTest]: ['exitCode=0\nBUILD SUCCESS\nTests run: 2, Failures: 0, Errors: 0'],
        [TOOL.getSingleMethodCoverage]: ['calc(int, int) line=90.0% branch=50.0%'],
    };

    script(name: string, ...outputs: string[]): this {
        this.outputs[name] = outputs;
        return this;
    }

    async invoke(name: string, args: ToolArgs): Promise<string> {
        this.calls.push({ name, args });
        const queue = this.outputs[name];
        if (!queue || queue.length === 0) {
            return `ERROR: Unknown tool '${name}'`;
        }
        return queue.length > 1 ? queue.shift() ?? '' : queue[0];
    }

    count(name: string): number {
        return this.calls.filter(c => c.name === name).length;
    }
}

describe('AgentOrchestrator', () => {
    let config: CovloopConfig;
    let tools: ScriptedTools;
    let coverageSource: jest.Mocked<CoverageReportSource>;
    let reportGenerator: ReportGenerator;

    beforeEach(() => {
        config = structuredClone(DEFAULT_CONFIG);
        config.workflow.feedback = false;
        tools = new ScriptedTools();
        coverageSource = { getClassCoverage: jest.fn() };
        coverageSource.getClassCoverage.mockResolvedValue({ ok: true, report: report([CALC, GET_X]), reportPath: '/proj/jacoco.xml' });
        reportGenerator = new ReportGenerator();
        jest.spyOn(reportGenerator, 'generateReports').mockResolvedValue({ outputDir: '/proj/result' });
        jest.mocked(fileExists).mockImplementation(async p => p === SOURCE);
    });

    afterEach(() => {
        jest.clearAllMocks();
    });

    function orchestrator(sessions: SessionFactory): AgentOrchestrator {
        return new AgentOrchestrator({
            config,
            sessions,
            tools,
            toolNames: Object.values(TOOL),
            guard: new CompileGuard(),
            coverageSource,
            reportGenerator,
        });
    }

    describe('iterative mode', () => {
        it('should work on the uncovered method first and skip a covered one without asking the model', async () => {
            const sessions = new ScriptedSessions();

            const result = await orchestrator(sessions).run(SOURCE);

            expect(result.status).toBe('completed');
            expect(result.mode).toBe('iterative');
            expect(result.precheck.testFilePath).toBe(TEST_FILE);
            expect(result.methods.map(e => [e.method.name, e.method.priority])).toEqual([['calc', 'P0'], ['getX', 'P2']]);
            expect(result.methods[0]).toMatchObject({ status: 'SUCCESS', coverageAchieved: 90, notes: 'Attempt 1' });
            expect(result.methods[1]).toMatchObject({ status: 'SKIPPED', coverageAchieved: 85, notes: 'Already at 85.0%' });
            expect(sessions.labels()).toEqual(['init', 'generate calc #1']);
            expect(result.report?.counts).toEqual({ total: 2, success: 1, failed: 0, partial: 0, skipped: 1 });
        });

        it('should measure each method by its full signature', async () => {
            await orchestrator(new ScriptedSessions()).run(SOURCE);

            const lookup = tools.calls.find(c => c.name === TOOL.getSingleMethodCoverage);
            expect(lookup?.args).toEqual({ projectRoot: '/proj', className: 'com.example.Calc', methodName: 'calc(int, int)' });
        });

        it('should hand the init session analysis tools only and the generation session write tools', async () => {
            const sessions = new ScriptedSessions();

            await orchestrator(sessions).run(SOURCE);

            const [init, generate] = sessions.created;
            expect(init.capabilities.has(TOOL.readFile)).toBe(true);
            expect(init.capabilities.has(TOOL.compileProject)).toBe(false);
            expect(generate.capabilities.has(TOOL.writeFile)).toBe(true);
            expect(generate.capabilities.has(TOOL.executeTest)).toBe(false);
        });

        it('should repair a syntax failure and then succeed', async () => {
            coverageSource.getClassCoverage.mockResolvedValue({ ok: true, report: report([CALC]), reportPath: '/proj/jacoco.xml' });
            tools.script(TOOL.checkSyntax, `SYNTAX_ERROR: 1 issue(s) in ${TEST_FILE}\n${TEST_FILE}:3:1 [SYNTAX002] Unclosed '{'`, `SYNTAX_OK: ${TEST_FILE}`);
            const sessions = new ScriptedSessions();

            const result = await orchestrator(sessions).run(SOURCE);

            expect(result.status).toBe('completed');
            expect(result.methods[0]).toMatchObject({ status: 'SUCCESS', coverageAchieved: 90 });
            expect(sessions.labels()).toEqual(['init', 'generate calc #1', 'repair calc SYNTAX_CHECK']);
            expect(tools.count(TOOL.checkSyntax)).toBe(2);
            expect(tools.count(TOOL.executeTest)).toBe(1);
        });

        it('should end PARTIAL with the last coverage when every attempt stays below the threshold', async () => {
            coverageSource.getClassCoverage.mockResolvedValue({ ok: true, report: report([CALC]), reportPath: '/proj/jacoco.xml' });
            tools.script(TOOL.getSingleMethodCoverage, 'calc(int, int) line=30.0% branch=0.0%', 'calc(int, int) line=40.0% branch=0.0%');
            const sessions = new ScriptedSessions();

            const result = await orchestrator(sessions).run(SOURCE);

            expect(result.status).toBe('partial');
            expect(result.methods[0]).toMatchObject({
                status: 'PARTIAL',
                coverageAchieved: 40,
                notes: 'Coverage 40.0% below 80% after 3 attempts',
            });
            expect(sessions.labels()).toEqual(['init', 'generate calc #1', 'generate calc #2', 'generate calc #3']);
        });

        it('should fail a method whose tests still fail after every repair', async () => {
            coverageSource.getClassCoverage.mockResolvedValue({ ok: true, report: report([CALC]), reportPath: '/proj/jacoco.xml' });
            tools.script(TOOL.executeTest, 'exitCode=1\nTests run: 2, Failures: 1, Errors: 0');
            const sessions = new ScriptedSessions();

            const result = await orchestrator(sessions).run(SOURCE);

            expect(result.status).toBe('failed');
            expect(result.methods[0]).toMatchObject({
                status: 'FAILED',
                coverageAchieved: 0,
                notes: 'Verification failed at TEST: Tests failed (failures=1, errors=0)',
            });
            expect(sessions.labels()).toEqual([
                'init',
                'generate calc #1',
                'repair calc TEST',
                'repair calc TEST',
                'repair calc TEST',
            ]);
            expect(tools.count(TOOL.executeTest)).toBe(4);
            expect(tools.count(TOOL.getSingleMethodCoverage)).toBe(0);
        });

        it('should count a coverage lookup failure as an attempt without repairing it', async () => {
            coverageSource.getClassCoverage.mockResolvedValue({ ok: true, report: report([CALC]), reportPath: '/proj/jacoco.xml' });
            tools.script(TOOL.getSingleMethodCoverage, 'ERROR: No coverage report found', 'calc(int, int) line=90.0% branch=50.0%');
            const sessions = new ScriptedSessions();

            const result = await orchestrator(sessions).run(SOURCE);

            expect(result.status).toBe('completed');
            expect(result.methods[0]).toMatchObject({ status: 'SUCCESS', coverageAchieved: 90, notes: 'Attempt 2' });
            expect(sessions.labels()).toEqual(['init', 'generate calc #1', 'generate calc #2']);
        });

        it('should end every method in a terminal status when something throws mid-method', async () => {
            const sessions = new ScriptedSessions();
            const create = sessions.create.bind(sessions);
            jest.spyOn(sessions, 'create').mockImplementation(options => {
                if (options.label?.startsWith('generate')) {
                    throw new Error('session pool exhausted');
                }
                return create(options);
            });

            const result = await orchestrator(sessions).run(SOURCE);

            expect(result.status).toBe('failed');
            expect(result.errorMessage).toBe('session pool exhausted');
            expect(result.methods.map(e => [e.method.name, e.status, e.notes])).toEqual([
                ['calc', 'FAILED', 'Run aborted: session pool exhausted'],
                ['getX', 'FAILED', 'Run aborted: session pool exhausted'],
            ]);
            expect(result.report?.counts).toEqual({ total: 2, success: 0, failed: 2, partial: 0, skipped: 0 });
            expect(reportGenerator.generateReports).toHaveBeenCalledTimes(1);
        });

        it('should fail a method after repeated empty responses without further attempts', async () => {
            coverageSource.getClassCoverage.mockResolvedValue({ ok: true, report: report([CALC]), reportPath: '/proj/jacoco.xml' });
            const sessions = new ScriptedSessions([ok('skeleton written')], ok(''));

            const result = await orchestrator(sessions).run(SOURCE);

            expect(result.status).toBe('failed');
            expect(result.methods[0]).toMatchObject({
                status: 'FAILED',
                coverageAchieved: 0,
                notes: 'Generation failed: Empty response after 3 attempt(s)',
            });
            expect(sessions.created).toHaveLength(4);
            expect(tools.count(TOOL.checkSyntax)).toBe(0);
        });

        it('should fail every method when the init session fails', async () => {
            const sessions = new ScriptedSessions([{ success: false, errorMessage: 'rate limited', content: '' }]);

            const result = await orchestrator(sessions).run(SOURCE);

            expect(result.status).toBe('failed');
            expect(result.methods.map(e => e.status)).toEqual(['FAILED', 'FAILED']);
            expect(result.methods[0].notes).toBe('Test file initialization failed: rate limited');
            expect(sessions.created).toHaveLength(1);
        });

        it('should skip low-priority methods when the class already meets the target', async () => {
            config.workflow.skip_low_priority = true;
            config.workflow.feedback = true;
            const feedback = {
                runFeedbackCycle: jest.fn().mockResolvedValue({
                    iteration: 1,
                    currentCoverage: 85,
                    targetCoverage: 80,
                    targetMet: true,
                    uncoveredMethods: [],
                    improvements: [],
                    nextAction: 'done',
                }),
                iterationSummary: jest.fn().mockReturnValue('1 feedback cycle(s)'),
            };
            const sessions = new ScriptedSessions();

            const result = await new AgentOrchestrator({
                config,
                sessions,
                tools,
                toolNames: Object.values(TOOL),
                guard: new CompileGuard(),
                coverageSource,
                reportGenerator,
                feedback,
            }).run(SOURCE);

            expect(result.methods[1]).toMatchObject({ status: 'SKIPPED', notes: 'Low priority, skipped' });
            expect(result.report?.feedbackSummary).toBe('1 feedback cycle(s)');
        });
    });

    it('should abort without a report when the pre-check fails', async () => {
        jest.mocked(fileExists).mockResolvedValue(false);
        const sessions = new ScriptedSessions();

        const result = await orchestrator(sessions).run(SOURCE);

        expect(result.status).toBe('aborted');
        expect(result.errorMessage).toBe(`Source file not found: ${SOURCE}`);
        expect(result.report).toBeUndefined();
        expect(sessions.created).toHaveLength(0);
        expect(reportGenerator.generateReports).not.toHaveBeenCalled();
    });

    it('should judge a single traditional session by the coverage measured afterwards', async () => {
        config.workflow.iterative_mode = false;
        coverageSource.getClassCoverage
            .mockResolvedValueOnce({ ok: true, report: report([CALC, GET_X]), reportPath: '/proj/jacoco.xml' })
            .mockResolvedValue({
                ok: true,
                report: report([{ ...CALC, counters: [{ type: 'LINE', covered: 2, missed: 2 }] }, GET_X]),
                reportPath: '/proj/jacoco.xml',
            });
        const sessions = new ScriptedSessions();

        const result = await orchestrator(sessions).run(SOURCE);

        expect(result.mode).toBe('traditional');
        expect(result.status).toBe('partial');
        expect(result.methods.map(e => [e.method.name, e.status, e.coverageAchieved])).toEqual([
            ['calc', 'PARTIAL', 50],
            ['getX', 'SUCCESS', 85],
        ]);
        expect(sessions.labels()).toEqual(['traditional']);
    });

    describe('fallback mode', () => {
        beforeEach(() => {
            coverageSource.getClassCoverage.mockResolvedValueOnce({ ok: true, report: report([]), reportPath: '/proj/jacoco.xml' });
        });

        it('should stop when measured coverage meets the threshold even without a completion claim', async () => {
            coverageSource.getClassCoverage.mockResolvedValue({ ok: true, report: report([], 9, 1), reportPath: '/proj/jacoco.xml' });
            const sessions = new ScriptedSessions([ok('METHOD: calc COVERAGE: 75%')]);

            const result = await orchestrator(sessions).run(SOURCE);

            expect(result.mode).toBe('fallback');
            expect(result.status).toBe('completed');
            expect(sessions.created).toHaveLength(1);
            expect(result.report?.methods.map(m => [m.name, m.status])).toEqual([['calc', 'PARTIAL']]);
        });

        it('should keep going while the model claims nothing and coverage stays low', async () => {
            config.workflow.fallback_max_iterations = 2;
            coverageSource.getClassCoverage.mockResolvedValue({ ok: true, report: report([], 1, 9), reportPath: '/proj/jacoco.xml' });
            const sessions = new ScriptedSessions([ok('METHOD: calc COVERAGE: 40%'), ok('METHOD: calc COVERAGE: 60%')]);

            const result = await orchestrator(sessions).run(SOURCE);

            expect(result.status).toBe('partial');
            expect(sessions.labels()).toEqual(['fallback #1', 'fallback #2']);
        });

        it('should accept a completion claim', async () => {
            coverageSource.getClassCoverage.mockResolvedValue({ ok: true, report: report([], 1, 9), reportPath: '/proj/jacoco.xml' });
            const sessions = new ScriptedSessions([ok('All methods tested. ITERATION_COMPLETE')]);

            const result = await orchestrator(sessions).run(SOURCE);

            expect(result.status).toBe('completed');
        });

        it('should take measured coverage over a reply that mentions a failure', async () => {
            coverageSource.getClassCoverage.mockResolvedValue({ ok: true, report: report([], 9, 1), reportPath: '/proj/jacoco.xml' });
            const sessions = new ScriptedSessions([ok('One test failed at first, fixed it. METHOD: calc COVERAGE: 90%')]);

            const result = await orchestrator(sessions).run(SOURCE);

            expect(result.status).toBe('completed');
            expect(sessions.created).toHaveLength(1);
            expect(result.report?.methods.map(m => [m.name, m.status, m.finalCoverage])).toEqual([['calc', 'SUCCESS', 90]]);
        });

        it('should give up on an iteration after consecutive failures and move on to the next', async () => {
            config.workflow.fallback_max_iterations = 2;
            const failed = ok('Compilation failed again');
            const sessions = new ScriptedSessions([failed, failed, failed, ok('METHOD: add COVERAGE: 50%')]);

            const result = await orchestrator(sessions).run(SOURCE);

            expect(result.status).toBe('partial');
            expect(sessions.labels()).toEqual(['fallback #1', 'fallback #1', 'fallback #1', 'fallback #2']);
            expect(result.report?.methods.map(m => [m.name, m.status])).toEqual([
                ['iteration 1', 'FAILED'],
                ['add', 'PARTIAL'],
            ]);
        });

        it('should fail when every iteration is given up', async () => {
            config.workflow.fallback_max_iterations = 2;
            const sessions = new ScriptedSessions([], { success: false, errorMessage: 'rate limited', content: '' });

            const result = await orchestrator(sessions).run(SOURCE);

            expect(result.status).toBe('failed');
            expect(sessions.created).toHaveLength(6);
            expect(result.report?.methods.map(m => [m.name, m.status])).toEqual([
                ['iteration 1', 'FAILED'],
                ['iteration 2', 'FAILED'],
            ]);
        });
    });
});

describe('isCompletionResponse', () => {
    it('should recognize the completion phrases', () => {
        expect(isCompletionResponse('ITERATION_COMPLETE')).toBe(true);
        expect(isCompletionResponse('All methods completed.')).toBe(true);
        expect(isCompletionResponse('Iterative generation completed successfully')).toBe(true);
        expect(isCompletionResponse('Wrote tests for calc')).toBe(false);
    });
});

describe('extractProgress', () => {
    it('should read method and coverage lines', () => {
        expect(extractProgress('METHOD: calc\nCOVERAGE: 72.5%')).toEqual({ method: 'calc', coverage: 72.5 });
        expect(extractProgress('nothing here')).toEqual({ method: undefined, coverage: undefined });
    });
});
