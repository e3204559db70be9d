import path from 'path';
import { CovloopConfig } from '../config/schema';
import { CommandResult, CommandRunner } from '../executor/CommandRunner';
import { CompileGuard } from '../guard/CompileGuard';
import { TOOL } from './ToolNames';
import { stringArg, ToolArgs, ToolDefinition } from './ToolRegistry';

const OUTPUT_TAIL = 4000;

function tail(text: string): string {
    return text.length > OUTPUT_TAIL ? `...${text.slice(-OUTPUT_TAIL)}` : text;
}

/**
 * `exitCode=N`, a verdict line, then the tail of both streams
 */
export function formatBuildResult(result: CommandResult): string {
    const verdict = result.exitCode === 0 ? 'BUILD SUCCESS' : 'BUILD FAILURE';
    const parts = [`exitCode=${result.exitCode}`, verdict];
    if (result.stdout.trim()) {
        parts.push('--- stdout ---', tail(result.stdout.trim()));
    }
    if (result.stderr.trim()) {
        parts.push('--- stderr ---', tail(result.stderr.trim()));
    }
    return parts.join('\n');
}

export interface BuildToolOptions {
    guard: CompileGuard;
    runner: CommandRunner;
    build: CovloopConfig['build'];
}

/**
 * Build actions. Each one asks the compile guard first and hands its
 * refusal back as the tool result.
 */
export function createBuildTools(options: BuildToolOptions): ToolDefinition[] {
    const { guard, runner, build } = options;

    const guarded = async (args: ToolArgs, command: string): Promise<string> => {
        const check = guard.canCompile();
        if (!check.canCompile) {
            return check.blockReason;
        }
        const root = path.resolve(stringArg(args, 'projectRoot') ?? process.cwd());
        const result = await runner.execute(command, root, build.timeout);
        return formatBuildResult(result);
    };

    const rootParam = { type: 'string' as const, description: 'Project root directory', required: true };

    return [
        {
            name: TOOL.compileProject,
            description: 'Compile main and test sources. Blocked until every edited file passed checkSyntax.',
            parameters: { projectRoot: rootParam },
            handler: args => guarded(args, build.compile_command),
        },
        {
            name: TOOL.cleanAndTest,
            description: 'Clean build, run all tests and produce a coverage report',
            parameters: { projectRoot: rootParam },
            handler: args => guarded(args, build.clean_test_command),
        },
        {
            name: TOOL.executeTest,
            description: 'Run one test class and refresh the coverage report',
            parameters: {
                projectRoot: rootParam,
                testClass: { type: 'string', description: 'Test class name', required: true },
            },
            handler: args => guarded(args, build.test_command.split('{test}').join(stringArg(args, 'testClass') ?? '')),
        },
    ];
}
