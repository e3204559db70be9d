import path from 'path';
import { CovloopConfig } from '../config/schema';
import { CommandRunner } from '../executor/CommandRunner';
import { ChatClient } from '../llm/types';
import { fileExists, removeFile, writeFile } from '../utils/fileUtils';
import logger from '../utils/logger';

export type CheckName = 'build' | 'llm' | 'coverage' | 'syntax' | 'lsp' | 'permissions';

export interface EnvironmentCheck {
    name: CheckName;
    ok: boolean;
    detail: string;
    suggestion?: string;
}

export interface EnvironmentReport {
    ready: boolean;
    checks: EnvironmentCheck[];
}

export interface EnvironmentCheckerOptions {
    config: CovloopConfig;
    runner: CommandRunner;
    /** Project the run will work in */
    projectRoot: string;
    /** When set, the model is sent one short request */
    client?: ChatClient;
}

const LOOKUP_TIMEOUT = 10000;
const WRITE_CHECK_FILE = '.covloop-write-check';

const CHECK_LABELS: Record<CheckName, string> = {
    build: 'Build tool',
    llm: 'LLM',
    coverage: 'Coverage report',
    syntax: 'Syntax checker',
    lsp: 'Language server',
    permissions: 'Permissions',
};

/**
 * First word of a shell command, the executable that has to be on PATH
 */
export function commandTool(command: string): string {
    return command.trim().split(/\s+/)[0];
}

/**
 * Verifies that a run can start: tools on PATH, model credentials,
 * coverage settings and write access to the test directory
 */
export class EnvironmentChecker {
    constructor(private readonly options: EnvironmentCheckerOptions) {}

    async check(): Promise<EnvironmentReport> {
        const { config } = this.options;
        logger.info(`Checking environment for ${this.options.projectRoot}`);

        const checks: EnvironmentCheck[] = [
            await this.checkTool('build', config.build.compile_command, 'build.compile_command'),
            await this.checkLlm(),
            await this.checkCoverage(),
            await this.checkSyntax(),
        ];
        if (config.workflow.use_lsp) {
            checks.push(await this.checkTool('lsp', config.lsp.command, 'lsp.command'));
        }
        checks.push(await this.checkPermissions());

        for (const check of checks) {
            if (check.ok) {
                logger.info(`${CHECK_LABELS[check.name]}: OK (${check.detail})`);
            } else {
                logger.warn(`${CHECK_LABELS[check.name]}: FAILED (${check.detail})`);
            }
        }

        return { ready: checks.every(c => c.ok), checks };
    }

    private async checkTool(name: CheckName, command: string, field: string): Promise<EnvironmentCheck> {
        const tool = commandTool(command);
        if (!tool) {
            return { name, ok: false, detail: `${field} is empty`, suggestion: `Set ${field} in .covloop.yml` };
        }
        const missing: EnvironmentCheck = {
            name,
            ok: false,
            detail: `${tool} not found on PATH`,
            suggestion: `Install ${tool} and make sure it is on your PATH`,
        };
        try {
            const result = await this.options.runner.execute(`command -v ${tool}`, this.options.projectRoot, LOOKUP_TIMEOUT);
            return result.exitCode === 0 ? { name, ok: true, detail: `${tool} found` } : missing;
        } catch (error) {
            logger.debug(`Lookup of ${tool} failed: ${error}`);
            return missing;
        }
    }

    private async checkLlm(): Promise<EnvironmentCheck> {
        const { llm } = this.options.config;
        const { client } = this.options;
        if (!llm.api_key) {
            return {
                name: 'llm',
                ok: false,
                detail: 'Missing API key',
                suggestion: 'Set OPENROUTER_API_KEY in your .env file',
            };
        }
        if (!client) {
            return { name: 'llm', ok: true, detail: `API key set for ${llm.model}` };
        }

        try {
            await client.chat(
                { model: llm.model, messages: [{ role: 'user', content: 'ping' }], maxTokens: 1 },
                'check-env'
            );
            return { name: 'llm', ok: true, detail: `${llm.model} reachable` };
        } catch (error) {
            return {
                name: 'llm',
                ok: false,
                detail: error instanceof Error ? error.message : String(error),
                suggestion: 'Check llm.model, llm.base_url and the API key',
            };
        }
    }

    private async checkCoverage(): Promise<EnvironmentCheck> {
        const reportPath = this.options.config.coverage.report_path;
        if (!reportPath.trim()) {
            return {
                name: 'coverage',
                ok: false,
                detail: 'coverage.report_path is empty',
                suggestion: 'Point coverage.report_path at the JaCoCo XML report',
            };
        }
        const absolute = path.resolve(this.options.projectRoot, reportPath);
        return {
            name: 'coverage',
            ok: true,
            detail: (await fileExists(absolute)) ? `report found at ${absolute}` : `no report at ${absolute} yet`,
        };
    }

    private async checkSyntax(): Promise<EnvironmentCheck> {
        const command = this.options.config.build.syntax_command;
        if (!command) {
            return { name: 'syntax', ok: true, detail: 'built-in delimiter check' };
        }
        const found = await this.checkTool('syntax', command, 'build.syntax_command');
        return found.ok ? { ...found, detail: command } : found;
    }

    private async checkPermissions(): Promise<EnvironmentCheck> {
        const testDir = path.join(this.options.projectRoot, this.options.config.layout.test_dir);
        const marker = path.join(testDir, WRITE_CHECK_FILE);
        try {
            await writeFile(marker, '');
            await removeFile(marker);
            return { name: 'permissions', ok: true, detail: `${testDir} is writable` };
        } catch (error) {
            return {
                name: 'permissions',
                ok: false,
                detail: `cannot write to ${testDir}: ${error instanceof Error ? error.message : String(error)}`,
                suggestion: `Make sure ${testDir} exists or can be created`,
            };
        }
    }
}

export function formatEnvironmentReport(report: EnvironmentReport): string {
    const lines: string[] = [];
    for (const check of report.checks) {
        lines.push(`${CHECK_LABELS[check.name]}: ${check.ok ? 'OK' : 'FAILED'} (${check.detail})`);
        if (check.suggestion) {
            lines.push(`  Suggestion: ${check.suggestion}`);
        }
    }
    lines.push(report.ready ? 'Environment is ready.' : 'Fix the issues above before running covloop.');
    return lines.join('\n');
}
