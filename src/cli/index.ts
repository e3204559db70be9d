#!/usr/bin/env node

import * as dotenv from 'dotenv';
import path from 'path';
import { Command } from 'commander';
import { ConfigError, ConfigLoader } from '../config/ConfigLoader';
import { CovloopConfig } from '../config/schema';
import { EnvironmentChecker, formatEnvironmentReport } from '../env/EnvironmentChecker';
import { CommandRunner } from '../executor/CommandRunner';
import { OpenRouterClient } from '../llm/OpenRouterClient';
import { LanguageServerClient } from '../lsp/LanguageServerClient';
import { RunResult } from '../orchestrator/AgentOrchestrator';
import { createOrchestrator, createRuntime } from '../orchestrator/Runtime';
import { PreCheckExecutor } from '../precheck/PreCheckExecutor';
import logger from '../utils/logger';
import { extractProjectRoot } from '../utils/ProjectPaths';

// Load .env from the working directory if present
dotenv.config();

export interface CliOptions {
    config?: string;
    threshold?: string;
    iterative?: boolean;
    lsp?: boolean;
    maxRetries?: string;
    verbose?: boolean;
    ping?: boolean;
}

const program = new Command();

program
    .name('covloop')
    .description('Coverage-driven unit test generation with an LLM in the loop')
    .version('0.1.0');

program
    .command('run')
    .description('Generate tests for one source file until its methods reach the coverage threshold')
    .argument('<targetFile>', 'Source file to cover')
    .option('-c, --config <path>', 'Custom config file')
    .option('-t, --threshold <percent>', 'Line coverage threshold per method')
    .option('--iterative', 'Process methods one at a time (default)')
    .option('--no-iterative', 'Use a single session for the whole class')
    .option('--lsp', 'Check test files with the configured language server')
    .option('--max-retries <count>', 'Generation attempts per method')
    .option('-v, --verbose', 'Verbose output')
    .action(runAction);

program
    .command('coverage')
    .description('Run the pre-check only and print the method coverage summary')
    .argument('<targetFile>', 'Source file to inspect')
    .option('-c, --config <path>', 'Custom config file')
    .option('-t, --threshold <percent>', 'Line coverage threshold per method')
    .option('-v, --verbose', 'Verbose output')
    .action(coverageAction);

program
    .command('check-env')
    .description('Check the build tool, model access and write permissions before a run')
    .argument('[projectDir]', 'Project to check', '.')
    .option('-c, --config <path>', 'Custom config file')
    .option('--no-ping', 'Skip the test request to the model')
    .action(checkEnvAction);

async function runAction(targetFile: string, options: CliOptions): Promise<void> {
    try {
        logger.info('Starting covloop...');

        const config = applyCliOptions(await new ConfigLoader().load(options.config), options);
        const sourceFile = path.resolve(targetFile);

        const lsp = config.workflow.use_lsp ? await startLanguageServer(config, sourceFile) : undefined;
        const runtime = createRuntime(config, lsp);
        let result: RunResult;
        try {
            result = await createOrchestrator(config, runtime).run(sourceFile);
        } finally {
            runtime.stabilizer?.dispose();
            await lsp?.stop();
        }

        printSummary(result);

        if (result.status === 'aborted') {
            console.error(`\nRun aborted: ${result.errorMessage ?? 'pre-check failed'}`);
            process.exit(1);
        }
        logger.info('covloop finished');
    } catch (error) {
        logger.error(`covloop failed: ${error}`);
        console.error(`\nError: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
    }
}

async function coverageAction(targetFile: string, options: CliOptions): Promise<void> {
    try {
        const config = applyCliOptions(
            await new ConfigLoader().load(options.config, { requireApiKey: false }),
            options
        );
        const runtime = createRuntime(config);
        const precheck = await new PreCheckExecutor({
            config,
            tools: runtime.registry,
            coverageSource: runtime.coverageSource,
        }).execute(path.resolve(targetFile));

        if (!precheck.success) {
            console.error(`\nPre-check failed: ${precheck.errorMessage}`);
            process.exit(1);
        }

        console.log(`\n${precheck.coverageInfoText}`);
        console.log(`\nTest file: ${precheck.testFilePath}${precheck.hasExistingTests ? '' : ' (not created yet)'}`);
    } catch (error) {
        logger.error(`covloop failed: ${error}`);
        console.error(`\nError: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
    }
}

async function checkEnvAction(projectDir: string, options: CliOptions): Promise<void> {
    try {
        const config = await new ConfigLoader().load(options.config, { requireApiKey: false });
        const client = options.ping === false
            ? undefined
            : new OpenRouterClient({ apiKey: config.llm.api_key, baseUrl: config.llm.base_url, timeout: config.llm.timeout });

        const report = await new EnvironmentChecker({
            config,
            runner: new CommandRunner(config.build.timeout),
            projectRoot: path.resolve(projectDir),
            client,
        }).check();

        console.log(`\n${formatEnvironmentReport(report)}`);
        if (!report.ready) {
            process.exit(1);
        }
    } catch (error) {
        logger.error(`Environment check failed: ${error}`);
        console.error(`\nError: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
    }
}

async function startLanguageServer(config: CovloopConfig, sourceFile: string): Promise<LanguageServerClient | undefined> {
    const client = new LanguageServerClient({
        command: config.lsp.command,
        languageId: config.lsp.language_id,
        initTimeoutMs: config.lsp.init_timeout_ms,
    });
    try {
        await client.start(await extractProjectRoot(sourceFile, config.layout));
        return client;
    } catch (error) {
        logger.warn(`⚠️ Language server unavailable, continuing with syntax checks only: ${error}`);
        return undefined;
    }
}

function printSummary(result: RunResult): void {
    console.log('\n=== covloop Results ===');

    const statusColor = result.status === 'completed' ? '\x1b[32m' : result.status === 'partial' ? '\x1b[33m' : '\x1b[31m';
    const resetColor = '\x1b[0m';
    console.log(`Status: ${statusColor}${result.status.toUpperCase()}${resetColor}`);
    if (result.mode) {
        console.log(`Mode: ${result.mode}`);
    }

    if (result.report) {
        const { counts, tokens, durationMs } = result.report;
        console.log(`Methods: ${counts.total} (success ${counts.success}, partial ${counts.partial}, failed ${counts.failed}, skipped ${counts.skipped})`);
        console.log(`Tokens: ${tokens.total}`);
        console.log(`Duration: ${(durationMs / 1000).toFixed(2)}s`);
    }

    for (const entry of result.methods) {
        console.log(`  ${entry.status.padEnd(8)} ${entry.method.signature} ${entry.coverageAchieved.toFixed(1)}%`);
    }

    if (result.reportPaths?.jsonPath) {
        console.log(`\nJSON Report: ${result.reportPaths.jsonPath}`);
    }
    if (result.reportPaths?.markdownPath) {
        console.log(`Markdown Report: ${result.reportPaths.markdownPath}`);
    }
}

function parseNumber(value: string, field: string, integer: boolean): number {
    const parsed = integer ? Number.parseInt(value, 10) : Number.parseFloat(value);
    if (Number.isNaN(parsed)) {
        throw new ConfigError(`Invalid value for ${field}: ${value}`, field);
    }
    return parsed;
}

/**
 * Apply CLI options to config
 */
function applyCliOptions(config: CovloopConfig, options: CliOptions): CovloopConfig {
    if (options.threshold !== undefined) {
        const threshold = parseNumber(options.threshold, 'workflow.coverage_threshold', false);
        if (threshold < 0 || threshold > 100) {
            throw new ConfigError(`Coverage threshold must be between 0 and 100, got ${threshold}`, 'workflow.coverage_threshold');
        }
        config.workflow.coverage_threshold = threshold;
    }
    if (options.iterative !== undefined) {
        config.workflow.iterative_mode = options.iterative;
    }
    if (options.lsp) {
        config.workflow.use_lsp = true;
    }
    if (options.maxRetries !== undefined) {
        const retries = parseNumber(options.maxRetries, 'workflow.max_method_retries', true);
        if (retries < 1) {
            throw new ConfigError(`max retries must be a positive integer, got ${retries}`, 'workflow.max_method_retries');
        }
        config.workflow.max_method_retries = retries;
    }
    if (options.verbose) {
        config.output.verbose = true;
    }
    if (config.output.verbose) {
        logger.level = 'debug';
    }

    return config;
}

// Only parse arguments if this module is run directly
if (require.main === module) {
    program.parse();
}

export { program, applyCliOptions, runAction, coverageAction, checkEnvAction };
