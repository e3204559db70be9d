import fs from 'fs/promises';
import path from 'path';
import yaml from 'js-yaml';
import { CovloopConfig, DEFAULT_CONFIG, SessionLimits } from './schema';
import { fileExists } from '../utils/fileUtils';
import logger from '../utils/logger';

export const DEFAULT_CONFIG_FILE = '.covloop.yml';

type SessionName = keyof CovloopConfig['sessions'];

const SESSION_NAMES: readonly SessionName[] = ['init', 'step', 'traditional'];

/**
 * Section-level partial of the config as it appears in a yaml file;
 * session limits are partial one level further down
 */
export type ConfigOverrides = {
    [K in Exclude<keyof CovloopConfig, 'sessions'>]?: Partial<CovloopConfig[K]>;
} & {
    sessions?: { [K in SessionName]?: Partial<SessionLimits> };
};

export class ConfigError extends Error {
    constructor(message: string, public readonly field?: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export interface LoadOptions {
    /** The pre-check only command does not talk to a model */
    requireApiKey?: boolean;
}

/**
 * Load and validate configuration
 */
export class ConfigLoader {
    private configSource: string = 'defaults';

    /**
     * Load configuration from file or use defaults
     */
    async load(configPath?: string, options: LoadOptions = {}): Promise<CovloopConfig> {
        let config: ConfigOverrides = {};

        if (configPath) {
            config = await this.loadFromFile(configPath);
            this.configSource = configPath;
        } else {
            const defaultPath = path.join(process.cwd(), DEFAULT_CONFIG_FILE);
            if (await fileExists(defaultPath)) {
                config = await this.loadFromFile(defaultPath);
                this.configSource = defaultPath;
            }
        }

        const mergedConfig = this.mergeWithDefaults(config);

        this.applyEnvironmentOverrides(mergedConfig);

        this.validate(mergedConfig, options.requireApiKey ?? true);

        logger.info(`Configuration loaded successfully from: ${this.configSource}`);
        return mergedConfig;
    }

    getConfigSource(): string {
        return this.configSource;
    }

    /**
     * Load config from file
     */
    private async loadFromFile(filePath: string): Promise<ConfigOverrides> {
        try {
            const content = await fs.readFile(filePath, 'utf-8');
            const parsed: unknown = yaml.load(content);
            if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
                logger.warn(`Config file ${filePath} is not a mapping, ignoring it`);
                return {};
            }
            logger.info(`Loaded config from: ${filePath}`);
            // Value types are checked in validate() after the merge
            return parsed as ConfigOverrides;
        } catch (error) {
            logger.warn(`Failed to load config from ${filePath}: ${error}`);
            return {};
        }
    }

    /**
     * Merge with default configuration
     */
    private mergeWithDefaults(config: ConfigOverrides): CovloopConfig {
        return {
            llm: { ...DEFAULT_CONFIG.llm, ...config.llm },
            workflow: { ...DEFAULT_CONFIG.workflow, ...config.workflow },
            sessions: {
                init: { ...DEFAULT_CONFIG.sessions.init, ...config.sessions?.init },
                step: { ...DEFAULT_CONFIG.sessions.step, ...config.sessions?.step },
                traditional: { ...DEFAULT_CONFIG.sessions.traditional, ...config.sessions?.traditional },
            },
            build: { ...DEFAULT_CONFIG.build, ...config.build },
            coverage: { ...DEFAULT_CONFIG.coverage, ...config.coverage },
            layout: { ...DEFAULT_CONFIG.layout, ...config.layout },
            lsp: { ...DEFAULT_CONFIG.lsp, ...config.lsp },
            prompts: { ...DEFAULT_CONFIG.prompts, ...config.prompts },
            output: { ...DEFAULT_CONFIG.output, ...config.output },
        };
    }

    /**
     * Apply environment variable overrides
     */
    private applyEnvironmentOverrides(config: CovloopConfig): void {
        if (process.env.OPENROUTER_API_KEY) {
            config.llm.api_key = process.env.OPENROUTER_API_KEY;
        }
        if (process.env.OPENROUTER_MODEL) {
            config.llm.model = process.env.OPENROUTER_MODEL;
        }
        if (process.env.OPENROUTER_BASE_URL) {
            config.llm.base_url = process.env.OPENROUTER_BASE_URL;
        }

        if (process.env.COVLOOP_COVERAGE_THRESHOLD) {
            config.workflow.coverage_threshold = parseFloat(process.env.COVLOOP_COVERAGE_THRESHOLD);
        }
        if (process.env.COVLOOP_ITERATIVE) {
            config.workflow.iterative_mode = process.env.COVLOOP_ITERATIVE === 'true';
        }
        if (process.env.COVLOOP_USE_LSP) {
            config.workflow.use_lsp = process.env.COVLOOP_USE_LSP === 'true';
        }

        if (process.env.VERBOSE === 'true') {
            config.output.verbose = true;
        }
    }

    /**
     * Reject values the workflow cannot run with
     */
    private validate(config: CovloopConfig, requireApiKey: boolean): void {
        const threshold = config.workflow.coverage_threshold;
        if (typeof threshold !== 'number' || Number.isNaN(threshold) || threshold < 0 || threshold > 100) {
            throw new ConfigError(
                `workflow.coverage_threshold must be between 0 and 100, got ${threshold}`,
                'workflow.coverage_threshold'
            );
        }

        const counts: Array<[string, number]> = [
            ['workflow.max_method_retries', config.workflow.max_method_retries],
            ['workflow.max_verification_retries', config.workflow.max_verification_retries],
            ['workflow.fallback_max_iterations', config.workflow.fallback_max_iterations],
            ['workflow.fallback_max_retries', config.workflow.fallback_max_retries],
            ['llm.max_empty_retries', config.llm.max_empty_retries],
            ['llm.max_tool_iterations', config.llm.max_tool_iterations],
            ...SESSION_NAMES.flatMap((name): Array<[string, number]> => [
                [`sessions.${name}.max_messages`, config.sessions[name].max_messages],
                [`sessions.${name}.timeout_ms`, config.sessions[name].timeout_ms],
            ]),
        ];
        for (const [field, value] of counts) {
            if (!Number.isInteger(value) || value < 1) {
                throw new ConfigError(`${field} must be a positive integer, got ${value}`, field);
            }
        }

        if (requireApiKey && config.llm.provider === 'openrouter' && !config.llm.api_key) {
            throw new ConfigError('Missing OPENROUTER_API_KEY. Please set it in your .env file.', 'llm.api_key');
        }
    }
}
