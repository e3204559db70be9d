import fs from 'fs/promises';
import path from 'path';
import { ConfigError, ConfigLoader } from '../ConfigLoader';
import * as fileUtils from '../../utils/fileUtils';

jest.mock('fs/promises');
jest.mock('../../utils/fileUtils');
jest.mock('../../utils/logger');

const ENV_KEYS = [
    'OPENROUTER_API_KEY',
    'OPENROUTER_MODEL',
    'OPENROUTER_BASE_URL',
    'COVLOOP_COVERAGE_THRESHOLD',
    'COVLOOP_ITERATIVE',
    'COVLOOP_USE_LSP',
    'VERBOSE',
];

describe('ConfigLoader', () => {
    const mockedReadFile = jest.mocked(fs.readFile);
    const mockedFileExists = jest.mocked(fileUtils.fileExists);
    const savedEnv: Record<string, string | undefined> = {};
    let configLoader: ConfigLoader;

    beforeAll(() => {
        ENV_KEYS.forEach(key => {
            savedEnv[key] = process.env[key];
        });
    });

    afterAll(() => {
        ENV_KEYS.forEach(key => {
            if (savedEnv[key] === undefined) {
                delete process.env[key];
            } else {
                process.env[key] = savedEnv[key];
            }
        });
    });

    beforeEach(() => {
        jest.resetAllMocks();
        ENV_KEYS.forEach(key => delete process.env[key]);
        process.env.OPENROUTER_API_KEY = 'test-secret';
        mockedFileExists.mockResolvedValue(false);
        configLoader = new ConfigLoader();
    });

    describe('load', () => {
        it('should use defaults when there is no config file', async () => {
            const config = await configLoader.load();

            expect(mockedFileExists).toHaveBeenCalledWith(path.join(process.cwd(), '.covloop.yml'));
            expect(config.workflow.coverage_threshold).toBe(80);
            expect(config.workflow.max_method_retries).toBe(3);
            expect(config.llm.api_key).toBe('test-secret');
            expect(configLoader.getConfigSource()).toBe('defaults');
        });

        it('should merge a yaml file section by section over the defaults', async () => {
            mockedReadFile.mockResolvedValue([
                'workflow:',
                '  coverage_threshold: 90',
                '  max_method_retries: 5',
                'llm:',
                '  model: test/model',
            ].join('\n'));

            const config = await configLoader.load('custom.yml');

            expect(config.workflow.coverage_threshold).toBe(90);
            expect(config.workflow.max_method_retries).toBe(5);
            expect(config.workflow.max_verification_retries).toBe(3);
            expect(config.llm.model).toBe('test/model');
            expect(config.llm.base_url).toBe('https://openrouter.ai/api/v1');
            expect(configLoader.getConfigSource()).toBe('custom.yml');
        });

        it('should merge each session over its own defaults', async () => {
            mockedReadFile.mockResolvedValue('sessions:\n  step:\n    timeout_ms: 1000\n');

            const config = await configLoader.load('custom.yml');

            expect(config.sessions.step).toEqual({ max_messages: 10, timeout_ms: 1000 });
            expect(config.sessions.init).toEqual({ max_messages: 8, timeout_ms: 300000 });
        });

        it('should read the default file from the working directory when present', async () => {
            mockedFileExists.mockResolvedValue(true);
            mockedReadFile.mockResolvedValue('output:\n  result_dir: reports\n');

            const config = await configLoader.load();

            expect(config.output.result_dir).toBe('reports');
            expect(config.output.format).toEqual(['json', 'markdown']);
            expect(configLoader.getConfigSource()).toBe(path.join(process.cwd(), '.covloop.yml'));
        });

        it('should let environment variables override file values', async () => {
            mockedReadFile.mockResolvedValue('workflow:\n  coverage_threshold: 90\n');
            process.env.COVLOOP_COVERAGE_THRESHOLD = '65';
            process.env.COVLOOP_ITERATIVE = 'false';
            process.env.COVLOOP_USE_LSP = 'true';
            process.env.OPENROUTER_MODEL = 'env/model';
            process.env.VERBOSE = 'true';

            const config = await configLoader.load('custom.yml');

            expect(config.workflow.coverage_threshold).toBe(65);
            expect(config.workflow.iterative_mode).toBe(false);
            expect(config.workflow.use_lsp).toBe(true);
            expect(config.llm.model).toBe('env/model');
            expect(config.output.verbose).toBe(true);
        });

        it('should ignore a file that is not a mapping', async () => {
            mockedReadFile.mockResolvedValue('- one\n- two\n');

            const config = await configLoader.load('list.yml');

            expect(config.workflow.coverage_threshold).toBe(80);
        });

        it('should fall back to defaults when the file cannot be read', async () => {
            mockedReadFile.mockRejectedValue(new Error('ENOENT'));

            const config = await configLoader.load('missing.yml');

            expect(config.workflow.coverage_threshold).toBe(80);
        });
    });

    describe('validation', () => {
        it('should reject a threshold outside 0-100', async () => {
            mockedReadFile.mockResolvedValue('workflow:\n  coverage_threshold: 150\n');

            await expect(configLoader.load('bad.yml')).rejects.toThrow(
                new ConfigError('workflow.coverage_threshold must be between 0 and 100, got 150')
            );
        });

        it('should reject non-positive retry counts', async () => {
            mockedReadFile.mockResolvedValue('workflow:\n  max_method_retries: 0\n');

            await expect(configLoader.load('bad.yml')).rejects.toThrow('workflow.max_method_retries must be a positive integer, got 0');
        });

        it('should reject a session window that is not a positive integer', async () => {
            mockedReadFile.mockResolvedValue('sessions:\n  traditional:\n    max_messages: 2.5\n');

            await expect(configLoader.load('bad.yml')).rejects.toThrow(
                'sessions.traditional.max_messages must be a positive integer, got 2.5'
            );
        });

        it('should require an API key unless told otherwise', async () => {
            delete process.env.OPENROUTER_API_KEY;

            await expect(configLoader.load()).rejects.toThrow('Missing OPENROUTER_API_KEY. Please set it in your .env file.');
            await expect(configLoader.load(undefined, { requireApiKey: false })).resolves.toBeDefined();
        });

        it('should name the offending field', async () => {
            mockedReadFile.mockResolvedValue('llm:\n  max_empty_retries: -1\n');

            const error = await configLoader.load('bad.yml').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ConfigError);
            expect(error instanceof ConfigError ? error.field : undefined).toBe('llm.max_empty_retries');
        });
    });
});
