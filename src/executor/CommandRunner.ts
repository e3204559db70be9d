import { ChildProcess, spawn } from 'child_process';
import logger from '../utils/logger';

export interface CommandResult {
    exitCode: number;
    stdout: string;
    stderr: string;
    duration: number;
}

export type SpawnFn = (command: string, cwd: string) => ChildProcess;

export class CommandTimeoutError extends Error {
    constructor(public readonly command: string, public readonly timeoutMs: number) {
        super(`Command timed out after ${timeoutMs}ms: ${command}`);
        this.name = 'CommandTimeoutError';
    }
}

const shellSpawn: SpawnFn = (command, cwd) =>
    spawn(command, {
        cwd,
        shell: true,
        env: { ...process.env, FORCE_COLOR: '0' },
    });

/**
 * Executes build commands and captures output
 */
export class CommandRunner {
    constructor(
        private readonly defaultTimeout: number = 300000,
        private readonly spawnFn: SpawnFn = shellSpawn
    ) {}

    /**
     * Execute a command. Both streams are drained as they arrive; the process
     * is killed when the timeout expires.
     */
    async execute(command: string, cwd: string, timeout: number = this.defaultTimeout): Promise<CommandResult> {
        const startTime = Date.now();

        logger.info(`Executing command: ${command} in ${cwd}`);

        return new Promise((resolve, reject) => {
            const child = this.spawnFn(command, cwd);

            let stdout = '';
            let stderr = '';
            let settled = false;

            // Decoded per stream so multi-byte characters split across chunks survive
            child.stdout?.setEncoding('utf8');
            child.stderr?.setEncoding('utf8');

            child.stdout?.on('data', (data: string) => {
                stdout += data;
            });

            child.stderr?.on('data', (data: string) => {
                stderr += data;
            });

            const timeoutId = setTimeout(() => {
                settled = true;
                child.kill('SIGKILL');
                logger.error(`Command timed out after ${timeout}ms: ${command}`);
                reject(new CommandTimeoutError(command, timeout));
            }, timeout);

            child.on('close', (code: number | null) => {
                clearTimeout(timeoutId);
                if (settled) {
                    return;
                }
                settled = true;
                const duration = Date.now() - startTime;

                // Killed by a signal: no exit code, treat as failure
                const result: CommandResult = {
                    exitCode: code ?? 1,
                    stdout,
                    stderr,
                    duration,
                };

                logger.info(`Command completed with exit code ${result.exitCode} in ${duration}ms`);
                resolve(result);
            });

            child.on('error', (error: Error) => {
                clearTimeout(timeoutId);
                if (settled) {
                    return;
                }
                settled = true;
                logger.error(`Command execution error: ${error}`);
                reject(error);
            });
        });
    }
}
