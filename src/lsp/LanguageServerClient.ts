import { ChildProcessWithoutNullStreams, spawn } from 'child_process';
import path from 'path';
import { pathToFileURL } from 'url';
import {
    createMessageConnection,
    MessageConnection,
    StreamMessageReader,
    StreamMessageWriter,
} from 'vscode-jsonrpc/node';
import { withTimeout } from '../utils/async';
import logger from '../utils/logger';
import { Diagnostic, DiagnosticCollaborator, DiagnosticListener, DiagnosticSeverity } from './DiagnosticStabilizer';

export interface LanguageServerOptions {
    command: string;
    languageId: string;
    initTimeoutMs: number;
}

export interface PublishedDiagnostics {
    uri: string;
    diagnostics: Diagnostic[];
}

const SEVERITIES: Record<number, DiagnosticSeverity> = {
    1: 'error',
    2: 'warning',
    3: 'information',
    4: 'hint',
};

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

function startLine(range: unknown): number | undefined {
    if (!isRecord(range) || !isRecord(range.start) || typeof range.start.line !== 'number') {
        return undefined;
    }
    return range.start.line + 1;
}

/**
 * Reads a `textDocument/publishDiagnostics` payload. Lines come back 1-based;
 * a missing severity counts as an error.
 */
export function parsePublishDiagnostics(params: unknown): PublishedDiagnostics | null {
    if (!isRecord(params) || typeof params.uri !== 'string' || !Array.isArray(params.diagnostics)) {
        return null;
    }

    const diagnostics: Diagnostic[] = [];
    for (const raw of params.diagnostics) {
        if (!isRecord(raw) || typeof raw.message !== 'string') {
            continue;
        }
        diagnostics.push({
            severity: (typeof raw.severity === 'number' ? SEVERITIES[raw.severity] : undefined) ?? 'error',
            message: raw.message,
            line: startLine(raw.range),
            source: typeof raw.source === 'string' ? raw.source : undefined,
        });
    }
    return { uri: params.uri, diagnostics };
}

/**
 * Minimal LSP client over stdio: opens documents and forwards the
 * diagnostics the server pushes back
 */
export class LanguageServerClient implements DiagnosticCollaborator {
    private child?: ChildProcessWithoutNullStreams;
    private connection?: MessageConnection;
    private readonly listeners = new Set<DiagnosticListener>();
    private readonly versions = new Map<string, number>();

    constructor(private readonly options: LanguageServerOptions) {}

    isRunning(): boolean {
        return this.connection !== undefined;
    }

    async start(projectRoot: string): Promise<void> {
        if (this.connection) {
            return;
        }

        logger.info(`🔌 Starting language server: ${this.options.command}`);
        const child = spawn(this.options.command, { cwd: projectRoot, shell: true });
        child.stderr.on('data', (data: Buffer) => logger.debug(`[lsp] ${data.toString().trimEnd()}`));
        child.on('exit', code => {
            logger.info(`Language server exited with code ${code}`);
            this.connection = undefined;
        });

        const connection = createMessageConnection(
            new StreamMessageReader(child.stdout),
            new StreamMessageWriter(child.stdin)
        );
        connection.onNotification('textDocument/publishDiagnostics', (params: unknown) => {
            const published = parsePublishDiagnostics(params);
            if (published) {
                this.listeners.forEach(listener => listener(published.uri, published.diagnostics));
            }
        });
        // Servers ask for these during startup and stall without an answer
        connection.onRequest('workspace/configuration', (params: unknown) =>
            isRecord(params) && Array.isArray(params.items) ? params.items.map(() => null) : []
        );
        connection.onRequest('client/registerCapability', () => null);
        connection.onRequest('window/workDoneProgress/create', () => null);
        connection.listen();

        this.child = child;
        this.connection = connection;

        const rootUri = pathToFileURL(path.resolve(projectRoot)).href;
        try {
            await withTimeout(
                connection.sendRequest('initialize', {
                    processId: process.pid,
                    rootUri,
                    workspaceFolders: [{ uri: rootUri, name: path.basename(projectRoot) }],
                    capabilities: {
                        textDocument: {
                            publishDiagnostics: { relatedInformation: false },
                            synchronization: { didSave: false, dynamicRegistration: false },
                        },
                    },
                }),
                this.options.initTimeoutMs,
                'Language server initialization'
            );
            await connection.sendNotification('initialized', {});
            logger.info(`✅ Language server ready for ${projectRoot}`);
        } catch (error) {
            await this.stop();
            throw error;
        }
    }

    async open(uri: string, content: string): Promise<void> {
        const connection = this.connection;
        if (!connection) {
            throw new Error('Language server is not running');
        }

        const previous = this.versions.get(uri);
        if (previous === undefined) {
            this.versions.set(uri, 1);
            await connection.sendNotification('textDocument/didOpen', {
                textDocument: { uri, languageId: this.options.languageId, version: 1, text: content },
            });
            return;
        }

        const version = previous + 1;
        this.versions.set(uri, version);
        await connection.sendNotification('textDocument/didChange', {
            textDocument: { uri, version },
            contentChanges: [{ text: content }],
        });
    }

    onDiagnostics(listener: DiagnosticListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    async stop(): Promise<void> {
        const { connection, child } = this;
        this.connection = undefined;
        this.child = undefined;
        this.versions.clear();

        if (connection) {
            try {
                await withTimeout(connection.sendRequest('shutdown'), 5000, 'Language server shutdown');
                await connection.sendNotification('exit');
            } catch (error) {
                logger.warn(`Language server did not shut down cleanly: ${error}`);
            }
            connection.dispose();
        }
        if (child && child.exitCode === null) {
            child.kill();
        }
    }
}
