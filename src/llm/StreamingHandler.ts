import { LlmResponse, StreamingHandler } from './types';

/**
 * Collects the outcome of a session run for a caller that waits with a timeout
 */
export class ResponseStreamingHandler implements StreamingHandler {
    private done = false;
    private success = false;
    private error?: string;
    private content = '';
    private readonly finished: Promise<void>;

    constructor(run: Promise<LlmResponse>) {
        this.finished = run.then(
            response => {
                this.success = response.success;
                this.error = response.errorMessage;
                this.content = response.content;
                this.done = true;
            },
            (error: unknown) => {
                this.success = false;
                this.error = error instanceof Error ? error.message : String(error);
                this.done = true;
            }
        );
    }

    async await(timeoutMs: number): Promise<boolean> {
        if (this.done) {
            return true;
        }
        let timer: NodeJS.Timeout | undefined;
        const timedOut = new Promise<boolean>(resolve => {
            timer = setTimeout(() => resolve(false), timeoutMs);
        });
        try {
            return await Promise.race([this.finished.then(() => true), timedOut]);
        } finally {
            clearTimeout(timer);
        }
    }

    isSuccess(): boolean {
        return this.done && this.success;
    }

    getError(): string | undefined {
        if (!this.done) {
            return 'Response not complete';
        }
        return this.error;
    }

    getContent(): string {
        return this.content;
    }
}
