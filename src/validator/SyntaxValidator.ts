import { CommandRunner } from '../executor/CommandRunner';
import { readFile } from '../utils/fileUtils';
import logger from '../utils/logger';

/**
 * Validates generated test sources before they reach the build
 */
export interface SyntaxIssue {
    file: string;
    line: number;
    column: number;
    message: string;
    code?: string;
}

export interface ValidationResult {
    valid: boolean;
    errors: SyntaxIssue[];
    warnings: string[];
}

const PAIRS: Record<string, string> = { ')': '(', ']': '[', '}': '{' };

interface OpenDelimiter {
    char: string;
    line: number;
    column: number;
}

export class SyntaxValidator {
    constructor(private readonly runner: CommandRunner = new CommandRunner()) {}

    /**
     * Validate a file, through the configured checker command when there is one
     */
    async validate(file: string, cwd: string, command?: string): Promise<ValidationResult> {
        if (command) {
            return this.validateWithCommand(file, cwd, command);
        }
        const content = await readFile(file);
        return this.validateDelimiters(file, content);
    }

    /**
     * Run an external checker; `{file}` in the command is replaced with the path
     */
    async validateWithCommand(file: string, cwd: string, command: string): Promise<ValidationResult> {
        const resolved = command.split('{file}').join(`"${file}"`);
        const result = await this.runner.execute(resolved, cwd);
        if (result.exitCode === 0) {
            return { valid: true, errors: [], warnings: [] };
        }

        const output = `${result.stdout}\n${result.stderr}`.trim();
        const errors: SyntaxIssue[] = [];
        for (const match of output.matchAll(/^(.+?):(\d+)(?::(\d+))?:\s*(?:error:\s*)?(.+)$/gm)) {
            const [, reported, line, column, message] = match;
            errors.push({
                file: reported.trim(),
                line: parseInt(line, 10),
                column: column ? parseInt(column, 10) : 1,
                message: message.trim(),
                code: 'CHECKER',
            });
        }
        if (errors.length === 0) {
            errors.push({ file, line: 0, column: 0, message: output || `checker exited with ${result.exitCode}`, code: 'CHECKER' });
        }

        logger.info(`Syntax checker reported ${errors.length} error(s) for ${file}`);
        return { valid: false, errors, warnings: [] };
    }

    /**
     * Bracket balance over code, ignoring comments and string or char literals
     */
    validateDelimiters(file: string, content: string): ValidationResult {
        const errors: SyntaxIssue[] = [];
        const stack: OpenDelimiter[] = [];
        let line = 1;
        let column = 0;
        let i = 0;

        const issue = (message: string, code: string, at: { line: number; column: number } = { line, column }) =>
            errors.push({ file, line: at.line, column: at.column, message, code });

        while (i < content.length) {
            const ch = content[i];
            const next = content[i + 1];

            if (ch === '\n') {
                line++;
                column = 0;
                i++;
                continue;
            }
            column++;

            if (ch === '/' && next === '/') {
                while (i < content.length && content[i] !== '\n') i++;
                continue;
            }

            if (ch === '/' && next === '*') {
                const start = { line, column };
                const end = content.indexOf('*/', i + 2);
                const stop = end < 0 ? content.length : end + 2;
                for (let j = i; j < stop; j++) {
                    if (content[j] === '\n') {
                        line++;
                        column = 0;
                    } else {
                        column++;
                    }
                }
                if (end < 0) {
                    issue('Unterminated block comment', 'SYNTAX003', start);
                }
                i = stop;
                continue;
            }

            if (ch === '"' && content.startsWith('"""', i)) {
                const start = { line, column };
                const end = content.indexOf('"""', i + 3);
                const stop = end < 0 ? content.length : end + 3;
                for (let j = i; j < stop; j++) {
                    if (content[j] === '\n') {
                        line++;
                        column = 0;
                    } else {
                        column++;
                    }
                }
                if (end < 0) {
                    issue('Unterminated text block', 'SYNTAX004', start);
                }
                i = stop;
                continue;
            }

            if (ch === '"' || ch === '\'') {
                const start = { line, column };
                let j = i + 1;
                while (j < content.length && content[j] !== ch && content[j] !== '\n') {
                    j += content[j] === '\\' ? 2 : 1;
                }
                if (j >= content.length || content[j] !== ch) {
                    issue(`Unterminated ${ch === '"' ? 'string' : 'character'} literal`, 'SYNTAX004', start);
                }
                column += j - i;
                i = Math.min(j + 1, content.length);
                // the newline, if any, is handled by the main loop
                if (content[j] === '\n') i = j;
                continue;
            }

            if (ch === '(' || ch === '[' || ch === '{') {
                stack.push({ char: ch, line, column });
            } else if (ch === ')' || ch === ']' || ch === '}') {
                const open = stack.pop();
                if (!open) {
                    issue(`Unexpected '${ch}'`, 'SYNTAX002');
                } else if (open.char !== PAIRS[ch]) {
                    issue(`Mismatched '${ch}', expected closer for '${open.char}' opened at line ${open.line}`, 'SYNTAX002');
                }
            }
            i++;
        }

        for (const open of stack) {
            issue(`Unclosed '${open.char}'`, 'SYNTAX002', open);
        }

        return { valid: errors.length === 0, errors, warnings: [] };
    }

    /**
     * Format validation errors for display
     */
    formatErrors(result: ValidationResult): string {
        return result.errors
            .map(e => `${e.file}:${e.line}:${e.column} ${e.code ? `[${e.code}] ` : ''}${e.message}`)
            .join('\n');
    }
}
