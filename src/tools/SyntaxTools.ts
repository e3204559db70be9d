import path from 'path';
import { CompileGuard } from '../guard/CompileGuard';
import { DiagnosticStabilizer } from '../lsp/DiagnosticStabilizer';
import { fileExists, readFile } from '../utils/fileUtils';
import { SyntaxValidator } from '../validator/SyntaxValidator';
import { TOOL } from './ToolNames';
import { stringArg, ToolDefinition } from './ToolRegistry';

export interface SyntaxToolOptions {
    guard: CompileGuard;
    validator: SyntaxValidator;
    /** Checker command with a `{file}` placeholder */
    syntaxCommand?: string;
    stabilizer?: DiagnosticStabilizer;
}

export function createSyntaxTools(options: SyntaxToolOptions): ToolDefinition[] {
    const { guard, validator, syntaxCommand, stabilizer } = options;

    const tools: ToolDefinition[] = [
        {
            name: TOOL.checkSyntax,
            description: 'Check a source file for syntax errors. Required after every edit before compiling.',
            parameters: { path: { type: 'string', description: 'File path', required: true } },
            handler: async args => {
                const file = path.resolve(stringArg(args, 'path') ?? '');
                if (!(await fileExists(file))) {
                    return `ERROR: File not found: ${file}`;
                }
                const result = await validator.validate(file, path.dirname(file), syntaxCommand);
                if (result.valid) {
                    guard.markSyntaxPassed(file);
                    return `SYNTAX_OK: ${file}`;
                }
                const details = validator.formatErrors(result);
                guard.markSyntaxFailed(file, details);
                return `SYNTAX_ERROR: ${result.errors.length} issue(s) in ${file}\n${details}`;
            },
        },
    ];

    if (stabilizer) {
        tools.push({
            name: TOOL.checkSyntaxWithLsp,
            description: 'Check a source file with the language server and wait for its diagnostics',
            parameters: { path: { type: 'string', description: 'File path', required: true } },
            handler: async args => {
                const file = path.resolve(stringArg(args, 'path') ?? '');
                if (!(await fileExists(file))) {
                    return `ERROR: File not found: ${file}`;
                }
                const result = await stabilizer.check(file, await readFile(file));
                return result.text;
            },
        });
    }

    return tools;
}
