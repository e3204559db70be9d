import fs from 'fs/promises';
import path from 'path';
import { CompileGuard } from '../guard/CompileGuard';
import { dirExists, fileExists, readFile, writeFile } from '../utils/fileUtils';
import { TOOL } from './ToolNames';
import { integerArg, stringArg, ToolArgs, ToolDefinition } from './ToolRegistry';

function requirePath(args: ToolArgs): string {
    const value = stringArg(args, 'path');
    if (!value) {
        throw new Error('path is required');
    }
    return path.resolve(value);
}

/**
 * File tools for the model. Every write marks the file in the compile
 * guard, so it has to pass a syntax check before the next build.
 */
export function createFileTools(guard: CompileGuard): ToolDefinition[] {
    return [
        {
            name: TOOL.readFile,
            description: 'Read a file with line numbers',
            parameters: { path: { type: 'string', description: 'File path', required: true } },
            handler: async args => {
                const file = requirePath(args);
                if (!(await fileExists(file))) {
                    return `ERROR: File not found: ${file}`;
                }
                const lines = (await readFile(file)).split('\n');
                return lines.map((l, i) => `${String(i + 1).padStart(4)}| ${l}`).join('\n');
            },
        },
        {
            name: TOOL.writeFile,
            description: 'Create or overwrite a file',
            parameters: {
                path: { type: 'string', description: 'File path', required: true },
                content: { type: 'string', description: 'Full file content', required: true },
            },
            handler: async args => {
                const file = requirePath(args);
                const content = stringArg(args, 'content') ?? '';
                await writeFile(file, content);
                guard.markFileModified(file);
                return `SUCCESS: wrote ${content.length} characters to ${file}. Run checkSyntax before compiling.`;
            },
        },
        {
            name: TOOL.writeFileFromLine,
            description: 'Replace everything from a 1-based line to the end of the file',
            parameters: {
                path: { type: 'string', description: 'File path', required: true },
                startLine: { type: 'integer', description: 'First line to replace', required: true },
                content: { type: 'string', description: 'New content', required: true },
            },
            handler: async args => {
                const file = requirePath(args);
                const startLine = integerArg(args, 'startLine');
                if (startLine === undefined || startLine < 1) {
                    return 'ERROR: startLine must be a positive integer';
                }
                if (!(await fileExists(file))) {
                    return `ERROR: File not found: ${file}`;
                }
                const lines = (await readFile(file)).split('\n');
                if (startLine > lines.length + 1) {
                    return `ERROR: startLine ${startLine} is past the end of the file (${lines.length} lines)`;
                }
                const kept = lines.slice(0, startLine - 1);
                await writeFile(file, [...kept, stringArg(args, 'content') ?? ''].join('\n'));
                guard.markFileModified(file);
                return `SUCCESS: replaced lines ${startLine}-${lines.length} of ${file}`;
            },
        },
        {
            name: TOOL.searchReplace,
            description: 'Replace the first exact occurrence of a text in a file',
            parameters: {
                path: { type: 'string', description: 'File path', required: true },
                search: { type: 'string', description: 'Exact text to find', required: true },
                replace: { type: 'string', description: 'Replacement text', required: false },
            },
            handler: async args => {
                const file = requirePath(args);
                const search = stringArg(args, 'search') ?? '';
                if (!(await fileExists(file))) {
                    return `ERROR: File not found: ${file}`;
                }
                const content = await readFile(file);
                const index = content.indexOf(search);
                if (index < 0) {
                    return `ERROR: Search text not found in ${file}`;
                }
                const replace = stringArg(args, 'replace') ?? '';
                await writeFile(file, content.slice(0, index) + replace + content.slice(index + search.length));
                guard.markFileModified(file);
                return `SUCCESS: replaced 1 occurrence in ${file}`;
            },
        },
        {
            name: TOOL.fileExists,
            description: 'Check whether a file exists',
            parameters: { path: { type: 'string', description: 'File path', required: true } },
            handler: async args => String(await fileExists(requirePath(args))),
        },
        {
            name: TOOL.listDirectory,
            description: 'List the entries of a directory',
            parameters: { path: { type: 'string', description: 'Directory path', required: true } },
            handler: async args => {
                const dir = requirePath(args);
                if (!(await dirExists(dir))) {
                    return `ERROR: Directory not found: ${dir}`;
                }
                const entries = await fs.readdir(dir, { withFileTypes: true });
                return entries
                    .map(e => (e.isDirectory() ? `${e.name}/` : e.name))
                    .sort()
                    .join('\n');
            },
        },
    ];
}
