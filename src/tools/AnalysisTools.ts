import path from 'path';
import { formatAnalysis, scanSource } from '../analyzer/StaticMethodScanner';
import { fileExists, readFile } from '../utils/fileUtils';
import { TOOL } from './ToolNames';
import { stringArg, ToolDefinition } from './ToolRegistry';

export function createAnalysisTools(sourceExtension: string): ToolDefinition[] {
    return [
        {
            name: TOOL.analyzeClass,
            description: 'List the methods declared in a source file',
            parameters: { path: { type: 'string', description: 'Source file path', required: true } },
            handler: async args => {
                const file = path.resolve(stringArg(args, 'path') ?? '');
                if (!(await fileExists(file))) {
                    return `ERROR: File not found: ${file}`;
                }
                const className = path.basename(file, sourceExtension);
                return formatAnalysis(className, file, scanSource(await readFile(file), className));
            },
        },
    ];
}
