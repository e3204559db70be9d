import path from 'path';
import { CoverageParser } from '../analyzer/CoverageParser';
import { CoverageReportSource, MethodCoverageInfo } from '../models/CoverageModels';
import { TOOL } from './ToolNames';
import { stringArg, ToolDefinition } from './ToolRegistry';

const compact = (signature: string) => signature.replace(/\s+/g, '');

/**
 * Match on the full signature when one is given, so overloads stay apart;
 * a bare name picks the first method with that name.
 */
function matchesMethod(method: MethodCoverageInfo, query: string): boolean {
    return query.includes('(') ? compact(method.signature) === compact(query) : method.name === query;
}

export interface CoverageToolOptions {
    source: CoverageReportSource;
    parser: CoverageParser;
    threshold: number;
}

export function createCoverageTools(options: CoverageToolOptions): ToolDefinition[] {
    const { source, parser, threshold } = options;

    const params = {
        projectRoot: { type: 'string' as const, description: 'Project root directory', required: true },
        className: { type: 'string' as const, description: 'Fully qualified class name', required: true },
    };

    const lookup = (root: string | undefined, className: string | undefined) =>
        source.getClassCoverage(path.resolve(root ?? process.cwd()), className ?? '');

    return [
        {
            name: TOOL.getMethodCoverageDetails,
            description: 'Per-method line and branch coverage of a class',
            parameters: params,
            handler: async args => {
                const found = await lookup(stringArg(args, 'projectRoot'), stringArg(args, 'className'));
                return found.ok ? parser.renderSummary(found.report) : found.error;
            },
        },
        {
            name: TOOL.getUncoveredMethods,
            description: 'Methods of a class below the coverage threshold',
            parameters: params,
            handler: async args => {
                const found = await lookup(stringArg(args, 'projectRoot'), stringArg(args, 'className'));
                if (!found.ok) {
                    return found.error;
                }
                const below = parser.parseStructured(found.report).filter(m => m.lineCoverage < threshold);
                if (below.length === 0) {
                    return `All methods meet the ${threshold}% threshold`;
                }
                return [
                    `${below.length} method(s) below ${threshold}%:`,
                    ...below.map(m => `- [${m.priority}] ${m.signature} line=${m.lineCoverage.toFixed(1)}%`),
                ].join('\n');
            },
        },
        {
            name: TOOL.getSingleMethodCoverage,
            description: 'Line and branch coverage of one method',
            parameters: {
                ...params,
                methodName: { type: 'string', description: 'Method signature such as calc(int, int), or a bare name', required: true },
            },
            handler: async args => {
                const className = stringArg(args, 'className');
                const methodName = stringArg(args, 'methodName') ?? '';
                const found = await lookup(stringArg(args, 'projectRoot'), className);
                if (!found.ok) {
                    return found.error;
                }
                const method = parser.parseStructured(found.report).find(m => matchesMethod(m, methodName));
                if (!method) {
                    return `ERROR: Method ${methodName} not found in coverage report for ${className}`;
                }
                return `${method.signature} line=${method.lineCoverage.toFixed(1)}% branch=${method.branchCoverage.toFixed(1)}%`;
            },
        },
    ];
}
