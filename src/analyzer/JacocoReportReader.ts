import path from 'path';
import { parseStringPromise } from 'xml2js';
import {
    ClassCoverageReport,
    CounterType,
    CoverageCounter,
    CoverageReportSource,
    MethodCounters,
    ReportLookup,
} from '../models/CoverageModels';
import logger from '../utils/logger';
import { fileExists, findFiles, readFile } from '../utils/fileUtils';

type XmlNode = Record<string, unknown>;

const COUNTER_TYPES: readonly CounterType[] = ['INSTRUCTION', 'LINE', 'BRANCH', 'COMPLEXITY', 'METHOD', 'CLASS'];

const PRIMITIVES: Record<string, string> = {
    Z: 'boolean',
    B: 'byte',
    C: 'char',
    S: 'short',
    I: 'int',
    J: 'long',
    F: 'float',
    D: 'double',
    V: 'void',
};

function isNode(value: unknown): value is XmlNode {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function children(node: XmlNode, key: string): XmlNode[] {
    const value = node[key];
    return Array.isArray(value) ? value.filter(isNode) : [];
}

function attr(node: XmlNode, key: string): string | undefined {
    const attributes = node.$;
    if (!isNode(attributes)) {
        return undefined;
    }
    const value = attributes[key];
    return typeof value === 'string' ? value : undefined;
}

/**
 * `(ILjava/util/List;[D)V` -> ['int', 'List', 'double[]']
 */
export function descriptorToParams(desc: string): string[] {
    const open = desc.indexOf('(');
    const close = desc.indexOf(')');
    if (open < 0 || close < open) {
        return [];
    }

    const body = desc.slice(open + 1, close);
    const params: string[] = [];
    let dims = 0;
    let i = 0;
    while (i < body.length) {
        const ch = body[i];
        if (ch === '[') {
            dims++;
            i++;
            continue;
        }
        let type: string;
        if (ch === 'L') {
            const end = body.indexOf(';', i);
            const qualified = body.slice(i + 1, end < 0 ? body.length : end);
            type = qualified.slice(qualified.lastIndexOf('/') + 1);
            i = end < 0 ? body.length : end + 1;
        } else {
            type = PRIMITIVES[ch] ?? ch;
            i++;
        }
        params.push(type + '[]'.repeat(dims));
        dims = 0;
    }
    return params;
}

function toCounters(node: XmlNode): CoverageCounter[] {
    const counters: CoverageCounter[] = [];
    for (const c of children(node, 'counter')) {
        const type = COUNTER_TYPES.find(t => t === attr(c, 'type'));
        if (!type) {
            continue;
        }
        counters.push({
            type,
            missed: parseInt(attr(c, 'missed') ?? '0', 10),
            covered: parseInt(attr(c, 'covered') ?? '0', 10),
        });
    }
    return counters;
}

function matchesClass(reportName: string, className: string): boolean {
    const dotted = reportName.replace(/\//g, '.');
    if (dotted === className) {
        return true;
    }
    // Bare class name given: match on the simple name
    return !className.includes('.') && dotted.slice(dotted.lastIndexOf('.') + 1) === className;
}

/**
 * Reads per-class counters out of a JaCoCo XML report
 */
export class JacocoReportReader implements CoverageReportSource {
    constructor(
        private readonly reportPath: string = 'target/site/jacoco/jacoco.xml',
        private readonly reportGlob: string = '**/jacoco*.xml'
    ) {}

    async getClassCoverage(modulePath: string, className: string): Promise<ReportLookup> {
        const reportFile = await this.locateReport(modulePath);
        if (!reportFile) {
            return { ok: false, error: `ERROR: No coverage report found under ${modulePath}` };
        }

        try {
            const content = await readFile(reportFile);
            const report = await this.parseReport(content, className);
            if (!report) {
                return { ok: false, error: `ERROR: Class ${className} not found in ${reportFile}` };
            }
            return { ok: true, report, reportPath: reportFile };
        } catch (error) {
            logger.warn(`Failed to read coverage report ${reportFile}: ${error}`);
            return {
                ok: false,
                error: `ERROR: Unreadable coverage report ${reportFile}: ${error instanceof Error ? error.message : String(error)}`,
            };
        }
    }

    /**
     * Parse report XML and pick the class
     */
    async parseReport(xml: string, className: string): Promise<ClassCoverageReport | null> {
        const parsed: unknown = await parseStringPromise(xml);
        if (!isNode(parsed) || !isNode(parsed.report)) {
            throw new Error('Not a JaCoCo report: missing <report> root');
        }

        for (const pkg of children(parsed.report, 'package')) {
            for (const cls of children(pkg, 'class')) {
                const name = attr(cls, 'name');
                if (!name || !matchesClass(name, className)) {
                    continue;
                }

                const methods: MethodCounters[] = children(cls, 'method').map(m => {
                    const line = attr(m, 'line');
                    return {
                        name: attr(m, 'name') ?? '',
                        params: descriptorToParams(attr(m, 'desc') ?? '()V'),
                        line: line ? parseInt(line, 10) : undefined,
                        counters: toCounters(m),
                    };
                });

                return {
                    className: name.replace(/\//g, '.'),
                    sourceFile: attr(cls, 'sourcefilename'),
                    methods,
                    counters: toCounters(cls),
                };
            }
        }
        return null;
    }

    private async locateReport(modulePath: string): Promise<string | null> {
        const direct = path.join(modulePath, this.reportPath);
        if (await fileExists(direct)) {
            return direct;
        }

        const found = await findFiles(modulePath, this.reportGlob, { ignore: ['**/node_modules/**'] });
        if (found.length > 0) {
            logger.debug(`Coverage report located by search: ${found[0]}`);
            return found[0];
        }
        return null;
    }
}
