import {
    ClassCoverageReport,
    CounterType,
    CoverageCounter,
    CoverageSource,
    MethodCounters,
    MethodCoverageInfo,
    Priority,
} from '../models/CoverageModels';

export const STATUS_GLYPHS = {
    full: '✓',
    partial: '◐',
    none: '✗',
} as const;

const CONSTRUCTOR = '<init>';
const STATIC_INITIALIZER = '<clinit>';
const CONSTRUCTOR_DISPLAY = 'constructor';

const SUMMARY_LINE = /([✓◐✗])\s+(\w+)\(([^)]*)\)\s+Line:\s*([\d.]+)%\s+Branch:\s*([\d.]+)%/g;

/**
 * Round to one decimal, the precision of the rendered summary
 */
export function roundPct(value: number): number {
    return Math.round(value * 10) / 10;
}

/**
 * Percentage for a counter. Nothing to cover counts as fully covered.
 */
export function counterPercent(counter: CoverageCounter | undefined): number {
    if (!counter) {
        return 100;
    }
    const total = counter.covered + counter.missed;
    if (total === 0) {
        return 100;
    }
    return roundPct((counter.covered / total) * 100);
}

export function derivePriority(lineCoverage: number, threshold: number): Priority {
    if (lineCoverage <= 0) {
        return 'P0';
    }
    return lineCoverage < threshold ? 'P1' : 'P2';
}

export function toMethodCoverageInfo(
    name: string,
    params: string,
    lineCoverage: number,
    branchCoverage: number,
    threshold: number
): MethodCoverageInfo {
    return Object.freeze({
        name,
        signature: `${name}(${params})`,
        priority: derivePriority(lineCoverage, threshold),
        lineCoverage,
        branchCoverage,
    });
}

export function displayName(rawName: string): string {
    return rawName === CONSTRUCTOR ? CONSTRUCTOR_DISPLAY : rawName;
}

function isTarget(name: string): boolean {
    return name !== CONSTRUCTOR
        && name !== STATIC_INITIALIZER
        && name !== CONSTRUCTOR_DISPLAY
        && !name.includes('$');
}

function findCounter(counters: CoverageCounter[], type: CounterType): CoverageCounter | undefined {
    return counters.find(c => c.type === type);
}

/**
 * Turns coverage data for one class into per-method records.
 * The structured and the rendered path share one derivation, so
 * the same data yields the same records either way.
 */
export class CoverageParser {
    constructor(readonly threshold: number) {}

    parse(source: CoverageSource): MethodCoverageInfo[] {
        switch (source.kind) {
            case 'structured':
                return this.parseStructured(source.report);
            case 'rendered':
                return this.parseRendered(source.text);
        }
    }

    parseStructured(report: ClassCoverageReport): MethodCoverageInfo[] {
        return report.methods
            .filter(m => isTarget(m.name))
            .map(m => {
                const { line, branch } = this.methodPercents(m);
                return toMethodCoverageInfo(m.name, m.params.join(', '), line, branch, this.threshold);
            });
    }

    parseRendered(text: string): MethodCoverageInfo[] {
        const methods: MethodCoverageInfo[] = [];
        for (const match of text.matchAll(SUMMARY_LINE)) {
            const [, , name, params, line, branch] = match;
            if (!isTarget(name)) {
                continue;
            }
            methods.push(toMethodCoverageInfo(name, params, parseFloat(line), parseFloat(branch), this.threshold));
        }
        return methods;
    }

    /**
     * Human-readable summary in the shape parseRendered() reads back
     */
    renderSummary(report: ClassCoverageReport): string {
        const lines = [`Method coverage for ${report.className}:`];

        for (const m of report.methods) {
            if (m.name === STATIC_INITIALIZER || m.name.includes('$')) {
                continue;
            }
            const { line, branch } = this.methodPercents(m);
            lines.push(
                `${this.glyph(line)} ${displayName(m.name)}(${m.params.join(', ')}) `
                + `Line: ${line.toFixed(1)}% Branch: ${branch.toFixed(1)}%`
            );
        }

        const classLine = counterPercent(findCounter(report.counters, 'LINE'));
        const classBranch = counterPercent(findCounter(report.counters, 'BRANCH'));
        lines.push(`Class total: Line: ${classLine.toFixed(1)}% Branch: ${classBranch.toFixed(1)}%`);

        return lines.join('\n');
    }

    /**
     * Class-level line coverage, for the feedback and skip decisions
     */
    classLineCoverage(report: ClassCoverageReport): number {
        return counterPercent(findCounter(report.counters, 'LINE'));
    }

    private methodPercents(m: MethodCounters): { line: number; branch: number } {
        return {
            line: counterPercent(findCounter(m.counters, 'LINE')),
            branch: counterPercent(findCounter(m.counters, 'BRANCH')),
        };
    }

    private glyph(lineCoverage: number): string {
        if (lineCoverage <= 0) {
            return STATUS_GLYPHS.none;
        }
        return lineCoverage >= this.threshold ? STATUS_GLYPHS.full : STATUS_GLYPHS.partial;
    }
}
