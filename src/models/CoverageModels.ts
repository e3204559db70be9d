export type CounterType = 'INSTRUCTION' | 'LINE' | 'BRANCH' | 'COMPLEXITY' | 'METHOD' | 'CLASS';

export interface CoverageCounter {
    type: CounterType;
    missed: number;
    covered: number;
}

/**
 * Counters for one method as found in a structural report.
 * `name` is the raw report name, so constructors show up as `<init>`.
 */
export interface MethodCounters {
    name: string;
    params: string[];
    line?: number;
    counters: CoverageCounter[];
}

export interface ClassCoverageReport {
    className: string;
    sourceFile?: string;
    methods: MethodCounters[];
    counters: CoverageCounter[];
}

export type Priority = 'P0' | 'P1' | 'P2';

export interface MethodCoverageInfo {
    readonly name: string;
    /** Display form, e.g. `calc(int, int)` */
    readonly signature: string;
    readonly priority: Priority;
    readonly lineCoverage: number;
    readonly branchCoverage: number;
}

/**
 * Either kind of coverage data a collaborator may hand over
 */
export type CoverageSource =
    | { kind: 'structured'; report: ClassCoverageReport }
    | { kind: 'rendered'; text: string };

export function overallCoverage(info: Pick<MethodCoverageInfo, 'lineCoverage' | 'branchCoverage'>): number {
    return (info.lineCoverage + info.branchCoverage) / 2;
}

export type ReportLookup =
    | { ok: true; report: ClassCoverageReport; reportPath: string }
    | { ok: false; error: string };

/**
 * Where structural coverage for a class comes from
 */
export interface CoverageReportSource {
    getClassCoverage(modulePath: string, className: string): Promise<ReportLookup>;
}
