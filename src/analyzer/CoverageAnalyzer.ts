import { CoverageReportSource, MethodCoverageInfo } from '../models/CoverageModels';
import { TOOL } from '../tools/ToolNames';
import { isErrorResult, ToolInvoker } from '../tools/ToolRegistry';
import logger from '../utils/logger';
import { CoverageParser } from './CoverageParser';
import { parseAnalysisText, renderStaticSummary, toUncoveredMethods } from './StaticMethodScanner';

export interface CoverageAnalysis {
    methods: MethodCoverageInfo[];
    /** Rendered summary for prompts and logs */
    summary: string;
    /** Methods come from a source scan, coverage is synthetic 0% */
    staticScan: boolean;
}

/**
 * Per-method coverage for the class under test, from the report when
 * there is one and from a static scan of the source when there is not
 */
export class CoverageAnalyzer {
    private readonly parser: CoverageParser;

    constructor(
        private readonly source: CoverageReportSource,
        private readonly tools: ToolInvoker,
        threshold: number
    ) {
        this.parser = new CoverageParser(threshold);
    }

    async analyze(projectRoot: string, className: string, sourceFile: string): Promise<CoverageAnalysis> {
        logger.info(`Analyzing coverage for ${className}`);

        const lookup = await this.source.getClassCoverage(projectRoot, className);
        if (lookup.ok) {
            const methods = this.parser.parse({ kind: 'structured', report: lookup.report });
            logger.info(`Coverage report ${lookup.reportPath}: ${methods.length} method(s)`);
            return { methods, summary: this.parser.renderSummary(lookup.report), staticScan: false };
        }

        logger.warn(`No coverage data (${lookup.error}), falling back to static analysis`);
        const analysis = await this.tools.invoke(TOOL.analyzeClass, { path: sourceFile });
        if (isErrorResult(analysis)) {
            logger.warn(`Static analysis failed: ${analysis}`);
            return { methods: [], summary: `${lookup.error}\n${analysis}`, staticScan: true };
        }

        const methods = toUncoveredMethods(parseAnalysisText(analysis), this.parser.threshold);
        logger.info(`Static analysis found ${methods.length} method(s)`);
        return { methods, summary: renderStaticSummary(methods), staticScan: true };
    }
}
