import path from 'path';
import { ensureDir, writeFile } from '../utils/fileUtils';
import logger from '../utils/logger';
import { RunReport } from './IterationStats';

export type ReportFormat = 'json' | 'markdown';

export interface ReportPaths {
    outputDir: string;
    jsonPath?: string;
    markdownPath?: string;
}

/**
 * Writes the run report under `<projectRoot>/<resultDir>`, or into the
 * project root itself when that directory cannot be created
 */
export class ReportGenerator {
    async generateReports(
        report: RunReport,
        projectRoot: string,
        formats: ReportFormat[],
        resultDir: string = 'result'
    ): Promise<ReportPaths> {
        const outputDir = await this.resolveOutputDir(projectRoot, resultDir);
        const paths: ReportPaths = { outputDir };
        const base = `test-generation-${report.runId.slice(0, 8)}`;

        if (formats.includes('json')) {
            paths.jsonPath = await this.generateJSON(report, path.join(outputDir, `${base}.json`));
        }

        if (formats.includes('markdown')) {
            paths.markdownPath = await this.generateMarkdown(report, path.join(outputDir, `${base}.md`));
        }

        return paths;
    }

    private async resolveOutputDir(projectRoot: string, resultDir: string): Promise<string> {
        const preferred = path.join(projectRoot, resultDir);
        try {
            await ensureDir(preferred);
            return preferred;
        } catch (error) {
            logger.warn(`Cannot create ${preferred} (${error}), writing reports to ${projectRoot}`);
            return projectRoot;
        }
    }

    /**
     * Generate JSON report
     */
    private async generateJSON(report: RunReport, jsonPath: string): Promise<string> {
        await writeFile(jsonPath, JSON.stringify(report, null, 2));
        logger.info(`JSON report generated: ${jsonPath}`);
        return jsonPath;
    }

    /**
     * Generate Markdown report
     */
    private async generateMarkdown(report: RunReport, markdownPath: string): Promise<string> {
        await writeFile(markdownPath, this.buildMarkdown(report));
        logger.info(`Markdown report generated: ${markdownPath}`);
        return markdownPath;
    }

    buildMarkdown(report: RunReport): string {
        const lines = [
            '# Test Generation Report',
            '',
            `- Run: ${report.runId}`,
            `- Class: ${report.className}`,
            `- Source: ${report.sourceFile}`,
            `- Mode: ${report.mode}`,
            `- Status: ${report.status.toUpperCase()}`,
            `- Threshold: ${report.threshold}%`,
            `- Duration: ${(report.durationMs / 1000).toFixed(1)}s`,
        ];
        if (report.errorMessage) {
            lines.push(`- Error: ${report.errorMessage}`);
        }

        lines.push(
            '',
            '## Summary',
            '',
            '| Success | Failed | Partial | Skipped | Total |',
            '|---|---|---|---|---|',
            `| ${report.counts.success} | ${report.counts.failed} | ${report.counts.partial} | ${report.counts.skipped} | ${report.counts.total} |`,
            '',
            '## Tokens',
            '',
            `Prompt: ${report.tokens.prompt}, completion: ${report.tokens.completion}, total: ${report.tokens.total}`
        );

        if (report.methods.length > 0) {
            lines.push(
                '',
                '## Methods',
                '',
                '| Method | Priority | Initial | Final | Iterations | Status | Notes |',
                '|---|---|---|---|---|---|---|'
            );
            for (const m of report.methods) {
                lines.push(
                    `| \`${m.signature}\` | ${m.priority} | ${m.initialCoverage.toFixed(1)}% | ${m.finalCoverage.toFixed(1)}% `
                    + `| ${m.iterations} | ${m.status} | ${m.notes.replace(/\|/g, '\\|').replace(/\n/g, ' ')} |`
                );
            }
        }

        if (report.feedbackSummary) {
            lines.push('', '## Coverage Feedback', '', '```', report.feedbackSummary, '```');
        }

        return lines.join('\n') + '\n';
    }
}
