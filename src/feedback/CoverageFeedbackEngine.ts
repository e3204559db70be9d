import { CoverageParser } from '../analyzer/CoverageParser';
import { CoverageReportSource } from '../models/CoverageModels';
import { FeedbackResult } from '../models/WorkflowModels';
import logger from '../utils/logger';

export type NextAction = 'GENERATE_INITIAL_TESTS' | 'COVER_UNTESTED_METHODS' | 'IMPROVE_PARTIAL_COVERAGE' | 'DONE';

/**
 * Optional collaborator that compares class coverage with the target
 * and suggests where the next tests should go
 */
export interface FeedbackCollaborator {
    runFeedbackCycle(projectRoot: string, className: string, threshold: number): Promise<FeedbackResult>;
    iterationSummary(): string;
}

const MAX_SUGGESTIONS = 5;

export class CoverageFeedbackEngine implements FeedbackCollaborator {
    private readonly history: FeedbackResult[] = [];

    constructor(private readonly source: CoverageReportSource) {}

    async runFeedbackCycle(projectRoot: string, className: string, threshold: number): Promise<FeedbackResult> {
        const iteration = this.history.length + 1;
        const lookup = await this.source.getClassCoverage(projectRoot, className);

        let result: FeedbackResult;
        if (!lookup.ok) {
            result = {
                iteration,
                currentCoverage: 0,
                targetCoverage: threshold,
                targetMet: false,
                uncoveredMethods: [],
                improvements: ['No coverage report yet: generate an initial test class and run it with coverage enabled'],
                nextAction: 'GENERATE_INITIAL_TESTS',
            };
        } else {
            const parser = new CoverageParser(threshold);
            const methods = parser.parseStructured(lookup.report);
            const currentCoverage = parser.classLineCoverage(lookup.report);
            const below = methods.filter(m => m.lineCoverage < threshold);
            const targetMet = currentCoverage >= threshold;

            const improvements = below.slice(0, MAX_SUGGESTIONS).map(m =>
                m.lineCoverage === 0
                    ? `Add tests for ${m.signature}: not executed by any test`
                    : `Extend tests for ${m.signature}: line ${m.lineCoverage.toFixed(1)}%, branch ${m.branchCoverage.toFixed(1)}%`
            );
            for (const m of methods) {
                if (improvements.length >= MAX_SUGGESTIONS) break;
                if (m.lineCoverage >= threshold && m.branchCoverage < threshold) {
                    improvements.push(`Cover the remaining branches of ${m.signature} (${m.branchCoverage.toFixed(1)}%)`);
                }
            }

            let nextAction: NextAction = 'IMPROVE_PARTIAL_COVERAGE';
            if (targetMet) {
                nextAction = 'DONE';
            } else if (below.some(m => m.priority === 'P0')) {
                nextAction = 'COVER_UNTESTED_METHODS';
            }

            result = {
                iteration,
                currentCoverage,
                targetCoverage: threshold,
                targetMet,
                uncoveredMethods: below.map(m => m.signature),
                improvements,
                nextAction,
            };
        }

        this.history.push(result);
        logger.info(
            `📊 Feedback #${iteration}: ${result.currentCoverage.toFixed(1)}% of ${threshold}% `
            + `(${result.targetMet ? 'target met' : result.nextAction})`
        );
        return result;
    }

    iterationSummary(): string {
        if (this.history.length === 0) {
            return 'No feedback cycles run';
        }
        return this.history
            .map((r, i) => {
                const previous = i > 0 ? this.history[i - 1].currentCoverage : undefined;
                const delta = previous === undefined ? '' : ` (${r.currentCoverage - previous >= 0 ? '+' : ''}${(r.currentCoverage - previous).toFixed(1)})`;
                return `Iteration ${r.iteration}: ${r.currentCoverage.toFixed(1)}%${delta} of ${r.targetCoverage}% - ${r.targetMet ? 'target met' : r.nextAction}`;
            })
            .join('\n');
    }

    results(): readonly FeedbackResult[] {
        return this.history;
    }
}
