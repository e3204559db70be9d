import { CoverageAnalyzer } from '../analyzer/CoverageAnalyzer';
import { CovloopConfig } from '../config/schema';
import { FeedbackCollaborator } from '../feedback/CoverageFeedbackEngine';
import { CoverageReportSource } from '../models/CoverageModels';
import { FeedbackResult, PreCheckResult } from '../models/WorkflowModels';
import { isCompileOk } from '../pipeline/VerificationPipeline';
import { TOOL } from '../tools/ToolNames';
import { ToolInvoker } from '../tools/ToolRegistry';
import { fileExists } from '../utils/fileUtils';
import logger from '../utils/logger';
import { calculateTestFilePath, extractClassName, extractProjectRoot } from '../utils/ProjectPaths';

export interface PreCheckDependencies {
    config: CovloopConfig;
    tools: ToolInvoker;
    coverageSource: CoverageReportSource;
    feedback?: FeedbackCollaborator;
}

/**
 * Everything the run needs to know before the first model turn.
 * A failed result aborts the run.
 */
export class PreCheckExecutor {
    constructor(private readonly deps: PreCheckDependencies) {}

    async execute(sourceFile: string): Promise<PreCheckResult> {
        const { config, tools } = this.deps;
        const threshold = config.workflow.coverage_threshold;

        let projectRoot = '';
        let className = '';
        let testFilePath = '';
        const fail = (errorMessage: string): PreCheckResult => {
            logger.error(`❌ Pre-check failed: ${errorMessage}`);
            return {
                success: false,
                errorMessage,
                projectRoot,
                sourceFile,
                className,
                testFilePath,
                hasExistingTests: false,
                coverageInfoText: '',
                staticScan: false,
                methodCoverages: [],
            };
        };

        try {
            if (!(await fileExists(sourceFile))) {
                return fail(`Source file not found: ${sourceFile}`);
            }

            projectRoot = await extractProjectRoot(sourceFile, config.layout);
            className = extractClassName(sourceFile, projectRoot, config.layout);
            testFilePath = calculateTestFilePath(sourceFile, projectRoot, config.layout);
            logger.info(`📁 Project root: ${projectRoot}`);
            logger.info(`🧪 Test file: ${testFilePath}`);

            const hasExistingTests = await fileExists(testFilePath);
            if (hasExistingTests) {
                logger.info('Existing tests found, running a full test cycle for fresh coverage');
                const output = await tools.invoke(TOOL.cleanAndTest, { projectRoot });
                if (!isCompileOk(output)) {
                    logger.warn(`⚠️ Full test cycle reported problems; continuing with whatever coverage exists`);
                }
            } else {
                logger.info('No existing tests, checking that the project compiles');
                const output = await tools.invoke(TOOL.compileProject, { projectRoot });
                if (!isCompileOk(output)) {
                    return fail(`Project does not compile before any test was generated:\n${output}`);
                }
            }

            const analyzer = new CoverageAnalyzer(this.deps.coverageSource, tools, threshold);
            const analysis = await analyzer.analyze(projectRoot, className, sourceFile);

            let feedbackResult: FeedbackResult | undefined;
            if (this.deps.feedback && config.workflow.feedback) {
                try {
                    feedbackResult = await this.deps.feedback.runFeedbackCycle(projectRoot, className, threshold);
                } catch (error) {
                    logger.warn(`Feedback cycle failed, continuing without it: ${error}`);
                }
            }

            logger.info(`✅ Pre-check complete: ${analysis.methods.length} method(s) to consider`);
            return {
                success: true,
                projectRoot,
                sourceFile,
                className,
                testFilePath,
                hasExistingTests,
                coverageInfoText: analysis.summary,
                staticScan: analysis.staticScan,
                methodCoverages: analysis.methods,
                feedbackResult,
            };
        } catch (error) {
            return fail(error instanceof Error ? error.message : String(error));
        }
    }
}
