import { ConfigLoader } from './config/ConfigLoader';
import { RunResult } from './orchestrator/AgentOrchestrator';
import { createOrchestrator, createRuntime } from './orchestrator/Runtime';
import logger from './utils/logger';

/**
 * Main entry point for programmatic usage
 */
export async function runCovloop(sourceFile: string, configPath?: string): Promise<RunResult> {
    try {
        logger.info('Starting covloop...');

        const config = await new ConfigLoader().load(configPath);
        const result = await createOrchestrator(config, createRuntime(config)).run(sourceFile);

        logger.info(`covloop finished with status ${result.status}`);
        return result;
    } catch (error) {
        logger.error(`covloop failed: ${error}`);
        throw error;
    }
}

// Export main components for library usage
export { ConfigLoader, ConfigError } from './config/ConfigLoader';
export { AgentOrchestrator } from './orchestrator/AgentOrchestrator';
export type { OrchestratorDependencies, RunResult, RunState } from './orchestrator/AgentOrchestrator';
export { createOrchestrator, createRuntime } from './orchestrator/Runtime';
export type { Runtime } from './orchestrator/Runtime';
export { CoverageParser } from './analyzer/CoverageParser';
export { JacocoReportReader } from './analyzer/JacocoReportReader';
export { MethodQueue, MethodQueueError } from './queue/MethodQueue';
export { CompileGuard } from './guard/CompileGuard';
export { DiagnosticStabilizer } from './lsp/DiagnosticStabilizer';
export type { Diagnostic, DiagnosticCollaborator } from './lsp/DiagnosticStabilizer';
export { LanguageServerClient } from './lsp/LanguageServerClient';
export { VerificationPipeline } from './pipeline/VerificationPipeline';
export { PhaseManager } from './phase/PhaseManager';
export { EnvironmentChecker, formatEnvironmentReport } from './env/EnvironmentChecker';
export type { EnvironmentCheck, EnvironmentReport } from './env/EnvironmentChecker';
export { ReportGenerator } from './reporter/ReportGenerator';
export * from './models/CoverageModels';
export * from './models/WorkflowModels';
export * from './llm/types';
export * from './config/schema';
