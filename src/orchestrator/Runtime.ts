import { CoverageParser } from '../analyzer/CoverageParser';
import { JacocoReportReader } from '../analyzer/JacocoReportReader';
import { CovloopConfig } from '../config/schema';
import { CommandRunner } from '../executor/CommandRunner';
import { CoverageFeedbackEngine } from '../feedback/CoverageFeedbackEngine';
import { CompileGuard } from '../guard/CompileGuard';
import { AgentSessionFactory } from '../llm/AgentSession';
import { OpenRouterClient } from '../llm/OpenRouterClient';
import { DiagnosticCollaborator, DiagnosticStabilizer } from '../lsp/DiagnosticStabilizer';
import { createAnalysisTools } from '../tools/AnalysisTools';
import { createBuildTools } from '../tools/BuildTools';
import { createCoverageTools } from '../tools/CoverageTools';
import { createFileTools } from '../tools/FileTools';
import { createSyntaxTools } from '../tools/SyntaxTools';
import { ToolRegistry } from '../tools/ToolRegistry';
import { SyntaxValidator } from '../validator/SyntaxValidator';
import { AgentOrchestrator, OrchestratorDependencies } from './AgentOrchestrator';

export interface Runtime {
    guard: CompileGuard;
    registry: ToolRegistry;
    coverageSource: JacocoReportReader;
    feedback: CoverageFeedbackEngine;
    stabilizer?: DiagnosticStabilizer;
}

/**
 * Default collaborators: shell build commands, JaCoCo XML and the tool
 * registry the model sees
 */
export function createRuntime(config: CovloopConfig, diagnostics?: DiagnosticCollaborator): Runtime {
    const guard = new CompileGuard();
    const runner = new CommandRunner(config.build.timeout);
    const coverageSource = new JacocoReportReader(config.coverage.report_path, config.coverage.report_glob);
    const threshold = config.workflow.coverage_threshold;
    const stabilizer = diagnostics ? new DiagnosticStabilizer(diagnostics, guard) : undefined;

    const registry = new ToolRegistry()
        .registerAll(createFileTools(guard))
        .registerAll(createSyntaxTools({
            guard,
            validator: new SyntaxValidator(runner),
            syntaxCommand: config.build.syntax_command,
            stabilizer,
        }))
        .registerAll(createBuildTools({ guard, runner, build: config.build }))
        .registerAll(createCoverageTools({ source: coverageSource, parser: new CoverageParser(threshold), threshold }))
        .registerAll(createAnalysisTools(config.layout.source_extension));

    return {
        guard,
        registry,
        coverageSource,
        feedback: new CoverageFeedbackEngine(coverageSource),
        stabilizer,
    };
}

/**
 * Orchestrator talking to OpenRouter through the runtime's tools
 */
export function createOrchestrator(
    config: CovloopConfig,
    runtime: Runtime,
    overrides: Partial<OrchestratorDependencies> = {}
): AgentOrchestrator {
    const client = new OpenRouterClient({
        apiKey: config.llm.api_key,
        baseUrl: config.llm.base_url,
        timeout: config.llm.timeout,
    });

    return new AgentOrchestrator({
        config,
        sessions: new AgentSessionFactory(client, runtime.registry, config.llm),
        tools: runtime.registry,
        toolNames: runtime.registry.names(),
        guard: runtime.guard,
        coverageSource: runtime.coverageSource,
        stabilizer: runtime.stabilizer,
        feedback: config.workflow.feedback ? runtime.feedback : undefined,
        ...overrides,
    });
}
