/**
 * Limits for one model session
 */
export interface SessionLimits {
    max_messages: number;
    timeout_ms: number;
}

/**
 * Configuration schema for covloop
 */
export interface CovloopConfig {
    llm: {
        provider: 'openrouter';
        model: string;
        api_key?: string;
        base_url: string;
        max_tokens: number;
        temperature: number;
        timeout: number; // per HTTP request
        max_tool_iterations: number;
        max_empty_retries: number;
    };
    workflow: {
        iterative_mode: boolean;
        phase_switching: boolean;
        coverage_threshold: number;
        max_method_retries: number;
        max_verification_retries: number;
        use_lsp: boolean;
        skip_low_priority: boolean;
        fallback_max_iterations: number;
        fallback_max_retries: number;
        feedback: boolean;
    };
    sessions: {
        init: SessionLimits;
        step: SessionLimits;
        traditional: SessionLimits;
    };
    build: {
        compile_command: string;
        clean_test_command: string;
        test_command: string; // {test} is replaced with the test class name
        syntax_command?: string; // {file} is replaced with the file path
        timeout: number;
    };
    coverage: {
        report_path: string;
        report_glob: string;
    };
    layout: {
        source_dir: string;
        test_dir: string;
        test_suffix: string;
        source_extension: string;
        build_file: string;
    };
    lsp: {
        /** Language server started over stdio when workflow.use_lsp is on */
        command: string;
        language_id: string;
        init_timeout_ms: number;
    };
    prompts: {
        system_prompt?: string;
    };
    output: {
        format: ('json' | 'markdown')[];
        result_dir: string;
        verbose: boolean;
    };
}

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: CovloopConfig = {
    llm: {
        provider: 'openrouter',
        model: 'qwen/qwen-2.5-coder-32b-instruct',
        base_url: 'https://openrouter.ai/api/v1',
        max_tokens: 4000,
        temperature: 0.2,
        timeout: 60000,
        max_tool_iterations: 25,
        max_empty_retries: 3,
    },
    workflow: {
        iterative_mode: true,
        phase_switching: true,
        coverage_threshold: 80,
        max_method_retries: 3,
        max_verification_retries: 3,
        use_lsp: false,
        skip_low_priority: false,
        fallback_max_iterations: 20,
        fallback_max_retries: 3,
        feedback: true,
    },
    sessions: {
        init: { max_messages: 8, timeout_ms: 300000 },
        step: { max_messages: 10, timeout_ms: 300000 },
        traditional: { max_messages: 20, timeout_ms: 600000 },
    },
    build: {
        compile_command: 'mvn -q -B test-compile',
        clean_test_command: 'mvn -B clean test jacoco:report',
        test_command: 'mvn -B test -Dtest={test} jacoco:report',
        timeout: 300000,
    },
    coverage: {
        report_path: 'target/site/jacoco/jacoco.xml',
        report_glob: '**/jacoco*.xml',
    },
    layout: {
        source_dir: 'src/main/java',
        test_dir: 'src/test/java',
        test_suffix: 'Test',
        source_extension: '.java',
        build_file: 'pom.xml',
    },
    lsp: {
        command: 'jdtls',
        language_id: 'java',
        init_timeout_ms: 60000,
    },
    prompts: {},
    output: {
        format: ['json', 'markdown'],
        result_dir: 'result',
        verbose: false,
    },
};
