import logger from '../utils/logger';

export type ToolArgs = Record<string, unknown>;

export interface ToolParameter {
    type: 'string' | 'integer' | 'boolean';
    description: string;
    required?: boolean;
}

export interface ToolDefinition {
    name: string;
    description: string;
    parameters: Record<string, ToolParameter>;
    handler: (args: ToolArgs) => Promise<string>;
}

/**
 * What the core needs from tool dispatch. Failures come back as
 * strings starting with "ERROR", never as exceptions.
 */
export interface ToolInvoker {
    invoke(name: string, args: ToolArgs): Promise<string>;
}

export function stringArg(args: ToolArgs, key: string): string | undefined {
    const value = args[key];
    if (typeof value === 'string') {
        return value;
    }
    return typeof value === 'number' || typeof value === 'boolean' ? String(value) : undefined;
}

export function integerArg(args: ToolArgs, key: string): number | undefined {
    const value = args[key];
    if (typeof value === 'number' && Number.isInteger(value)) {
        return value;
    }
    if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) {
        return parseInt(value, 10);
    }
    return undefined;
}

/**
 * The same check the verification pipeline applies to tool output
 */
export function isErrorResult(result: string): boolean {
    const lower = result.trimStart().toLowerCase();
    return lower.startsWith('error') || lower.includes('missing required parameter');
}

export class ToolRegistry implements ToolInvoker {
    private readonly tools = new Map<string, ToolDefinition>();

    register(tool: ToolDefinition): this {
        if (this.tools.has(tool.name)) {
            logger.warn(`Tool ${tool.name} registered twice, keeping the latest`);
        }
        this.tools.set(tool.name, tool);
        return this;
    }

    registerAll(tools: ToolDefinition[]): this {
        tools.forEach(t => this.register(t));
        return this;
    }

    has(name: string): boolean {
        return this.tools.has(name);
    }

    names(): string[] {
        return [...this.tools.keys()];
    }

    /**
     * Definitions limited to a capability set; all of them when none is given
     */
    definitions(allowed?: ReadonlySet<string>): ToolDefinition[] {
        const all = [...this.tools.values()];
        return allowed ? all.filter(t => allowed.has(t.name)) : all;
    }

    async invoke(name: string, args: ToolArgs): Promise<string> {
        const tool = this.tools.get(name);
        if (!tool) {
            return `ERROR: Unknown tool '${name}'`;
        }

        for (const [param, spec] of Object.entries(tool.parameters)) {
            if (spec.required && (args[param] === undefined || args[param] === null || args[param] === '')) {
                return `ERROR: Missing required parameter '${param}' for tool ${name}`;
            }
        }

        try {
            const result = await tool.handler(args);
            logger.debug(`🔧 ${name} -> ${result.slice(0, 200)}`);
            return result;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.warn(`Tool ${name} failed: ${message}`);
            return `ERROR: ${message}`;
        }
    }

    /**
     * An invoker that only lets the given capability set through
     */
    scoped(allowed: ReadonlySet<string>): ToolInvoker {
        return {
            invoke: async (name, args) => {
                if (!allowed.has(name)) {
                    return `ERROR: Tool '${name}' is not available in the current phase`;
                }
                return this.invoke(name, args);
            },
        };
    }
}
