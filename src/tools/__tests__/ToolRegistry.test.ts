import { ToolDefinition, ToolRegistry, integerArg, isErrorResult, stringArg } from '../ToolRegistry';

jest.mock('../../utils/logger');

function echoTool(): ToolDefinition {
    return {
        name: 'echo',
        description: 'Echo the text back',
        parameters: { text: { type: 'string', description: 'Text', required: true } },
        handler: async args => `echo: ${stringArg(args, 'text')}`,
    };
}

describe('ToolRegistry', () => {
    let registry: ToolRegistry;

    beforeEach(() => {
        registry = new ToolRegistry().register(echoTool()).register({
            name: 'explode',
            description: 'Always throws',
            parameters: {},
            handler: async () => {
                throw new Error('boom');
            },
        });
    });

    it('should dispatch to the named tool', async () => {
        await expect(registry.invoke('echo', { text: 'hi' })).resolves.toBe('echo: hi');
        expect(registry.names()).toEqual(['echo', 'explode']);
        expect(registry.has('echo')).toBe(true);
    });

    it('should answer unknown tools with an error result', async () => {
        await expect(registry.invoke('nope', {})).resolves.toBe("ERROR: Unknown tool 'nope'");
    });

    it('should check required parameters before calling the handler', async () => {
        await expect(registry.invoke('echo', {})).resolves.toBe("ERROR: Missing required parameter 'text' for tool echo");
        await expect(registry.invoke('echo', { text: '' })).resolves.toBe("ERROR: Missing required parameter 'text' for tool echo");
    });

    it('should turn handler exceptions into error results', async () => {
        await expect(registry.invoke('explode', {})).resolves.toBe('ERROR: boom');
    });

    it('should filter definitions by capability set', () => {
        expect(registry.definitions(new Set(['echo'])).map(t => t.name)).toEqual(['echo']);
        expect(registry.definitions().map(t => t.name)).toEqual(['echo', 'explode']);
    });

    it('should refuse tools outside a scoped capability set', async () => {
        const scoped = registry.scoped(new Set(['explode']));

        await expect(scoped.invoke('echo', { text: 'hi' })).resolves.toBe("ERROR: Tool 'echo' is not available in the current phase");
        await expect(scoped.invoke('explode', {})).resolves.toBe('ERROR: boom');
    });
});

describe('tool argument helpers', () => {
    it('should read strings and stringify scalars', () => {
        expect(stringArg({ a: 'x', b: 3, c: true, d: {} }, 'a')).toBe('x');
        expect(stringArg({ b: 3 }, 'b')).toBe('3');
        expect(stringArg({ c: true }, 'c')).toBe('true');
        expect(stringArg({ d: {} }, 'd')).toBeUndefined();
    });

    it('should read integers from numbers and digit strings', () => {
        expect(integerArg({ n: 4 }, 'n')).toBe(4);
        expect(integerArg({ n: ' 12 ' }, 'n')).toBe(12);
        expect(integerArg({ n: 1.5 }, 'n')).toBeUndefined();
        expect(integerArg({ n: 'abc' }, 'n')).toBeUndefined();
    });

    it('should recognize error results', () => {
        expect(isErrorResult('ERROR: File not found')).toBe(true);
        expect(isErrorResult('  error: nope')).toBe(true);
        expect(isErrorResult("Missing required parameter 'x'")).toBe(true);
        expect(isErrorResult('SYNTAX_OK: /p/A.java')).toBe(false);
    });
});
