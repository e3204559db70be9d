import { MethodCoverageInfo } from '../models/CoverageModels';
import { STATUS_GLYPHS, toMethodCoverageInfo } from './CoverageParser';

export interface ScannedMethod {
    name: string;
    params: string[];
    returnType: string;
    modifiers: string[];
    line: number;
}

const MODIFIERS = new Set([
    'public', 'protected', 'private', 'static', 'final', 'abstract', 'synchronized', 'native', 'default', 'strictfp',
]);
const NOT_METHODS = new Set(['if', 'for', 'while', 'switch', 'catch', 'return', 'new', 'else', 'do', 'try', 'synchronized']);
const EXCLUDED = new Set(['main', 'toString', 'hashCode', 'equals']);

const DECLARATION = /^[ \t]*((?:@\w+(?:\([^)]*\))?\s+)*)((?:[\w<>[\],.? ]+?\s+)?)(\w+)\s*\(([^)]*)\)\s*(?:throws\s+[\w.,\s]+)?\{/gm;

/**
 * Split on commas outside generic brackets
 */
function splitParams(raw: string): string[] {
    const parts: string[] = [];
    let depth = 0;
    let current = '';
    for (const ch of raw) {
        if (ch === '<') depth++;
        if (ch === '>') depth--;
        if (ch === ',' && depth === 0) {
            parts.push(current);
            current = '';
        } else {
            current += ch;
        }
    }
    parts.push(current);
    return parts.map(p => p.trim()).filter(p => p.length > 0);
}

/**
 * `final List<String> names` -> `List`
 */
function paramType(param: string): string {
    const tokens = param
        .replace(/@\w+(\([^)]*\))?/g, '')
        .replace(/\bfinal\b/g, '')
        .trim()
        .split(/\s+(?![^<]*>)/);
    const type = tokens.length > 1 ? tokens.slice(0, -1).join(' ') : tokens[0];
    // Erased form, as coverage reports show it
    return type.replace(/<.*>/, '').replace(/\.\.\.$/, '[]');
}

/**
 * Regex-level scan of method declarations in one source file
 */
export function scanSource(content: string, className: string): ScannedMethod[] {
    const methods: ScannedMethod[] = [];
    for (const match of content.matchAll(DECLARATION)) {
        const [, , head, name, rawParams] = match;
        const words = head.trim().split(/\s+(?![^<]*>)/).filter(w => w.length > 0);
        const modifiers = words.filter(w => MODIFIERS.has(w));
        const rest = words.filter(w => !MODIFIERS.has(w) && !w.startsWith('<'));

        if (NOT_METHODS.has(name) || name === className || rest.some(w => NOT_METHODS.has(w))) {
            continue;
        }
        // A call like `foo(x) {` inside a lambda has no return type
        if (rest.length === 0) {
            continue;
        }

        const line = content.slice(0, match.index ?? 0).split('\n').length;
        methods.push({
            name,
            params: splitParams(rawParams).map(paramType),
            returnType: rest[rest.length - 1],
            modifiers,
            line,
        });
    }
    return methods;
}

/**
 * Text produced by the analyzeClass tool
 */
export function formatAnalysis(className: string, file: string, methods: ScannedMethod[]): string {
    const lines = [`Class: ${className}`, `File: ${file}`, `Methods (${methods.length}):`];
    for (const m of methods) {
        lines.push(
            `Method: ${m.name}(${m.params.join(', ')})`,
            `  - Signature: ${[...m.modifiers, m.returnType].join(' ')} ${m.name}(${m.params.join(', ')})`,
            `  - Line: ${m.line}`
        );
    }
    return lines.join('\n');
}

interface NamedMethod {
    name: string;
    params: string;
}

/**
 * Pull method names back out of analysis text. Tries the `Method:` lines
 * first, then `- Signature:` lines, then bare `- name` bullets.
 */
export function parseAnalysisText(text: string): NamedMethod[] {
    const patterns = [
        /Method:\s*(\w+)\s*\(([^)]*)\)/g,
        /-\s+Signature:\s+(?:[\w<>[\],.? ]+\s+)?(\w+)\(([^)]*)\)/g,
        /^\s*-\s+(\w+)\s*(?:\(([^)]*)\))?\s*$/gm,
    ];

    for (const pattern of patterns) {
        const found: NamedMethod[] = [];
        const seen = new Set<string>();
        for (const match of text.matchAll(pattern)) {
            const name = match[1];
            const params = match[2] ?? '';
            const key = `${name}(${params})`;
            if (EXCLUDED.has(name) || seen.has(key)) {
                continue;
            }
            seen.add(key);
            found.push({ name, params });
        }
        if (found.length > 0) {
            return found;
        }
    }
    return [];
}

/**
 * Synthetic 0% entries for methods found without a coverage report
 */
export function toUncoveredMethods(methods: NamedMethod[], threshold: number): MethodCoverageInfo[] {
    return methods.map(m => toMethodCoverageInfo(m.name, m.params, 0, 0, threshold));
}

export function renderStaticSummary(methods: readonly MethodCoverageInfo[]): string {
    const lines = ['Static analysis result (no coverage data yet):'];
    for (const m of methods) {
        lines.push(`${STATUS_GLYPHS.none} ${m.signature} Line: 0.0% Branch: 0.0%`);
    }
    return lines.join('\n');
}
