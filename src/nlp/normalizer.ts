import { GEOCODE_TOOL, NAVIGATE_TOOL, ZOOM_TOOL } from '../tools/map';
import { ModelTurn, NormalizedResponse, RawToolCall, ToolCall } from '../types';
import { TextExtractor, defaultExtractors } from './extractors';
import { defaultGazetteer } from './gazetteer';

export interface NormalizerOptions {
    /** Tool names accepted in the `{"<tool>": {...}}` shorthand. */
    toolNames?: readonly string[];
    extractors?: readonly TextExtractor[];
}

const DEFAULT_TOOL_NAMES = [NAVIGATE_TOOL, ZOOM_TOOL, GEOCODE_TOOL];

let defaultChain: readonly TextExtractor[] | null = null;

function defaultChainOnce(): readonly TextExtractor[] {
    if (!defaultChain) defaultChain = defaultExtractors(defaultGazetteer());
    return defaultChain;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
    try {
        return { ok: true, value: JSON.parse(text) };
    } catch {
        return { ok: false };
    }
}

/** Arguments arrive either as an object or as a JSON-encoded string. */
function decodeArguments(raw: unknown): { args: JsonObject; error?: string } {
    if (raw === undefined || raw === null) return { args: {} };
    if (isObject(raw)) return { args: raw };
    if (typeof raw === 'string') {
        if (!raw.trim()) return { args: {} };
        const parsed = tryParseJson(raw);
        if (!parsed.ok) return { args: {}, error: 'arguments are not valid JSON' };
        if (isObject(parsed.value)) return { args: parsed.value };
    }
    return { args: {}, error: 'arguments must be a JSON object' };
}

function toToolCall(name: string, rawArgs: unknown, origin: ToolCall['origin'], id?: string): ToolCall {
    const { args, error } = decodeArguments(rawArgs);
    const call: ToolCall = { name, arguments: args, origin };
    if (id) call.id = id;
    if (error) call.argumentError = error;
    return call;
}

function fromStructured(raw: RawToolCall): ToolCall {
    return toToolCall(raw.name, raw.arguments, 'structured', raw.id);
}

/** Recognizes the tool-call spellings models produce when writing JSON by hand. */
function fromJsonEncoding(value: JsonObject, toolNames: readonly string[]): ToolCall | null {
    const origin = 'text_extracted';

    if (typeof value.function_name === 'string') {
        return toToolCall(value.function_name, value.parameters ?? value.arguments, origin);
    }
    if (typeof value.tool_name === 'string') {
        return toToolCall(value.tool_name, value.parameters ?? value.arguments, origin);
    }
    if (isObject(value.function) && typeof value.function.name === 'string') {
        return toToolCall(value.function.name, value.function.arguments ?? value.function.parameters, origin);
    }
    if (typeof value.name === 'string' && ('arguments' in value || 'parameters' in value)) {
        return toToolCall(value.name, value.arguments ?? value.parameters, origin);
    }

    const keys = Object.keys(value);
    if (keys.length === 1 && toolNames.includes(keys[0])) {
        return toToolCall(keys[0], value[keys[0]], origin);
    }
    return null;
}

function collectToolCalls(value: unknown, toolNames: readonly string[]): ToolCall[] | null {
    const items: unknown[] = Array.isArray(value)
        ? value
        : isObject(value) && Array.isArray(value.tool_calls)
          ? value.tool_calls
          : [value];

    const calls: ToolCall[] = [];
    for (const item of items) {
        const call = isObject(item) ? fromJsonEncoding(item, toolNames) : null;
        if (!call) return null;
        calls.push(call);
    }
    return calls.length > 0 ? calls : null;
}

function stripCodeFence(text: string): string {
    let clean = text.trim();
    if (clean.startsWith('```json')) {
        clean = clean.slice(7);
    } else if (clean.startsWith('```')) {
        clean = clean.slice(3);
    }
    if (clean.endsWith('```')) {
        clean = clean.slice(0, -3);
    }
    return clean.trim();
}

function responseText(value: unknown): string {
    return typeof value === 'string' ? value : JSON.stringify(value);
}

// Widest {...} span that mentions a tool-call key; parsed to confirm.
const EMBEDDED_CALL = /\{[\s\S]*"(?:tool_name|function_name|name|function)"[\s\S]*\}/;

/**
 * Turns one raw model turn into canonical tool calls and/or prose.
 *
 * Structured calls from the API win outright. Otherwise the content is probed
 * as JSON (a `{"response": ...}` answer or a hand-written tool call), then for
 * a tool call embedded in prose, then by the text extractors. Anything left is
 * a terminal answer.
 */
export function normalizeResponse(turn: ModelTurn, options: NormalizerOptions = {}): NormalizedResponse {
    const thinking = turn.reasoning?.trim() ? turn.reasoning : null;
    const content = turn.content ?? '';
    const toolNames = options.toolNames ?? DEFAULT_TOOL_NAMES;

    if (turn.toolCalls.length > 0) {
        const toolCalls = turn.toolCalls.map(fromStructured);
        return content.trim()
            ? { kind: 'mixed', content, toolCalls, thinking }
            : { kind: 'tool_calls', toolCalls, thinking };
    }

    const cleaned = stripCodeFence(content);
    const parsed = tryParseJson(cleaned);
    if (parsed.ok) {
        if (isObject(parsed.value) && 'response' in parsed.value) {
            return { kind: 'terminal_text', content: responseText(parsed.value.response), thinking };
        }
        const toolCalls = collectToolCalls(parsed.value, toolNames);
        if (toolCalls) return { kind: 'tool_calls', toolCalls, thinking };
    } else {
        const embedded = EMBEDDED_CALL.exec(content);
        if (embedded) {
            const inner = tryParseJson(embedded[0]);
            const toolCalls = inner.ok ? collectToolCalls(inner.value, toolNames) : null;
            if (toolCalls) {
                const rest = content.replace(embedded[0], '').trim();
                return rest
                    ? { kind: 'mixed', content: rest, toolCalls, thinking }
                    : { kind: 'tool_calls', toolCalls, thinking };
            }
        }
    }

    const extractors = options.extractors ?? defaultChainOnce();
    for (const extract of extractors) {
        const call = extract(content);
        if (call) return { kind: 'tool_calls', toolCalls: [call], thinking };
    }

    return { kind: 'terminal_text', content, thinking };
}

export function toolCallsOf(response: NormalizedResponse): ToolCall[] {
    return response.kind === 'terminal_text' ? [] : response.toolCalls;
}
