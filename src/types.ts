import type { MapState } from './map/world-state';

// ─── Map Types ───────────────────────────────────────────────

/** [longitude, latitude], the order OpenLayers expects. */
export type LonLat = [number, number];

export interface MapSnapshot {
    center: LonLat;
    zoom: number;
}

// ─── Tool Types ──────────────────────────────────────────────

export type ToolCallOrigin = 'structured' | 'text_extracted';

export interface ToolCall {
    id?: string;
    name: string;
    arguments: Record<string, unknown>;
    origin: ToolCallOrigin;
    /** Set when the raw argument payload could not be decoded. */
    argumentError?: string;
}

export interface GeocodeCoordinates {
    latitude: number;
    longitude: number;
    confidence: number;
    formatted_address: string;
}

export interface ToolResultData {
    coordinates?: GeocodeCoordinates;
    candidates_count?: number;
}

export interface ToolResult {
    toolName: string;
    status: 'ok' | 'error';
    message: string;
    mapState: MapSnapshot;
    data?: ToolResultData;
}

/** What a handler reports; the dispatcher adds the tool name and snapshot. */
export interface ToolOutcome {
    message: string;
    data?: ToolResultData;
}

export interface JSONSchema {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
}

export interface ExecutionContext {
    sessionId: string;
    state: MapState;
    timestamp: Date;
}

export interface ToolDefinition {
    name: string;
    description: string;
    parameters: JSONSchema;
    execute: (args: Record<string, unknown>, context: ExecutionContext) => Promise<ToolOutcome>;
}

// ─── Model Types ─────────────────────────────────────────────

/** A function call exactly as the provider returned it. */
export interface RawToolCall {
    id?: string;
    name: string;
    arguments: string | Record<string, unknown>;
}

export interface ModelTurn {
    content: string | null;
    reasoning: string | null;
    toolCalls: RawToolCall[];
}

export type NormalizedResponse =
    | { kind: 'terminal_text'; content: string; thinking: string | null }
    | { kind: 'tool_calls'; toolCalls: ToolCall[]; thinking: string | null }
    | { kind: 'mixed'; content: string; toolCalls: ToolCall[]; thinking: string | null };

export type ConversationTurn =
    | { role: 'system'; content: string }
    | { role: 'user'; content: string }
    | { role: 'assistant'; content: string; toolCalls?: ToolCall[] }
    | { role: 'tool'; content: string; toolName: string; toolCallId?: string };

// ─── Outbound Notifications ──────────────────────────────────

export interface Diagnostics {
    user_message: string;
    iteration: number;
    llm_success: boolean;
    llm_content: string | null;
    llm_error?: string;
    has_tool_calls: boolean;
    raw_tool_calls: RawToolCall[] | null;
}

export type OutboundNotification =
    | {
          type: 'tool_call';
          tool: string;
          arguments: Record<string, unknown>;
          thinking_content?: string;
          diagnostics: Diagnostics;
      }
    | {
          type: 'tool_result';
          tool: string;
          status: 'ok' | 'error';
          content: string;
          map_state: MapSnapshot;
          coordinates?: GeocodeCoordinates;
          diagnostics: Diagnostics;
      }
    | {
          type: 'llm_response';
          content: string;
          thinking_content?: string;
          diagnostics: Diagnostics;
      }
    | { type: 'system-message'; content: string; diagnostics?: Diagnostics }
    | { type: 'map_state'; session_id: string; map_state: MapSnapshot };

export type Notify = (notification: OutboundNotification) => void | Promise<void>;

// ─── Inbound Messages ────────────────────────────────────────

export interface ChatMessage {
    type: 'chat_message';
    content: string;
}
