import { GeocodeMatch, Geocoder } from '../geocode/arcgis';
import { ModelClient } from '../nlp/engine';
import { createMapTools } from '../tools/map';
import { ToolRegistry } from '../tools/registry';
import { ConversationTurn, ModelTurn, OutboundNotification, RawToolCall } from '../types';

export function prose(content: string): ModelTurn {
    return { content, reasoning: null, toolCalls: [] };
}

export function structured(...toolCalls: RawToolCall[]): ModelTurn {
    return { content: null, reasoning: null, toolCalls };
}

/** Replays canned replies in order and records the context of every call. */
export class ScriptedModel implements ModelClient {
    readonly received: ConversationTurn[][] = [];
    private readonly replies: Array<ModelTurn | Error>;

    constructor(replies: Array<ModelTurn | Error>, private readonly fallback?: ModelTurn) {
        this.replies = [...replies];
    }

    async complete(turns: readonly ConversationTurn[]): Promise<ModelTurn> {
        this.received.push([...turns]);
        const next = this.replies.shift() ?? this.fallback;
        if (!next) throw new Error('ScriptedModel ran out of replies');
        if (next instanceof Error) throw next;
        return next;
    }
}

export class FakeGeocoder implements Geocoder {
    readonly queries: string[] = [];

    constructor(private readonly answer: (address: string) => GeocodeMatch) {}

    async geocode(address: string): Promise<GeocodeMatch> {
        this.queries.push(address);
        return this.answer(address);
    }
}

export const WHITE_HOUSE: GeocodeMatch = {
    latitude: 38.8977,
    longitude: -77.0365,
    score: 98.5,
    address: '1600 Pennsylvania Ave NW, Washington, District of Columbia, 20500',
    candidatesCount: 3,
};

export function mapRegistry(geocoder: Geocoder = new FakeGeocoder(() => WHITE_HOUSE)): ToolRegistry {
    const registry = new ToolRegistry();
    createMapTools({ geocoder, geocodeZoom: 15 }).forEach((tool) => registry.register(tool));
    return registry;
}

export function collect(): { notifications: OutboundNotification[]; notify: (n: OutboundNotification) => void } {
    const notifications: OutboundNotification[] = [];
    return { notifications, notify: (n) => notifications.push(n) };
}
