import { NAVIGATE_TOOL, ZOOM_TOOL } from '../tools/map';
import { ToolCall } from '../types';
import { Gazetteer } from './gazetteer';

/**
 * Reads a tool call out of free prose, or returns null. Extractors run in
 * order and the first non-null result wins.
 */
export type TextExtractor = (text: string) => ToolCall | null;

const WAYFINDING_VERBS = ['navigate', 'go to', 'show me', 'take me'];

export function hasWayfindingVerb(text: string): boolean {
    const lower = text.toLowerCase();
    return WAYFINDING_VERBS.some((verb) => lower.includes(verb));
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function navigateCall(latitude: number, longitude: number): ToolCall {
    return {
        name: NAVIGATE_TOOL,
        arguments: { latitude, longitude },
        origin: 'text_extracted',
    };
}

export function gazetteerExtractor(gazetteer: Gazetteer): TextExtractor {
    const patterns = Array.from(gazetteer.entries()).map(([name, place]) => ({
        pattern: new RegExp(`\\b${escapeRegExp(name)}\\b`, 'i'),
        place,
    }));

    return (text) => {
        if (!hasWayfindingVerb(text)) return null;
        const hit = patterns.find(({ pattern }) => pattern.test(text));
        return hit ? navigateCall(hit.place.lat, hit.place.lon) : null;
    };
}

// Two numbers with at least one non-numeric character between them.
const COORDINATE_PAIR = /(-?\d+(?:\.\d+)?)[^-\d.]+(-?\d+(?:\.\d+)?)/;

export const coordinateExtractor: TextExtractor = (text) => {
    if (!hasWayfindingVerb(text)) return null;
    const match = COORDINATE_PAIR.exec(text);
    if (!match) return null;

    const latitude = parseFloat(match[1]);
    const longitude = parseFloat(match[2]);
    if (latitude < -90 || latitude > 90 || longitude < -180 || longitude > 180) return null;
    return navigateCall(latitude, longitude);
};

// "zoom to 10", "zoom 5", "zoom to level 10", "zoom level to 10", "set zoom level to 10"
const ZOOM_REQUEST = /\bzoom\s+(?:to\s+(?:level\s+)?|level\s+to\s+)?(\d+)\b/i;

/** Only explicit numeric zoom requests; the level is passed through unclamped. */
export const zoomExtractor: TextExtractor = (text) => {
    const match = ZOOM_REQUEST.exec(text);
    if (!match) return null;
    return {
        name: ZOOM_TOOL,
        arguments: { zoom_level: parseInt(match[1], 10) },
        origin: 'text_extracted',
    };
};

export function defaultExtractors(gazetteer: Gazetteer): TextExtractor[] {
    return [gazetteerExtractor(gazetteer), coordinateExtractor, zoomExtractor];
}
