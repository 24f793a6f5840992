import { z } from 'zod';
import { SchemaViolationError } from '../errors';
import { Geocoder } from '../geocode/arcgis';
import { ToolDefinition, ToolOutcome } from '../types';

export const NAVIGATE_TOOL = 'navigate_to_location';
export const ZOOM_TOOL = 'zoom_to_level';
export const GEOCODE_TOOL = 'geocode_address';

const navigateArgs = z.object({
    latitude: z.number().finite(),
    longitude: z.number().finite(),
});

const zoomArgs = z.object({
    zoom_level: z.number().finite(),
});

const geocodeArgs = z.object({
    address: z.string().trim().min(1),
});

function parseArgs<T>(toolName: string, schema: z.ZodType<T>, args: Record<string, unknown>): T {
    const result = schema.safeParse(args);
    if (!result.success) {
        throw new SchemaViolationError(
            toolName,
            result.error.issues.map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
        );
    }
    return result.data;
}

export interface MapToolOptions {
    geocoder: Geocoder;
    /** Zoom applied after a successful geocode. */
    geocodeZoom: number;
}

export function createMapTools({ geocoder, geocodeZoom }: MapToolOptions): ToolDefinition[] {
    return [
        // ── navigate_to_location ──
        {
            name: NAVIGATE_TOOL,
            description: 'Navigate the map to a specific latitude and longitude',
            parameters: {
                type: 'object',
                properties: {
                    latitude: { type: 'number', description: 'Latitude coordinate (-90 to 90)' },
                    longitude: { type: 'number', description: 'Longitude coordinate (-180 to 180)' },
                },
                required: ['latitude', 'longitude'],
            },
            // Ranges are advertised to the model but not enforced here.
            execute: async (args, { state }): Promise<ToolOutcome> => {
                const { latitude, longitude } = parseArgs(NAVIGATE_TOOL, navigateArgs, args);
                state.moveTo(latitude, longitude);
                return { message: `Map navigated to coordinates: ${latitude}, ${longitude}` };
            },
        },

        // ── zoom_to_level ──
        {
            name: ZOOM_TOOL,
            description: 'Zoom the map to a specific level',
            parameters: {
                type: 'object',
                properties: {
                    zoom_level: {
                        type: 'integer',
                        description: 'Zoom level (0-20, where 0 is most zoomed out)',
                    },
                },
                required: ['zoom_level'],
            },
            execute: async (args, { state }): Promise<ToolOutcome> => {
                const { zoom_level } = parseArgs(ZOOM_TOOL, zoomArgs, args);
                const stored = state.zoomTo(zoom_level);
                const note = stored === zoom_level ? '' : ` (requested ${zoom_level})`;
                return { message: `Map zoomed to level: ${stored}${note}` };
            },
        },

        // ── geocode_address ──
        {
            name: GEOCODE_TOOL,
            description:
                'Convert a street address or place name to coordinates and navigate the map there',
            parameters: {
                type: 'object',
                properties: {
                    address: {
                        type: 'string',
                        description: 'Free-text address or place name, e.g. "1600 Pennsylvania Ave, Washington DC"',
                    },
                },
                required: ['address'],
            },
            execute: async (args, { state }): Promise<ToolOutcome> => {
                const { address } = parseArgs(GEOCODE_TOOL, geocodeArgs, args);
                // Throws GeocodeError before any state change.
                const match = await geocoder.geocode(address);

                state.moveTo(match.latitude, match.longitude);
                state.zoomTo(geocodeZoom);

                const label =
                    match.address || `${match.latitude.toFixed(6)}, ${match.longitude.toFixed(6)}`;
                return {
                    message: `Geocoded '${address}' and navigated to: ${label} (confidence: ${match.score}%)`,
                    data: {
                        coordinates: {
                            latitude: match.latitude,
                            longitude: match.longitude,
                            confidence: match.score,
                            formatted_address: match.address,
                        },
                        candidates_count: match.candidatesCount,
                    },
                };
            },
        },
    ];
}
