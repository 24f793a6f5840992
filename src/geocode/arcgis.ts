import { z } from 'zod';
import { GeocodeError, errorMessage } from '../errors';
import { createLogger } from '../logger';

const log = createLogger('Geocode');

export interface GeocodeMatch {
    latitude: number;
    longitude: number;
    /** Provider score, 0-100. */
    score: number;
    address: string;
    candidatesCount: number;
}

export interface Geocoder {
    geocode(address: string): Promise<GeocodeMatch>;
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface ArcGisGeocoderOptions {
    url: string;
    maxLocations: number;
    fetchFn?: FetchFn;
}

const candidateSchema = z.object({
    address: z.string().optional(),
    location: z.object({ x: z.number().finite(), y: z.number().finite() }),
    score: z.number().optional(),
});

const responseSchema = z.object({
    candidates: z.array(z.unknown()).optional(),
    error: z.object({ code: z.number().optional(), message: z.string().optional() }).optional(),
});

/**
 * ArcGIS World Geocoding `findAddressCandidates`. Only the top-ranked candidate
 * is used; the service already orders candidates by score.
 */
export class ArcGisGeocoder implements Geocoder {
    private readonly fetchFn: FetchFn;

    constructor(private readonly options: ArcGisGeocoderOptions) {
        this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
    }

    async geocode(address: string): Promise<GeocodeMatch> {
        const params = new URLSearchParams({
            f: 'json',
            maxLocations: String(this.options.maxLocations),
            outFields: '*',
            SingleLine: address,
        });
        const url = `${this.options.url}?${params.toString()}`;

        log.debug(`GET ${url}`);

        let response: Response;
        try {
            response = await this.fetchFn(url, { headers: { Accept: 'application/json' } });
        } catch (error) {
            throw new GeocodeError(`Network error when geocoding address '${address}': ${errorMessage(error)}`);
        }

        if (!response.ok) {
            throw new GeocodeError(`Geocoding service returned HTTP ${response.status} for address: ${address}`);
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch {
            throw new GeocodeError(`Geocoding service returned a non-JSON body for address: ${address}`);
        }

        const parsed = responseSchema.safeParse(body);
        if (!parsed.success) {
            throw new GeocodeError(`Geocoding service returned an unexpected payload for address: ${address}`);
        }
        if (parsed.data.error) {
            throw new GeocodeError(
                `Geocoding service error for address '${address}': ${parsed.data.error.message ?? 'unknown error'}`
            );
        }

        const candidates = parsed.data.candidates ?? [];
        if (candidates.length === 0) {
            throw new GeocodeError(`No location found for address: ${address}`);
        }

        const best = candidateSchema.safeParse(candidates[0]);
        if (!best.success) {
            throw new GeocodeError(`Geocoding service returned invalid coordinates for address: ${address}`);
        }

        log.debug(`${candidates.length} candidate(s) for "${address}", best score ${best.data.score ?? 0}`);

        return {
            latitude: best.data.location.y,
            longitude: best.data.location.x,
            score: best.data.score ?? 0,
            address: best.data.address ?? '',
            candidatesCount: candidates.length,
        };
    }
}
