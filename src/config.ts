import dotenv from 'dotenv';

dotenv.config();

type Env = Record<string, string | undefined>;

const DEFAULT_GEOCODER_URL =
    'https://geocode.arcgis.com/arcgis/rest/services/World/GeocodeServer/findAddressCandidates';

export function buildConfig(env: Env) {
    return {
        llm: {
            provider: env.LLM_PROVIDER || 'lmstudio',
            baseUrl: env.LLM_BASE_URL || 'http://localhost:1234/v1',
            apiKey: env.LLM_API_KEY || 'not-needed',
            model: env.LLM_MODEL || 'qwen2.5-7b-instruct',
            temperature: readFloat(env.LLM_TEMPERATURE, 0.1),
            maxTokens: readInt(env.LLM_MAX_TOKENS, 1000),
        },
        agent: {
            maxIterations: Math.max(1, readInt(env.AGENT_MAX_ITERATIONS, 5)),
            stopOnRepeatedToolCalls: env.AGENT_STOP_ON_REPEAT === 'true',
        },
        map: {
            defaultCenter: readCenter(env.MAP_DEFAULT_CENTER, [0, 0]),
            defaultZoom: readInt(env.MAP_DEFAULT_ZOOM, 2),
        },
        geocoder: {
            url: env.GEOCODER_URL || DEFAULT_GEOCODER_URL,
            maxLocations: readInt(env.GEOCODER_MAX_LOCATIONS, 10),
            resultZoom: readInt(env.GEOCODE_ZOOM, 15),
        },
        server: {
            host: env.HOST || '0.0.0.0',
            port: readInt(env.PORT, 8000),
            corsOrigin: env.CORS_ORIGIN || '*',
        },
        logLevel: env.LOG_LEVEL || 'info',
    } as const;
}

export type AppConfig = ReturnType<typeof buildConfig>;

export const config: AppConfig = buildConfig(process.env);

function readInt(raw: string | undefined, fallback: number): number {
    if (!raw?.trim()) return fallback;
    const parsed = parseInt(raw, 10);
    return Number.isNaN(parsed) ? fallback : parsed;
}

function readFloat(raw: string | undefined, fallback: number): number {
    if (!raw?.trim()) return fallback;
    const parsed = parseFloat(raw);
    return Number.isFinite(parsed) ? parsed : fallback;
}

/** Parses "lon,lat"; anything else falls back. */
function readCenter(raw: string | undefined, fallback: [number, number]): [number, number] {
    if (!raw?.trim()) return fallback;
    const parts = raw.split(',').map((p) => parseFloat(p.trim()));
    if (parts.length !== 2 || !parts.every(Number.isFinite)) return fallback;
    return [parts[0], parts[1]];
}
