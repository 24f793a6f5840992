import fs from 'fs';
import path from 'path';
import { z } from 'zod';

export interface Place {
    lat: number;
    lon: number;
}

/** Lower-case place name → coordinates. Iteration order is lookup priority. */
export type Gazetteer = ReadonlyMap<string, Place>;

const gazetteerFile = z.record(
    z.object({
        lat: z.number().min(-90).max(90),
        lon: z.number().min(-180).max(180),
    })
);

export const DEFAULT_GAZETTEER_PATH = path.resolve(__dirname, '../../data/gazetteer.json');

export function createGazetteer(entries: Record<string, Place>): Gazetteer {
    return new Map(Object.entries(entries).map(([name, place]) => [name.toLowerCase(), place]));
}

export function loadGazetteer(filePath: string = DEFAULT_GAZETTEER_PATH): Gazetteer {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    return createGazetteer(gazetteerFile.parse(raw));
}

let cached: Gazetteer | null = null;

export function defaultGazetteer(): Gazetteer {
    if (!cached) cached = loadGazetteer();
    return cached;
}
