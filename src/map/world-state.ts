import { LonLat, MapSnapshot } from '../types';

export const MIN_ZOOM = 0;
export const MAX_ZOOM = 20;

export function clampZoom(level: number): number {
    return Math.max(MIN_ZOOM, Math.min(MAX_ZOOM, Math.round(level)));
}

/**
 * Current view of one session's map. Only the tool handlers write to it;
 * everything else reads through `snapshot()`.
 */
export class MapState {
    private center: LonLat;
    private zoom: number;

    constructor(initial: MapSnapshot) {
        this.center = [initial.center[0], initial.center[1]];
        this.zoom = clampZoom(initial.zoom);
    }

    /** Stores the point in OpenLayers order: [longitude, latitude]. */
    moveTo(latitude: number, longitude: number): void {
        this.center = [longitude, latitude];
    }

    /** Saturates to [0, 20] and returns the stored level. */
    zoomTo(level: number): number {
        this.zoom = clampZoom(level);
        return this.zoom;
    }

    snapshot(): MapSnapshot {
        return { center: [this.center[0], this.center[1]], zoom: this.zoom };
    }
}
