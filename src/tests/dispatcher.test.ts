import { GeocodeError } from '../errors';
import { MapState } from '../map/world-state';
import { ToolDispatcher } from '../tools/dispatcher';
import { ToolRegistry } from '../tools/registry';
import { ToolCall } from '../types';
import { FakeGeocoder, WHITE_HOUSE, mapRegistry } from './helpers';

function call(name: string, args: Record<string, unknown>): ToolCall {
    return { name, arguments: args, origin: 'structured' };
}

describe('ToolDispatcher', () => {
    let state: MapState;
    let dispatcher: ToolDispatcher;

    beforeEach(() => {
        state = new MapState({ center: [0, 0], zoom: 2 });
        dispatcher = new ToolDispatcher(mapRegistry(), state, 'session-1');
    });

    describe('navigate_to_location', () => {
        it('moves the map and reports the coordinates', async () => {
            const result = await dispatcher.execute(
                call('navigate_to_location', { latitude: 48.8566, longitude: 2.3522 })
            );
            expect(result).toEqual({
                toolName: 'navigate_to_location',
                status: 'ok',
                message: 'Map navigated to coordinates: 48.8566, 2.3522',
                mapState: { center: [2.3522, 48.8566], zoom: 2 },
            });
        });

        it('accepts coordinates outside the advertised ranges', async () => {
            const result = await dispatcher.execute(call('navigate_to_location', { latitude: 95, longitude: 10 }));
            expect(result.status).toBe('ok');
            expect(result.mapState.center).toEqual([10, 95]);
        });

        it('rejects a missing argument without touching the map', async () => {
            const result = await dispatcher.execute(call('navigate_to_location', { latitude: 10 }));
            expect(result).toEqual({
                toolName: 'navigate_to_location',
                status: 'error',
                message: 'Invalid arguments for navigate_to_location: longitude: Required',
                mapState: { center: [0, 0], zoom: 2 },
            });
        });

        it('rejects a string where a number is expected', async () => {
            const result = await dispatcher.execute(
                call('navigate_to_location', { latitude: '10', longitude: 20 })
            );
            expect(result.status).toBe('error');
            expect(result.message).toBe(
                'Invalid arguments for navigate_to_location: latitude: Expected number, received string'
            );
            expect(state.snapshot().center).toEqual([0, 0]);
        });
    });

    describe('zoom_to_level', () => {
        it('stores an in-range level', async () => {
            const result = await dispatcher.execute(call('zoom_to_level', { zoom_level: 12 }));
            expect(result.message).toBe('Map zoomed to level: 12');
            expect(result.mapState.zoom).toBe(12);
        });

        it('reports the clamped level alongside the requested one', async () => {
            const high = await dispatcher.execute(call('zoom_to_level', { zoom_level: 99 }));
            expect(high.status).toBe('ok');
            expect(high.message).toBe('Map zoomed to level: 20 (requested 99)');

            const low = await dispatcher.execute(call('zoom_to_level', { zoom_level: -3 }));
            expect(low.message).toBe('Map zoomed to level: 0 (requested -3)');
            expect(state.snapshot().zoom).toBe(0);
        });
    });

    describe('geocode_address', () => {
        it('navigates to the best match and zooms in', async () => {
            const result = await dispatcher.execute(call('geocode_address', { address: '1600 Pennsylvania Ave' }));
            expect(result).toEqual({
                toolName: 'geocode_address',
                status: 'ok',
                message:
                    "Geocoded '1600 Pennsylvania Ave' and navigated to: " +
                    '1600 Pennsylvania Ave NW, Washington, District of Columbia, 20500 (confidence: 98.5%)',
                mapState: { center: [-77.0365, 38.8977], zoom: 15 },
                data: {
                    coordinates: {
                        latitude: 38.8977,
                        longitude: -77.0365,
                        confidence: 98.5,
                        formatted_address: '1600 Pennsylvania Ave NW, Washington, District of Columbia, 20500',
                    },
                    candidates_count: 3,
                },
            });
        });

        it('falls back to the coordinates when the match has no address', async () => {
            const geocoder = new FakeGeocoder(() => ({ ...WHITE_HOUSE, address: '' }));
            const local = new ToolDispatcher(mapRegistry(geocoder), state, 'session-1');
            const result = await local.execute(call('geocode_address', { address: 'somewhere' }));
            expect(result.message).toBe(
                "Geocoded 'somewhere' and navigated to: 38.897700, -77.036500 (confidence: 98.5%)"
            );
        });

        it('leaves the map alone when geocoding fails', async () => {
            const geocoder = new FakeGeocoder((address) => {
                throw new GeocodeError(`No location found for address: ${address}`);
            });
            const local = new ToolDispatcher(mapRegistry(geocoder), state, 'session-1');
            const result = await local.execute(call('geocode_address', { address: 'Atlantis' }));
            expect(result).toEqual({
                toolName: 'geocode_address',
                status: 'error',
                message: 'No location found for address: Atlantis',
                mapState: { center: [0, 0], zoom: 2 },
            });
        });

        it('rejects a blank address before calling the geocoder', async () => {
            const geocoder = new FakeGeocoder(() => WHITE_HOUSE);
            const local = new ToolDispatcher(mapRegistry(geocoder), state, 'session-1');
            const result = await local.execute(call('geocode_address', { address: '   ' }));
            expect(result.status).toBe('error');
            expect(result.message).toMatch(/^Invalid arguments for geocode_address: address: /);
            expect(geocoder.queries).toEqual([]);
        });
    });

    it('answers an unknown tool with an error result', async () => {
        const result = await dispatcher.execute(call('fly_to_moon', {}));
        expect(result).toEqual({
            toolName: 'fly_to_moon',
            status: 'error',
            message: 'Unknown tool: fly_to_moon',
            mapState: { center: [0, 0], zoom: 2 },
        });
    });

    it('reports arguments that could not be decoded', async () => {
        const result = await dispatcher.execute({
            name: 'zoom_to_level',
            arguments: {},
            origin: 'structured',
            argumentError: 'arguments are not valid JSON',
        });
        expect(result.message).toBe('Invalid arguments for zoom_to_level: arguments are not valid JSON');
        expect(result.status).toBe('error');
    });

    it('wraps an unexpected handler failure', async () => {
        const registry = new ToolRegistry();
        registry.register({
            name: 'broken',
            description: 'Always fails',
            parameters: { type: 'object', properties: {} },
            execute: async () => {
                throw new Error('boom');
            },
        });
        const local = new ToolDispatcher(registry, state, 'session-1');
        const result = await local.execute(call('broken', {}));
        expect(result.message).toBe('An unexpected error occurred while executing broken: boom');
        expect(result.status).toBe('error');
    });

    it('passes the session id and live state to handlers', async () => {
        const registry = new ToolRegistry();
        const seen: string[] = [];
        registry.register({
            name: 'probe',
            description: 'Records its context',
            parameters: { type: 'object', properties: {} },
            execute: async (_args, context) => {
                seen.push(context.sessionId);
                context.state.moveTo(1, 2);
                return { message: 'probed' };
            },
        });
        const local = new ToolDispatcher(registry, state, 'session-42');
        await local.execute(call('probe', {}));
        expect(seen).toEqual(['session-42']);
        expect(local.mapState.center).toEqual([2, 1]);
    });

    it('exposes the map only as a copy', () => {
        const view = dispatcher.mapState;
        view.center[0] = 99;
        view.zoom = 19;

        expect(dispatcher.mapState).toEqual({ center: [0, 0], zoom: 2 });
        expect(state.snapshot()).toEqual({ center: [0, 0], zoom: 2 });
    });
});
