import { buildConfig } from '../config';

describe('buildConfig', () => {
    it('falls back to local defaults', () => {
        const config = buildConfig({});

        expect(config.llm).toEqual({
            provider: 'lmstudio',
            baseUrl: 'http://localhost:1234/v1',
            apiKey: 'not-needed',
            model: 'qwen2.5-7b-instruct',
            temperature: 0.1,
            maxTokens: 1000,
        });
        expect(config.agent).toEqual({ maxIterations: 5, stopOnRepeatedToolCalls: false });
        expect(config.map).toEqual({ defaultCenter: [0, 0], defaultZoom: 2 });
        expect(config.geocoder.maxLocations).toBe(10);
        expect(config.geocoder.resultZoom).toBe(15);
        expect(config.server).toEqual({ host: '0.0.0.0', port: 8000, corsOrigin: '*' });
    });

    it('reads overrides from the environment', () => {
        const config = buildConfig({
            LLM_BASE_URL: 'http://models.internal:8080/v1',
            LLM_MODEL: 'test-model',
            LLM_TEMPERATURE: '0.7',
            AGENT_MAX_ITERATIONS: '3',
            AGENT_STOP_ON_REPEAT: 'true',
            MAP_DEFAULT_CENTER: ' -0.1278, 51.5074 ',
            MAP_DEFAULT_ZOOM: '6',
            PORT: '9001',
        });

        expect(config.llm.baseUrl).toBe('http://models.internal:8080/v1');
        expect(config.llm.model).toBe('test-model');
        expect(config.llm.temperature).toBe(0.7);
        expect(config.agent).toEqual({ maxIterations: 3, stopOnRepeatedToolCalls: true });
        expect(config.map).toEqual({ defaultCenter: [-0.1278, 51.5074], defaultZoom: 6 });
        expect(config.server.port).toBe(9001);
    });

    it('ignores values that do not parse', () => {
        const config = buildConfig({
            LLM_MAX_TOKENS: 'lots',
            PORT: '',
            MAP_DEFAULT_CENTER: '10',
        });

        expect(config.llm.maxTokens).toBe(1000);
        expect(config.server.port).toBe(8000);
        expect(config.map.defaultCenter).toEqual([0, 0]);
    });

    it('never allows fewer than one round', () => {
        expect(buildConfig({ AGENT_MAX_ITERATIONS: '0' }).agent.maxIterations).toBe(1);
    });
});
