import { GeocodeError, SchemaViolationError, errorMessage } from '../errors';
import { createLogger } from '../logger';
import { MapState } from '../map/world-state';
import { MapSnapshot, ToolCall, ToolResult } from '../types';
import { ToolRegistry } from './registry';

const log = createLogger('Tool');

/**
 * Executes tool calls against one session's map. The dispatcher is the only
 * path by which a MapState is written.
 */
export class ToolDispatcher {
    constructor(
        private readonly registry: ToolRegistry,
        private readonly state: MapState,
        private readonly sessionId: string
    ) {}

    get mapState(): MapSnapshot {
        return this.state.snapshot();
    }

    async execute(call: ToolCall): Promise<ToolResult> {
        const tool = this.registry.get(call.name);
        if (!tool) {
            log.warn(`Unknown tool requested: ${call.name}`);
            return this.error(call.name, `Unknown tool: ${call.name}`);
        }

        if (call.argumentError) {
            return this.error(call.name, `Invalid arguments for ${call.name}: ${call.argumentError}`);
        }

        log.info(`${call.name}(${JSON.stringify(call.arguments)})`);

        try {
            const outcome = await tool.execute(call.arguments, {
                sessionId: this.sessionId,
                state: this.state,
                timestamp: new Date(),
            });
            const result: ToolResult = {
                toolName: call.name,
                status: 'ok',
                message: outcome.message,
                mapState: this.state.snapshot(),
            };
            if (outcome.data) result.data = outcome.data;
            log.debug(`${call.name} -> ${outcome.message}`);
            return result;
        } catch (error) {
            if (error instanceof SchemaViolationError || error instanceof GeocodeError) {
                log.warn(`${call.name} failed: ${error.message}`);
                return this.error(call.name, error.message);
            }
            log.error(`${call.name} threw: ${errorMessage(error)}`);
            return this.error(
                call.name,
                `An unexpected error occurred while executing ${call.name}: ${errorMessage(error)}`
            );
        }
    }

    private error(toolName: string, message: string): ToolResult {
        return { toolName, status: 'error', message, mapState: this.state.snapshot() };
    }
}
