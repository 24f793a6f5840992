import type OpenAI from 'openai';
import { ToolDefinition } from '../types';
import { createLogger } from '../logger';

const log = createLogger('ToolRegistry');

export class ToolRegistry {
    private tools: Map<string, ToolDefinition> = new Map();

    register(tool: ToolDefinition): void {
        this.tools.set(tool.name, tool);
        log.debug(`Registered tool: ${tool.name}`);
    }

    get(name: string): ToolDefinition | undefined {
        return this.tools.get(name);
    }

    getAll(): ToolDefinition[] {
        return Array.from(this.tools.values());
    }

    getNames(): string[] {
        return Array.from(this.tools.keys());
    }

    getToolListForPrompt(): string {
        return this.getAll()
            .map((t) => `  * \`${t.name}\`: ${t.description}`)
            .join('\n');
    }

    /** Function-calling schema in the chat-completions `tools` shape. */
    getFunctionSchemas(): OpenAI.Chat.ChatCompletionTool[] {
        return this.getAll().map((t) => ({
            type: 'function',
            function: {
                name: t.name,
                description: t.description,
                parameters: { ...t.parameters },
            },
        }));
    }
}
