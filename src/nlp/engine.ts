import OpenAI from 'openai';
import { ModelCallError, errorMessage } from '../errors';
import { createLogger } from '../logger';
import { ConversationTurn, ModelTurn, RawToolCall } from '../types';

const log = createLogger('NLP');

export interface ModelClient {
    /** One chat-completions round trip. Rejects with ModelCallError. */
    complete(turns: readonly ConversationTurn[], tools: OpenAI.Chat.ChatCompletionTool[]): Promise<ModelTurn>;
}

export interface ModelSettings {
    baseUrl: string;
    apiKey: string;
    model: string;
    temperature: number;
    maxTokens: number;
}

export function buildSystemPrompt(toolList: string): string {
    return `You are a helpful assistant that controls an interactive map.

**Available Tools:**
${toolList}

When users ask to navigate to a place whose coordinates you know, use navigate_to_location.
When they give a street address or a place you cannot locate precisely, use geocode_address.
When they ask to zoom, use zoom_to_level.

IMPORTANT: Always respond in JSON format. If you don't use tools, respond with:
{"response": "your text response here"}

If you use tools, let the tool execution handle the response. Tool results are sent
back to you; once the map shows what the user asked for, reply with the JSON response above.

If your model supports reasoning/thinking content:
- Put your thinking process in the reasoning_content field
- Put your final response in the content field`;
}

function readReasoning(message: object): string | null {
    if ('reasoning_content' in message && typeof message.reasoning_content === 'string') {
        return message.reasoning_content;
    }
    return null;
}

/** Maps the conversation onto chat-completions messages. */
export function toChatMessages(turns: readonly ConversationTurn[]): OpenAI.Chat.ChatCompletionMessageParam[] {
    return turns.map((turn): OpenAI.Chat.ChatCompletionMessageParam => {
        switch (turn.role) {
            case 'system':
                return { role: 'system', content: turn.content };
            case 'user':
                return { role: 'user', content: turn.content };
            case 'assistant': {
                const native = (turn.toolCalls ?? []).filter(
                    (call) => call.origin === 'structured' && call.id
                );
                if (native.length === 0) {
                    return { role: 'assistant', content: turn.content };
                }
                return {
                    role: 'assistant',
                    content: turn.content || null,
                    tool_calls: native.map((call) => ({
                        id: call.id ?? '',
                        type: 'function' as const,
                        function: { name: call.name, arguments: JSON.stringify(call.arguments) },
                    })),
                };
            }
            case 'tool':
                // Calls inferred from text have no id to answer, so report them as user text.
                if (turn.toolCallId) {
                    return { role: 'tool', tool_call_id: turn.toolCallId, content: turn.content };
                }
                return { role: 'user', content: `Tool result (${turn.toolName}): ${turn.content}` };
        }
    });
}

/** Client for any OpenAI-compatible server (OpenAI, LM Studio, Ollama, vLLM). */
export class OpenAIModelClient implements ModelClient {
    private client: OpenAI;

    constructor(private readonly settings: ModelSettings) {
        // Failures surface once; a new user message is the retry.
        this.client = new OpenAI({ apiKey: settings.apiKey, baseURL: settings.baseUrl, maxRetries: 0 });
    }

    async complete(turns: readonly ConversationTurn[], tools: OpenAI.Chat.ChatCompletionTool[]): Promise<ModelTurn> {
        const params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
            model: this.settings.model,
            messages: toChatMessages(turns),
            temperature: this.settings.temperature,
            max_tokens: this.settings.maxTokens,
        };
        if (tools.length > 0) {
            params.tools = tools;
            params.tool_choice = 'auto';
        }

        log.info(`Calling model ${this.settings.model} (${turns.length} messages)`);
        const startTime = Date.now();

        let completion: OpenAI.Chat.ChatCompletion;
        try {
            completion = await this.client.chat.completions.create(params);
        } catch (error) {
            throw new ModelCallError(`Model call failed: ${errorMessage(error)}`, error);
        }

        log.info(`Model responded in ${Date.now() - startTime}ms`);

        const message = completion.choices[0]?.message;
        if (!message) {
            throw new ModelCallError('Model returned no choices');
        }

        const toolCalls: RawToolCall[] = (message.tool_calls ?? []).map((call) => ({
            id: call.id,
            name: call.function.name,
            arguments: call.function.arguments,
        }));
        const turn: ModelTurn = {
            content: message.content,
            reasoning: readReasoning(message),
            toolCalls,
        };

        log.debug(`Response - content: ${turn.content}, thinking: ${turn.reasoning}, tool_calls: ${JSON.stringify(toolCalls)}`);
        return turn;
    }
}
