import { ModelCallError, errorMessage } from '../errors';
import { createLogger } from '../logger';
import { ModelClient, buildSystemPrompt } from '../nlp/engine';
import { NormalizerOptions, normalizeResponse, toolCallsOf } from '../nlp/normalizer';
import { ToolDispatcher } from '../tools/dispatcher';
import { ToolRegistry } from '../tools/registry';
import { Diagnostics, ModelTurn, Notify, ToolCall } from '../types';
import { Conversation } from './conversation';

const log = createLogger('Agent');

export interface AgentOptions {
    maxIterations: number;
    /** Stop early when a round repeats the previous round's calls exactly. */
    stopOnRepeatedToolCalls?: boolean;
    normalizer?: NormalizerOptions;
}

export type ConversationOutcome =
    | { status: 'answered'; answer: string; iterations: number }
    | { status: 'gave_up'; reason: 'iteration_limit' | 'repeated_tool_calls'; iterations: number }
    | { status: 'failed'; error: string; iterations: number };

function diagnosticsFor(userMessage: string, iteration: number, turn: ModelTurn): Diagnostics {
    return {
        user_message: userMessage,
        iteration,
        llm_success: true,
        llm_content: turn.content,
        has_tool_calls: turn.toolCalls.length > 0,
        raw_tool_calls: turn.toolCalls.length > 0 ? turn.toolCalls : null,
    };
}

function thinkingField(thinking: string | null): { thinking_content?: string } {
    return thinking ? { thinking_content: thinking } : {};
}

function roundSignature(calls: ToolCall[]): string {
    return JSON.stringify(calls.map((call) => [call.name, call.arguments]));
}

/**
 * Runs one user utterance to completion: call the model, normalize its reply,
 * execute any tool calls in order, feed the results back, and repeat until the
 * model answers in prose or the round cap is reached.
 */
export class AgentCore {
    private readonly systemPrompt: string;

    constructor(
        private readonly model: ModelClient,
        private readonly registry: ToolRegistry,
        private readonly options: AgentOptions
    ) {
        this.systemPrompt = buildSystemPrompt(registry.getToolListForPrompt());
    }

    async handleMessage(text: string, dispatcher: ToolDispatcher, notify: Notify): Promise<ConversationOutcome> {
        const conversation = new Conversation(this.systemPrompt, text);
        const tools = this.registry.getFunctionSchemas();
        const normalizerOptions: NormalizerOptions = {
            toolNames: this.registry.getNames(),
            ...this.options.normalizer,
        };
        let previousRound: string | null = null;

        log.info(`Processing message: "${text}"`);
        conversation.start();

        while (conversation.iterationCount < this.options.maxIterations) {
            const iteration = conversation.iterationCount + 1;

            let turn: ModelTurn;
            try {
                turn = await this.model.complete(conversation.turns, tools);
            } catch (error) {
                const failure = error instanceof ModelCallError ? error.message : `Model call failed: ${errorMessage(error)}`;
                log.error(failure);
                conversation.finish();
                await notify({
                    type: 'system-message',
                    content: `LLM Error: ${failure}`,
                    diagnostics: {
                        user_message: text,
                        iteration,
                        llm_success: false,
                        llm_content: null,
                        llm_error: failure,
                        has_tool_calls: false,
                        raw_tool_calls: null,
                    },
                });
                return { status: 'failed', error: failure, iterations: conversation.iterationCount };
            }

            const diagnostics = diagnosticsFor(text, iteration, turn);
            const normalized = normalizeResponse(turn, normalizerOptions);
            const calls = toolCallsOf(normalized);

            if (normalized.kind === 'terminal_text') {
                conversation.addAssistant(normalized.content);
                conversation.finish();
                log.info(`Answered after ${conversation.iterationCount} tool round(s)`);
                await notify({
                    type: 'llm_response',
                    content: normalized.content,
                    ...thinkingField(normalized.thinking),
                    diagnostics,
                });
                return { status: 'answered', answer: normalized.content, iterations: conversation.iterationCount };
            }

            conversation.addAssistant(normalized.kind === 'mixed' ? normalized.content : turn.content ?? '', calls);

            // In emission order; each call sees the map as the previous one left it.
            for (const call of calls) {
                await notify({
                    type: 'tool_call',
                    tool: call.name,
                    arguments: call.arguments,
                    ...thinkingField(normalized.thinking),
                    diagnostics,
                });

                const result = await dispatcher.execute(call);
                conversation.addToolResult(call, result);

                await notify({
                    type: 'tool_result',
                    tool: call.name,
                    status: result.status,
                    content: result.message,
                    map_state: result.mapState,
                    ...(result.data?.coordinates ? { coordinates: result.data.coordinates } : {}),
                    diagnostics,
                });
            }

            conversation.completeRound();

            if (this.options.stopOnRepeatedToolCalls) {
                const signature = roundSignature(calls);
                if (signature === previousRound) {
                    return this.giveUp(conversation, 'repeated_tool_calls', notify);
                }
                previousRound = signature;
            }
        }

        return this.giveUp(conversation, 'iteration_limit', notify);
    }

    private async giveUp(
        conversation: Conversation,
        reason: 'iteration_limit' | 'repeated_tool_calls',
        notify: Notify
    ): Promise<ConversationOutcome> {
        conversation.finish();
        const rounds = conversation.iterationCount;
        const content =
            reason === 'iteration_limit'
                ? `Stopped after ${rounds} tool round(s) without a final answer.`
                : `Stopped after ${rounds} tool round(s): the model repeated the same tool calls.`;
        log.warn(content);
        await notify({ type: 'system-message', content });
        return { status: 'gave_up', reason, iterations: rounds };
    }
}
