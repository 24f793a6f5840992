import { ConversationTurn, ToolCall, ToolResult } from '../types';

export type ConversationPhase = 'pending' | 'running' | 'terminal';

/** Render a tool outcome the way the model sees it on the next round. */
export function describeToolResult(result: ToolResult): string {
    const prefix = result.status === 'error' ? 'Error: ' : '';
    return `${prefix}${result.message}\nMap state: ${JSON.stringify(result.mapState)}`;
}

/**
 * Context of one user utterance: the append-only turn list plus the round
 * counter the agent loop is capped on.
 */
export class Conversation {
    private readonly history: ConversationTurn[];
    private rounds = 0;
    private phase: ConversationPhase = 'pending';

    constructor(systemPrompt: string, userMessage: string) {
        this.history = [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: userMessage },
        ];
    }

    get turns(): readonly ConversationTurn[] {
        return this.history;
    }

    get iterationCount(): number {
        return this.rounds;
    }

    get terminal(): boolean {
        return this.phase === 'terminal';
    }

    start(): void {
        if (this.phase === 'pending') this.phase = 'running';
    }

    addAssistant(content: string, toolCalls?: ToolCall[]): void {
        this.assertOpen();
        this.history.push(toolCalls?.length ? { role: 'assistant', content, toolCalls } : { role: 'assistant', content });
    }

    addToolResult(call: ToolCall, result: ToolResult): void {
        this.assertOpen();
        const answersNativeCall = call.origin === 'structured' && call.id;
        this.history.push({
            role: 'tool',
            toolName: call.name,
            content: describeToolResult(result),
            ...(answersNativeCall ? { toolCallId: call.id } : {}),
        });
    }

    /** One model call plus its tool executions is done. */
    completeRound(): void {
        this.assertOpen();
        this.rounds += 1;
    }

    finish(): void {
        this.phase = 'terminal';
    }

    private assertOpen(): void {
        if (this.phase === 'terminal') {
            throw new Error('Conversation is already terminal');
        }
    }
}
