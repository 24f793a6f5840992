import { z } from 'zod';
import { ChatSession } from '../agent/session';
import { ConversationOutcome } from '../agent/core';
import { SerializationError, errorMessage } from '../errors';
import { createLogger } from '../logger';
import { ChatMessage, OutboundNotification } from '../types';

const log = createLogger('Gateway');

const chatMessageSchema: z.ZodType<ChatMessage> = z.object({
    type: z.literal('chat_message'),
    content: z.string(),
});

/**
 * Encodes a notification for the wire. Anything JSON cannot represent
 * (BigInt, cycles) is replaced by a system message instead of dropping the frame.
 */
export function encodeNotification(notification: OutboundNotification): string {
    try {
        return JSON.stringify(notification);
    } catch (error) {
        const failure = new SerializationError(`Message serialization error: ${errorMessage(error)}`);
        log.warn(`Could not serialize ${notification.type}: ${failure.message}`);
        return JSON.stringify({ type: 'system-message', content: failure.message });
    }
}

export type SendFrame = (frame: string) => void;

/** Binds one session to one transport connection. */
export class ChatChannel {
    constructor(
        private readonly session: ChatSession,
        private readonly send: SendFrame
    ) {}

    get sessionId(): string {
        return this.session.id;
    }

    notify = (notification: OutboundNotification): void => {
        this.send(encodeNotification(notification));
    };

    open(): void {
        this.notify({ type: 'map_state', session_id: this.session.id, map_state: this.session.mapState });
    }

    /**
     * Handles one inbound text frame. Resolves with the conversation outcome for
     * chat messages, or null when the frame was rejected or ignored.
     */
    async receive(frame: string): Promise<ConversationOutcome | null> {
        let payload: unknown;
        try {
            payload = JSON.parse(frame);
        } catch {
            this.notify({ type: 'system-message', content: 'Invalid JSON format received' });
            return null;
        }

        const message = chatMessageSchema.safeParse(payload);
        if (!message.success) {
            log.debug(`Ignoring frame: ${frame.slice(0, 100)}`);
            return null;
        }

        return this.session.submit(message.data.content, this.notify);
    }
}
