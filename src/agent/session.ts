import { v4 as uuidv4 } from 'uuid';
import { errorMessage } from '../errors';
import { createLogger } from '../logger';
import { MapState } from '../map/world-state';
import { ToolDispatcher } from '../tools/dispatcher';
import { ToolRegistry } from '../tools/registry';
import { MapSnapshot, Notify } from '../types';
import { AgentCore, ConversationOutcome } from './core';

const log = createLogger('Session');

/**
 * One connected client. Owns its own map and processes utterances strictly
 * one at a time.
 */
export class ChatSession {
    readonly id: string;
    readonly createdAt = new Date();
    private readonly dispatcher: ToolDispatcher;
    private queue: Promise<unknown> = Promise.resolve();
    private pending = 0;

    constructor(
        private readonly agent: AgentCore,
        registry: ToolRegistry,
        initialMap: MapSnapshot,
        id: string = uuidv4()
    ) {
        this.id = id;
        this.dispatcher = new ToolDispatcher(registry, new MapState(initialMap), id);
    }

    get mapState(): MapSnapshot {
        return this.dispatcher.mapState;
    }

    get busy(): boolean {
        return this.pending > 0;
    }

    /** Queues the utterance behind any still running in this session. */
    submit(text: string, notify: Notify): Promise<ConversationOutcome> {
        this.pending += 1;
        const run = this.queue.then(() => this.agent.handleMessage(text, this.dispatcher, notify));
        const settled = run.finally(() => {
            this.pending -= 1;
        });
        // Keep the chain alive after a rejection so later utterances still run.
        this.queue = settled.catch((error: unknown) => {
            log.error(`Session ${this.id} utterance failed: ${errorMessage(error)}`);
        });
        return settled;
    }
}

export interface SessionManagerOptions {
    agent: AgentCore;
    registry: ToolRegistry;
    initialMap: MapSnapshot;
}

export class SessionManager {
    private sessions: Map<string, ChatSession> = new Map();

    constructor(private readonly options: SessionManagerOptions) {}

    create(id?: string): ChatSession {
        const session = new ChatSession(this.options.agent, this.options.registry, this.options.initialMap, id);
        this.sessions.set(session.id, session);
        log.info(`Created session ${session.id}`);
        return session;
    }

    get(id: string): ChatSession | undefined {
        return this.sessions.get(id);
    }

    close(id: string): void {
        const session = this.sessions.get(id);
        if (!session) return;
        this.sessions.delete(id);
        const seconds = Math.round((Date.now() - session.createdAt.getTime()) / 1000);
        log.info(`Closed session ${id} after ${seconds}s`);
    }

    get size(): number {
        return this.sessions.size;
    }
}
