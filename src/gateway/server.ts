import http from 'http';
import { Server as SocketIOServer, Socket } from 'socket.io';
import { SessionManager } from '../agent/session';
import { errorMessage } from '../errors';
import { createLogger } from '../logger';
import { ChatChannel } from './channel';

const log = createLogger('Gateway');

export interface GatewayOptions {
    host: string;
    port: number;
    corsOrigin: string;
    /** Shown on /health. */
    model: string;
}

/**
 * HTTP server with Socket.IO attached. Every connection gets its own session;
 * frames travel as JSON text on the `message` event.
 */
export class GatewayServer {
    private io: SocketIOServer | null = null;

    constructor(
        private readonly sessions: SessionManager,
        private readonly options: GatewayOptions
    ) {}

    async start(): Promise<void> {
        const server = http.createServer((req, res) => {
            if (req.method === 'GET' && req.url === '/health') {
                res.writeHead(200, { 'Content-Type': 'application/json' });
                res.end(
                    JSON.stringify({ status: 'ok', model: this.options.model, sessions: this.sessions.size })
                );
                return;
            }
            res.writeHead(404, { 'Content-Type': 'application/json' });
            res.end(JSON.stringify({ error: 'Not found' }));
        });

        const io = new SocketIOServer(server, { cors: { origin: this.options.corsOrigin } });
        io.on('connection', (socket) => this.handleConnection(socket));

        this.io = io;

        await new Promise<void>((resolve, reject) => {
            server.once('error', reject);
            server.listen(this.options.port, this.options.host, () => {
                server.off('error', reject);
                resolve();
            });
        });
        log.success(`Listening on http://${this.options.host}:${this.options.port}`);
    }

    private handleConnection(socket: Socket): void {
        const session = this.sessions.create();
        const channel = new ChatChannel(session, (frame) => {
            socket.send(frame);
        });
        log.info(`Client ${socket.id} connected (session ${session.id})`);
        channel.open();

        socket.on('message', (data: unknown) => {
            const frame = typeof data === 'string' ? data : JSON.stringify(data ?? null);
            channel.receive(frame).catch((error: unknown) => {
                log.error(`Session ${session.id} failed: ${errorMessage(error)}`);
                channel.notify({ type: 'system-message', content: `Internal error: ${errorMessage(error)}` });
            });
        });

        socket.on('disconnect', () => {
            log.info(`Client ${socket.id} disconnected`);
            this.sessions.close(session.id);
        });
    }

    async stop(): Promise<void> {
        const io = this.io;
        this.io = null;
        if (!io) return;
        // Closing the Socket.IO server also closes the underlying HTTP server.
        await new Promise<void>((resolve, reject) => {
            io.close((error) => (error ? reject(error) : resolve()));
        });
        log.info('Stopped');
    }
}
