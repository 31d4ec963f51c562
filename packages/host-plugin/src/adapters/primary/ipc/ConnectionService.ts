/**
 * @file ConnectionService.ts
 * @description Manages the WebSocket server lifecycle, the single browser session, and low-level
 * frame transmission.
 * @module TabBridge/Plugin
 */

import WebSocket, { WebSocketServer } from 'ws';
import { BindError, Logger, extractErrorInfo } from '@tabbridge/shared';
import { Session } from '../../../core/entities/Session';
import { SessionRegistry } from '../../../core/services/SessionRegistry';

/**
 * Callbacks through which the connection layer reports session activity.
 */
export interface ConnectionHandlers {
    /** A peer attached. `evicted` is the session it displaced, already being closed. */
    onConnect(session: Session, evicted: Session | null): void;
    /** A frame arrived on the current session. Called in arrival order. */
    onMessage(session: Session, data: WebSocket.RawData): void;
    /** The current session ended, by a clean close or a transport error. */
    onDisconnect(session: Session): void;
}

/**
 * Manages the WebSocket server lifecycle and the attached browser extension.
 * Accepting, reading and writing all happen on the event loop, so callers never block on I/O.
 */
export class ConnectionService {
    private wss: WebSocketServer | null = null;
    private activePort: number | null = null;
    private activeHost: string | null = null;
    private readonly logger = new Logger('ConnectionService');

    constructor(private readonly registry: SessionRegistry = new SessionRegistry()) {}

    /**
     * Attempts to start the WebSocket server on a specific endpoint.
     * @returns A promise that resolves once listening, or rejects with the underlying bind error.
     */
    public tryStartServerOnPort(host: string, port: number): Promise<void> {
        return new Promise((resolve, reject) => {
            const wss = new WebSocketServer({ host, port });

            const onError = (error: Error) => {
                wss.removeAllListeners();
                wss.close();
                reject(error);
            };

            const onListening = () => {
                wss.removeListener('error', onError); // Don't reject on subsequent errors
                wss.on('error', (error: Error) => {
                    this.logger.error(`WebSocket server error: ${error.message}`);
                });
                const address = wss.address();
                this.wss = wss;
                this.activeHost = host;
                this.activePort = typeof address === 'object' && address !== null ? address.port : port;
                resolve();
            };

            wss.once('error', onError);
            wss.once('listening', onListening);
        });
    }

    /**
     * Starts the WebSocket server.
     * @param host Interface to bind, e.g. `localhost`.
     * @param port Port to bind; `0` picks a free port.
     * @param handlers Receives session activity.
     * @returns The port the server is listening on.
     * @throws {BindError} When the endpoint cannot be bound.
     */
    public async startServer(host: string, port: number, handlers: ConnectionHandlers): Promise<number> {
        if (this.wss && this.activePort !== null) {
            this.logger.warn(`Server already listening on ${this.activeHost}:${this.activePort}; start ignored.`);
            return this.activePort;
        }

        try {
            await this.tryStartServerOnPort(host, port);
        } catch (error) {
            const errno = typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string'
                ? error.code
                : undefined;
            this.logger.error(`Failed to listen on ${host}:${port}: ${extractErrorInfo(error).message}`);
            throw new BindError(host, port, errno);
        }

        const wss = this.wss;
        const activePort = this.activePort;
        if (!wss || activePort === null) {
            throw new BindError(host, port);
        }

        this.logger.info(`WebSocket server listening on ${host}:${activePort}`);

        wss.on('connection', (ws: WebSocket, req) => {
            const clientIp = req.socket.remoteAddress || 'unknown';
            this.handleConnection(ws, clientIp, handlers);
        });

        return activePort;
    }

    private handleConnection(ws: WebSocket, ip: string, handlers: ConnectionHandlers): void {
        this.logger.info(`Browser connected from ${ip}`);
        const { session, evicted } = this.registry.attach(ws, ip);

        ws.on('message', (data: WebSocket.RawData) => {
            if (!this.registry.isCurrent(ws)) {
                this.logger.debug(`Dropping frame from replaced session ${session.id}.`);
                return;
            }
            handlers.onMessage(session, data);
        });

        const release = () => {
            const departed = this.registry.detach(ws);
            if (departed) {
                handlers.onDisconnect(departed);
            }
        };

        ws.on('close', (code: number) => {
            this.logger.info(`Browser session ${session.id} from ${ip} closed (code ${code}).`);
            release();
            ws.removeAllListeners();
        });

        ws.on('error', (error: Error) => {
            this.logger.error(`Error on WebSocket connection from ${ip}: ${error.message}`);
            release();
        });

        handlers.onConnect(session, evicted);
    }

    /**
     * Writes text to the attached browser.
     * @returns False when no browser is attached and the frame was dropped.
     */
    public sendText(text: string): boolean {
        this.logger.trace('Sending frame.', { length: text.length });
        return this.registry.send(text);
    }

    public getSession(): Session | null {
        return this.registry.current();
    }

    /**
     * Gets the active port the server is listening on.
     */
    public getActivePort(): number | null {
        return this.activePort;
    }

    public isRunning(): boolean {
        return this.wss !== null && this.activePort !== null;
    }

    /**
     * Stops the WebSocket server, terminates every connection and resolves once the listening
     * socket is released. Does nothing when the server is not running.
     */
    public async stop(): Promise<void> {
        const wss = this.wss;
        if (!wss) {
            return;
        }
        this.logger.info('Stopping WebSocket server...');
        this.wss = null;
        this.activePort = null;
        this.activeHost = null;

        this.registry.clear();
        // Evicted sockets may still be completing their close handshake.
        wss.clients.forEach(client => client.terminate());
        wss.removeAllListeners('connection');

        await new Promise<void>((resolve) => {
            wss.close((err) => {
                if (err) {
                    this.logger.error(`Error closing WebSocket server: ${err.message}`);
                } else {
                    this.logger.info('WebSocket server stopped.');
                }
                resolve();
            });
        });
    }
}
