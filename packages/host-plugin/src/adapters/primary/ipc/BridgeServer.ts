/**
 * @file BridgeServer.ts
 * @description Thin coordinator between the browser connection and the automation host. Delegates to
 * ConnectionService for transport and IncomingMessageDispatcher for event handling.
 * @module TabBridge/Plugin
 */

import WebSocket from 'ws';
import {
    InboundEvent,
    LIFECYCLE_NOTIFICATIONS,
    Logger,
    NotificationName,
    TabCommand,
    extractErrorInfo
} from '@tabbridge/shared';
import { Session } from '../../../core/entities/Session';
import { IHostFramework } from '../../../ports/IHostFramework';
import { ConnectionService } from './ConnectionService';
import { IncomingMessageDispatcher } from './IncomingMessageDispatcher';
import { decodeEvent, encodeCommand } from './MessageCodec';

/**
 * Relays commands to the browser extension and its events to the host.
 * One instance lives from plugin start to plugin stop.
 */
export class BridgeServer {
    private readonly logger = new Logger('BridgeServer');
    private readonly dispatcher: IncomingMessageDispatcher;

    /**
     * @param host The automation host receiving notifications.
     * @param connectionService Owns the WebSocket server and session.
     */
    constructor(
        private readonly host: IHostFramework,
        private readonly connectionService: ConnectionService = new ConnectionService()
    ) {
        this.dispatcher = new IncomingMessageDispatcher((name, payload) => this.host.triggerEvent(name, payload));
    }

    /**
     * Starts listening for the browser extension.
     * @returns The bound port.
     * @throws {BindError} When the endpoint cannot be bound.
     */
    public start(host: string, port: number): Promise<number> {
        return this.connectionService.startServer(host, port, {
            onConnect: (session, evicted) => this.handleConnect(session, evicted),
            onMessage: (session, data) => this.handleMessage(session, data),
            onDisconnect: (session) => this.handleDisconnect(session)
        });
    }

    public stop(): Promise<void> {
        return this.connectionService.stop();
    }

    /**
     * Encodes and sends a command. Dropped when no browser is attached.
     * @returns Whether the frame was handed to the socket.
     */
    public send(command: TabCommand): boolean {
        const text = encodeCommand(command);
        const sent = this.connectionService.sendText(text);
        if (sent) {
            this.logger.debug(`Sent command '${command.name}'.`);
        } else {
            this.logger.debug(`Command '${command.name}' dropped: browser unreachable.`);
        }
        return sent;
    }

    public sendText(text: string): boolean {
        return this.connectionService.sendText(text);
    }

    public isRunning(): boolean {
        return this.connectionService.isRunning();
    }

    public getActivePort(): number | null {
        return this.connectionService.getActivePort();
    }

    public getSession(): Session | null {
        return this.connectionService.getSession();
    }

    private handleConnect(session: Session, evicted: Session | null): void {
        if (evicted) {
            this.logger.info(`Session ${evicted.id} replaced by ${session.id}.`);
        }
        this.notify(LIFECYCLE_NOTIFICATIONS.PeerConnected, session.ip);
    }

    private handleDisconnect(session: Session): void {
        this.logger.info(`Browser session ${session.id} ended.`);
        this.notify(LIFECYCLE_NOTIFICATIONS.PeerDisconnected);
    }

    /**
     * Decodes one frame and dispatches it. Nothing thrown here leaves the receive path.
     */
    private handleMessage(session: Session, data: WebSocket.RawData): void {
        let event: InboundEvent;
        try {
            event = decodeEvent(data);
        } catch (error) {
            const { message, errorCode } = extractErrorInfo(error);
            this.logger.warn(`Dropping malformed frame from session ${session.id}: ${message}`, { errorCode });
            return;
        }

        this.logger.trace(`Received event '${event.command}' on session ${session.id}.`);

        try {
            this.dispatcher.dispatch(event);
        } catch (error) {
            const errorMessage = error instanceof Error ? error.message : String(error);
            this.logger.error(`Host failed to handle event '${event.command}': ${errorMessage}`);
        }
    }

    private notify(name: NotificationName, payload?: unknown): void {
        try {
            this.host.triggerEvent(name, payload);
        } catch (error) {
            this.logger.error(`Host failed to handle '${name}': ${extractErrorInfo(error).message}`);
        }
    }
}
