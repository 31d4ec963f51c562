/**
 * @file SessionRegistry.ts
 * @description Tracks the one browser extension the plugin talks to.
 * @module TabBridge/Plugin
 */

import WebSocket from 'ws';
import { v4 as uuidv4 } from 'uuid';
import { Logger } from '@tabbridge/shared';
import { PeerHandle, Session } from '../entities/Session';

/** Close code sent to a peer displaced by a newer connection. */
export const EVICTED_CLOSE_CODE = 4001;
export const EVICTED_CLOSE_REASON = 'Replaced by newer connection';

/**
 * Result of attaching a peer.
 * @property {Session} session - The session now current.
 * @property {Session | null} evicted - The session that was displaced, if any.
 */
export interface AttachResult {
    session: Session;
    evicted: Session | null;
}

/**
 * Holds at most one session. A new attach evicts and closes the previous peer.
 *
 * Every mutation runs synchronously on the event loop, and `ws` queues writes per socket,
 * so neither attach/detach nor outbound frames can interleave.
 */
export class SessionRegistry {
    private currentSession: Session | null = null;
    private readonly logger = new Logger('SessionRegistry');

    /**
     * Records a newly connected peer, closing the one it replaces.
     * @param peer The peer connection.
     * @param ip The peer's remote address.
     */
    public attach(peer: PeerHandle, ip: string): AttachResult {
        const evicted = this.currentSession;
        if (evicted) {
            this.logger.info(`Replacing browser session ${evicted.id} (${evicted.ip}) with a connection from ${ip}.`);
            try {
                evicted.peer.close(EVICTED_CLOSE_CODE, EVICTED_CLOSE_REASON);
            } catch (error) {
                this.logger.warn(`Failed to close evicted session ${evicted.id}; terminating.`, error);
                evicted.peer.terminate();
            }
        }

        const session: Session = { id: uuidv4(), peer, ip, connectedAt: new Date() };
        this.currentSession = session;
        this.logger.debug(`Session ${session.id} attached from ${ip}.`);
        return { session, evicted };
    }

    /**
     * Clears the current session.
     * @param peer When given, the session is only cleared if it belongs to this peer.
     * A late close from an evicted socket therefore never clears its replacement.
     * @returns The cleared session, or null when nothing was cleared.
     */
    public detach(peer?: PeerHandle): Session | null {
        const session = this.currentSession;
        if (!session) {
            return null;
        }
        if (peer && session.peer !== peer) {
            this.logger.trace(`Ignoring detach from a peer that is not the current session ${session.id}.`);
            return null;
        }
        this.currentSession = null;
        this.logger.debug(`Session ${session.id} detached.`);
        return session;
    }

    /**
     * Forgets the current session and terminates its connection.
     */
    public clear(): Session | null {
        const session = this.currentSession;
        this.currentSession = null;
        if (session) {
            this.logger.debug(`Clearing session ${session.id}.`);
            session.peer.terminate();
        }
        return session;
    }

    public current(): Session | null {
        return this.currentSession;
    }

    public isCurrent(peer: PeerHandle): boolean {
        return this.currentSession !== null && this.currentSession.peer === peer;
    }

    /**
     * Writes a frame to the current peer.
     * @returns True if the frame was handed to the socket; false if it was dropped.
     */
    public send(text: string): boolean {
        const session = this.currentSession;
        if (!session) {
            this.logger.debug('No browser attached. Message dropped.');
            return false;
        }
        if (session.peer.readyState !== WebSocket.OPEN) {
            this.logger.warn(`Session ${session.id} is not OPEN (state: ${session.peer.readyState}). Message dropped.`);
            return false;
        }
        try {
            session.peer.send(text, (err) => {
                if (err) {
                    this.logger.error(`Write to session ${session.id} failed: ${err.message}`);
                }
            });
            return true;
        } catch (error) {
            const errorMessage = error instanceof Error ? error.message : String(error);
            this.logger.error(`Error during send() on session ${session.id}: ${errorMessage}`);
            return false;
        }
    }
}
