/**
 * @file Session.ts
 * @description Core data structures representing the attached browser extension.
 * @module TabBridge/Plugin
 */

/**
 * The send-capable side of a peer connection. A `ws` WebSocket satisfies it.
 */
export interface PeerHandle {
    readonly readyState: number;
    send(data: string, cb?: (err?: Error) => void): void;
    close(code?: number, reason?: string): void;
    terminate(): void;
}

/**
 * Bookkeeping record for the single attached browser extension.
 */
export interface Session {
    /** Unique identifier for this attachment, used in logs */
    id: string;
    /** Connection to the browser extension */
    peer: PeerHandle;
    /** Remote address of the peer, or 'unknown' */
    ip: string;
    /** Timestamp when the peer attached */
    connectedAt: Date;
}
