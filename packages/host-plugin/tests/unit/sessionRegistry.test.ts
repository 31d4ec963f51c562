/**
 * @file sessionRegistry.test.ts
 * @description Unit tests for the single-session registry.
 * @module TabBridge/Plugin/Tests
 */

import WebSocket from 'ws';
import { LogLevel } from '@tabbridge/shared';
import { PeerHandle } from '../../src/core/entities/Session';
import {
    EVICTED_CLOSE_CODE,
    EVICTED_CLOSE_REASON,
    SessionRegistry
} from '../../src/core/services/SessionRegistry';
import { CapturingOutput, captureLogs, restoreLogs } from '../helpers/captureLogs';

type MockPeer = PeerHandle & {
    readyState: number;
    send: jest.Mock;
    close: jest.Mock;
    terminate: jest.Mock;
};

function createPeer(readyState: number = WebSocket.OPEN): MockPeer {
    return {
        readyState,
        send: jest.fn(),
        close: jest.fn(),
        terminate: jest.fn()
    };
}

describe('SessionRegistry', () => {
    let registry: SessionRegistry;
    let logs: CapturingOutput;

    beforeEach(() => {
        logs = captureLogs();
        registry = new SessionRegistry();
    });

    afterEach(() => {
        restoreLogs();
    });

    describe('attach', () => {
        it('makes the first peer current without evicting anything', () => {
            const peer = createPeer();

            const { session, evicted } = registry.attach(peer, '127.0.0.1');

            expect(evicted).toBeNull();
            expect(session.peer).toBe(peer);
            expect(session.ip).toBe('127.0.0.1');
            expect(session.id).toMatch(/^[0-9a-f-]{36}$/);
            expect(session.connectedAt).toBeInstanceOf(Date);
            expect(registry.current()).toBe(session);
            expect(registry.isCurrent(peer)).toBe(true);
        });

        it('evicts and closes the previous peer', () => {
            const first = createPeer();
            const second = createPeer();
            const { session: firstSession } = registry.attach(first, '10.0.0.1');

            const { session, evicted } = registry.attach(second, '10.0.0.2');

            expect(evicted).toBe(firstSession);
            expect(first.close).toHaveBeenCalledWith(EVICTED_CLOSE_CODE, EVICTED_CLOSE_REASON);
            expect(EVICTED_CLOSE_CODE).toBe(4001);
            expect(registry.current()).toBe(session);
            expect(registry.isCurrent(first)).toBe(false);
            expect(session.id).not.toBe(firstSession.id);
        });

        it('terminates an evicted peer whose close throws', () => {
            const first = createPeer();
            first.close.mockImplementation(() => {
                throw new Error('already closing');
            });
            registry.attach(first, '10.0.0.1');

            registry.attach(createPeer(), '10.0.0.2');

            expect(first.terminate).toHaveBeenCalledTimes(1);
        });
    });

    describe('detach', () => {
        it('clears the current peer and returns its session', () => {
            const peer = createPeer();
            const { session } = registry.attach(peer, '127.0.0.1');

            expect(registry.detach(peer)).toBe(session);
            expect(registry.current()).toBeNull();
            expect(registry.detach(peer)).toBeNull();
        });

        it('ignores a late detach from an evicted peer', () => {
            const first = createPeer();
            const second = createPeer();
            registry.attach(first, '10.0.0.1');
            const { session } = registry.attach(second, '10.0.0.2');

            expect(registry.detach(first)).toBeNull();
            expect(registry.current()).toBe(session);
        });

        it('clears whatever is current when no peer is given', () => {
            const { session } = registry.attach(createPeer(), '127.0.0.1');

            expect(registry.detach()).toBe(session);
            expect(registry.current()).toBeNull();
        });
    });

    describe('clear', () => {
        it('terminates the current peer', () => {
            const peer = createPeer();
            const { session } = registry.attach(peer, '127.0.0.1');

            expect(registry.clear()).toBe(session);
            expect(peer.terminate).toHaveBeenCalledTimes(1);
            expect(registry.current()).toBeNull();
        });

        it('returns null when empty', () => {
            expect(registry.clear()).toBeNull();
        });
    });

    describe('send', () => {
        it('drops the frame when no peer is attached', () => {
            expect(registry.send('{"command":"QueryActiveTab"}')).toBe(false);
            expect(logs.messages(LogLevel.DEBUG)).toContain('No browser attached. Message dropped.');
        });

        it('writes to an open peer', () => {
            const peer = createPeer();
            registry.attach(peer, '127.0.0.1');

            expect(registry.send('hello')).toBe(true);
            expect(peer.send).toHaveBeenCalledWith('hello', expect.any(Function));
        });

        it('drops the frame when the peer is not open', () => {
            const peer = createPeer(WebSocket.CLOSING);
            const { session } = registry.attach(peer, '127.0.0.1');

            expect(registry.send('hello')).toBe(false);
            expect(peer.send).not.toHaveBeenCalled();
            expect(logs.messages(LogLevel.WARN)).toEqual([
                `Session ${session.id} is not OPEN (state: 2). Message dropped.`
            ]);
        });

        it('reports a synchronous send failure as dropped', () => {
            const peer = createPeer();
            peer.send.mockImplementation(() => {
                throw new Error('socket gone');
            });
            const { session } = registry.attach(peer, '127.0.0.1');

            expect(registry.send('hello')).toBe(false);
            expect(logs.messages(LogLevel.ERROR)).toEqual([
                `Error during send() on session ${session.id}: socket gone`
            ]);
        });

        it('logs a failed asynchronous write', () => {
            const peer = createPeer();
            peer.send.mockImplementation((_data: string, cb: (err?: Error) => void) => cb(new Error('EPIPE')));
            const { session } = registry.attach(peer, '127.0.0.1');

            expect(registry.send('hello')).toBe(true);
            expect(logs.messages(LogLevel.ERROR)).toEqual([`Write to session ${session.id} failed: EPIPE`]);
        });
    });
});
