/**
 * @file bridgeServer.test.ts
 * @description Unit tests for the BridgeServer coordinator.
 * @module TabBridge/Plugin/Tests
 */

import { LogLevel } from '@tabbridge/shared';
import { BridgeServer } from '../../src/adapters/primary/ipc/BridgeServer';
import { ConnectionHandlers, ConnectionService } from '../../src/adapters/primary/ipc/ConnectionService';
import { Session } from '../../src/core/entities/Session';
import { CapturingOutput, captureLogs, restoreLogs } from '../helpers/captureLogs';

function createSession(id: string, ip = '127.0.0.1'): Session {
    return {
        id,
        peer: { readyState: 1, send: jest.fn(), close: jest.fn(), terminate: jest.fn() },
        ip,
        connectedAt: new Date()
    };
}

describe('BridgeServer', () => {
    let host: { registerAction: jest.Mock; triggerEvent: jest.Mock };
    let connection: ConnectionService;
    let server: BridgeServer;
    let handlers: ConnectionHandlers | undefined;
    let logs: CapturingOutput;

    function activeHandlers(): ConnectionHandlers {
        if (!handlers) {
            throw new Error('BridgeServer was not started');
        }
        return handlers;
    }

    beforeEach(async () => {
        logs = captureLogs();
        host = { registerAction: jest.fn(), triggerEvent: jest.fn() };
        connection = new ConnectionService();
        handlers = undefined;
        jest.spyOn(connection, 'startServer').mockImplementation(async (_host, port, received) => {
            handlers = received;
            return port;
        });
        jest.spyOn(connection, 'stop').mockResolvedValue(undefined);
        server = new BridgeServer(host, connection);
        await server.start('localhost', 8000);
    });

    afterEach(() => {
        jest.restoreAllMocks();
        restoreLogs();
    });

    it('starts the connection service on the given endpoint', () => {
        expect(connection.startServer).toHaveBeenCalledWith('localhost', 8000, expect.any(Object));
    });

    it('stops the connection service', async () => {
        await server.stop();

        expect(connection.stop).toHaveBeenCalledTimes(1);
    });

    describe('lifecycle notifications', () => {
        it('raises Browser.Connected with the peer address', () => {
            activeHandlers().onConnect(createSession('s-1', '10.1.2.3'), null);

            expect(host.triggerEvent).toHaveBeenCalledWith('Browser.Connected', '10.1.2.3');
        });

        it('logs the replaced session on eviction', () => {
            activeHandlers().onConnect(createSession('s-2'), createSession('s-1'));

            expect(logs.messages(LogLevel.INFO)).toContain('Session s-1 replaced by s-2.');
            expect(host.triggerEvent).toHaveBeenCalledTimes(1);
        });

        it('raises Browser.Disconnected without a payload', () => {
            activeHandlers().onDisconnect(createSession('s-1'));

            expect(host.triggerEvent).toHaveBeenCalledWith('Browser.Disconnected', undefined);
        });

        it('keeps going when the host throws', () => {
            host.triggerEvent.mockImplementation(() => {
                throw new Error('rule crashed');
            });

            expect(() => activeHandlers().onConnect(createSession('s-1'), null)).not.toThrow();
            expect(logs.messages(LogLevel.ERROR)).toEqual(["Host failed to handle 'Browser.Connected': rule crashed"]);
        });
    });

    describe('inbound frames', () => {
        it('dispatches a decoded event to the host', () => {
            const raw = '{"command":"TabUpdated","data":{"url":"http://a.test"}}';

            activeHandlers().onMessage(createSession('s-1'), Buffer.from(raw));

            expect(host.triggerEvent.mock.calls).toEqual([
                ['ActiveTabUrl', 'http://a.test'],
                ['ActiveTabUrInfo', raw]
            ]);
        });

        it('drops a malformed frame', () => {
            activeHandlers().onMessage(createSession('s-1'), Buffer.from('{"command":'));

            expect(host.triggerEvent).not.toHaveBeenCalled();
            const [warning] = logs.messages(LogLevel.WARN);
            expect(warning).toMatch(/^Dropping malformed frame from session s-1: Message is not valid JSON: .* \| \{"errorCode":"MALFORMED_MESSAGE"\}$/);
        });

        it('contains a host failure while dispatching', () => {
            host.triggerEvent.mockImplementation(() => {
                throw new Error('rule crashed');
            });

            expect(() => activeHandlers().onMessage(
                createSession('s-1'),
                Buffer.from('{"command":"ActiveTab","data":{"url":"http://a.test"}}')
            )).not.toThrow();
            expect(host.triggerEvent).toHaveBeenCalledTimes(1);
            expect(logs.messages(LogLevel.ERROR)).toEqual(["Host failed to handle event 'ActiveTab': rule crashed"]);
        });
    });

    describe('send', () => {
        it('encodes the command and hands it to the connection', () => {
            const sendText = jest.spyOn(connection, 'sendText').mockReturnValue(true);

            expect(server.send({ name: 'QueryTabByIndex', index: 4 })).toBe(true);
            expect(sendText).toHaveBeenCalledWith('{"command":"QueryTabByIndex","data":4}');
            expect(logs.messages(LogLevel.DEBUG)).toContain("Sent command 'QueryTabByIndex'.");
        });

        it('reports a dropped command', () => {
            jest.spyOn(connection, 'sendText').mockReturnValue(false);

            expect(server.send({ name: 'QueryActiveTab' })).toBe(false);
            expect(logs.messages(LogLevel.DEBUG)).toContain("Command 'QueryActiveTab' dropped: browser unreachable.");
        });

        it('passes raw text through unchanged', () => {
            const sendText = jest.spyOn(connection, 'sendText').mockReturnValue(true);

            server.sendText('hello {name}');

            expect(sendText).toHaveBeenCalledWith('hello {name}');
        });
    });
});
