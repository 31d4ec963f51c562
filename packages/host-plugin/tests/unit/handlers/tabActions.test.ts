/**
 * @file tabActions.test.ts
 * @description Unit tests for the tab action handlers, invoked the way the host invokes them.
 * @module TabBridge/Plugin/Tests
 */

import { LogLevel } from '@tabbridge/shared';
import { ActionRegistry, createActionRegistry } from '../../../src/adapters/primary/actions';
import { TemplateExpander } from '../../../src/core/services/TemplateExpander';
import { CapturingOutput, captureLogs, restoreLogs } from '../../helpers/captureLogs';

describe('Tab actions', () => {
    let sender: { send: jest.Mock; sendText: jest.Mock };
    let registry: ActionRegistry;
    let logs: CapturingOutput;

    beforeEach(() => {
        logs = captureLogs();
        sender = { send: jest.fn(), sendText: jest.fn() };
        const variables: Record<string, string> = { site: 'example.com' };
        registry = createActionRegistry(sender, new TemplateExpander(name => variables[name]));
    });

    afterEach(() => {
        restoreLogs();
    });

    describe('NewTab', () => {
        it('sends the defaults when no parameters are given', () => {
            registry.invoke('NewTab', {});

            expect(sender.send).toHaveBeenCalledWith({
                name: 'NewTab',
                parameters: { url: '', active: false, pinned: false, target: 0, index: 0 }
            });
        });

        it('normalizes host values and expands the url', () => {
            registry.invoke('NewTab', { url: 'http://{site}/start', active: 'true', pinned: false, target: '1', index: '3' });

            expect(sender.send).toHaveBeenCalledWith({
                name: 'NewTab',
                parameters: { url: 'http://example.com/start', active: true, pinned: false, target: 1, index: 3 }
            });
        });

        it('sends nothing for an invalid target', () => {
            registry.invoke('NewTab', { url: 'http://a.test', target: 2 });

            expect(sender.send).not.toHaveBeenCalled();
            expect(logs.messages(LogLevel.WARN)).toEqual([
                "Action 'NewTab' not sent: Invalid parameter 'target' for action 'NewTab': expected 0 or 1, got 2"
            ]);
        });
    });

    describe('UpdateTab', () => {
        it('sends NewUrl with the muted flag', () => {
            registry.invoke('UpdateTab', { url: 'http://{site}/', muted: true, target: 1, index: 2 });

            expect(sender.send).toHaveBeenCalledWith({
                name: 'NewUrl',
                parameters: { url: 'http://example.com/', active: false, pinned: false, muted: true, target: 1, index: 2 }
            });
        });
    });

    describe('ReloadTab', () => {
        it('sends the cache flag', () => {
            registry.invoke('ReloadTab', { bypasscache: 'True' });

            expect(sender.send).toHaveBeenCalledWith({
                name: 'ReloadTab',
                parameters: { target: 0, index: 0, bypasscache: true }
            });
        });
    });

    describe('MoveTab', () => {
        it('sends both indexes', () => {
            registry.invoke('MoveTab', { target: 1, startindex: 4, endindex: '0' });

            expect(sender.send).toHaveBeenCalledWith({
                name: 'MoveTab',
                parameters: { target: 1, startindex: 4, endindex: 0 }
            });
        });

        it('sends nothing for a negative destination', () => {
            registry.invoke('MoveTab', { endindex: -2 });

            expect(sender.send).not.toHaveBeenCalled();
        });
    });

    describe('RemoveTab', () => {
        it('defaults to the active tab', () => {
            registry.invoke('RemoveTab', {});

            expect(sender.send).toHaveBeenCalledWith({ name: 'RemoveTab', parameters: { target: 0, index: 0 } });
        });
    });

    describe('QueryTabByIndex', () => {
        it('sends the index', () => {
            registry.invoke('QueryTabByIndex', { index: 6 });

            expect(sender.send).toHaveBeenCalledWith({ name: 'QueryTabByIndex', index: 6 });
        });
    });

    describe('QueryActiveTab', () => {
        it('ignores any parameters', () => {
            registry.invoke('QueryActiveTab', { index: 6 });

            expect(sender.send).toHaveBeenCalledWith({ name: 'QueryActiveTab' });
        });
    });

    describe('SendMessage', () => {
        it('sends the message as written', () => {
            registry.invoke('SendMessage', { message: '{"command":"Ping","site":"{site}"}' });

            expect(sender.sendText).toHaveBeenCalledWith('{"command":"Ping","site":"{site}"}');
            expect(sender.send).not.toHaveBeenCalled();
        });

        it('sends an empty message by default', () => {
            registry.invoke('SendMessage', {});

            expect(sender.sendText).toHaveBeenCalledWith('');
        });
    });

    it('contains a sender failure', () => {
        sender.send.mockImplementation(() => {
            throw new Error('socket gone');
        });

        expect(() => registry.invoke('RemoveTab', {})).not.toThrow();
        expect(logs.messages(LogLevel.ERROR)).toEqual(["Action 'RemoveTab' failed: socket gone | {}"]);
    });
});
