/**
 * @file MessageCodec.ts
 * @description Encodes outbound tab commands to JSON text and decodes inbound frames.
 * @module TabBridge/Plugin
 */

import WebSocket from 'ws';
import {
    TabCommand,
    TabTarget,
    WireCommandMessage,
    InboundEvent,
    MalformedMessageError,
    extractErrorInfo
} from '@tabbridge/shared';

export type FrameData = WebSocket.RawData | string;

export function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Converts a frame received from `ws` to its UTF-8 text.
 */
export function frameToString(data: FrameData): string {
    if (typeof data === 'string') {
        return data;
    }
    if (Buffer.isBuffer(data)) {
        return data.toString('utf8');
    }
    if (Array.isArray(data)) {
        return Buffer.concat(data).toString('utf8');
    }
    return Buffer.from(data).toString('utf8');
}

/**
 * Builds the wire object for a command. Keys are written in protocol order.
 */
export function toWireMessage(command: TabCommand): WireCommandMessage {
    switch (command.name) {
        case 'NewTab': {
            const { url, active, pinned, target, index } = command.parameters;
            return { command: 'NewTab', parameters: { url, active, pinned, target, index } };
        }
        case 'NewUrl': {
            const { url, active, pinned, muted, target, index } = command.parameters;
            return { command: 'NewUrl', parameters: { url, active, pinned, muted, target, index } };
        }
        case 'ReloadTab': {
            const { target, index, bypasscache } = command.parameters;
            return { command: 'ReloadTab', parameters: { target, index, bypasscache } };
        }
        case 'MoveTab': {
            const { target, startindex, endindex } = command.parameters;
            return { command: 'MoveTab', parameters: { target, startindex, endindex } };
        }
        case 'RemoveTab': {
            const { target, index } = command.parameters;
            return { command: 'RemoveTab', parameters: { target, index } };
        }
        case 'QueryActiveTab':
            return { command: 'QueryActiveTab' };
        case 'QueryTabByIndex':
            return { command: 'QueryTabByIndex', data: command.index };
        default: {
            const unhandled: never = command;
            throw new Error(`Unhandled command: ${JSON.stringify(unhandled)}`);
        }
    }
}

export function encodeCommand(command: TabCommand): string {
    return JSON.stringify(toWireMessage(command));
}

function parseJsonObject(text: string): Record<string, unknown> {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (error) {
        throw new MalformedMessageError(`Message is not valid JSON: ${extractErrorInfo(error).message}`);
    }
    if (!isPlainObject(parsed)) {
        throw new MalformedMessageError('Message is not a JSON object.');
    }
    return parsed;
}

/**
 * Decodes an inbound frame from the browser extension.
 * The command tag is not checked against the known event tags.
 * @throws {MalformedMessageError} When the frame is not a JSON object with a string `command`.
 */
export function decodeEvent(data: FrameData): InboundEvent {
    const raw = frameToString(data);
    const parsed = parseJsonObject(raw);
    if (typeof parsed.command !== 'string') {
        throw new MalformedMessageError("Message has no string 'command' field.");
    }
    const event: InboundEvent = { command: parsed.command, raw };
    if (isPlainObject(parsed.data)) {
        event.data = parsed.data;
    }
    return event;
}

// --- Extension-side decoding ---

function readParameters(message: Record<string, unknown>): Record<string, unknown> {
    if (!isPlainObject(message.parameters)) {
        throw new MalformedMessageError(`Command '${String(message.command)}' has no 'parameters' object.`);
    }
    return message.parameters;
}

function readString(parameters: Record<string, unknown>, key: string): string {
    const value = parameters[key];
    if (typeof value !== 'string') {
        throw new MalformedMessageError(`Parameter '${key}' must be a string.`);
    }
    return value;
}

function readBoolean(parameters: Record<string, unknown>, key: string): boolean {
    const value = parameters[key];
    if (typeof value !== 'boolean') {
        throw new MalformedMessageError(`Parameter '${key}' must be a boolean.`);
    }
    return value;
}

function readIndex(value: unknown, key: string): number {
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
        throw new MalformedMessageError(`'${key}' must be a non-negative integer.`);
    }
    return value;
}

function readTarget(parameters: Record<string, unknown>): TabTarget {
    const value = parameters.target;
    if (value === 0 || value === 1) {
        return value;
    }
    throw new MalformedMessageError("Parameter 'target' must be 0 or 1.");
}

/**
 * Decodes a command frame as the browser extension receives it. Inverse of {@link encodeCommand}.
 * @throws {MalformedMessageError} When the frame is not a command this plugin can produce.
 */
export function decodeCommand(data: FrameData): TabCommand {
    const message = parseJsonObject(frameToString(data));

    switch (message.command) {
        case 'NewTab': {
            const p = readParameters(message);
            return {
                name: 'NewTab',
                parameters: {
                    url: readString(p, 'url'),
                    active: readBoolean(p, 'active'),
                    pinned: readBoolean(p, 'pinned'),
                    target: readTarget(p),
                    index: readIndex(p.index, 'index')
                }
            };
        }
        case 'NewUrl': {
            const p = readParameters(message);
            return {
                name: 'NewUrl',
                parameters: {
                    url: readString(p, 'url'),
                    active: readBoolean(p, 'active'),
                    pinned: readBoolean(p, 'pinned'),
                    muted: readBoolean(p, 'muted'),
                    target: readTarget(p),
                    index: readIndex(p.index, 'index')
                }
            };
        }
        case 'ReloadTab': {
            const p = readParameters(message);
            return {
                name: 'ReloadTab',
                parameters: {
                    target: readTarget(p),
                    index: readIndex(p.index, 'index'),
                    bypasscache: readBoolean(p, 'bypasscache')
                }
            };
        }
        case 'MoveTab': {
            const p = readParameters(message);
            return {
                name: 'MoveTab',
                parameters: {
                    target: readTarget(p),
                    startindex: readIndex(p.startindex, 'startindex'),
                    endindex: readIndex(p.endindex, 'endindex')
                }
            };
        }
        case 'RemoveTab': {
            const p = readParameters(message);
            return {
                name: 'RemoveTab',
                parameters: { target: readTarget(p), index: readIndex(p.index, 'index') }
            };
        }
        case 'QueryActiveTab':
            return { name: 'QueryActiveTab' };
        case 'QueryTabByIndex':
            return { name: 'QueryTabByIndex', index: readIndex(message.data, 'data') };
        default:
            throw new MalformedMessageError(`Unknown command '${String(message.command)}'.`);
    }
}
