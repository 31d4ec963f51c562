/**
 * @file protocol-types.ts
 * @description Types for the messages exchanged between the host plugin and the browser extension,
 * and for the notifications the plugin raises toward the automation host.
 * @module TabBridge/Shared
 */

import {
    NewTabParameters,
    UpdateTabParameters,
    ReloadTabParameters,
    MoveTabParameters,
    RemoveTabParameters
} from './data-models';

// --- Plugin -> Extension (Commands) ---

/**
 * An outbound instruction to the browser extension, discriminated by `name`.
 * `QueryTabByIndex` carries a bare index because its wire form has a top-level `data`
 * field instead of `parameters`.
 */
export type TabCommand =
    | { name: 'NewTab'; parameters: NewTabParameters }
    | { name: 'NewUrl'; parameters: UpdateTabParameters }
    | { name: 'ReloadTab'; parameters: ReloadTabParameters }
    | { name: 'MoveTab'; parameters: MoveTabParameters }
    | { name: 'RemoveTab'; parameters: RemoveTabParameters }
    | { name: 'QueryActiveTab' }
    | { name: 'QueryTabByIndex'; index: number };

/**
 * The JSON object written to the socket for a {@link TabCommand}.
 */
export type WireCommandMessage =
    | { command: 'NewTab'; parameters: NewTabParameters }
    | { command: 'NewUrl'; parameters: UpdateTabParameters }
    | { command: 'ReloadTab'; parameters: ReloadTabParameters }
    | { command: 'MoveTab'; parameters: MoveTabParameters }
    | { command: 'RemoveTab'; parameters: RemoveTabParameters }
    | { command: 'QueryActiveTab' }
    | { command: 'QueryTabByIndex'; data: number };

// --- Extension -> Plugin (Events) ---

export const INBOUND_COMMANDS = [
    'QueryActiveTab',
    'QueryTabByIndex',
    'ActiveTab',
    'TabUpdated',
    'CreateNewTab',
    'MoveTab',
    'RemoveTab'
] as const;

/**
 * Event tags the plugin turns into host notifications. Any other tag is ignored.
 */
export type InboundCommand = typeof INBOUND_COMMANDS[number];

export function isInboundCommand(command: string): command is InboundCommand {
    return (INBOUND_COMMANDS as readonly string[]).includes(command);
}

/**
 * A decoded inbound frame.
 * @property {string} command - The event tag; not validated against {@link INBOUND_COMMANDS}.
 * @property {Record<string, unknown>} [data] - Command-specific fields such as `url` or `index`.
 * @property {string} raw - The frame text exactly as received, forwarded as the payload of the `*Info` notifications.
 */
export interface InboundEvent {
    command: string;
    data?: Record<string, unknown>;
    raw: string;
}

// --- Plugin -> Host (Notifications) ---

export type TabNotification =
    | 'QueryActiveTabInfo'
    | 'QueryActiveTab'
    | 'QueryTabByIndex'
    | 'QueryTabByIndexInfo'
    | 'ActiveTabUrl'
    | 'ActiveTabInfo'
    // Existing automation rules match this exact name.
    | 'ActiveTabUrInfo'
    | 'CreateNewTab'
    | 'MoveTab'
    | 'RemoveTab';

export const LIFECYCLE_NOTIFICATIONS = {
    PeerConnected: 'Browser.Connected',
    PeerDisconnected: 'Browser.Disconnected'
} as const;

export type LifecycleNotification = typeof LIFECYCLE_NOTIFICATIONS[keyof typeof LIFECYCLE_NOTIFICATIONS];

export type NotificationName = TabNotification | LifecycleNotification;

/**
 * A notification raised toward the host, in the order it was raised.
 */
export interface Notification {
    name: NotificationName;
    payload: unknown;
}
