/**
 * @file ICommandSender.ts
 * @description Outbound side of the bridge, as seen by the actions.
 * @module TabBridge/Plugin
 */

import { TabCommand } from '@tabbridge/shared';

/**
 * Hands commands to whichever server is running. Commands sent while no browser is
 * attached, or while the plugin is stopped, are dropped without an error.
 */
export interface ICommandSender {
    send(command: TabCommand): void;

    /** Sends pre-formatted text unchanged. */
    sendText(text: string): void;
}
