/**
 * @file IHostFramework.ts
 * @description The automation host's plugin surface, as consumed by TabBridge.
 * @module TabBridge/Plugin
 */

import { NotificationName } from '@tabbridge/shared';

/**
 * Parameters an automation rule passes when it invokes an action, keyed by parameter name.
 */
export type ActionParameters = Readonly<Record<string, unknown>>;

export type ActionCallback = (parameters: ActionParameters) => void;

/**
 * Display information the host shows for a registered action.
 */
export interface ActionMetadata {
    name: string;
    description: string;
}

/**
 * Interface for the automation host a TabBridge plugin runs inside.
 */
export interface IHostFramework {
    /**
     * Registers an action that automation rules can invoke.
     * @param id - Stable action identifier, e.g. `NewTab`
     * @param callback - Invoked with the rule's parameters
     * @param metadata - Display name and description
     */
    registerAction(id: string, callback: ActionCallback, metadata: ActionMetadata): void;

    /**
     * Raises a notification. The host prefixes the suffix with the plugin's own name.
     * @param suffix - Notification name, e.g. `ActiveTabUrl`
     * @param payload - Optional payload attached to the notification
     */
    triggerEvent(suffix: NotificationName, payload?: unknown): void;

    /**
     * Resolves a host variable referenced as `{name}` in templated text parameters.
     * @returns The value, or undefined when the host has no such variable
     */
    getVariable?(name: string): unknown;

    /**
     * Appends a line to the host's log window.
     */
    log?(line: string): void;
}
