/**
 * @file IActionHandler.ts
 * @description Interface definition for the actions the plugin registers with the host.
 * @module TabBridge/Plugin
 */

import { ActionMetadata, ActionParameters } from '../../../ports/IHostFramework';

/**
 * An action an automation rule can invoke.
 * @template TParams - The normalized parameters the action sends.
 */
export interface IActionHandler<TParams> {
    /** Stable identifier the host registers the action under. */
    readonly id: string;
    readonly metadata: ActionMetadata;

    /**
     * Validates and normalizes the rule's parameters.
     * @throws {InvalidParameterError} When a parameter cannot be normalized.
     */
    parseParameters(raw: ActionParameters): TParams;

    /**
     * Builds the command and hands it to the sender. Delivery is not reported back.
     */
    execute(params: TParams): void;
}
