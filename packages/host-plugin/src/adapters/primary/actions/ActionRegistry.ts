/**
 * @file ActionRegistry.ts
 * @description Registry for the actions exposed to the automation host.
 * @module TabBridge/Plugin
 */

import { Logger, extractErrorInfo, isTabBridgeError } from '@tabbridge/shared';
import { IActionHandler } from './IActionHandler';
import { ActionParameters, IHostFramework } from '../../../ports/IHostFramework';

/**
 * Registry for action handlers using the Command Pattern.
 * Invocations never throw back into the host: invalid parameters and send failures are logged.
 */
export class ActionRegistry {
    private readonly handlers: Map<string, IActionHandler<unknown>> = new Map();
    private readonly logger = new Logger('ActionRegistry');

    /**
     * Registers a handler under its own id.
     */
    register<TParams>(handler: IActionHandler<TParams>): void {
        if (this.handlers.has(handler.id)) {
            this.logger.warn(`Action '${handler.id}' registered twice; keeping the latest.`);
        }
        this.handlers.set(handler.id, handler);
    }

    getHandler(id: string): IActionHandler<unknown> | undefined {
        return this.handlers.get(id);
    }

    getRegisteredActionIds(): string[] {
        return Array.from(this.handlers.keys());
    }

    /**
     * Runs an action with the parameters an automation rule supplied.
     */
    invoke(id: string, raw: ActionParameters): void {
        const handler = this.handlers.get(id);
        if (!handler) {
            this.logger.warn(`Unknown action '${id}'.`);
            return;
        }

        try {
            const params = handler.parseParameters(raw);
            handler.execute(params);
        } catch (error) {
            const { message, errorCode } = extractErrorInfo(error);
            if (isTabBridgeError(error) && error.errorCode === 'INVALID_PARAMETER') {
                this.logger.warn(`Action '${id}' not sent: ${message}`);
            } else {
                this.logger.error(`Action '${id}' failed: ${message}`, { errorCode });
            }
        }
    }

    /**
     * Exposes every registered action to the host.
     */
    registerWithHost(host: IHostFramework): void {
        for (const [id, handler] of this.handlers) {
            host.registerAction(id, (raw) => this.invoke(id, raw), handler.metadata);
            this.logger.debug(`Registered action '${id}' with the host.`);
        }
    }
}
