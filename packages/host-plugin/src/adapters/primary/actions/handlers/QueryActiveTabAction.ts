/**
 * @file QueryActiveTabAction.ts
 * @description Handler for the QueryActiveTab action. The answer arrives later as the
 * `QueryActiveTab` and `QueryActiveTabInfo` notifications.
 * @module TabBridge/Plugin
 */

import { IActionHandler } from '../IActionHandler';
import { ICommandSender } from '../../../../ports/ICommandSender';

export class QueryActiveTabAction implements IActionHandler<void> {
    public readonly id = 'QueryActiveTab';
    public readonly metadata = {
        name: 'Query Active Tab',
        description: 'Receive the JSON properties of the active tab'
    };

    constructor(private readonly sender: ICommandSender) {}

    parseParameters(): void {
        // Takes no parameters.
    }

    execute(): void {
        this.sender.send({ name: 'QueryActiveTab' });
    }
}
