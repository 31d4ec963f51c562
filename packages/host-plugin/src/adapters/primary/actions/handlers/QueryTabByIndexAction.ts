/**
 * @file QueryTabByIndexAction.ts
 * @description Handler for the QueryTabByIndex action.
 * @module TabBridge/Plugin
 */

import { Logger } from '@tabbridge/shared';
import { IActionHandler } from '../IActionHandler';
import { ParameterReader } from '../ParameterReader';
import { ActionParameters } from '../../../../ports/IHostFramework';
import { ICommandSender } from '../../../../ports/ICommandSender';

/**
 * Asks the browser for the tab at an index. The answer arrives as the `QueryTabByIndex`
 * and `QueryTabByIndexInfo` notifications.
 */
export class QueryTabByIndexAction implements IActionHandler<number> {
    public readonly id = 'QueryTabByIndex';
    public readonly metadata = {
        name: 'Query Tab By Index',
        description: 'Receive the JSON properties of the tab at an index'
    };
    private readonly logger = new Logger('QueryTabByIndexAction');

    constructor(private readonly sender: ICommandSender) {}

    parseParameters(raw: ActionParameters): number {
        return new ParameterReader(this.id, raw).index('index', 0);
    }

    execute(index: number): void {
        this.logger.debug(`Querying tab ${index}.`);
        this.sender.send({ name: 'QueryTabByIndex', index });
    }
}
