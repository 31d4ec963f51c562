/**
 * @file RemoveTabAction.ts
 * @description Handler for the RemoveTab action.
 * @module TabBridge/Plugin
 */

import { RemoveTabParameters, TAB_TARGET_DEFAULT } from '@tabbridge/shared';
import { IActionHandler } from '../IActionHandler';
import { ParameterReader } from '../ParameterReader';
import { ActionParameters } from '../../../../ports/IHostFramework';
import { ICommandSender } from '../../../../ports/ICommandSender';

export class RemoveTabAction implements IActionHandler<RemoveTabParameters> {
    public readonly id = 'RemoveTab';
    public readonly metadata = {
        name: 'Remove Tab',
        description: 'Close the active tab or the tab at an index'
    };

    constructor(private readonly sender: ICommandSender) {}

    parseParameters(raw: ActionParameters): RemoveTabParameters {
        const reader = new ParameterReader(this.id, raw);
        return {
            target: reader.target('target', TAB_TARGET_DEFAULT),
            index: reader.index('index', 0)
        };
    }

    execute(parameters: RemoveTabParameters): void {
        this.sender.send({ name: 'RemoveTab', parameters });
    }
}
