/**
 * @file MoveTabAction.ts
 * @description Handler for the MoveTab action.
 * @module TabBridge/Plugin
 */

import { MoveTabParameters, TAB_TARGET_DEFAULT } from '@tabbridge/shared';
import { IActionHandler } from '../IActionHandler';
import { ParameterReader } from '../ParameterReader';
import { ActionParameters } from '../../../../ports/IHostFramework';
import { ICommandSender } from '../../../../ports/ICommandSender';

/**
 * Moves one tab to a new position. `startindex` is only read by the browser when `target` is 1.
 */
export class MoveTabAction implements IActionHandler<MoveTabParameters> {
    public readonly id = 'MoveTab';
    public readonly metadata = {
        name: 'Move Tab',
        description: 'Move a single tab to a new position'
    };

    constructor(private readonly sender: ICommandSender) {}

    parseParameters(raw: ActionParameters): MoveTabParameters {
        const reader = new ParameterReader(this.id, raw);
        return {
            target: reader.target('target', TAB_TARGET_DEFAULT),
            startindex: reader.index('startindex', 0),
            endindex: reader.index('endindex', 0)
        };
    }

    execute(parameters: MoveTabParameters): void {
        this.sender.send({ name: 'MoveTab', parameters });
    }
}
