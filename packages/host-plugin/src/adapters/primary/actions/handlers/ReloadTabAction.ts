/**
 * @file ReloadTabAction.ts
 * @description Handler for the ReloadTab action.
 * @module TabBridge/Plugin
 */

import { ReloadTabParameters, TAB_TARGET_DEFAULT } from '@tabbridge/shared';
import { IActionHandler } from '../IActionHandler';
import { ParameterReader } from '../ParameterReader';
import { ActionParameters } from '../../../../ports/IHostFramework';
import { ICommandSender } from '../../../../ports/ICommandSender';

export class ReloadTabAction implements IActionHandler<ReloadTabParameters> {
    public readonly id = 'ReloadTab';
    public readonly metadata = {
        name: 'Reload Tab',
        description: 'Reload the active tab or the tab at an index'
    };

    constructor(private readonly sender: ICommandSender) {}

    parseParameters(raw: ActionParameters): ReloadTabParameters {
        const reader = new ParameterReader(this.id, raw);
        return {
            target: reader.target('target', TAB_TARGET_DEFAULT),
            index: reader.index('index', 0),
            bypasscache: reader.boolean('bypasscache', false)
        };
    }

    execute(parameters: ReloadTabParameters): void {
        this.sender.send({ name: 'ReloadTab', parameters });
    }
}
