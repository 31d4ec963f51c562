/**
 * @file UpdateTabAction.ts
 * @description Handler for the UpdateTab action, sent to the browser as `NewUrl`.
 * @module TabBridge/Plugin
 */

import { Logger, UpdateTabParameters, TAB_TARGET_DEFAULT } from '@tabbridge/shared';
import { IActionHandler } from '../IActionHandler';
import { ParameterReader } from '../ParameterReader';
import { ActionParameters } from '../../../../ports/IHostFramework';
import { ICommandSender } from '../../../../ports/ICommandSender';
import { TemplateExpander } from '../../../../core/services/TemplateExpander';

/**
 * Navigates an existing tab (the active one, or the one at `index`) to a new URL and
 * updates its active, pinned and muted state.
 */
export class UpdateTabAction implements IActionHandler<UpdateTabParameters> {
    public readonly id = 'UpdateTab';
    public readonly metadata = {
        name: 'Update Tab',
        description: 'Visit a new URL on the active tab or the tab at an index'
    };
    private readonly logger = new Logger('UpdateTabAction');

    constructor(
        private readonly sender: ICommandSender,
        private readonly expander: TemplateExpander
    ) {}

    parseParameters(raw: ActionParameters): UpdateTabParameters {
        const reader = new ParameterReader(this.id, raw);
        return {
            url: this.expander.expand(reader.string('url', '')),
            active: reader.boolean('active', false),
            pinned: reader.boolean('pinned', false),
            muted: reader.boolean('muted', false),
            target: reader.target('target', TAB_TARGET_DEFAULT),
            index: reader.index('index', 0)
        };
    }

    execute(parameters: UpdateTabParameters): void {
        this.logger.debug(`Updating tab to ${parameters.url} (target ${parameters.target}, index ${parameters.index}).`);
        this.sender.send({ name: 'NewUrl', parameters });
    }
}
