/**
 * @file NewTabAction.ts
 * @description Handler for the NewTab action.
 * @module TabBridge/Plugin
 */

import { Logger, NewTabParameters, TAB_TARGET_DEFAULT } from '@tabbridge/shared';
import { IActionHandler } from '../IActionHandler';
import { ParameterReader } from '../ParameterReader';
import { ActionParameters } from '../../../../ports/IHostFramework';
import { ICommandSender } from '../../../../ports/ICommandSender';
import { TemplateExpander } from '../../../../core/services/TemplateExpander';

/**
 * Opens a new tab, either after the last tab or at a given index.
 */
export class NewTabAction implements IActionHandler<NewTabParameters> {
    public readonly id = 'NewTab';
    public readonly metadata = {
        name: 'Create New Tab',
        description: 'Create a new tab and select its properties and position'
    };
    private readonly logger = new Logger('NewTabAction');

    constructor(
        private readonly sender: ICommandSender,
        private readonly expander: TemplateExpander
    ) {}

    parseParameters(raw: ActionParameters): NewTabParameters {
        const reader = new ParameterReader(this.id, raw);
        return {
            url: this.expander.expand(reader.string('url', '')),
            active: reader.boolean('active', false),
            pinned: reader.boolean('pinned', false),
            target: reader.target('target', TAB_TARGET_DEFAULT),
            index: reader.index('index', 0)
        };
    }

    execute(parameters: NewTabParameters): void {
        this.logger.debug(`Opening ${parameters.url || 'an empty tab'} (target ${parameters.target}, index ${parameters.index}).`);
        this.sender.send({ name: 'NewTab', parameters });
    }
}
