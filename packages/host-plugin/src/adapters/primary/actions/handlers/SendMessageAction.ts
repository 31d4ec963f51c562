/**
 * @file SendMessageAction.ts
 * @description Handler for the SendMessage action, which writes user-supplied text to the
 * browser unchanged.
 * @module TabBridge/Plugin
 */

import { IActionHandler } from '../IActionHandler';
import { ParameterReader } from '../ParameterReader';
import { ActionParameters } from '../../../../ports/IHostFramework';
import { ICommandSender } from '../../../../ports/ICommandSender';

export class SendMessageAction implements IActionHandler<string> {
    public readonly id = 'SendMessage';
    public readonly metadata = {
        name: 'Send Message',
        description: 'Send a message to the browser'
    };

    constructor(private readonly sender: ICommandSender) {}

    parseParameters(raw: ActionParameters): string {
        return new ParameterReader(this.id, raw).string('message', '');
    }

    execute(message: string): void {
        this.sender.sendText(message);
    }
}
