/**
 * @file index.ts
 * @description Builds the registry holding every action the plugin offers.
 * @module TabBridge/Plugin
 */

import { ICommandSender } from '../../../ports/ICommandSender';
import { TemplateExpander } from '../../../core/services/TemplateExpander';
import { ActionRegistry } from './ActionRegistry';
import { NewTabAction } from './handlers/NewTabAction';
import { MoveTabAction } from './handlers/MoveTabAction';
import { RemoveTabAction } from './handlers/RemoveTabAction';
import { UpdateTabAction } from './handlers/UpdateTabAction';
import { ReloadTabAction } from './handlers/ReloadTabAction';
import { QueryTabByIndexAction } from './handlers/QueryTabByIndexAction';
import { QueryActiveTabAction } from './handlers/QueryActiveTabAction';
import { SendMessageAction } from './handlers/SendMessageAction';

export { ActionRegistry } from './ActionRegistry';
export type { IActionHandler } from './IActionHandler';
export { ParameterReader } from './ParameterReader';

export function createActionRegistry(sender: ICommandSender, expander: TemplateExpander): ActionRegistry {
    const registry = new ActionRegistry();
    registry.register(new NewTabAction(sender, expander));
    registry.register(new MoveTabAction(sender));
    registry.register(new RemoveTabAction(sender));
    registry.register(new UpdateTabAction(sender, expander));
    registry.register(new ReloadTabAction(sender));
    registry.register(new QueryTabByIndexAction(sender));
    registry.register(new QueryActiveTabAction(sender));
    registry.register(new SendMessageAction(sender));
    return registry;
}
