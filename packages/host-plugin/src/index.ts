/**
 * @file index.ts
 * @description Public surface of the TabBridge host plugin.
 * @module TabBridge/Plugin
 */

export { TabBridgePlugin } from './plugin';
export type { BridgeServerFactory } from './plugin';
export { resolveSettings, DEFAULT_SETTINGS, ENV_HOST, ENV_PORT, ENV_LOG_LEVEL } from './config';
export type { PluginSettings, PluginSettingsOverrides } from './config';
export { HostLoggerOutput } from './hostLogger';
export type { IHostFramework, ActionCallback, ActionMetadata, ActionParameters } from './ports/IHostFramework';
export type { ICommandSender } from './ports/ICommandSender';
export type { PeerHandle, Session } from './core/entities/Session';
export { SessionRegistry, EVICTED_CLOSE_CODE, EVICTED_CLOSE_REASON } from './core/services/SessionRegistry';
export { TemplateExpander } from './core/services/TemplateExpander';
export { BridgeServer } from './adapters/primary/ipc/BridgeServer';
export { ConnectionService } from './adapters/primary/ipc/ConnectionService';
export type { ConnectionHandlers } from './adapters/primary/ipc/ConnectionService';
export { IncomingMessageDispatcher, NOTIFICATION_TABLE } from './adapters/primary/ipc/IncomingMessageDispatcher';
export type { DispatchResult, NotificationSink } from './adapters/primary/ipc/IncomingMessageDispatcher';
export { encodeCommand, decodeEvent, decodeCommand } from './adapters/primary/ipc/MessageCodec';
export { ActionRegistry, createActionRegistry } from './adapters/primary/actions';
