/**
 * @file IncomingMessageDispatcher.ts
 * @description Turns decoded browser events into host notifications.
 * @module TabBridge/Plugin
 */

import {
    InboundCommand,
    InboundEvent,
    MissingFieldError,
    Notification,
    NotificationName,
    TabNotification,
    Logger,
    isInboundCommand
} from '@tabbridge/shared';

/**
 * Where a notification's payload comes from: the raw frame text, or a field of `data`.
 */
export type PayloadSource = 'raw' | 'data.url' | 'data.index';

export interface NotificationRule {
    name: TabNotification;
    payload: PayloadSource;
}

/**
 * Notifications raised per event tag, in the order they are raised.
 */
export const NOTIFICATION_TABLE: Readonly<Record<InboundCommand, readonly NotificationRule[]>> = {
    QueryActiveTab: [
        { name: 'QueryActiveTabInfo', payload: 'raw' },
        { name: 'QueryActiveTab', payload: 'data.url' }
    ],
    QueryTabByIndex: [
        { name: 'QueryTabByIndex', payload: 'data.index' },
        { name: 'QueryTabByIndexInfo', payload: 'raw' }
    ],
    ActiveTab: [
        { name: 'ActiveTabUrl', payload: 'data.url' },
        { name: 'ActiveTabInfo', payload: 'raw' }
    ],
    TabUpdated: [
        { name: 'ActiveTabUrl', payload: 'data.url' },
        { name: 'ActiveTabUrInfo', payload: 'raw' }
    ],
    CreateNewTab: [{ name: 'CreateNewTab', payload: 'raw' }],
    MoveTab: [{ name: 'MoveTab', payload: 'raw' }],
    RemoveTab: [{ name: 'RemoveTab', payload: 'raw' }]
};

export type NotificationSink = (name: NotificationName, payload?: unknown) => void;

export type DispatchResult =
    | { status: 'dispatched'; notifications: Notification[] }
    | { status: 'ignored' }
    | { status: 'dropped'; error: MissingFieldError };

type ResolvedPayload = { found: true; value: unknown } | { found: false };

/**
 * Stateless, table-driven mapping from inbound events to host notifications.
 * Payloads are resolved before anything is raised, so an incomplete event raises nothing.
 */
export class IncomingMessageDispatcher {
    private readonly logger = new Logger('IncomingMessageDispatcher');

    constructor(private readonly sink: NotificationSink) {}

    /**
     * Raises the notifications for one event.
     * Errors thrown by the sink propagate to the caller.
     */
    public dispatch(event: InboundEvent): DispatchResult {
        if (!isInboundCommand(event.command)) {
            this.logger.debug(`Ignoring event with unhandled command '${event.command}'.`);
            return { status: 'ignored' };
        }

        const notifications: Notification[] = [];
        for (const rule of NOTIFICATION_TABLE[event.command]) {
            const resolved = this.resolvePayload(event, rule.payload);
            if (!resolved.found) {
                const error = new MissingFieldError(event.command, rule.payload);
                this.logger.warn(`${error.message}. Event dropped.`, { raw: event.raw });
                return { status: 'dropped', error };
            }
            notifications.push({ name: rule.name, payload: resolved.value });
        }

        for (const notification of notifications) {
            this.logger.debug(`Raising '${notification.name}'.`);
            this.sink(notification.name, notification.payload);
        }
        return { status: 'dispatched', notifications };
    }

    private resolvePayload(event: InboundEvent, source: PayloadSource): ResolvedPayload {
        switch (source) {
            case 'raw':
                return { found: true, value: event.raw };
            case 'data.url':
                return this.readDataField(event, 'url');
            case 'data.index':
                return this.readDataField(event, 'index');
        }
    }

    private readDataField(event: InboundEvent, field: string): ResolvedPayload {
        const value = event.data?.[field];
        return value === undefined ? { found: false } : { found: true, value };
    }
}
