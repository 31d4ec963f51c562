/**
 * @file plugin.ts
 * @description Main entry point for the TabBridge host plugin.
 * Registers the actions with the host and owns the bridge server between start and stop.
 * @module TabBridge/Plugin
 */

import { Logger, TabCommand } from '@tabbridge/shared';
import { BridgeServer } from './adapters/primary/ipc/BridgeServer';
import { ActionRegistry, createActionRegistry } from './adapters/primary/actions';
import { TemplateExpander } from './core/services/TemplateExpander';
import { PluginSettings, PluginSettingsOverrides, resolveSettings } from './config';
import { HostLoggerOutput } from './hostLogger';
import { ICommandSender } from './ports/ICommandSender';
import { IHostFramework } from './ports/IHostFramework';

export type BridgeServerFactory = (host: IHostFramework) => BridgeServer;

const defaultServerFactory: BridgeServerFactory = (host) => new BridgeServer(host);

/**
 * The plugin as the automation host sees it. The host constructs it once, then calls
 * {@link start} and {@link stop} from its own plugin lifecycle, possibly several times.
 */
export class TabBridgePlugin implements ICommandSender {
    private readonly logger = new Logger('TabBridgePlugin');
    private readonly actionRegistry: ActionRegistry;
    private server: BridgeServer | null = null;
    private settings: PluginSettings | null = null;

    /**
     * @param host The automation host.
     * @param createServer Builds the server for each start; replaced in tests.
     */
    constructor(
        private readonly host: IHostFramework,
        private readonly createServer: BridgeServerFactory = defaultServerFactory
    ) {
        const expander = new TemplateExpander(host.getVariable?.bind(host));
        this.actionRegistry = createActionRegistry(this, expander);
        this.actionRegistry.registerWithHost(host);
    }

    /**
     * Starts the bridge server. Resolves once it is listening.
     * @throws {ConfigurationError} When the settings are invalid.
     * @throws {BindError} When the endpoint cannot be bound.
     */
    public async start(overrides?: PluginSettingsOverrides): Promise<void> {
        if (this.server) {
            this.logger.warn('start() called while already started; ignoring.');
            return;
        }

        const settings = resolveSettings(overrides);
        Logger.setOutput(new HostLoggerOutput(this.host));
        Logger.setLevel(settings.logLevel);
        this.logger.info(`Starting on ${settings.host}:${settings.port}...`);

        const server = this.createServer(this.host);
        this.server = server;
        let port: number;
        try {
            port = await server.start(settings.host, settings.port);
        } catch (error) {
            if (this.server === server) {
                this.server = null;
            }
            throw error;
        }

        if (this.server !== server) {
            // stop() ran while the server was binding.
            await server.stop();
            return;
        }
        this.settings = { ...settings, port };
        this.logger.info(`Started. Waiting for the browser extension on ${settings.host}:${port}.`);
    }

    /**
     * Stops the bridge server and releases the listening port. Does nothing when not started.
     */
    public async stop(): Promise<void> {
        const server = this.server;
        if (!server) {
            return;
        }
        this.server = null;
        this.settings = null;
        await server.stop();
        this.logger.info('Stopped.');
    }

    public send(command: TabCommand): void {
        if (!this.server) {
            this.logger.debug(`Plugin not started; command '${command.name}' dropped.`);
            return;
        }
        this.server.send(command);
    }

    public sendText(text: string): void {
        if (!this.server) {
            this.logger.debug('Plugin not started; message dropped.');
            return;
        }
        this.server.sendText(text);
    }

    public isRunning(): boolean {
        return this.server !== null;
    }

    /**
     * Settings in effect, with `port` set to the bound port. Null while stopped.
     */
    public getSettings(): PluginSettings | null {
        return this.settings;
    }

    public getActionRegistry(): ActionRegistry {
        return this.actionRegistry;
    }
}
