/**
 * @file config.ts
 * @description Resolves the plugin's settings from defaults, the environment and host overrides.
 * @module TabBridge/Plugin
 */

import { ConfigurationError, LogLevel, parseLogLevel } from '@tabbridge/shared';

/**
 * Settings the plugin starts with.
 * @property {string} host - Interface the WebSocket server binds to.
 * @property {number} port - Port the browser extension connects to.
 * @property {LogLevel} logLevel - Minimum level written to the host log.
 */
export interface PluginSettings {
    host: string;
    port: number;
    logLevel: LogLevel;
}

/**
 * Values a host may supply, typically from its configuration dialog.
 */
export interface PluginSettingsOverrides {
    host?: string;
    port?: number | string;
    logLevel?: LogLevel | string;
}

export const DEFAULT_SETTINGS: Readonly<PluginSettings> = {
    host: 'localhost',
    port: 8000,
    logLevel: LogLevel.INFO
};

export const ENV_HOST = 'TABBRIDGE_HOST';
export const ENV_PORT = 'TABBRIDGE_PORT';
export const ENV_LOG_LEVEL = 'TABBRIDGE_LOG_LEVEL';

const MAX_PORT = 65535;

function fromEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
    const value = env[key];
    return value === undefined || value.trim() === '' ? undefined : value;
}

function validateHost(value: string): string {
    const host = value.trim();
    if (host === '') {
        throw new ConfigurationError('host', 'must not be empty');
    }
    return host;
}

function validatePort(value: number | string): number {
    const port = typeof value === 'string' && /^\d+$/.test(value.trim()) ? Number(value.trim()) : value;
    if (typeof port !== 'number' || !Number.isInteger(port) || port < 0 || port > MAX_PORT) {
        throw new ConfigurationError('port', `expected an integer between 0 and ${MAX_PORT}, got '${value}'`);
    }
    return port;
}

function validateLogLevel(value: LogLevel | string): LogLevel {
    const level = typeof value === 'string' ? parseLogLevel(value) : value;
    if (level === undefined || LogLevel[level] === undefined) {
        throw new ConfigurationError('logLevel', `unknown level '${value}'`);
    }
    return level;
}

/**
 * Merges settings. Host overrides win over the environment, which wins over the defaults.
 * @throws {ConfigurationError} When a resolved value is invalid.
 */
export function resolveSettings(
    overrides: PluginSettingsOverrides = {},
    env: NodeJS.ProcessEnv = process.env
): PluginSettings {
    return {
        host: validateHost(overrides.host ?? fromEnv(env, ENV_HOST) ?? DEFAULT_SETTINGS.host),
        port: validatePort(overrides.port ?? fromEnv(env, ENV_PORT) ?? DEFAULT_SETTINGS.port),
        logLevel: validateLogLevel(overrides.logLevel ?? fromEnv(env, ENV_LOG_LEVEL) ?? DEFAULT_SETTINGS.logLevel)
    };
}
