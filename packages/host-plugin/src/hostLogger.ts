/**
 * @file hostLogger.ts
 * @description Implements the ILoggerOutput interface for the automation host,
 * directing logs to the host's log window and the console.
 * @module TabBridge/Plugin
 */

import { ConsoleLoggerOutput, ILoggerOutput, LogLevel } from '@tabbridge/shared';
import { IHostFramework } from './ports/IHostFramework';

/**
 * An ILoggerOutput implementation that writes to the console and, when the host
 * offers one, to the host's own log.
 */
export class HostLoggerOutput implements ILoggerOutput {
    constructor(
        private readonly host: Pick<IHostFramework, 'log'>,
        private readonly console: ILoggerOutput = new ConsoleLoggerOutput()
    ) {}

    public log(level: LogLevel, message: string): void {
        this.console.log(level, message);
        this.host.log?.(message);
    }
}
