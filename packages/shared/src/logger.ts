/**
 * @file logger.ts
 * @description A simple, centralized, level-based logger for the TabBridge project.
 * @module TabBridge/Shared
 */

/**
 * Defines the available logging levels.
 * The levels are ordered by verbosity, from least to most verbose.
 */
export enum LogLevel {
    ERROR = 0,
    WARN = 1,
    INFO = 2,
    DEBUG = 3,
    TRACE = 4,
}

/**
 * Defines the contract for a logger output sink.
 * The host plugin routes lines to the automation host's log; tests capture them in memory.
 */
export interface ILoggerOutput {
    log(level: LogLevel, message: string): void;
}

/**
 * Resolves a level name such as `"debug"` or `"WARN"` to its {@link LogLevel}.
 * @returns The matching level, or undefined when the name is not a known level.
 */
export function parseLogLevel(name: string): LogLevel | undefined {
    switch (name.trim().toUpperCase()) {
        case 'ERROR':
            return LogLevel.ERROR;
        case 'WARN':
            return LogLevel.WARN;
        case 'INFO':
            return LogLevel.INFO;
        case 'DEBUG':
            return LogLevel.DEBUG;
        case 'TRACE':
            return LogLevel.TRACE;
        default:
            return undefined;
    }
}

/**
 * A default console logger output that writes to the standard console.
 */
export class ConsoleLoggerOutput implements ILoggerOutput {
    public log(level: LogLevel, message: string): void {
        switch (level) {
            case LogLevel.ERROR:
                console.error(message);
                break;
            case LogLevel.WARN:
                console.warn(message);
                break;
            case LogLevel.INFO:
                console.info(message);
                break;
            default: // DEBUG and TRACE
                // console.debug is hidden by several terminals, so .log is used instead.
                console.log(message);
                break;
        }
    }
}

/**
 * A simple, centralized, level-based logger.
 */
export class Logger {
    private static _level: LogLevel = LogLevel.INFO;
    private static _output: ILoggerOutput = new ConsoleLoggerOutput();

    private readonly componentName: string;

    /**
     * Creates a new logger instance for a specific component.
     * @param componentName The name of the component, which will be included in log messages.
     */
    constructor(componentName: string) {
        this.componentName = componentName;
    }

    /**
     * Sets the global minimum log level.
     * Messages with a level lower than this will not be logged.
     */
    public static setLevel(level: LogLevel): void {
        Logger._level = level;
    }

    /** Returns the global minimum log level. */
    public static getLevel(): LogLevel {
        return Logger._level;
    }

    /**
     * Sets the global output sink for all loggers.
     */
    public static setOutput(output: ILoggerOutput): void {
        Logger._output = output;
    }

    /**
     * Formats the log message with a timestamp, level, and component name.
     */
    private format(level: LogLevel, message: string, args: unknown[]): string {
        const timestamp = new Date().toISOString();
        const levelStr = LogLevel[level].padEnd(5, ' ');
        let formattedMessage = `[${timestamp}] [${levelStr}] [${this.componentName}] ${message}`;

        if (args.length > 0) {
            const formattedArgs = args.map(arg => {
                if (arg instanceof Error) {
                    return `${arg.name}: ${arg.message}`;
                }
                if (typeof arg === 'object' && arg !== null) {
                    try {
                        return JSON.stringify(arg, this.getCircularReplacer());
                    } catch {
                        return '[Unserializable Object]';
                    }
                }
                return String(arg);
            }).join(' ');
            formattedMessage += ` | ${formattedArgs}`;
        }

        return formattedMessage;
    }

    /**
     * Creates a replacer function for JSON.stringify to handle circular references.
     */
    private getCircularReplacer = () => {
        const seen = new WeakSet<object>();
        return (_key: string, value: unknown): unknown => {
            if (typeof value === 'object' && value !== null) {
                if (seen.has(value)) {
                    return '[Circular Reference]';
                }
                seen.add(value);
            }
            return value;
        };
    };

    private log(level: LogLevel, message: string, ...args: unknown[]): void {
        if (level <= Logger._level) {
            const formattedMessage = this.format(level, message, args);
            Logger._output.log(level, formattedMessage);
        }
    }

    /** Logs a TRACE level message. For frame-level protocol detail. */
    public trace(message: string, ...args: unknown[]): void {
        this.log(LogLevel.TRACE, message, ...args);
    }

    /** Logs a DEBUG level message. For development-time debugging. */
    public debug(message: string, ...args: unknown[]): void {
        this.log(LogLevel.DEBUG, message, ...args);
    }

    /** Logs an INFO level message. For major lifecycle events and operations. */
    public info(message: string, ...args: unknown[]): void {
        this.log(LogLevel.INFO, message, ...args);
    }

    /** Logs a WARN level message. For non-critical issues or potential problems. */
    public warn(message: string, ...args: unknown[]): void {
        this.log(LogLevel.WARN, message, ...args);
    }

    /** Logs an ERROR level message. For exceptions and critical failures. */
    public error(message: string, ...args: unknown[]): void {
        this.log(LogLevel.ERROR, message, ...args);
    }
}
