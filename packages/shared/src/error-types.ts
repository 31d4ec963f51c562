/**
 * @file error-types.ts
 * @description Defines error types and utilities for consistent error handling across TabBridge.
 * @module TabBridge/Shared
 */

/**
 * Machine-readable codes carried by every {@link TabBridgeError}.
 */
export type TabBridgeErrorCode =
    | 'BIND_FAILED'
    | 'MALFORMED_MESSAGE'
    | 'MISSING_FIELD'
    | 'INVALID_PARAMETER'
    | 'INVALID_CONFIGURATION';

/**
 * Extended Error class that includes an error code for machine-readable error identification.
 */
export class TabBridgeError extends Error {
    /**
     * Machine-readable error code for identifying specific error types.
     */
    public readonly errorCode: TabBridgeErrorCode;

    /**
     * Creates a new TabBridgeError instance.
     * @param message Human-readable error message.
     * @param errorCode Machine-readable error code.
     */
    constructor(message: string, errorCode: TabBridgeErrorCode) {
        super(message);
        this.name = 'TabBridgeError';
        this.errorCode = errorCode;

        // Maintains proper stack trace for where our error was thrown (only available on V8)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, new.target);
        }
    }
}

/**
 * The listening endpoint could not be bound. The only error that reaches the host's start routine.
 */
export class BindError extends TabBridgeError {
    constructor(
        public readonly host: string,
        public readonly port: number,
        public readonly errno?: string
    ) {
        super(`Failed to listen on ${host}:${port}${errno ? ` (${errno})` : ''}`, 'BIND_FAILED');
        this.name = 'BindError';
    }
}

/**
 * An inbound frame that is not a JSON object with a string `command`.
 */
export class MalformedMessageError extends TabBridgeError {
    constructor(message: string) {
        super(message, 'MALFORMED_MESSAGE');
        this.name = 'MalformedMessageError';
    }
}

/**
 * A decodable inbound event that lacks a field its command requires.
 */
export class MissingFieldError extends TabBridgeError {
    constructor(
        public readonly command: string,
        public readonly field: string
    ) {
        super(`Event '${command}' is missing required field '${field}'`, 'MISSING_FIELD');
        this.name = 'MissingFieldError';
    }
}

/**
 * An action parameter that cannot be normalized to its declared type.
 */
export class InvalidParameterError extends TabBridgeError {
    constructor(
        public readonly action: string,
        public readonly parameter: string,
        reason: string
    ) {
        super(`Invalid parameter '${parameter}' for action '${action}': ${reason}`, 'INVALID_PARAMETER');
        this.name = 'InvalidParameterError';
    }
}

/**
 * A plugin setting that fails validation.
 */
export class ConfigurationError extends TabBridgeError {
    constructor(
        public readonly setting: string,
        reason: string
    ) {
        super(`Invalid setting '${setting}': ${reason}`, 'INVALID_CONFIGURATION');
        this.name = 'ConfigurationError';
    }
}

/**
 * Type guard to check if an error is a TabBridgeError with an error code.
 */
export function isTabBridgeError(error: unknown): error is TabBridgeError {
    return error instanceof TabBridgeError;
}

/**
 * Safely extracts error message and code from an unknown error value.
 * @param error The error value to extract from.
 * @returns An object containing the error message and optional error code.
 */
export function extractErrorInfo(error: unknown): { message: string; errorCode?: TabBridgeErrorCode } {
    if (isTabBridgeError(error)) {
        return { message: error.message, errorCode: error.errorCode };
    } else if (error instanceof Error) {
        return { message: error.message };
    } else if (typeof error === 'string') {
        return { message: error };
    } else {
        return { message: 'An unknown error occurred' };
    }
}
