/**
 * @file ParameterReader.ts
 * @description Typed, defaulting access to the loosely typed parameters a host passes to an action.
 * @module TabBridge/Plugin
 */

import { InvalidParameterError, TabTarget } from '@tabbridge/shared';
import { ActionParameters } from '../../../ports/IHostFramework';

const UNSIGNED_INTEGER = /^\d+$/;

function describe(value: unknown): string {
    return typeof value === 'string' ? `"${value}"` : String(value);
}

/**
 * Reads one action's parameters. Absent and null values fall back to the default, as does an
 * empty string for flags and indexes, matching what the host stores for a field left blank.
 */
export class ParameterReader {
    constructor(
        private readonly action: string,
        private readonly raw: ActionParameters
    ) {}

    private isUnset(value: unknown): value is undefined | null | '' {
        return value === undefined || value === null || value === '';
    }

    public string(name: string, fallback: string): string {
        const value = this.raw[name];
        if (value === undefined || value === null) {
            return fallback;
        }
        if (typeof value === 'string') {
            return value;
        }
        if (typeof value === 'number' || typeof value === 'boolean') {
            return String(value);
        }
        throw new InvalidParameterError(this.action, name, 'expected text');
    }

    public boolean(name: string, fallback: boolean): boolean {
        const value = this.raw[name];
        if (this.isUnset(value)) {
            return fallback;
        }
        if (typeof value === 'boolean') {
            return value;
        }
        if (typeof value === 'string') {
            const normalized = value.trim().toLowerCase();
            if (normalized === 'true') {
                return true;
            }
            if (normalized === 'false') {
                return false;
            }
        }
        throw new InvalidParameterError(this.action, name, `expected true or false, got ${describe(value)}`);
    }

    /**
     * Reads a non-negative integer such as a tab index.
     */
    public index(name: string, fallback: number): number {
        const value = this.raw[name];
        if (this.isUnset(value)) {
            return fallback;
        }
        if (typeof value === 'number' && Number.isInteger(value) && value >= 0) {
            return value;
        }
        if (typeof value === 'string' && UNSIGNED_INTEGER.test(value.trim())) {
            return Number.parseInt(value.trim(), 10);
        }
        throw new InvalidParameterError(this.action, name, `expected a non-negative integer, got ${describe(value)}`);
    }

    public target(name: string, fallback: TabTarget): TabTarget {
        const value = this.index(name, fallback);
        if (value === 0 || value === 1) {
            return value;
        }
        throw new InvalidParameterError(this.action, name, `expected 0 or 1, got ${value}`);
    }
}
