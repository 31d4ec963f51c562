/**
 * @file TemplateExpander.ts
 * @description Expands `{name}` placeholders in text parameters from host variables.
 * @module TabBridge/Plugin
 */

import { Logger } from '@tabbridge/shared';

export type VariableResolver = (name: string) => unknown;

const PLACEHOLDER = /\{\{|\}\}|\{([^{}]+)\}/g;

/**
 * Replaces `{name}` with the host variable of that name. `{{` and `}}` produce literal braces.
 * Placeholders naming an unknown variable are left as written.
 */
export class TemplateExpander {
    private readonly logger = new Logger('TemplateExpander');

    constructor(private readonly resolve?: VariableResolver) {}

    public expand(template: string): string {
        return template.replace(PLACEHOLDER, (match: string, name: string | undefined) => {
            if (name === undefined) {
                return match === '{{' ? '{' : '}';
            }
            const key = name.trim();
            const value = this.resolve ? this.resolve(key) : undefined;
            if (value === undefined) {
                this.logger.warn(`No host variable '${key}'; placeholder left unexpanded.`);
                return match;
            }
            return this.stringify(value);
        });
    }

    private stringify(value: unknown): string {
        if (typeof value === 'string') {
            return value;
        }
        if (typeof value === 'object' && value !== null) {
            try {
                return JSON.stringify(value);
            } catch {
                return String(value);
            }
        }
        return String(value);
    }
}
