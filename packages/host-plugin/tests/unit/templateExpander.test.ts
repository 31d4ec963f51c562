/**
 * @file templateExpander.test.ts
 * @description Unit tests for host-variable expansion in text parameters.
 * @module TabBridge/Plugin/Tests
 */

import { LogLevel } from '@tabbridge/shared';
import { TemplateExpander } from '../../src/core/services/TemplateExpander';
import { CapturingOutput, captureLogs, restoreLogs } from '../helpers/captureLogs';

describe('TemplateExpander', () => {
    const variables: Record<string, unknown> = {
        site: 'example.com',
        page: 3,
        query: { q: 'tabs' }
    };
    const resolve = (name: string): unknown => variables[name];
    let logs: CapturingOutput;

    beforeEach(() => {
        logs = captureLogs();
    });

    afterEach(() => {
        restoreLogs();
    });

    it('replaces placeholders with host variables', () => {
        expect(new TemplateExpander(resolve).expand('http://{site}/p/{page}')).toBe('http://example.com/p/3');
    });

    it('trims the variable name', () => {
        expect(new TemplateExpander(resolve).expand('http://{ site }/')).toBe('http://example.com/');
    });

    it('writes objects as JSON', () => {
        expect(new TemplateExpander(resolve).expand('{query}')).toBe('{"q":"tabs"}');
    });

    it('turns doubled braces into literal braces', () => {
        expect(new TemplateExpander(resolve).expand('{{site}} is {site}')).toBe('{site} is example.com');
    });

    it('leaves unknown placeholders as written', () => {
        expect(new TemplateExpander(resolve).expand('http://{missing}/')).toBe('http://{missing}/');
        expect(logs.messages(LogLevel.WARN)).toEqual(["No host variable 'missing'; placeholder left unexpanded."]);
    });

    it('leaves every placeholder when the host has no variables', () => {
        expect(new TemplateExpander().expand('http://{site}/')).toBe('http://{site}/');
    });

    it('returns text without placeholders unchanged', () => {
        expect(new TemplateExpander(resolve).expand('http://a.test/')).toBe('http://a.test/');
        expect(logs.lines).toHaveLength(0);
    });
});
