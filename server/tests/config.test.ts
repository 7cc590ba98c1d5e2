/**
 * config.test.ts
 *
 * Environment parsing: defaults, boolean flags and rejection of invalid
 * values.
 */

import {describe, it, expect} from 'vitest';
import {ZodError} from 'zod';
import {parseConfig} from '../src/config.js';

describe('parseConfig', () => {
    it('fills development defaults', () => {
        const cfg = parseConfig({});
        expect(cfg.PORT).toBe(8000);
        expect(cfg.HOST).toBe('0.0.0.0');
        expect(cfg.GIT_HASH).toBe('unknown');
        expect(cfg.METRICS_ENABLED).toBe(false);
        expect(cfg.FASTIFY_LOG_LEVEL).toBe('info');
    });

    it('coerces numbers and boolean flags', () => {
        const cfg = parseConfig({PORT: '9000', METRICS_ENABLED: '1', OTEL_ENABLED: 'true', COOKIE_SECURE: 'false'});
        expect(cfg.PORT).toBe(9000);
        expect(cfg.METRICS_ENABLED).toBe(true);
        expect(cfg.OTEL_ENABLED).toBe(true);
        expect(cfg.COOKIE_SECURE).toBe(false);
    });

    it('rejects invalid values', () => {
        expect(() => parseConfig({PORT: 'eighty'})).toThrow(ZodError);
        expect(() => parseConfig({METRICS_ENABLED: 'yes'})).toThrow(ZodError);
        expect(() => parseConfig({JWT_SECRET: 'short'})).toThrow(ZodError);
    });
});
