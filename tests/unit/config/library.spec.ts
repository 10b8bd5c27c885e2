import { describe, expect, it } from 'vitest';
import { LIBRARY_DEFAULTS, LOG_LEVEL_ENV_KEY, resolveLogLevel } from 'config/library';

describe('library configuration', () => {
    it('freezes the defaults', () => {
        expect(Object.isFrozen(LIBRARY_DEFAULTS)).toBe(true);
        expect(LIBRARY_DEFAULTS.snapshotVersion).toBe(1);
        expect(LIBRARY_DEFAULTS.eventQueueCapacity).toBe(256);
    });

    it('defaults to warn outside tests and error inside them', () => {
        expect(resolveLogLevel({})).toBe('warn');
        expect(resolveLogLevel({ NODE_ENV: 'test' })).toBe('error');
    });

    it('lets the environment pick a level', () => {
        expect(resolveLogLevel({ [LOG_LEVEL_ENV_KEY]: ' Debug ' })).toBe('debug');
        expect(resolveLogLevel({ [LOG_LEVEL_ENV_KEY]: 'info', NODE_ENV: 'test' })).toBe('info');
    });

    it('ignores unknown levels', () => {
        expect(resolveLogLevel({ [LOG_LEVEL_ENV_KEY]: 'loud', NODE_ENV: 'test' })).toBe('error');
    });
});
