import { InvalidConfigurationError, resolveConfig } from '@leasehold/core';
import { configFromEnv, validateEnv } from '../env-schema';

function issuesOf(fn: () => unknown): string[] {
    try {
        fn();
    } catch (err) {
        if (err instanceof InvalidConfigurationError) {
            return err.issues;
        }
        throw err;
    }
    throw new Error('expected InvalidConfigurationError');
}

describe('validateEnv', () => {
    describe('Default values', () => {
        it('should apply defaults when nothing is set', () => {
            const env = validateEnv({});

            expect(env.NODE_ENV).toBe('development');
            expect(env.LOG_LEVEL).toBe('info');
            expect(env.LEASEHOLD_AUTO_SAVE_INTERVAL).toBeUndefined();
            expect(env.LEASEHOLD_PROCESS_ID).toBeUndefined();
        });
    });

    describe('Type coercion', () => {
        it('should coerce numeric strings', () => {
            const env = validateEnv({
                LEASEHOLD_AUTO_SAVE_INTERVAL: '45',
                LEASEHOLD_REMOTE_WRITE_COOLDOWN: '0',
                LEASEHOLD_FORCE_LOAD_MAX_STEPS: '4',
                LEASEHOLD_RETRY_BASE_DELAY_MS: '100',
            });

            expect(env.LEASEHOLD_AUTO_SAVE_INTERVAL).toBe(45);
            expect(env.LEASEHOLD_REMOTE_WRITE_COOLDOWN).toBe(0);
            expect(env.LEASEHOLD_FORCE_LOAD_MAX_STEPS).toBe(4);
            expect(env.LEASEHOLD_RETRY_BASE_DELAY_MS).toBe(100);
        });
    });

    describe('Validation errors', () => {
        it('should reject a non-numeric value', () => {
            expect(() => validateEnv({ LEASEHOLD_FORCE_LOAD_MAX_STEPS: 'many' })).toThrow(InvalidConfigurationError);
        });

        it('should reject a fractional step count', () => {
            const issues = issuesOf(() => validateEnv({ LEASEHOLD_FORCE_LOAD_MAX_STEPS: '2.5' }));
            expect(issues).toHaveLength(1);
            expect(issues[0].startsWith('LEASEHOLD_FORCE_LOAD_MAX_STEPS: ')).toBe(true);
        });

        it('should list every malformed variable', () => {
            const issues = issuesOf(() =>
                validateEnv({
                    LEASEHOLD_TICK_INTERVAL: '-1',
                    LEASEHOLD_ISSUE_COUNT: '0',
                    NODE_ENV: 'staging',
                })
            );
            const paths = issues.map((issue) => issue.split(':')[0]).sort();
            expect(paths).toEqual(['LEASEHOLD_ISSUE_COUNT', 'LEASEHOLD_TICK_INTERVAL', 'NODE_ENV']);
        });
    });
});

describe('configFromEnv', () => {
    it('should map variables onto the lease config and session', () => {
        const settings = configFromEnv({
            LEASEHOLD_AUTO_SAVE_INTERVAL: '45',
            LEASEHOLD_RETRY_MAX_ATTEMPTS: '3',
            LEASEHOLD_PROCESS_ID: 'worker-7',
        });

        expect(settings.session).toEqual({ processId: 'worker-7', jobId: undefined });

        const config = resolveConfig(settings.config);
        expect(config.autoSaveInterval).toBe(45);
        expect(config.retry).toEqual({ maxAttempts: 3, baseDelayMs: 250, maxDelayMs: 8000 });
        expect(config.remoteWriteCooldown).toBe(7);
        expect(config.forceLoadMaxSteps).toBe(8);
    });

    it('should leave cross-field checks to resolveConfig', () => {
        const settings = configFromEnv({
            LEASEHOLD_AUTO_SAVE_INTERVAL: '60',
            LEASEHOLD_DEAD_LOCK_ASSUMED_AFTER: '30',
        });

        const issues = issuesOf(() => resolveConfig(settings.config));
        expect(issues).toEqual([
            'deadLockAssumedAfter: deadLockAssumedAfter must exceed autoSaveInterval, or live holders would be treated as dead',
        ]);
    });
});
