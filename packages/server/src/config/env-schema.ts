import { z } from 'zod';
import { InvalidConfigurationError, type LeaseConfigInput, type SessionTag } from '@leasehold/core';

const seconds = z.coerce.number().positive().finite().optional();
const count = z.coerce.number().int().min(1).optional();
const millis = z.coerce.number().int().nonnegative().optional();

/**
 * Every setting is optional; unset ones fall back to the LeaseConfigSchema defaults.
 */
const EnvSchema = z.object({
    NODE_ENV: z
        .enum(['development', 'test', 'production'])
        .default('development'),
    LOG_LEVEL: z
        .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
        .default('info'),

    // Session identity
    LEASEHOLD_PROCESS_ID: z.string().min(1).optional(),
    LEASEHOLD_JOB_ID: z.string().min(1).optional(),

    // Lease timing
    LEASEHOLD_AUTO_SAVE_INTERVAL: seconds,
    LEASEHOLD_REMOTE_WRITE_COOLDOWN: z.coerce.number().nonnegative().finite().optional(),
    LEASEHOLD_FORCE_LOAD_MAX_STEPS: count,
    LEASEHOLD_DEAD_LOCK_ASSUMED_AFTER: seconds,
    LEASEHOLD_TICK_INTERVAL: seconds,
    LEASEHOLD_LOAD_REPEAT_DELAY: seconds,

    // Health
    LEASEHOLD_ISSUE_COUNT: count,
    LEASEHOLD_ISSUE_WINDOW: seconds,
    LEASEHOLD_CRITICAL_STATE_WINDOW: seconds,

    // Store retries
    LEASEHOLD_RETRY_MAX_ATTEMPTS: count,
    LEASEHOLD_RETRY_BASE_DELAY_MS: millis,
    LEASEHOLD_RETRY_MAX_DELAY_MS: millis,
});

export type EnvConfig = z.infer<typeof EnvSchema>;

/**
 * @throws InvalidConfigurationError listing every malformed variable
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
    const result = EnvSchema.safeParse(env);
    if (!result.success) {
        throw new InvalidConfigurationError(
            result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`)
        );
    }
    return result.data;
}

export interface EnvLeaseSettings {
    config: LeaseConfigInput;
    session: Partial<SessionTag>;
}

/**
 * Lease service settings from the environment, ready for `new LeaseService({ stores, ...settings })`.
 * Cross-field checks happen when the service resolves the config.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): EnvLeaseSettings {
    const vars = validateEnv(env);
    return {
        config: {
            autoSaveInterval: vars.LEASEHOLD_AUTO_SAVE_INTERVAL,
            remoteWriteCooldown: vars.LEASEHOLD_REMOTE_WRITE_COOLDOWN,
            forceLoadMaxSteps: vars.LEASEHOLD_FORCE_LOAD_MAX_STEPS,
            deadLockAssumedAfter: vars.LEASEHOLD_DEAD_LOCK_ASSUMED_AFTER,
            issueCountForCriticalState: vars.LEASEHOLD_ISSUE_COUNT,
            issueWindowSeconds: vars.LEASEHOLD_ISSUE_WINDOW,
            criticalStateWindowSeconds: vars.LEASEHOLD_CRITICAL_STATE_WINDOW,
            tickInterval: vars.LEASEHOLD_TICK_INTERVAL,
            loadRepeatDelay: vars.LEASEHOLD_LOAD_REPEAT_DELAY,
            retry: {
                maxAttempts: vars.LEASEHOLD_RETRY_MAX_ATTEMPTS,
                baseDelayMs: vars.LEASEHOLD_RETRY_BASE_DELAY_MS,
                maxDelayMs: vars.LEASEHOLD_RETRY_MAX_DELAY_MS,
            },
        },
        session: {
            processId: vars.LEASEHOLD_PROCESS_ID,
            jobId: vars.LEASEHOLD_JOB_ID,
        },
    };
}
