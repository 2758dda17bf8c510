import { z } from 'zod';
import { InvalidConfigurationError } from './errors';

const seconds = z.number().positive().finite();
const count = z.number().int().min(1);

export const RetryConfigSchema = z.object({
  /** Attempts per store request, including the first (default: 5) */
  maxAttempts: count.default(5),
  baseDelayMs: z.number().int().nonnegative().default(250),
  maxDelayMs: z.number().int().nonnegative().default(8000),
});

/**
 * Lease timing and health thresholds. Durations are seconds.
 */
export const LeaseConfigSchema = z
  .object({
    /** Each active lease is saved about once per this many seconds */
    autoSaveInterval: seconds.default(30),
    /** Minimum spacing between store calls for the same key; 0 disables throttling */
    remoteWriteCooldown: z.number().nonnegative().finite().default(7),
    /** Polling steps before a force load takes the record unconditionally */
    forceLoadMaxSteps: count.default(8),
    /** A holder that has not saved for this long is presumed dead */
    deadLockAssumedAfter: seconds.default(1800),
    issueCountForCriticalState: count.default(5),
    issueWindowSeconds: seconds.default(60),
    criticalStateWindowSeconds: seconds.default(60),
    /** Cadence of the process-wide tick */
    tickInterval: seconds.default(1),
    /** Wait between claim attempts while polling a locked record */
    loadRepeatDelay: seconds.default(15),
    retry: RetryConfigSchema.default({}),
  })
  .superRefine((data, ctx) => {
    if (data.retry.maxDelayMs < data.retry.baseDelayMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'retry.maxDelayMs must be >= retry.baseDelayMs',
        path: ['retry', 'maxDelayMs'],
      });
    }
    if (data.deadLockAssumedAfter <= data.autoSaveInterval) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'deadLockAssumedAfter must exceed autoSaveInterval, or live holders would be treated as dead',
        path: ['deadLockAssumedAfter'],
      });
    }
  });

export type LeaseConfig = z.infer<typeof LeaseConfigSchema>;
export type LeaseConfigInput = z.input<typeof LeaseConfigSchema>;

/**
 * Merges the given settings over the defaults and validates them.
 * @throws InvalidConfigurationError listing every problem found
 */
export function resolveConfig(input: LeaseConfigInput = {}): LeaseConfig {
  const result = LeaseConfigSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}
