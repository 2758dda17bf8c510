export interface BackoffConfig {
    baseDelayMs: number;
    maxDelayMs: number;
}

/**
 * Exponential backoff with jitter: base * 2^attempt, scaled by 0.5x-1.5x, capped at maxDelayMs.
 * @param attempt Zero-based retry number
 */
export function calculateBackoffDelay(
    attempt: number,
    config: BackoffConfig,
    random: () => number = Math.random
): number {
    const exponential = Math.min(config.baseDelayMs * Math.pow(2, attempt), config.maxDelayMs);
    const jittered = exponential * (0.5 + random());
    return Math.floor(Math.min(jittered, config.maxDelayMs));
}
