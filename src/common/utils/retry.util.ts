export interface RetryOptions {
    maxAttempts?: number;
    baseDelayMs?: number;
    maxDelayMs?: number;
    /** Return false to rethrow immediately. */
    shouldRetry?: (error: unknown) => boolean;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
    sleep?: (ms: number) => Promise<void>;
    random?: () => number;
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
        setTimeout(resolve, ms);
    });
}

/**
 * Delay before the retry following `attempt` (1-based): an exponential
 * ceiling `base * 2^(attempt-1)` capped at `max`, with full jitter.
 */
export function backoffDelay(
    attempt: number,
    baseDelayMs: number,
    maxDelayMs: number,
    random: () => number = Math.random,
): number {
    const ceiling = Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
    return Math.round(ceiling * random());
}

export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions = {},
): Promise<T> {
    const {
        maxAttempts = 3,
        baseDelayMs = 200,
        maxDelayMs = 5000,
        shouldRetry = () => true,
        onRetry,
        sleep: wait = sleep,
        random = Math.random,
    } = options;

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn(attempt);
        } catch (error) {
            if (attempt >= maxAttempts || !shouldRetry(error)) {
                throw error;
            }
            const delayMs = backoffDelay(attempt, baseDelayMs, maxDelayMs, random);
            onRetry?.(error, attempt, delayMs);
            await wait(delayMs);
        }
    }
}
