import { logger } from './logger'
import { sleep } from './utils'

// Simple retries in our code
export const defaultRetryConfig = {
    // for easy value changes in tests
    RETRY_INTERVAL_DEFAULT: 100, // Start with 100ms
    MAX_RETRIES_DEFAULT: 3,
    BACKOFF_FACTOR: 2, // Exponential backoff multiplier
    MAX_INTERVAL: 10000, // Cap at 10s
}

function isRetriable(error: unknown): boolean {
    if (typeof error !== 'object' || error === null || !('isRetriable' in error)) {
        // Unknown errors (socket resets, timeouts) are worth another try
        return true
    }
    return error.isRetriable !== false
}

/**
 * Retry a function, respecting `error.isRetriable`.
 */
export async function retryIfRetriable<T>(
    fn: () => Promise<T>,
    name: string,
    tries = defaultRetryConfig.MAX_RETRIES_DEFAULT,
    sleepMs = defaultRetryConfig.RETRY_INTERVAL_DEFAULT
): Promise<T> {
    let currentSleepMs = sleepMs
    for (let i = 0; i < tries; i++) {
        try {
            return await fn()
        } catch (error) {
            if (!isRetriable(error) || i === tries - 1) {
                // Throw if the error is not retryable or if we're out of tries.
                logger.debug('🚫', `failed ${name}, giving up after ${i + 1} attempt(s)`, { error: String(error) })
                throw error
            }

            logger.debug('🔁', `failed ${name}, retrying`, { error: String(error) })
            await sleep(currentSleepMs)
            currentSleepMs = Math.min(
                currentSleepMs * defaultRetryConfig.BACKOFF_FACTOR,
                defaultRetryConfig.MAX_INTERVAL
            )
        }
    }

    // This should never happen, but TypeScript doesn't know that.
    throw new Error('Unreachable error in retry')
}
