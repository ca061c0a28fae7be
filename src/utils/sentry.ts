import * as Sentry from '@sentry/node'

import { RetentionServerConfig } from '../types'

export function initSentry(config: RetentionServerConfig): void {
    if (config.SENTRY_DSN) {
        Sentry.init({
            dsn: config.SENTRY_DSN,
            normalizeDepth: 8, // Default: 3
            initialScope: {
                tags: {
                    ES_INDEX_PATTERN: config.ES_INDEX_PATTERN,
                    TIMEZONE: config.TIMEZONE,
                },
            },
        })
    }
}

type Primitive = number | string | boolean | null | undefined

export function captureException(
    exception: unknown,
    hint?: { tags?: Record<string, Primitive>; extra?: Record<string, unknown> }
): string {
    return Sentry.captureException(exception, hint)
}
