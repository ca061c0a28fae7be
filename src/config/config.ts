import { IANAZone } from 'luxon'
import { z } from 'zod'

import { LogLevel, RetentionServerConfig } from '../types'
import { isDevEnv, isTestEnv } from '../utils/env-utils'
import { ConfigError } from '../utils/errors'
import { ONE_HOUR } from './constants'

export const DEFAULT_HTTP_SERVER_PORT = 6740

const RetentionServerConfigSchema = z.object({
    HTTP_SERVER_PORT: z.number().int().nonnegative(),
    LOG_LEVEL: z.nativeEnum(LogLevel),
    ES_URL: z.string(),
    ES_API_KEY: z.string(),
    ES_INDEX_PATTERN: z.string().min(1),
    ES_REQUEST_TIMEOUT_MS: z.number().nonnegative(),
    ES_REQUEST_RETRIES: z.number().int().positive(),
    TIMEZONE: z.string(),
    SIGNUP_EVENT_NAME: z.string().min(1),
    ACTIVE_EVENT_NAME: z.string().min(1),
    USER_ID_BUCKET_LIMIT: z.number().int().positive(),
    QUERY_CACHE_TTL_MS: z.number().nonnegative(),
    QUERY_CACHE_MAX_SIZE: z.number().int().positive(),
    SENTRY_DSN: z.string(),
})

export const defaultConfig = overrideWithEnv(getDefaultConfig())

export function getDefaultConfig(): RetentionServerConfig {
    return {
        HTTP_SERVER_PORT: DEFAULT_HTTP_SERVER_PORT,
        LOG_LEVEL: isTestEnv() ? LogLevel.Warn : isDevEnv() ? LogLevel.Debug : LogLevel.Info,
        ES_URL: isTestEnv() || isDevEnv() ? 'http://localhost:9200' : '',
        ES_API_KEY: '',
        ES_INDEX_PATTERN: 'monitor-prod-20*',
        ES_REQUEST_TIMEOUT_MS: 10_000,
        ES_REQUEST_RETRIES: 3,
        TIMEZONE: 'Asia/Shanghai',
        SIGNUP_EVENT_NAME: 'backend-sign_up',
        ACTIVE_EVENT_NAME: 'root', // the page load every logged in client sends
        USER_ID_BUCKET_LIMIT: 10_000,
        QUERY_CACHE_TTL_MS: ONE_HOUR,
        QUERY_CACHE_MAX_SIZE: 1000,
        SENTRY_DSN: '',
    }
}

export function overrideWithEnv(
    config: RetentionServerConfig,
    env: Record<string, string | undefined> = process.env
): RetentionServerConfig {
    const defaults: Record<string, unknown> = { ...getDefaultConfig() }
    const tmpConfig: Record<string, unknown> = { ...config }

    for (const key of Object.keys(config)) {
        const value = env[key]
        if (typeof value === 'undefined') {
            continue
        }
        tmpConfig[key] = typeof defaults[key] === 'number' ? Number(value) : value
    }

    const parsed = RetentionServerConfigSchema.safeParse(tmpConfig)
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        throw new ConfigError(`Invalid config. ${issues.join('; ')}`)
    }
    const newConfig: RetentionServerConfig = parsed.data

    if (!newConfig.ES_URL) {
        throw new ConfigError('You must specify ES_URL, the base URL of the Elasticsearch cluster holding the event log!')
    }

    if (!IANAZone.isValidZone(newConfig.TIMEZONE)) {
        throw new ConfigError(`Invalid TIMEZONE ${newConfig.TIMEZONE}. Expected an IANA zone such as Asia/Shanghai`)
    }

    return newConfig
}
