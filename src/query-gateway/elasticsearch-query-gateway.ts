import { Counter } from 'prom-client'
import { z } from 'zod'

import { CalendarDay, DailyHistogramRecord, QueryGateway, RetentionServerConfig, UserIdSet } from '../types'
import { QueryGatewayError } from '../utils/errors'
import { parseJSON } from '../utils/json-parse'
import { logger } from '../utils/logger'
import { instrument } from '../utils/metrics'
import { FetchResponse, internalFetch } from '../utils/request'
import { retryIfRetriable } from '../utils/retries'
import { buildDailyHistogramQuery, buildUserIdsQuery } from './queries'
import { DailyHistogramResponseSchema, ErrorResponseSchema, UserIdsResponseSchema } from './schema'

const queryGatewayRequests = new Counter({
    name: 'query_gateway_requests_total',
    help: 'Search requests sent to the index, by operation and outcome',
    labelNames: ['operation', 'outcome'],
})

const userIdBucketTruncations = new Counter({
    name: 'user_id_bucket_truncations_total',
    help: 'Number of user id lookups that hit the terms bucket limit and were truncated',
    labelNames: ['event_name'],
})

export type ElasticsearchQueryGatewayConfig = Pick<
    RetentionServerConfig,
    | 'ES_URL'
    | 'ES_API_KEY'
    | 'ES_INDEX_PATTERN'
    | 'ES_REQUEST_TIMEOUT_MS'
    | 'ES_REQUEST_RETRIES'
    | 'TIMEZONE'
    | 'SIGNUP_EVENT_NAME'
    | 'USER_ID_BUCKET_LIMIT'
>

type SearchOperation = 'term_bucket_users' | 'daily_histogram'

export class ElasticsearchQueryGateway implements QueryGateway {
    private readonly searchUrl: string

    constructor(private readonly config: ElasticsearchQueryGatewayConfig) {
        const baseUrl = config.ES_URL.replace(/\/+$/, '')
        this.searchUrl = `${baseUrl}/${encodeURIComponent(config.ES_INDEX_PATTERN)}/_search`
    }

    public async termBucketUsers(day: CalendarDay, eventName: string): Promise<UserIdSet> {
        const limit = this.config.USER_ID_BUCKET_LIMIT
        const body = buildUserIdsQuery({ day, eventName, timezone: this.config.TIMEZONE, bucketLimit: limit })
        const response = await this.search('term_bucket_users', body, UserIdsResponseSchema)

        const { buckets, sum_other_doc_count } = response.aggregations.unique_userIds
        if (buckets.length >= limit || (sum_other_doc_count ?? 0) > 0) {
            // Known approximation: we keep going with the first `limit` ids
            userIdBucketTruncations.labels({ event_name: eventName }).inc()
            logger.warn('✂️', 'User id buckets truncated', {
                day,
                eventName,
                limit,
                sumOtherDocCount: sum_other_doc_count,
            })
        }

        return new Set(buckets.map((bucket) => bucket.key))
    }

    public async dailyHistogram(start: CalendarDay, end: CalendarDay): Promise<DailyHistogramRecord[]> {
        const body = buildDailyHistogramQuery({
            start,
            end,
            signUpEventName: this.config.SIGNUP_EVENT_NAME,
            timezone: this.config.TIMEZONE,
        })
        const response = await this.search('daily_histogram', body, DailyHistogramResponseSchema)

        return response.aggregations.by_day.buckets.map((bucket) => ({
            date: bucket.key_as_string,
            allVisitorCount: bucket.userId_all.unique_visitorId.value,
            registeredVisitorCount: bucket.userId_not_0.unique_visitorId.value,
            signUpCount: bucket.new_sign_up.unique_visitorId.value,
        }))
    }

    private async search<T>(operation: SearchOperation, body: object, schema: z.ZodType<T>): Promise<T> {
        return await instrument({ metricName: 'queryGateway.search', key: 'operation', tag: operation }, () =>
            retryIfRetriable(
                () => this.searchOnce(operation, body, schema),
                `search ${operation}`,
                this.config.ES_REQUEST_RETRIES + 1
            )
        )
    }

    private async searchOnce<T>(operation: SearchOperation, body: object, schema: z.ZodType<T>): Promise<T> {
        const headers: Record<string, string> = { 'Content-Type': 'application/json' }
        if (this.config.ES_API_KEY) {
            headers['Authorization'] = `ApiKey ${this.config.ES_API_KEY}`
        }

        let response: FetchResponse
        try {
            response = await internalFetch(this.searchUrl, {
                method: 'POST',
                headers,
                body: JSON.stringify(body),
                timeoutMs: this.config.ES_REQUEST_TIMEOUT_MS,
            })
        } catch (error) {
            queryGatewayRequests.labels({ operation, outcome: 'transport_error' }).inc()
            throw new QueryGatewayError(
                `Search request for ${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
                undefined,
                true
            )
        }

        if (response.status < 200 || response.status >= 300) {
            queryGatewayRequests.labels({ operation, outcome: 'http_error' }).inc()
            const reason = describeErrorBody(await response.text())
            throw new QueryGatewayError(
                `Search request for ${operation} returned status ${response.status}${reason ? `: ${reason}` : ''}`,
                response.status,
                response.status >= 500 || response.status === 429
            )
        }

        let json: unknown
        try {
            json = parseJSON(await response.text())
        } catch {
            queryGatewayRequests.labels({ operation, outcome: 'malformed' }).inc()
            throw new QueryGatewayError(`Search response for ${operation} is not valid JSON`, response.status)
        }

        const parsed = schema.safeParse(json)
        if (!parsed.success) {
            queryGatewayRequests.labels({ operation, outcome: 'malformed' }).inc()
            const issue = parsed.error.issues[0]
            throw new QueryGatewayError(
                `Unexpected search response for ${operation} at ${issue?.path.join('.') ?? '?'}: ${issue?.message}`,
                response.status
            )
        }

        queryGatewayRequests.labels({ operation, outcome: 'ok' }).inc()
        return parsed.data
    }
}

function describeErrorBody(text: string): string | undefined {
    let json: unknown
    try {
        json = parseJSON(text)
    } catch {
        return text.slice(0, 200) || undefined
    }
    const parsed = ErrorResponseSchema.safeParse(json)
    if (!parsed.success) {
        return undefined
    }
    const { error } = parsed.data
    return typeof error === 'string' ? error : [error.type, error.reason].filter(Boolean).join(': ') || undefined
}
