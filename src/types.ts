import { DateTime } from 'luxon'

export enum LogLevel {
    Debug = 'debug',
    Info = 'info',
    Warn = 'warn',
    Error = 'error',
}

export interface RetentionServerConfig {
    HTTP_SERVER_PORT: number
    LOG_LEVEL: LogLevel
    ES_URL: string
    ES_API_KEY: string
    ES_INDEX_PATTERN: string
    ES_REQUEST_TIMEOUT_MS: number
    ES_REQUEST_RETRIES: number
    TIMEZONE: string
    SIGNUP_EVENT_NAME: string
    ACTIVE_EVENT_NAME: string
    USER_ID_BUCKET_LIMIT: number
    QUERY_CACHE_TTL_MS: number
    QUERY_CACHE_MAX_SIZE: number
    SENTRY_DSN: string
}

/** A `yyyy-MM-dd` day in the configured timezone */
export type CalendarDay = string

/** Raw bucket key as returned by the index. `1` and `'1'` are different users. */
export type UserId = string | number

export type UserIdSet = ReadonlySet<UserId>

export interface CohortPoint {
    /** Acquisition day of the cohort */
    date: CalendarDay
    cohortSize: number
    retentionCount: number
    retentionRate: number
}

export interface RetentionSeries {
    intervalDays: number
    points: CohortPoint[]
}

/** Cardinality estimates for one day, passed through as the index returns them */
export interface DailyHistogramRecord {
    date: CalendarDay
    allVisitorCount: number
    registeredVisitorCount: number
    signUpCount: number
}

export interface FunnelRow {
    date: CalendarDay
    allVisitorCount: number
    allRegisteredCount: number
    allSignUpCount: number
    retentionCount: number
}

export interface QueryGateway {
    termBucketUsers(day: CalendarDay, eventName: string): Promise<UserIdSet>
    dailyHistogram(start: CalendarDay, end: CalendarDay): Promise<DailyHistogramRecord[]>
}

/** Source of the reference instant; injectable so tests can pin "today" */
export type Clock = () => DateTime

export type HealthCheckResultResponse = {
    service: string
    status: 'ok' | 'error'
    message?: string
    details?: Record<string, unknown>
}

export abstract class HealthCheckResult {
    public status: 'ok' | 'error'

    constructor(status: 'ok' | 'error') {
        this.status = status
    }

    public abstract toResponse(serviceId: string): HealthCheckResultResponse

    public isError(): boolean {
        return this.status === 'error'
    }
}

export class HealthCheckResultOk extends HealthCheckResult {
    constructor() {
        super('ok')
    }

    public toResponse(serviceId: string): HealthCheckResultResponse {
        return { service: serviceId, status: this.status }
    }
}

export class HealthCheckResultError extends HealthCheckResult {
    constructor(
        public message: string,
        public details: Record<string, unknown>
    ) {
        super('error')
    }

    public toResponse(serviceId: string): HealthCheckResultResponse {
        return { service: serviceId, status: this.status, message: this.message, details: this.details }
    }
}

export type RetentionServerService = {
    id: string
    onShutdown: () => Promise<void>
    healthcheck: () => HealthCheckResult | Promise<HealthCheckResult>
}
