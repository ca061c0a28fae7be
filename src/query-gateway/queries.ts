import { EVENT_NAME_FIELD, TIMESTAMP_FIELD, USER_ID_FIELD, VISITOR_ID_FIELD } from '../config/constants'
import { parseCalendarDay, shiftDays, toCalendarDay } from '../retention/dates'
import { CalendarDay } from '../types'

export type UserIdsQueryParams = {
    day: CalendarDay
    eventName: string
    timezone: string
    bucketLimit: number
}

export type DailyHistogramQueryParams = {
    start: CalendarDay
    end: CalendarDay
    signUpEventName: string
    timezone: string
}

function nextCalendarDay(day: CalendarDay, timezone: string): CalendarDay {
    return toCalendarDay(shiftDays(parseCalendarDay(day, timezone), 1))
}

/**
 * Distinct user ids that sent `eventName` on `day`. The upper bound is `23:59:59` exclusive, so
 * events in the last second of the day are not counted. `time_zone` is the IANA name so the index
 * applies daylight saving per day.
 */
export function buildUserIdsQuery({ day, eventName, timezone, bucketLimit }: UserIdsQueryParams) {
    return {
        size: 0,
        query: {
            bool: {
                must: [
                    {
                        range: {
                            [TIMESTAMP_FIELD]: {
                                gte: `${day}T00:00:00`,
                                lt: `${day}T23:59:59`,
                                time_zone: timezone,
                            },
                        },
                    },
                    { term: { [EVENT_NAME_FIELD]: eventName } },
                ],
            },
        },
        aggs: {
            unique_userIds: {
                terms: {
                    field: USER_ID_FIELD,
                    size: bucketLimit,
                },
            },
        },
    }
}

const visitorCardinality = {
    unique_visitorId: {
        cardinality: { field: VISITOR_ID_FIELD },
    },
}

export function buildDailyHistogramQuery({ start, end, signUpEventName, timezone }: DailyHistogramQueryParams) {
    return {
        size: 0,
        query: {
            bool: {
                must: [
                    {
                        range: {
                            [TIMESTAMP_FIELD]: {
                                gte: `${start}T00:00:00`,
                                lt: `${nextCalendarDay(end, timezone)}T00:00:00`,
                                time_zone: timezone,
                            },
                        },
                    },
                ],
            },
        },
        aggs: {
            by_day: {
                date_histogram: {
                    field: TIMESTAMP_FIELD,
                    calendar_interval: 'day',
                    time_zone: timezone,
                    format: 'yyyy-MM-dd',
                    // Empty days still get a bucket so the funnel always has one row per day
                    min_doc_count: 0,
                    extended_bounds: { min: start, max: end },
                },
                aggs: {
                    // Every visitor, anonymous ones carry userId 0
                    userId_all: {
                        filter: { range: { [USER_ID_FIELD]: { gte: 0 } } },
                        aggs: visitorCardinality,
                    },
                    userId_not_0: {
                        filter: { range: { [USER_ID_FIELD]: { gt: 0 } } },
                        aggs: visitorCardinality,
                    },
                    new_sign_up: {
                        filter: { term: { [EVENT_NAME_FIELD]: signUpEventName } },
                        aggs: {
                            unique_visitorId: {
                                cardinality: { field: USER_ID_FIELD },
                            },
                        },
                    },
                },
            },
        },
    }
}
