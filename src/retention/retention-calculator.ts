import { DateTime } from 'luxon'

import { WINDOW_DAYS } from '../config/constants'
import { CalendarDay, Clock, CohortPoint, QueryGateway, RetentionSeries, UserIdSet } from '../types'
import { InvalidIntervalError } from '../utils/errors'
import { logger } from '../utils/logger'
import { shiftDays, startOfDayInZone, toCalendarDay } from './dates'

export type RetentionCalculatorOptions = {
    timezone: string
    /** Event that puts a user into the cohort of the day it happened */
    signUpEventName: string
    /** Event that counts a user as returning */
    activeEventName: string
    clock?: Clock
}

export function assertValidInterval(intervalDays: number): void {
    if (!Number.isInteger(intervalDays) || intervalDays <= 0) {
        throw new InvalidIntervalError(intervalDays)
    }
}

export function countIntersection(a: UserIdSet, b: UserIdSet): number {
    const [smaller, larger] = a.size <= b.size ? [a, b] : [b, a]
    let count = 0
    for (const userId of smaller) {
        if (larger.has(userId)) {
            count++
        }
    }
    return count
}

export function toCohortPoint(date: CalendarDay, cohort: UserIdSet, returning: UserIdSet): CohortPoint {
    const retentionCount = countIntersection(cohort, returning)
    return {
        date,
        cohortSize: cohort.size,
        retentionCount,
        // An empty cohort has zero retention
        retentionRate: cohort.size > 0 ? retentionCount / cohort.size : 0,
    }
}

export class RetentionCalculator {
    private readonly clock: Clock

    constructor(
        private readonly gateway: QueryGateway,
        private readonly options: RetentionCalculatorOptions
    ) {
        this.clock = options.clock ?? (() => DateTime.now())
    }

    /**
     * For each of the last 14 acquisition days that already have `intervalDays` of follow up, the share of
     * that day's sign ups that were active exactly `intervalDays` later. Points are returned oldest first.
     */
    public async computeRetention(intervalDays: number, now: DateTime = this.clock()): Promise<RetentionSeries> {
        assertValidInterval(intervalDays)

        const today = startOfDayInZone(now, this.options.timezone)
        const offsets = Array.from({ length: WINDOW_DAYS }, (_, index) => WINDOW_DAYS - index)

        // Each (cohort, returning) pair is independent of the others so they are fetched in parallel
        const points = await Promise.all(
            offsets.map(async (offset) => {
                const day = shiftDays(today, -(offset + intervalDays - 1))
                const nextDay = shiftDays(day, intervalDays)
                const [cohort, returning] = await Promise.all([
                    this.gateway.termBucketUsers(toCalendarDay(day), this.options.signUpEventName),
                    this.gateway.termBucketUsers(toCalendarDay(nextDay), this.options.activeEventName),
                ])
                return toCohortPoint(toCalendarDay(day), cohort, returning)
            })
        )

        logger.debug('📈', `Computed ${intervalDays} day retention`, {
            from: points[0]?.date,
            to: points[points.length - 1]?.date,
        })

        return { intervalDays, points }
    }
}
