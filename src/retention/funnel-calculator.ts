import { DateTime } from 'luxon'

import { WINDOW_DAYS } from '../config/constants'
import { Clock, DailyHistogramRecord, FunnelRow, QueryGateway, RetentionSeries } from '../types'
import { FunnelAlignmentError } from '../utils/errors'
import { trailingWindow } from './dates'
import { RetentionCalculator } from './retention-calculator'

export type FunnelCalculatorOptions = {
    timezone: string
    clock?: Clock
}

/**
 * Joins the histogram records with the next day retention counts by position, after checking that
 * both cover the same days in the same order.
 */
export function joinFunnel(records: DailyHistogramRecord[], retention: RetentionSeries): FunnelRow[] {
    if (records.length !== WINDOW_DAYS || retention.points.length !== WINDOW_DAYS) {
        throw new FunnelAlignmentError(
            `Expected ${WINDOW_DAYS} histogram days and ${WINDOW_DAYS} retention points, got ${records.length} and ${retention.points.length}`,
            { histogramDays: records.length, retentionPoints: retention.points.length }
        )
    }

    return records.map((record, index) => {
        const point = retention.points[index]
        if (point.date !== record.date) {
            throw new FunnelAlignmentError(`Funnel day ${record.date} does not line up with retention day ${point.date}`, {
                index,
                histogramDate: record.date,
                retentionDate: point.date,
            })
        }

        return {
            date: record.date,
            allVisitorCount: record.allVisitorCount,
            allRegisteredCount: record.registeredVisitorCount,
            allSignUpCount: record.signUpCount,
            retentionCount: point.retentionCount,
        }
    })
}

export class FunnelCalculator {
    private readonly clock: Clock

    constructor(
        private readonly gateway: QueryGateway,
        private readonly retentionCalculator: RetentionCalculator,
        private readonly options: FunnelCalculatorOptions
    ) {
        this.clock = options.clock ?? (() => DateTime.now())
    }

    /** One row per day of the 14 days ending yesterday, oldest first */
    public async computeFunnel(now: DateTime = this.clock()): Promise<FunnelRow[]> {
        const { start, end } = trailingWindow(now, this.options.timezone)

        // Both halves use the same `now` so they can't straddle a day boundary
        const [records, retention] = await Promise.all([
            this.gateway.dailyHistogram(start, end),
            this.retentionCalculator.computeRetention(1, now),
        ])

        return joinFunnel(records, retention)
    }
}
