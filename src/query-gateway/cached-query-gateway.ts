import { DateTime } from 'luxon'

import { CalendarDay, Clock, DailyHistogramRecord, QueryGateway, UserIdSet } from '../types'
import { TtlCache } from '../utils/ttl-cache'

export type CachedQueryGatewayOptions = {
    ttlMs: number
    maxSize: number
    timezone: string
    clock?: Clock
}

export function currentHourKey(now: DateTime, timezone: string): string {
    return now.setZone(timezone).toFormat("yyyy-MM-dd'T'HH")
}

/**
 * Serves the gateway through a short lived cache. User sets are keyed by day and event name, the
 * histogram additionally by the current hour so the funnel is refreshed at least hourly.
 */
export class CachedQueryGateway implements QueryGateway {
    private readonly userIds: TtlCache<UserIdSet>
    private readonly histograms: TtlCache<DailyHistogramRecord[]>
    private readonly clock: Clock

    constructor(
        private readonly inner: QueryGateway,
        private readonly options: CachedQueryGatewayOptions
    ) {
        this.userIds = new TtlCache({ name: 'user_ids', ttlMs: options.ttlMs, maxSize: options.maxSize })
        this.histograms = new TtlCache({ name: 'daily_histogram', ttlMs: options.ttlMs, maxSize: options.maxSize })
        this.clock = options.clock ?? (() => DateTime.now())
    }

    public termBucketUsers(day: CalendarDay, eventName: string): Promise<UserIdSet> {
        return this.userIds.get(`users:${day}:${eventName}`, () => this.inner.termBucketUsers(day, eventName))
    }

    public dailyHistogram(start: CalendarDay, end: CalendarDay): Promise<DailyHistogramRecord[]> {
        const hour = currentHourKey(this.clock(), this.options.timezone)
        return this.histograms.get(`histogram:${start}:${end}:${hour}`, () => this.inner.dailyHistogram(start, end))
    }

    public clear(): void {
        this.userIds.clear()
        this.histograms.clear()
    }
}
