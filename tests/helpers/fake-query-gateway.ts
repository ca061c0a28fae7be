import { CalendarDay, DailyHistogramRecord, QueryGateway, UserId, UserIdSet } from '../../src/types'

/**
 * In memory stand in for the index. Days that were never seeded have no events, like days outside of
 * the index retention.
 */
export class FakeQueryGateway implements QueryGateway {
    public readonly userIdCalls: { day: CalendarDay; eventName: string }[] = []
    public readonly histogramCalls: { start: CalendarDay; end: CalendarDay }[] = []

    private users = new Map<string, UserId[]>()
    private histogram: DailyHistogramRecord[] = []

    public addUsers(day: CalendarDay, eventName: string, userIds: UserId[]): this {
        const key = `${day}:${eventName}`
        this.users.set(key, [...(this.users.get(key) ?? []), ...userIds])
        return this
    }

    public setHistogram(records: DailyHistogramRecord[]): this {
        this.histogram = records
        return this
    }

    public termBucketUsers(day: CalendarDay, eventName: string): Promise<UserIdSet> {
        this.userIdCalls.push({ day, eventName })
        return Promise.resolve(new Set(this.users.get(`${day}:${eventName}`) ?? []))
    }

    public dailyHistogram(start: CalendarDay, end: CalendarDay): Promise<DailyHistogramRecord[]> {
        this.histogramCalls.push({ start, end })
        return Promise.resolve(this.histogram.filter((record) => record.date >= start && record.date <= end))
    }
}

export function histogramRecord(date: CalendarDay, allVisitorCount: number): DailyHistogramRecord {
    return {
        date,
        allVisitorCount,
        registeredVisitorCount: Math.floor(allVisitorCount / 2),
        signUpCount: Math.floor(allVisitorCount / 10),
    }
}
