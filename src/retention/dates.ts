import { DateTime } from 'luxon'

import { DAY_FORMAT, WINDOW_DAYS } from '../config/constants'
import { CalendarDay } from '../types'

/** Truncates the instant to the start of its calendar day in `timezone` */
export function startOfDayInZone(now: DateTime, timezone: string): DateTime {
    return now.setZone(timezone).startOf('day')
}

export function toCalendarDay(dateTime: DateTime): CalendarDay {
    return dateTime.toFormat(DAY_FORMAT)
}

export function parseCalendarDay(day: CalendarDay, timezone: string): DateTime {
    const parsed = DateTime.fromFormat(day, DAY_FORMAT, { zone: timezone })
    if (!parsed.isValid) {
        throw new Error(`Invalid calendar day ${day}, expected ${DAY_FORMAT}`)
    }
    return parsed
}

export function shiftDays(day: DateTime, days: number): DateTime {
    return day.plus({ days })
}

/** The 14 calendar days ending yesterday, oldest first */
export function trailingWindow(now: DateTime, timezone: string): { start: CalendarDay; end: CalendarDay } {
    const today = startOfDayInZone(now, timezone)
    const end = shiftDays(today, -1)
    const start = shiftDays(end, -(WINDOW_DAYS - 1))
    return { start: toCalendarDay(start), end: toCalendarDay(end) }
}
