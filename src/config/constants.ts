export const ONE_MINUTE = 60 * 1000
export const ONE_HOUR = 60 * ONE_MINUTE

/** Number of cohort days in a retention series and of rows in the funnel */
export const WINDOW_DAYS = 14

export const DAY_FORMAT = 'yyyy-MM-dd'

export const TIMESTAMP_FIELD = '@timestamp'
export const EVENT_NAME_FIELD = 'message.name.keyword'
export const USER_ID_FIELD = 'message.userId'
export const VISITOR_ID_FIELD = 'message.visitorId.keyword'

export type IntervalPreset = {
    label: string
    intervalDays: number
}

export const INTERVAL_PRESETS: readonly IntervalPreset[] = [
    { label: '1日留存', intervalDays: 1 },
    { label: '3日留存', intervalDays: 3 },
    { label: '7日留存', intervalDays: 7 },
    { label: '15日留存', intervalDays: 15 },
    { label: '30日留存', intervalDays: 30 },
]
