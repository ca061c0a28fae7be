import { INTERVAL_PRESETS, IntervalPreset } from '../config/constants'
import { CalendarDay, FunnelRow, RetentionSeries } from '../types'
import { InvalidIntervalError } from '../utils/errors'

export const DASHBOARD_TITLE = '用户留存分析'
export const FUNNEL_HEADING = '新注留存漏斗：'
export const INTERVAL_SELECTOR_LABEL = '选择留存计算的天数间隔:'

/** Offset of a point's value label above the point, in data units */
export const POINT_LABEL_OFFSET = 5

export type ChartPoint = {
    x: CalendarDay
    y: number
}

export type PointLabel = ChartPoint & {
    text: string
    align: 'center'
}

export type DropLine = {
    x: CalendarDay
    from: number
    to: number
    color: string
    dash: 'dashed'
    width: number
}

export type LineSeries = {
    name: string
    color: string
    lineWidth: number
    points: ChartPoint[]
    markers?: { color: string; size: number }
    labels?: PointLabel[]
}

export type ChartModel = {
    title?: string
    xLabel: string
    yLabel: string
    xTickRotation: number
    series: LineSeries[]
    dropLines: DropLine[]
}

export type IntervalOption = IntervalPreset & { selected: boolean }

export type DashboardModel = {
    title: string
    funnelHeading: string
    funnelChart: ChartModel
    intervalSelector: {
        label: string
        options: IntervalOption[]
    }
    selectedIntervalDays: number
    retentionChart: ChartModel
}

type FunnelCountKey = Exclude<keyof FunnelRow, 'date'>

const FUNNEL_SERIES: { name: string; key: FunnelCountKey; color: string }[] = [
    { name: 'all_visitor_count', key: 'allVisitorCount', color: 'blue' },
    { name: 'all_registered_count', key: 'allRegisteredCount', color: 'orange' },
    { name: 'all_sign_up_count', key: 'allSignUpCount', color: 'green' },
    { name: 'retention_count', key: 'retentionCount', color: 'red' },
]

export function buildFunnelChart(rows: FunnelRow[]): ChartModel {
    return {
        title: 'User Metrics Over Time',
        xLabel: 'Date',
        yLabel: 'Count',
        xTickRotation: 45,
        series: FUNNEL_SERIES.map(({ name, key, color }) => ({
            name,
            color,
            lineWidth: 1,
            points: rows.map((row) => ({ x: row.date, y: row[key] })),
            markers: { color, size: 50 },
            labels: rows.map(
                (row): PointLabel => ({
                    x: row.date,
                    y: row[key] + POINT_LABEL_OFFSET,
                    text: String(row[key]),
                    align: 'center',
                })
            ),
        })),
        dropLines: [],
    }
}

export function buildRetentionChart(series: RetentionSeries): ChartModel {
    return {
        xLabel: 'Date',
        yLabel: 'Retention Rate',
        xTickRotation: 45,
        series: [
            {
                name: 'Retention Rate',
                color: 'blue',
                lineWidth: 1,
                points: series.points.map((point) => ({ x: point.date, y: point.retentionRate })),
                markers: { color: 'red', size: 50 },
            },
        ],
        dropLines: series.points.map(
            (point): DropLine => ({
                x: point.date,
                from: 0,
                to: point.retentionRate,
                color: 'gray',
                dash: 'dashed',
                width: 0.8,
            })
        ),
    }
}

/**
 * Accepts a preset label (`7日留存`) or a plain positive number of days. Missing values select the
 * first preset.
 */
export function parseIntervalOption(value: unknown): number {
    if (value === undefined || value === '') {
        return INTERVAL_PRESETS[0].intervalDays
    }
    if (typeof value !== 'string') {
        throw new InvalidIntervalError(value)
    }

    const preset = INTERVAL_PRESETS.find((option) => option.label === value)
    if (preset) {
        return preset.intervalDays
    }

    if (!/^\d+$/.test(value.trim())) {
        throw new InvalidIntervalError(value)
    }
    const intervalDays = parseInt(value, 10)
    if (intervalDays <= 0) {
        throw new InvalidIntervalError(value)
    }
    return intervalDays
}

export function buildDashboard(funnel: FunnelRow[], retention: RetentionSeries): DashboardModel {
    return {
        title: DASHBOARD_TITLE,
        funnelHeading: FUNNEL_HEADING,
        funnelChart: buildFunnelChart(funnel),
        intervalSelector: {
            label: INTERVAL_SELECTOR_LABEL,
            options: INTERVAL_PRESETS.map((preset) => ({
                ...preset,
                selected: preset.intervalDays === retention.intervalDays,
            })),
        },
        selectedIntervalDays: retention.intervalDays,
        retentionChart: buildRetentionChart(retention),
    }
}
