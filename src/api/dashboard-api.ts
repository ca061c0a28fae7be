import express from 'express'
import { DateTime } from 'luxon'

import { buildDashboard, parseIntervalOption } from '../charts/charts'
import { INTERVAL_PRESETS } from '../config/constants'
import { FunnelCalculator } from '../retention/funnel-calculator'
import { RetentionCalculator } from '../retention/retention-calculator'
import { Clock, HealthCheckResult, HealthCheckResultOk } from '../types'

/** `?interval_days=7` takes precedence over `?interval=7日留存` */
export function intervalFromQuery(query: express.Request['query']): number {
    return parseIntervalOption(query.interval_days ?? query.interval)
}

export class DashboardApi {
    constructor(
        private readonly retentionCalculator: RetentionCalculator,
        private readonly funnelCalculator: FunnelCalculator,
        private readonly clock: Clock = () => DateTime.now()
    ) {}

    isHealthy(): HealthCheckResult {
        // NOTE: Nothing stateful to check, the index is only reached per request
        return new HealthCheckResultOk()
    }

    router(): express.Router {
        const router = express.Router()

        const asyncHandler =
            (fn: (req: express.Request, res: express.Response) => Promise<void>) =>
            (req: express.Request, res: express.Response, next: express.NextFunction): Promise<void> =>
                fn(req, res).catch(next)

        router.get('/api/funnel', asyncHandler(this.getFunnel))
        router.get('/api/retention/presets', this.getPresets)
        router.get('/api/retention', asyncHandler(this.getRetention))
        router.get('/api/dashboard', asyncHandler(this.getDashboard))

        return router
    }

    private getPresets = (req: express.Request, res: express.Response): void => {
        res.json({ results: INTERVAL_PRESETS })
    }

    private getFunnel = async (req: express.Request, res: express.Response): Promise<void> => {
        const results = await this.funnelCalculator.computeFunnel()
        res.json({ results })
    }

    private getRetention = async (req: express.Request, res: express.Response): Promise<void> => {
        const intervalDays = intervalFromQuery(req.query)
        const series = await this.retentionCalculator.computeRetention(intervalDays)
        res.json(series)
    }

    private getDashboard = async (req: express.Request, res: express.Response): Promise<void> => {
        const intervalDays = intervalFromQuery(req.query)
        const now = this.clock()
        const [funnel, retention] = await Promise.all([
            this.funnelCalculator.computeFunnel(now),
            this.retentionCalculator.computeRetention(intervalDays, now),
        ])
        res.json(buildDashboard(funnel, retention))
    }
}
