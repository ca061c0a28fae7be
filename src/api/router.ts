import express from 'express'
import * as prometheus from 'prom-client'

import { HealthCheckResultError, RetentionServerService } from '../types'
import { FunnelAlignmentError, InvalidIntervalError, QueryGatewayError } from '../utils/errors'
import { logger } from '../utils/logger'
import { captureException } from '../utils/sentry'

prometheus.collectDefaultMetrics()

export function setupCommonRoutes(
    app: express.Application,
    services: Pick<RetentionServerService, 'id' | 'healthcheck'>[]
): express.Application {
    app.get('/_health', buildGetHealth(services))
    app.get('/_ready', buildGetHealth(services))
    app.get('/_metrics', getMetrics)
    app.get('/metrics', getMetrics)

    return app
}

export function setupExpressApp(): express.Application {
    const app = express()
    app.disable('x-powered-by')
    app.use(express.json({ limit: '100kb' }))
    return app
}

const buildGetHealth =
    (services: Pick<RetentionServerService, 'id' | 'healthcheck'>[]) =>
    async (req: express.Request, res: express.Response): Promise<void> => {
        // Health checks must stay cheap: they should not query the index
        const healthChecks = await Promise.all(
            services.map(async (service) => {
                try {
                    return { service, result: await service.healthcheck() }
                } catch (error) {
                    return {
                        service,
                        result: new HealthCheckResultError(
                            error instanceof Error ? error.message : 'Unknown error',
                            {}
                        ),
                    }
                }
            })
        )

        const checkResults = healthChecks.map(({ service, result }) => result.toResponse(service.id))
        const statusCode = healthChecks.every(({ result }) => !result.isError()) ? 200 : 503

        const checkResultsMapping = Object.fromEntries(
            checkResults.map((result) => [
                result.service,
                result.message ? { status: result.status, message: result.message } : result.status,
            ])
        )

        if (statusCode !== 200) {
            logger.error('💔', 'Server liveness check failed', {
                failedServices: checkResults.filter((r) => r.status === 'error'),
            })
        }

        res.status(statusCode).json({ status: statusCode === 200 ? 'ok' : 'error', checks: checkResultsMapping })
    }

const getMetrics = async (req: express.Request, res: express.Response): Promise<void> => {
    try {
        const metrics = await prometheus.register.metrics()
        res.set('Content-Type', prometheus.register.contentType)
        res.send(metrics)
    } catch (err) {
        logger.error('🩺', 'Error while collecting metrics', { err: String(err) })
        res.sendStatus(500)
    }
}

export function statusCodeForError(error: unknown): number {
    if (error instanceof InvalidIntervalError) {
        return 400
    }
    if (error instanceof QueryGatewayError) {
        return 502
    }
    return 500
}

/** Last middleware of the app: the whole request fails, there is no partial result */
export const errorHandler: express.ErrorRequestHandler = (error: unknown, req, res, next) => {
    if (res.headersSent) {
        next(error)
        return
    }

    const statusCode = statusCodeForError(error)
    const message = error instanceof Error ? error.message : 'Unknown error'

    if (statusCode >= 500) {
        logger.error('💥', `${req.method} ${req.path} failed`, {
            error: message,
            name: error instanceof Error ? error.name : undefined,
            details: error instanceof FunnelAlignmentError ? error.details : undefined,
        })
        captureException(error, { tags: { path: req.path } })
    }

    res.status(statusCode).json({ error: message })
}
