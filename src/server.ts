import express from 'express'
import { Server } from 'http'

import { DashboardApi } from './api/dashboard-api'
import { errorHandler, setupCommonRoutes, setupExpressApp } from './api/router'
import { defaultConfig } from './config/config'
import { CachedQueryGateway } from './query-gateway/cached-query-gateway'
import { ElasticsearchQueryGateway } from './query-gateway/elasticsearch-query-gateway'
import { FunnelCalculator } from './retention/funnel-calculator'
import { RetentionCalculator } from './retention/retention-calculator'
import { Clock, QueryGateway, RetentionServerConfig, RetentionServerService } from './types'
import { logger, shutdownLogger } from './utils/logger'
import { initSentry } from './utils/sentry'

export type RetentionServerOptions = {
    /** Replaces the Elasticsearch gateway, the cache is still put in front of it */
    gateway?: QueryGateway
    clock?: Clock
    disableHttpServer?: boolean
}

export class RetentionServer {
    config: RetentionServerConfig
    services: RetentionServerService[] = []
    httpServer?: Server
    stopping = false
    expressApp: express.Application

    readonly gateway: CachedQueryGateway
    readonly retentionCalculator: RetentionCalculator
    readonly funnelCalculator: FunnelCalculator
    readonly dashboardApi: DashboardApi

    constructor(
        config: Partial<RetentionServerConfig> = {},
        private options: RetentionServerOptions = {}
    ) {
        this.config = {
            ...defaultConfig,
            ...config,
        }

        const { clock } = options
        this.gateway = new CachedQueryGateway(options.gateway ?? new ElasticsearchQueryGateway(this.config), {
            ttlMs: this.config.QUERY_CACHE_TTL_MS,
            maxSize: this.config.QUERY_CACHE_MAX_SIZE,
            timezone: this.config.TIMEZONE,
            clock,
        })
        this.retentionCalculator = new RetentionCalculator(this.gateway, {
            timezone: this.config.TIMEZONE,
            signUpEventName: this.config.SIGNUP_EVENT_NAME,
            activeEventName: this.config.ACTIVE_EVENT_NAME,
            clock,
        })
        this.funnelCalculator = new FunnelCalculator(this.gateway, this.retentionCalculator, {
            timezone: this.config.TIMEZONE,
            clock,
        })
        this.dashboardApi = new DashboardApi(this.retentionCalculator, this.funnelCalculator, clock)

        this.expressApp = setupExpressApp()
    }

    async start(): Promise<void> {
        initSentry(this.config)

        this.services = [
            {
                id: 'dashboard-api',
                onShutdown: async () => {
                    this.gateway.clear()
                },
                healthcheck: () => this.dashboardApi.isHealthy(),
            },
        ]

        setupCommonRoutes(this.expressApp, this.services)
        this.expressApp.use('/', this.dashboardApi.router())
        this.expressApp.use(errorHandler)

        if (this.options.disableHttpServer) {
            return
        }

        this.setupListeners()
        await new Promise<void>((resolve) => {
            this.httpServer = this.expressApp.listen(this.config.HTTP_SERVER_PORT, () => {
                logger.info('🩺', `Retention server listening on port ${this.config.HTTP_SERVER_PORT}`)
                resolve()
            })
        })
    }

    private setupListeners(): void {
        for (const signal of ['SIGINT', 'SIGTERM', 'SIGHUP'] as const) {
            process.on(signal, () => {
                logger.info('👋', `process handling ${signal}...`)
                void this.stop()
            })
        }

        process.on('unhandledRejection', (error: unknown) => {
            logger.error('🤮', 'Unhandled Promise Rejection', { error: String(error) })
        })
    }

    async stop(error?: Error): Promise<void> {
        if (error) {
            logger.error('🤮', 'Shutting down due to error', { error: error.stack })
        }
        if (this.stopping) {
            logger.info('🚨', 'Stop called but already stopping...')
            return
        }

        this.stopping = true
        logger.info('💤', ' Shutting down gracefully...')

        const httpServer = this.httpServer
        if (httpServer) {
            await new Promise<void>((resolve, reject) => httpServer.close((err) => (err ? reject(err) : resolve())))
        }

        await Promise.allSettled(this.services.map((service) => service.onShutdown()))

        logger.info('💤', ' Shut down gracefully!')
        await shutdownLogger()

        if (!this.options.disableHttpServer) {
            process.exit(error ? 1 : 0)
        }
    }
}
