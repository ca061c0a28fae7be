import pino from 'pino'

import { defaultConfig } from '../config/config'
import { LogLevel } from '../types'
import { isDevEnv } from './env-utils'

export class Logger {
    private pino: pino.Logger
    private prefix: string
    private transport?: ReturnType<typeof pino.transport>
    private isShutdown: boolean = false

    constructor(name: string) {
        this.prefix = `[${name.toUpperCase()}]`
        const logLevel: LogLevel = defaultConfig.LOG_LEVEL
        if (isDevEnv()) {
            // NOTE: we keep a reference to the transport such that we can end it on shutdown,
            // otherwise the worker thread keeps the process alive.
            this.transport = pino.transport({
                target: 'pino-pretty',
                options: {
                    sync: true,
                    level: logLevel,
                },
            })
            this.pino = pino({ level: logLevel }, this.transport)
        } else {
            // Output the level name rather than the number so logs can be queried by `error` etc.
            this.pino = pino({
                formatters: {
                    level: (label) => {
                        return { level: label }
                    },
                },
                level: logLevel,
            })
        }
    }

    private _log(level: LogLevel, ...args: unknown[]): void {
        if (this.isShutdown) {
            return
        }

        // A trailing plain object is spread into the log line as fields
        const lastArg = args[args.length - 1]
        const extra = isLogFields(lastArg) ? lastArg : undefined
        if (extra) {
            args.pop()
        }

        const msg = `${this.prefix} ${args.map(String).join(' ')}`
        this.pino[level]({ ...extra, msg })
    }

    debug(...args: unknown[]): void {
        this._log(LogLevel.Debug, ...args)
    }

    info(...args: unknown[]): void {
        this._log(LogLevel.Info, ...args)
    }

    warn(...args: unknown[]): void {
        this._log(LogLevel.Warn, ...args)
    }

    error(...args: unknown[]): void {
        this._log(LogLevel.Error, ...args)
    }

    async shutdown(): Promise<void> {
        this.isShutdown = true
        if (this.transport) {
            const transport = this.transport
            await new Promise<void>((resolve) => {
                transport.once('close', () => resolve())
                transport.end()
            })
        }
    }
}

function isLogFields(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !(value instanceof Error) && !Array.isArray(value)
}

export const logger = new Logger('retention')

export async function shutdownLogger(): Promise<void> {
    await logger.shutdown()
}
