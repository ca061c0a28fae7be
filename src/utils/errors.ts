export class ConfigError extends Error {
    constructor(message: string) {
        super(message)
        this.name = 'ConfigError'
    }
}

export class InvalidIntervalError extends Error {
    constructor(public readonly value: unknown) {
        super(`Retention interval must be a positive integer number of days, got ${String(value)}`)
        this.name = 'InvalidIntervalError'
    }
}

/**
 * Raised for anything that goes wrong talking to the index: transport failures, non 2xx responses
 * and bodies that don't match the expected aggregation shape.
 */
export class QueryGatewayError extends Error {
    constructor(
        message: string,
        public readonly status?: number,
        public readonly isRetriable: boolean = false
    ) {
        super(message)
        this.name = 'QueryGatewayError'
    }
}

export class FunnelAlignmentError extends Error {
    constructor(
        message: string,
        public readonly details: Record<string, unknown>
    ) {
        super(message)
        this.name = 'FunnelAlignmentError'
    }
}
