import { Agent, Dispatcher, request } from 'undici'
import { URL } from 'url'

import { defaultConfig } from '../config/config'

// NOTE: This isn't exactly fetch - it's meant to be very close but limited to only options we actually want to expose
export type FetchOptions = {
    method?: Dispatcher.HttpMethod
    headers?: Record<string, string>
    body?: string | Buffer
    timeoutMs?: number
}

export type FetchResponse = {
    status: number
    text: () => Promise<string>
}

// The cluster is operator configured and usually lives on a private network, so no public IP checks here
class InternalAgent extends Agent {
    constructor() {
        super({
            keepAliveTimeout: 10_000,
            connections: 50,
            connect: {
                timeout: defaultConfig.ES_REQUEST_TIMEOUT_MS,
            },
        })
    }
}

const sharedInternalAgent = new InternalAgent()

export async function _fetch(url: string, options: FetchOptions = {}, dispatcher: Dispatcher): Promise<FetchResponse> {
    let parsed: URL
    try {
        parsed = new URL(url)
    } catch {
        throw new Error('Invalid URL')
    }

    if (!parsed.hostname || !(parsed.protocol === 'http:' || parsed.protocol === 'https:')) {
        throw new Error('URL must have HTTP or HTTPS protocol and a valid hostname')
    }

    const timeoutMs = options.timeoutMs ?? defaultConfig.ES_REQUEST_TIMEOUT_MS

    const result = await request(parsed.toString(), {
        method: options.method ?? 'GET',
        headers: options.headers,
        body: options.body,
        dispatcher,
        signal: timeoutMs ? AbortSignal.timeout(timeoutMs) : undefined,
    })

    return {
        status: result.statusCode,
        text: async () => await result.body.text(),
    }
}

export async function internalFetch(url: string, options: FetchOptions = {}): Promise<FetchResponse> {
    return await _fetch(url, options, sharedInternalAgent)
}
