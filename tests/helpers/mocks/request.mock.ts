import { FetchResponse } from '../../../src/utils/request'

export function fetchResponse(status: number, body: unknown): FetchResponse {
    const text = typeof body === 'string' ? body : JSON.stringify(body)
    return {
        status,
        text: () => Promise.resolve(text),
    }
}

export function userIdsBody(keys: (string | number)[], sumOtherDocCount = 0) {
    return {
        took: 3,
        timed_out: false,
        hits: { total: { value: 10000, relation: 'gte' }, hits: [] },
        aggregations: {
            unique_userIds: {
                doc_count_error_upper_bound: 0,
                sum_other_doc_count: sumOtherDocCount,
                buckets: keys.map((key, i) => ({ key, doc_count: 10 - i })),
            },
        },
    }
}

export function histogramBucket(day: string, visitors: number, registered: number, signUps: number) {
    return {
        key_as_string: day,
        key: Date.parse(`${day}T00:00:00+08:00`),
        doc_count: visitors * 3,
        userId_all: { doc_count: visitors * 3, unique_visitorId: { value: visitors } },
        userId_not_0: { doc_count: registered * 3, unique_visitorId: { value: registered } },
        new_sign_up: { doc_count: signUps, unique_visitorId: { value: signUps } },
    }
}

export function histogramBody(buckets: ReturnType<typeof histogramBucket>[]) {
    return {
        took: 12,
        timed_out: false,
        hits: { total: { value: 10000, relation: 'gte' }, hits: [] },
        aggregations: { by_day: { buckets } },
    }
}
