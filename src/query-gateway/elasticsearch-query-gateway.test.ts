jest.mock('../utils/request', () => ({
    internalFetch: jest.fn(),
}))

import {
    fetchResponse,
    histogramBody,
    histogramBucket,
    userIdsBody,
} from '../../tests/helpers/mocks/request.mock'
import { QueryGatewayError } from '../utils/errors'
import { internalFetch } from '../utils/request'
import { ElasticsearchQueryGateway, ElasticsearchQueryGatewayConfig } from './elasticsearch-query-gateway'

const mockInternalFetch = jest.mocked(internalFetch)

const config: ElasticsearchQueryGatewayConfig = {
    ES_URL: 'http://es.test:9200/',
    ES_API_KEY: 'test-key',
    ES_INDEX_PATTERN: 'monitor-prod-20*',
    ES_REQUEST_TIMEOUT_MS: 1000,
    ES_REQUEST_RETRIES: 2,
    TIMEZONE: 'Asia/Shanghai',
    SIGNUP_EVENT_NAME: 'backend-sign_up',
    USER_ID_BUCKET_LIMIT: 3,
}

function sentBody(callIndex = 0): unknown {
    const options = mockInternalFetch.mock.calls[callIndex][1]
    return JSON.parse(String(options?.body))
}

describe('ElasticsearchQueryGateway', () => {
    let gateway: ElasticsearchQueryGateway

    beforeEach(() => {
        gateway = new ElasticsearchQueryGateway(config)
    })

    describe('termBucketUsers', () => {
        it('searches the index for the ids that sent the event that day', async () => {
            mockInternalFetch.mockResolvedValue(fetchResponse(200, userIdsBody([1, 2])))

            await gateway.termBucketUsers('2026-10-10', 'root')

            expect(mockInternalFetch).toHaveBeenCalledTimes(1)
            const [url, options] = mockInternalFetch.mock.calls[0]
            expect(url).toBe('http://es.test:9200/monitor-prod-20*/_search')
            expect(options?.method).toBe('POST')
            expect(options?.headers).toEqual({
                'Content-Type': 'application/json',
                Authorization: 'ApiKey test-key',
            })
            expect(sentBody()).toEqual({
                size: 0,
                query: {
                    bool: {
                        must: [
                            {
                                range: {
                                    '@timestamp': {
                                        gte: '2026-10-10T00:00:00',
                                        lt: '2026-10-10T23:59:59',
                                        time_zone: 'Asia/Shanghai',
                                    },
                                },
                            },
                            { term: { 'message.name.keyword': 'root' } },
                        ],
                    },
                },
                aggs: {
                    unique_userIds: {
                        terms: { field: 'message.userId', size: 3 },
                    },
                },
            })
        })

        it('returns the bucket keys as they come', async () => {
            mockInternalFetch.mockResolvedValue(fetchResponse(200, userIdsBody([1001, 'visitor-9'])))

            const userIds = await gateway.termBucketUsers('2026-10-10', 'root')

            expect(Array.from(userIds)).toEqual([1001, 'visitor-9'])
        })

        it('keeps ids above 2^53 apart', async () => {
            mockInternalFetch.mockResolvedValue(
                fetchResponse(
                    200,
                    '{"took":4,"aggregations":{"unique_userIds":{"sum_other_doc_count":0,"buckets":[' +
                        '{"key":9007199254740993,"doc_count":2},{"key":9007199254740992,"doc_count":1},' +
                        '{"key":42,"doc_count":1}]}}}'
                )
            )

            const userIds = await gateway.termBucketUsers('2026-10-10', 'root')

            expect(userIds.size).toBe(3)
            expect(Array.from(userIds)).toEqual(['9007199254740993', '9007199254740992', 42])
        })

        it('keeps the truncated ids when the bucket limit is hit', async () => {
            mockInternalFetch.mockResolvedValue(fetchResponse(200, userIdsBody([1, 2, 3], 42)))

            const userIds = await gateway.termBucketUsers('2026-10-10', 'backend-sign_up')

            expect(userIds.size).toBe(3)
        })

        it('leaves the Authorization header out without an api key', async () => {
            mockInternalFetch.mockResolvedValue(fetchResponse(200, userIdsBody([])))
            gateway = new ElasticsearchQueryGateway({ ...config, ES_API_KEY: '' })

            await gateway.termBucketUsers('2026-10-10', 'root')

            expect(mockInternalFetch.mock.calls[0][1]?.headers).toEqual({ 'Content-Type': 'application/json' })
        })
    })

    describe('dailyHistogram', () => {
        it('requests one bucket per day with the three visitor counts', async () => {
            mockInternalFetch.mockResolvedValue(fetchResponse(200, histogramBody([])))

            await gateway.dailyHistogram('2026-10-04', '2026-10-17')

            expect(sentBody()).toEqual({
                size: 0,
                query: {
                    bool: {
                        must: [
                            {
                                range: {
                                    '@timestamp': {
                                        gte: '2026-10-04T00:00:00',
                                        lt: '2026-10-18T00:00:00',
                                        time_zone: 'Asia/Shanghai',
                                    },
                                },
                            },
                        ],
                    },
                },
                aggs: {
                    by_day: {
                        date_histogram: {
                            field: '@timestamp',
                            calendar_interval: 'day',
                            time_zone: 'Asia/Shanghai',
                            format: 'yyyy-MM-dd',
                            min_doc_count: 0,
                            extended_bounds: { min: '2026-10-04', max: '2026-10-17' },
                        },
                        aggs: {
                            userId_all: {
                                filter: { range: { 'message.userId': { gte: 0 } } },
                                aggs: { unique_visitorId: { cardinality: { field: 'message.visitorId.keyword' } } },
                            },
                            userId_not_0: {
                                filter: { range: { 'message.userId': { gt: 0 } } },
                                aggs: { unique_visitorId: { cardinality: { field: 'message.visitorId.keyword' } } },
                            },
                            new_sign_up: {
                                filter: { term: { 'message.name.keyword': 'backend-sign_up' } },
                                aggs: { unique_visitorId: { cardinality: { field: 'message.userId' } } },
                            },
                        },
                    },
                },
            })
        })

        it('maps each bucket to a day record', async () => {
            mockInternalFetch.mockResolvedValue(
                fetchResponse(
                    200,
                    histogramBody([histogramBucket('2026-10-04', 300, 120, 14), histogramBucket('2026-10-05', 0, 0, 0)])
                )
            )

            const records = await gateway.dailyHistogram('2026-10-04', '2026-10-05')

            expect(records).toEqual([
                { date: '2026-10-04', allVisitorCount: 300, registeredVisitorCount: 120, signUpCount: 14 },
                { date: '2026-10-05', allVisitorCount: 0, registeredVisitorCount: 0, signUpCount: 0 },
            ])
        })
    })

    describe('errors', () => {
        it('does not retry client errors', async () => {
            mockInternalFetch.mockResolvedValue(
                fetchResponse(401, { error: { type: 'security_exception', reason: 'unable to authenticate' }, status: 401 })
            )

            const error = await gateway.termBucketUsers('2026-10-10', 'root').catch((e: unknown) => e)

            expect(error).toBeInstanceOf(QueryGatewayError)
            expect(error).toMatchObject({
                status: 401,
                message:
                    'Search request for term_bucket_users returned status 401: security_exception: unable to authenticate',
            })
            expect(mockInternalFetch).toHaveBeenCalledTimes(1)
        })

        it('retries server errors', async () => {
            mockInternalFetch
                .mockResolvedValueOnce(fetchResponse(503, 'unavailable'))
                .mockResolvedValueOnce(fetchResponse(200, userIdsBody(['a'])))

            const userIds = await gateway.termBucketUsers('2026-10-10', 'root')

            expect(Array.from(userIds)).toEqual(['a'])
            expect(mockInternalFetch).toHaveBeenCalledTimes(2)
        })

        it('gives up after the configured number of retries', async () => {
            mockInternalFetch.mockRejectedValue(new Error('connect ECONNREFUSED'))

            await expect(gateway.dailyHistogram('2026-10-04', '2026-10-17')).rejects.toThrow(
                'Search request for daily_histogram failed: connect ECONNREFUSED'
            )
            // the first attempt plus ES_REQUEST_RETRIES
            expect(mockInternalFetch).toHaveBeenCalledTimes(3)
        })

        it('rejects responses without the expected aggregation', async () => {
            mockInternalFetch.mockResolvedValue(fetchResponse(200, { took: 1, hits: { hits: [] } }))

            await expect(gateway.termBucketUsers('2026-10-10', 'root')).rejects.toThrow(
                'Unexpected search response for term_bucket_users at aggregations: Required'
            )
            expect(mockInternalFetch).toHaveBeenCalledTimes(1)
        })

        it('rejects bodies that are not JSON', async () => {
            mockInternalFetch.mockResolvedValue(fetchResponse(200, '<html>proxy error</html>'))

            await expect(gateway.termBucketUsers('2026-10-10', 'root')).rejects.toThrow(
                'Search response for term_bucket_users is not valid JSON'
            )
        })
    })
})
