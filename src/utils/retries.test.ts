import { QueryGatewayError } from './errors'
import { retryIfRetriable } from './retries'

describe('retryIfRetriable', () => {
    it('returns the first successful result', async () => {
        const fn = jest.fn().mockRejectedValueOnce(new Error('socket hang up')).mockResolvedValueOnce('ok')

        await expect(retryIfRetriable(fn, 'search', 3, 0)).resolves.toEqual('ok')
        expect(fn).toHaveBeenCalledTimes(2)
    })

    it('retries retriable gateway errors until it runs out of tries', async () => {
        const fn = jest.fn().mockRejectedValue(new QueryGatewayError('status 503', 503, true))

        await expect(retryIfRetriable(fn, 'search', 3, 0)).rejects.toThrow('status 503')
        expect(fn).toHaveBeenCalledTimes(3)
    })

    it('gives up straight away on errors that are not retriable', async () => {
        const fn = jest.fn().mockRejectedValue(new QueryGatewayError('status 400', 400, false))

        await expect(retryIfRetriable(fn, 'search', 3, 0)).rejects.toThrow('status 400')
        expect(fn).toHaveBeenCalledTimes(1)
    })
})
