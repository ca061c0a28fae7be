import JSONbig from 'json-bigint'
import { performance } from 'perf_hooks'
import { Summary } from 'prom-client'

const jsonParseDurationMsSummary = new Summary({
    name: 'json_parse_duration_ms',
    help: 'Time to parse JSON responses from the index',
    percentiles: [0.5, 0.9, 0.95, 0.99],
})

// Numbers written with more than 15 characters come back as their decimal string, so 64 bit user ids
// above 2^53 stay distinct instead of rounding onto their neighbours
const losslessJSON = JSONbig({ storeAsString: true })

export function parseJSON(json: string): unknown {
    const startTime = performance.now()
    const result: unknown = losslessJSON.parse(json)
    jsonParseDurationMsSummary.observe(performance.now() - startTime)

    return result
}
