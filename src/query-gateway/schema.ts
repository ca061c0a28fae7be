import { z } from 'zod'

const CardinalityFilterSchema = z.object({
    doc_count: z.number(),
    unique_visitorId: z.object({
        value: z.number(),
    }),
})

export const UserIdsResponseSchema = z.object({
    aggregations: z.object({
        unique_userIds: z.object({
            sum_other_doc_count: z.number().optional(),
            buckets: z.array(
                z.object({
                    key: z.union([z.string(), z.number()]),
                    doc_count: z.number(),
                })
            ),
        }),
    }),
})

export const DailyHistogramResponseSchema = z.object({
    aggregations: z.object({
        by_day: z.object({
            buckets: z.array(
                z.object({
                    key_as_string: z.string(),
                    key: z.number(),
                    doc_count: z.number(),
                    userId_all: CardinalityFilterSchema,
                    userId_not_0: CardinalityFilterSchema,
                    new_sign_up: CardinalityFilterSchema,
                })
            ),
        }),
    }),
})

// Shape of the body Elasticsearch sends back with a non 2xx status
export const ErrorResponseSchema = z.object({
    error: z.union([
        z.string(),
        z.object({
            type: z.string().optional(),
            reason: z.string().optional(),
        }),
    ]),
})

export type UserIdsResponse = z.infer<typeof UserIdsResponseSchema>
export type DailyHistogramResponse = z.infer<typeof DailyHistogramResponseSchema>
