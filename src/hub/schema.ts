import { z } from 'zod'

/**
 * Fields of a Hub list entry that we read. Everything else passes through untouched;
 * models and datasets share this shape for the fields we care about.
 */
export const hubEntrySchema = z
  .object({
    id: z.string().optional(),
    /** Legacy alias of `id` on model entries. */
    modelId: z.string().optional(),
    author: z.string().nullish(),
    downloads: z.number().nullish(),
    likes: z.number().nullish(),
    tags: z.array(z.string()).nullish()
  })
  .passthrough()

export const hubListSchema = z.array(hubEntrySchema)

export type HubEntry = z.infer<typeof hubEntrySchema>
