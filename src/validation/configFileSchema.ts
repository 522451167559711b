import { z } from 'zod';

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

/**
 * Optional JSON config file. Every section and key may be omitted;
 * present values override the environment.
 */
export const configFileSchema = z
  .object({
    crawl: z
      .object({
        baseUrl: z.string().url(),
        category: z.string().min(1),
        timePeriod: z.string().min(1),
        maxListingPages: nonNegativeInt,
        maxItems: nonNegativeInt,
        requestDelayMs: nonNegativeInt,
        requestTimeoutMs: nonNegativeInt,
        fetchMaxRetries: nonNegativeInt,
        userAgent: z.string().min(1),
      })
      .partial()
      .strict(),
    cache: z
      .object({
        dir: z.string().min(1),
        documentMaxAgeMs: nonNegativeInt,
        listingMaxAgeMs: nonNegativeInt,
      })
      .partial()
      .strict(),
    state: z
      .object({
        checkpointDir: z.string().min(1),
        workDir: z.string().min(1),
      })
      .partial()
      .strict(),
    embedding: z
      .object({
        model: z.string().min(1),
        dimensions: positiveInt,
        chunkMaxChars: positiveInt,
        chunkOverlapChars: nonNegativeInt,
        batchSize: positiveInt,
        maxRetries: nonNegativeInt,
        aggregation: z.enum(['mean', 'max']),
      })
      .partial()
      .strict(),
    workers: z
      .object({
        extract: positiveInt,
        embed: positiveInt,
        load: positiveInt,
        queueCapacity: positiveInt,
      })
      .partial()
      .strict(),
    stores: z
      .object({
        writeTimeoutMs: nonNegativeInt,
        maxRetries: nonNegativeInt,
        repairGracePeriodMs: nonNegativeInt,
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;
