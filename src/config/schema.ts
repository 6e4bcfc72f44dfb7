import { z } from "zod";

const retryConfigSchema = z.object({
  attempts: z.number().int().nonnegative().default(0),
  backoffMs: z.number().int().nonnegative().default(1000),
});

const upstreamConfigSchema = z.object({
  baseUrl: z.string().url(),
  authToken: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().default(30000),
  pageSize: z.number().int().positive().default(20),
  retry: retryConfigSchema.default({}),
});

const accountSeedSchema = z.object({
  feedId: z.string().min(1),
  name: z.string().min(1).optional(),
  active: z.boolean().default(true),
});

export const appConfigSchema = z.object({
  upstream: upstreamConfigSchema,
  rateLimit: z
    .object({
      maxRequests: z.number().int().positive().default(30),
      windowMs: z.number().int().positive().default(60000),
    })
    .default({}),
  cache: z
    .object({
      enabled: z.boolean().default(true),
      ttlSeconds: z.number().int().positive().default(1800),
    })
    .default({}),
  sync: z
    .object({
      concurrency: z.number().int().positive().default(2),
      maxPagesPerRun: z.number().int().positive().default(50),
      staleRunMinutes: z.number().int().positive().default(60),
    })
    .default({}),
  accounts: z.array(accountSeedSchema).default([]),
  export: z
    .object({
      directory: z.string().min(1).default("./exports"),
    })
    .default({}),
  server: z
    .object({
      port: z.number().int().positive().default(3000),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type UpstreamConfig = AppConfig["upstream"];
