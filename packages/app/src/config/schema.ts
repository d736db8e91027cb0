/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import { DEFAULT_ROSTER_TIMEOUT_MS, DEFAULT_ROSTER_URL } from '@mdpoc/symbol-roster';
import { DEFAULT_YAHOO_TIMEOUT_MS } from '@mdpoc/provider-yahoo';

/**
 * Application configuration schema
 */
export const configSchema = z
  .object({
    logging: z
      .object({
        level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
        format: z.enum(['json', 'pretty']).default('pretty'),
        filePath: z.string().min(1).optional(),
      })
      .default({}),

    roster: z
      .object({
        url: z.string().url().default(DEFAULT_ROSTER_URL),
        timeoutMs: z.coerce.number().int().positive().default(DEFAULT_ROSTER_TIMEOUT_MS),
        userAgent: z.string().min(1).optional(),
      })
      .default({}),

    provider: z
      .object({
        type: z.enum(['yahoo', 'fixture']).default('yahoo'),
        baseUrl: z.string().url().optional(),
        timeoutMs: z.coerce.number().int().positive().default(DEFAULT_YAHOO_TIMEOUT_MS),
        fixturesPath: z.string().min(1).optional(),
      })
      .default({}),

    batch: z
      .object({
        concurrency: z.coerce.number().int().min(1).max(32).default(1),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    if (config.provider.type === 'fixture' && !config.provider.fixturesPath) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['provider', 'fixturesPath'],
        message: 'FIXTURES_PATH is required when PROVIDER_TYPE is fixture',
      });
    }
  });

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Readonly<Record<string, string>> = {
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  ROSTER_URL: 'roster.url',
  ROSTER_TIMEOUT_MS: 'roster.timeoutMs',
  ROSTER_USER_AGENT: 'roster.userAgent',
  PROVIDER_TYPE: 'provider.type',
  PROVIDER_BASE_URL: 'provider.baseUrl',
  PROVIDER_TIMEOUT_MS: 'provider.timeoutMs',
  FIXTURES_PATH: 'provider.fixturesPath',
  BATCH_CONCURRENCY: 'batch.concurrency',
};
