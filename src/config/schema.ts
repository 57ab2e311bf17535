/**
 * Environment configuration for discovery.
 * Validated once at startup; invalid values throw a ZodError.
 */
import { z } from 'zod';

export const envSchema = z.object({
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  DNS_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
  // Plain http is only meant for local test servers
  WELL_KNOWN_SCHEME: z.enum(['https', 'http']).default('https'),
  WELL_KNOWN_PORT: z.coerce.number().int().min(1).max(65535).optional(),
});

export type Config = z.infer<typeof envSchema>;

export function loadConfig(): Config {
  return envSchema.parse(process.env);
}
