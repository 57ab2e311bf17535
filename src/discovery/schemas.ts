/**
 * Wire formats of the documents discovery reads.
 * Unknown fields are dropped; only the fields below are checked.
 */
import { z } from 'zod';

export const serverWellKnownSchema = z.object({
  'm.server': z.string(),
});

const baseUrlSchema = z.object({
  base_url: z.string(),
});

export const clientWellKnownSchema = z.object({
  'm.homeserver': baseUrlSchema,
  'm.identity_server': baseUrlSchema.nullish(),
});

export const versionsSchema = z.object({
  versions: z.array(z.string()),
  unstable_features: z.record(z.string(), z.boolean()).optional(),
});

/**
 * Parse a JSON body against a schema.
 * @returns the parsed value, or null for invalid JSON or a schema mismatch
 */
export function parseJsonBody<T extends z.ZodType>(body: string, schema: T): z.infer<T> | null {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return null;
  }
  const result = schema.safeParse(json);
  return result.success ? result.data : null;
}
