import { z } from 'zod';
import { ValidationError } from './errors.js';
import { BASE_URL } from './types.js';

const baseUrlSchema = z
  .string({ invalid_type_error: 'Base URL must be a valid URL' })
  .url('Base URL must be a valid URL')
  .refine((value) => /^https?:\/\//i.test(value), 'Base URL must be a valid URL')
  .default(BASE_URL);

const tokenSchema = z
  .string({ required_error: 'Token required', invalid_type_error: 'Token required' })
  .min(1, 'Token required');

export const authClientOptionsSchema = z.object({
  baseUrl: baseUrlSchema,
});

export const clientOptionsSchema = authClientOptionsSchema.extend({
  token: tokenSchema,
});

export type ResolvedAuthClientOptions = z.infer<typeof authClientOptionsSchema>;
export type ResolvedClientOptions = z.infer<typeof clientOptionsSchema>;

function parseOptions<S extends z.ZodTypeAny>(schema: S, options: unknown): z.infer<S> {
  const result = schema.safeParse(options);
  if (!result.success) {
    throw new ValidationError(result.error.issues[0]?.message ?? 'Invalid client options');
  }
  return result.data;
}

/**
 * Validate the transport-independent parts of the main client's options.
 */
export function parseClientOptions(options: unknown): ResolvedClientOptions {
  return parseOptions(clientOptionsSchema, options);
}

export function parseAuthClientOptions(options: unknown): ResolvedAuthClientOptions {
  return parseOptions(authClientOptionsSchema, options);
}
