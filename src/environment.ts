/**
 * environment.ts - Process environment, validated once on first use
 */

import { z } from 'zod';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const environmentSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type Environment = z.infer<typeof environmentSchema>;

/**
 * Parse an environment map. Unset variables fall back to their defaults.
 */
export function parseEnvironment(source: Record<string, string | undefined>): Environment {
  const parsed = environmentSchema.safeParse({ LOG_LEVEL: source.LOG_LEVEL });
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment variables: ${issues.join('; ')}`);
  }
  return parsed.data;
}

let cached: Environment | null = null;

export function environment(): Environment {
  if (cached === null) {
    cached = parseEnvironment(process.env);
  }
  return cached;
}
