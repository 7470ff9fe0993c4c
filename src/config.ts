import { z } from 'zod';

import { LogLevelSchema } from './util/logger.js';

export const DEFAULT_CACHE_TTL_SECONDS = 10;

const EnvSchema = z.object({
  LOG_LEVEL: z
    .string()
    .optional()
    .transform((value) => value?.toLowerCase())
    .pipe(LogLevelSchema.default('warn')),
  KGE_CACHE_TTL_SECONDS: z.coerce.number().positive().default(DEFAULT_CACHE_TTL_SECONDS),
});

export interface KgeConfig {
  logLevel: z.infer<typeof LogLevelSchema>;
  cacheTtlSeconds: number;
}

/**
 * Reads process configuration from environment variables.
 * Kube-config selection (KUBECONFIG, in-cluster) is left to the client loader.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): KgeConfig {
  const result = EnvSchema.safeParse({
    LOG_LEVEL: env.LOG_LEVEL || undefined,
    KGE_CACHE_TTL_SECONDS: env.KGE_CACHE_TTL_SECONDS || undefined,
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }

  return {
    logLevel: result.data.LOG_LEVEL,
    cacheTtlSeconds: result.data.KGE_CACHE_TTL_SECONDS,
  };
}
