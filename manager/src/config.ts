/**
 * Manager configuration, read once from the environment.
 */

import { z } from 'zod';
import { ConfigError, isValidNamespace } from '@raygate/shared';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  NAMESPACE: z
    .string()
    .default('default')
    .refine(isValidNamespace, { message: 'must be a valid Kubernetes namespace' }),
  CHART_DIR: z.string().min(1).default('ray'),
  COMMAND_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
});

export interface ManagerConfig {
  port: number;
  namespace: string;
  chartDir: string;
  commandTimeoutMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ManagerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid manager environment: ${issues}`);
  }

  return {
    port: parsed.data.PORT,
    namespace: parsed.data.NAMESPACE,
    chartDir: parsed.data.CHART_DIR,
    commandTimeoutMs: parsed.data.COMMAND_TIMEOUT_MS,
  };
}
