/**
 * Proxy configuration, read once from the environment.
 *
 * TLS_CERT_FILE / TLS_KEY_FILE point at PEM files mounted into the
 * container (typically from a Kubernetes TLS secret).
 */

import { z } from 'zod';
import { ConfigError, isValidNamespace } from '@raygate/shared';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8443),
  HOST: z.string().min(1).default('0.0.0.0'),
  TLS_CERT_FILE: z.string().min(1),
  TLS_KEY_FILE: z.string().min(1),
  MANAGER_URL: z.string().url().default('http://manager:5000'),
  MANAGER_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  ROUTE_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(30_000),
  NAMESPACE: z
    .string()
    .refine(isValidNamespace, { message: 'must be a valid Kubernetes namespace' })
    .optional(),
});

export interface ProxyConfig {
  port: number;
  host: string;
  tlsCertFile: string;
  tlsKeyFile: string;
  managerUrl: string;
  managerTimeoutMs: number;
  upstreamTimeoutMs: number;
  routeCacheTtlMs: number;
  /** Namespace passed to the manager; the manager's default when unset */
  namespace?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ProxyConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid proxy environment: ${issues}`);
  }

  const data = parsed.data;
  return {
    port: data.PORT,
    host: data.HOST,
    tlsCertFile: data.TLS_CERT_FILE,
    tlsKeyFile: data.TLS_KEY_FILE,
    managerUrl: data.MANAGER_URL.replace(/\/+$/, ''),
    managerTimeoutMs: data.MANAGER_TIMEOUT_MS,
    upstreamTimeoutMs: data.UPSTREAM_TIMEOUT_MS,
    routeCacheTtlMs: data.ROUTE_CACHE_TTL_MS,
    namespace: data.NAMESPACE,
  };
}
