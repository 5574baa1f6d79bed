import { z } from 'zod';
import { ConfigurationError } from './errors';
import { RlsRule } from './types';

const TRUTHY = new Set(['1', 'true', 'yes', 'y', 'on']);

// Parse CORS origins from environment variable (comma-separated)
function parseCorsOrigins(): string[] {
  const origins = process.env.CORS_ALLOWED_ORIGINS;
  if (!origins) {
    return process.env.NODE_ENV === 'test'
      ? ['http://localhost:3000', 'http://localhost:8080', 'https://trusted.example.com']
      : [];
  }
  return origins.split(',').map(o => o.trim()).filter(Boolean);
}

export const config = {
  gateway: {
    port: parseInt(process.env.PORT || '8000', 10),
    corsAllowedOrigins: parseCorsOrigins(),
    version: '1.0.0',
  },
  isTest: process.env.NODE_ENV === 'test',
};

export interface BrokerConfig {
  baseUrl: string;
  username: string;
  password: string;
  provider: string;
  verifySsl: boolean;
  defaultRlsRules: RlsRule[];
  defaultGuestUsername: string;
  requestTimeoutMs: number;
  sessionTtlMs: number;
  sessionRefreshMarginMs: number;
  retryBackoffMs: number;
  rlsClauseMaxLength: number;
  redisUrl?: string;
}

const rlsRuleSchema = z.object({
  clause: z.string(),
  dataset: z.number().int().optional(),
});

const numberFromEnv = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z.object({
  SUPERSET_URL: z.string().url(),
  SUPERSET_USERNAME: z.string().min(1),
  SUPERSET_PASSWORD: z.string().min(1),
  SUPERSET_LOGIN_PROVIDER: z.string().min(1).default('db'),
  VERIFY_SSL: z.string().default('true'),
  RLS_JSON: z.string().default('[]'),
  GUEST_USERNAME: z.string().min(1).default('guest_via_api'),
  UPSTREAM_TIMEOUT_MS: numberFromEnv(20_000),
  SESSION_TTL_MS: numberFromEnv(15 * 60 * 1000),
  SESSION_REFRESH_MARGIN_MS: numberFromEnv(60_000),
  RETRY_BACKOFF_MS: numberFromEnv(250),
  RLS_CLAUSE_MAX_LENGTH: numberFromEnv(4096),
  REDIS_URL: z.string().min(1).optional(),
});

function parseDefaultRls(raw: string): RlsRule[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`RLS_JSON is not valid JSON: ${String(error)}`);
  }

  const result = z.array(rlsRuleSchema).safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(
      'RLS_JSON must be a JSON array, e.g. [] or [{"clause":"tenant_id=\'acme\'"}]'
    );
  }
  return result.data;
}

/**
 * Validate the upstream settings once at startup. The broker only ever sees
 * the resulting object, never raw environment strings.
 */
export function loadBrokerConfig(env: NodeJS.ProcessEnv = process.env): BrokerConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const missing = result.error.issues.map(issue => issue.path.join('.')).join(', ');
    throw new ConfigurationError(
      `Invalid or missing environment variables: ${missing}. ` +
      'Set SUPERSET_URL, SUPERSET_USERNAME, SUPERSET_PASSWORD.'
    );
  }

  const values = result.data;
  return {
    baseUrl: values.SUPERSET_URL.replace(/\/+$/, ''),
    username: values.SUPERSET_USERNAME,
    password: values.SUPERSET_PASSWORD,
    provider: values.SUPERSET_LOGIN_PROVIDER,
    verifySsl: TRUTHY.has(values.VERIFY_SSL.trim().toLowerCase()),
    defaultRlsRules: parseDefaultRls(values.RLS_JSON),
    defaultGuestUsername: values.GUEST_USERNAME,
    requestTimeoutMs: values.UPSTREAM_TIMEOUT_MS,
    sessionTtlMs: values.SESSION_TTL_MS,
    sessionRefreshMarginMs: values.SESSION_REFRESH_MARGIN_MS,
    retryBackoffMs: values.RETRY_BACKOFF_MS,
    rlsClauseMaxLength: values.RLS_CLAUSE_MAX_LENGTH,
    redisUrl: values.REDIS_URL,
  };
}
