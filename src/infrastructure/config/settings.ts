import { z } from 'zod';

/** Splits a comma-separated env value into trimmed, non-empty entries. */
function csv(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

const envSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  UPSTREAM_BASE_URL: z.string().url().default('http://localhost:8000'),
  UPSTREAM_API_KEY: z.string().default(''),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  AUDIT_DB_PATH: z.string().min(1).default('data/audit.db'),
  AUDIT_SYNCHRONOUS: z.enum(['FULL', 'NORMAL']).default('FULL'),
  AUDIT_WRITE_TIMEOUT_MS: z.coerce.number().int().positive().default(2_000),
  AUDIT_EXCLUDED_OPERATIONS: z.string().default(''),
});

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface Settings {
  host: string;
  port: number;
  logLevel: LogLevel;
  upstream: {
    baseUrl: string;
    apiKey: string;
    timeoutMs: number;
  };
  audit: {
    dbPath: string;
    synchronous: 'FULL' | 'NORMAL';
    writeTimeoutMs: number;
    excludedOperations: string[];
  };
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Reads settings from environment variables.
 *
 * Missing variables take their defaults. Invalid values fail fast with
 * a ConfigError naming every offending variable.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const e = parsed.data;

  return {
    host: e.HOST,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    upstream: {
      baseUrl: e.UPSTREAM_BASE_URL,
      apiKey: e.UPSTREAM_API_KEY,
      timeoutMs: e.UPSTREAM_TIMEOUT_MS,
    },
    audit: {
      dbPath: e.AUDIT_DB_PATH,
      synchronous: e.AUDIT_SYNCHRONOUS,
      writeTimeoutMs: e.AUDIT_WRITE_TIMEOUT_MS,
      excludedOperations: csv(e.AUDIT_EXCLUDED_OPERATIONS),
    },
  };
}
