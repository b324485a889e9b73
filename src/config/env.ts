import { z } from 'zod';

const emptyToUndef = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const bool = z.preprocess(
  emptyToUndef,
  z
    .string()
    .default('false')
    .transform(v => ['true', '1', 'yes', 'on'].includes(v.trim().toLowerCase())),
);

const Env = z.object({
  PORT: z.preprocess(emptyToUndef, z.coerce.number().int().min(0).max(65535).default(8000)),
  DATABASE_URL: z.preprocess(emptyToUndef, z.string().default('sqlite:///./data/errors.db')),
  SENTRY_DSN: z.preprocess(emptyToUndef, z.string().optional()),
  SENTRY_PROJECT: z.preprocess(emptyToUndef, z.string().trim().optional()),
  SENTRY_ORGANIZATION: z.preprocess(emptyToUndef, z.string().trim().optional()),
  SENTRY_FILTER_BY_PROJECT: bool,
  LOG_LEVEL: z.preprocess(
    emptyToUndef,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ),
  STORAGE_TIMEOUT_MS: z.preprocess(emptyToUndef, z.coerce.number().int().min(1).default(5000)),
  WEBHOOK_BODY_LIMIT: z.preprocess(emptyToUndef, z.string().default('5mb')),
  ERRORS_DEFAULT_LIMIT: z.preprocess(emptyToUndef, z.coerce.number().int().min(1).default(50)),
  ERRORS_MAX_LIMIT: z.preprocess(emptyToUndef, z.coerce.number().int().min(1).default(500)),
});

export type LogLevel = z.infer<typeof Env>['LOG_LEVEL'];

export type AppConfig = Readonly<{
  port: number;
  databaseUrl: string;
  sentryDsn: string | null;
  allowedProject: string | null;
  allowedOrganization: string | null;
  filterByProject: boolean;
  logLevel: LogLevel;
  storageTimeoutMs: number;
  webhookBodyLimit: string;
  errorsDefaultLimit: number;
  errorsMaxLimit: number;
}>;

/**
 * Builds the process configuration from environment variables.
 * Called once at startup; the result is frozen and handed to whoever needs it.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = Env.parse(env);
  const maxLimit = parsed.ERRORS_MAX_LIMIT;

  return Object.freeze({
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    sentryDsn: parsed.SENTRY_DSN ?? null,
    allowedProject: parsed.SENTRY_PROJECT ?? null,
    allowedOrganization: parsed.SENTRY_ORGANIZATION ?? null,
    filterByProject: parsed.SENTRY_FILTER_BY_PROJECT,
    logLevel: parsed.LOG_LEVEL,
    storageTimeoutMs: parsed.STORAGE_TIMEOUT_MS,
    webhookBodyLimit: parsed.WEBHOOK_BODY_LIMIT,
    errorsDefaultLimit: Math.min(parsed.ERRORS_DEFAULT_LIMIT, maxLimit),
    errorsMaxLimit: maxLimit,
  });
}
