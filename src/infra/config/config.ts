import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { IANAZone } from 'luxon';
import { parse } from 'yaml';
import { z } from 'zod';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
const appEnvSchema = z.enum(['dev', 'prod', 'test']);

// Shape of config/default.yaml; every key is optional and defaulted in resolveConfig
const AppConfigSchema = z.object({
  app: z
    .object({
      name: z.string().optional(),
      env: appEnvSchema.optional(),
    })
    .optional(),
  logging: z
    .object({
      color: z.boolean().optional(),
      level: logLevelSchema.optional(),
    })
    .optional(),
  database: z
    .object({
      driver: z.enum(['postgres', 'memory']).optional(),
      url: z.string().optional(),
      maxConnections: z.number().int().positive().optional(),
      connectionTimeoutMs: z.number().int().positive().optional(),
      queryTimeoutMs: z.number().int().positive().optional(),
      timezone: z.string().optional(),
    })
    .optional(),
  telegram: z
    .object({
      enabled: z.boolean().optional(),
      token: z.string().optional(),
    })
    .optional(),
  http: z
    .object({
      enabled: z.boolean().optional(),
      port: z.number().int().nonnegative().optional(),
    })
    .optional(),
  ingest: z
    .object({
      concurrency: z.number().int().positive().optional(),
      maxQueue: z.number().int().positive().optional(),
    })
    .optional(),
  llm: z
    .object({
      enabled: z.boolean().optional(),
      baseUrl: z.string().optional(),
      apiKey: z.string().optional(),
      model: z.string().optional(),
      temperature: z.number().min(0).max(2).optional(),
      timeoutMs: z.number().int().positive().optional(),
    })
    .optional(),
  digest: z
    .object({
      windowHours: z.number().positive().optional(),
      maxMessages: z.number().int().positive().optional(),
      maxMessageChars: z.number().int().positive().optional(),
      maxOutputTokens: z.number().int().positive().optional(),
    })
    .optional(),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export type AppConfigRequired = {
  app: {
    name: string;
    env: 'dev' | 'prod' | 'test';
  };
  logging: {
    color: boolean;
    level: LogLevel;
  };
  database: {
    driver: 'postgres' | 'memory';
    url?: string;
    maxConnections: number;
    connectionTimeoutMs: number;
    queryTimeoutMs: number;
    /** IANA zone that defines "today" and transcript clock times */
    timezone: string;
  };
  telegram: {
    enabled: boolean;
    token?: string;
  };
  http: {
    enabled: boolean;
    port: number;
  };
  ingest: {
    concurrency: number;
    maxQueue: number;
  };
  llm: {
    enabled: boolean;
    baseUrl: string;
    apiKey?: string;
    model: string;
    /** Sampling temperature; provider default when unset */
    temperature?: number;
    timeoutMs: number;
  };
  digest: DigestSettings;
};

export type DigestSettings = {
  windowHours: number;
  maxMessages: number;
  maxMessageChars: number;
  maxOutputTokens: number;
};

export type DatabaseSettings = AppConfigRequired['database'];

function pickLogLevel(value: string | undefined): LogLevel | undefined {
  const parsed = logLevelSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

function pickEnv(value: string | undefined): AppConfigRequired['app']['env'] | undefined {
  const parsed = appEnvSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

function intFromEnv(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function readConfigFile(filePath: string): AppConfig {
  if (!existsSync(filePath)) return {};
  const parsed: unknown = parse(readFileSync(filePath, 'utf-8'));
  if (parsed === null || parsed === undefined) return {};
  const result = AppConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid config file ${filePath}: ${issues}`);
  }
  return result.data;
}

/**
 * Build the full configuration from an optional yaml file and the environment.
 * Environment variables win over file values for secrets and deployment knobs.
 */
export function resolveConfig(
  cfg: AppConfig,
  env: NodeJS.ProcessEnv = process.env,
): AppConfigRequired {
  const databaseUrl = env.DATABASE_URL ?? cfg.database?.url;
  const telegramToken = env.TELEGRAM_TOKEN ?? cfg.telegram?.token;
  const llmApiKey = env.LLM_API_KEY ?? cfg.llm?.apiKey;

  const resolved: AppConfigRequired = {
    app: {
      name: cfg.app?.name ?? 'ChatPulse',
      env: pickEnv(env.NODE_ENV) ?? cfg.app?.env ?? 'prod',
    },
    logging: {
      color: cfg.logging?.color ?? true,
      level: pickLogLevel(env.LOG_LEVEL) ?? cfg.logging?.level ?? 'info',
    },
    database: {
      driver: cfg.database?.driver ?? 'postgres',
      url: databaseUrl,
      maxConnections: cfg.database?.maxConnections ?? 10,
      connectionTimeoutMs: cfg.database?.connectionTimeoutMs ?? 10_000,
      queryTimeoutMs: cfg.database?.queryTimeoutMs ?? 10_000,
      timezone: env.APP_TIMEZONE ?? cfg.database?.timezone ?? 'UTC',
    },
    telegram: {
      enabled: cfg.telegram?.enabled ?? true,
      token: telegramToken,
    },
    http: {
      enabled: cfg.http?.enabled ?? true,
      port: intFromEnv(env.PORT) ?? cfg.http?.port ?? 8000,
    },
    ingest: {
      concurrency: cfg.ingest?.concurrency ?? 4,
      maxQueue: cfg.ingest?.maxQueue ?? 1000,
    },
    llm: {
      enabled: cfg.llm?.enabled ?? true,
      baseUrl: env.LLM_BASE_URL ?? cfg.llm?.baseUrl ?? 'https://openrouter.ai/api/v1',
      apiKey: llmApiKey,
      model: env.LLM_MODEL ?? cfg.llm?.model ?? 'openai/gpt-4o-mini',
      temperature: cfg.llm?.temperature,
      timeoutMs: cfg.llm?.timeoutMs ?? 30_000,
    },
    digest: {
      windowHours: cfg.digest?.windowHours ?? 24,
      maxMessages: cfg.digest?.maxMessages ?? 500,
      maxMessageChars: cfg.digest?.maxMessageChars ?? 500,
      maxOutputTokens: cfg.digest?.maxOutputTokens ?? 500,
    },
  };

  // Missing credentials switch a surface off instead of failing startup
  if (resolved.telegram.enabled && !resolved.telegram.token) {
    console.warn(
      '[CONFIG] Telegram enabled but no token configured. Disabling adapter. Set telegram.token or TELEGRAM_TOKEN to enable.',
    );
    resolved.telegram.enabled = false;
  }
  if (resolved.llm.enabled && !resolved.llm.apiKey) {
    console.warn('[CONFIG] LLM enabled but no API key configured. Digests will be unavailable.');
    resolved.llm.enabled = false;
  }
  if (!IANAZone.isValidZone(resolved.database.timezone)) {
    throw new Error(`Unknown time zone "${resolved.database.timezone}" (database.timezone or APP_TIMEZONE)`);
  }
  if (resolved.database.driver === 'postgres' && !resolved.database.url) {
    throw new Error('DATABASE_URL (or database.url) is required for the postgres driver');
  }

  return resolved;
}

export function loadConfig(
  filePath: string = resolve(process.cwd(), 'config', 'default.yaml'),
): AppConfigRequired {
  return resolveConfig(readConfigFile(filePath));
}
