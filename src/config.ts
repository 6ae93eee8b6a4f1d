import { z } from 'zod';
import { ConfigError } from './errors';
import type { LogLevel } from './logger';

export const DEFAULT_LLM_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai/';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const userIdList = optionalString.transform((value, ctx) => {
  if (!value) return [];
  const ids: number[] = [];
  for (const part of value.split(',')) {
    const id = Number(part.trim());
    if (!Number.isInteger(id) || id <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${part.trim()}" is not a Telegram user id` });
      return z.NEVER;
    }
    ids.push(id);
  }
  return ids;
});

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  SPORTS_API_BASE_URL: z.string().url().default('http://localhost:8001'),
  SPORTS_API_KEY: optionalString,
  SPORTS_API_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SPORTS_MAX_ITEMS: z.coerce.number().int().positive().default(10),

  LLM_API_KEY: optionalString,
  GEMINI_API_KEY: optionalString,
  LLM_BASE_URL: z.string().url().default(DEFAULT_LLM_BASE_URL),
  LLM_MODEL: z.string().min(1).default('gemini-1.5-flash'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(1),

  INTENT_DETECTOR: z.enum(['model', 'keyword']).default('model'),

  SESSION_MAX_TURNS: z.coerce.number().int().positive().default(10),
  SESSION_TTL_MINUTES: z.coerce.number().positive().default(30),

  BOT_TOKEN: optionalString,
  TELEGRAM_ALLOWED_USERS: userIdList,
});

export interface SportsApiConfig {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
  maxItems: number;
}

export interface LlmConfig {
  apiKey?: string;
  baseUrl: string;
  model: string;
  temperature: number;
  timeoutMs: number;
  maxRetries: number;
}

export interface SessionConfig {
  maxTurns: number;
  ttlMs: number;
}

export interface TelegramConfig {
  token: string;
  /** Empty means everyone may talk to the bot. */
  allowedUsers: number[];
}

export type IntentDetectorKind = 'model' | 'keyword';

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  /** `model` still falls back to keywords when the model is unavailable. */
  intentDetector: IntentDetectorKind;
  sports: SportsApiConfig;
  llm: LlmConfig;
  session: SessionConfig;
  telegram?: TelegramConfig;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`),
    );
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    intentDetector: e.INTENT_DETECTOR,
    sports: {
      baseUrl: e.SPORTS_API_BASE_URL.replace(/\/+$/, ''),
      apiKey: e.SPORTS_API_KEY,
      timeoutMs: e.SPORTS_API_TIMEOUT_MS,
      maxItems: e.SPORTS_MAX_ITEMS,
    },
    llm: {
      apiKey: e.LLM_API_KEY ?? e.GEMINI_API_KEY,
      baseUrl: e.LLM_BASE_URL,
      model: e.LLM_MODEL,
      temperature: e.LLM_TEMPERATURE,
      timeoutMs: e.LLM_TIMEOUT_MS,
      maxRetries: e.LLM_MAX_RETRIES,
    },
    session: {
      maxTurns: e.SESSION_MAX_TURNS,
      ttlMs: Math.round(e.SESSION_TTL_MINUTES * 60_000),
    },
    telegram: e.BOT_TOKEN ? { token: e.BOT_TOKEN, allowedUsers: e.TELEGRAM_ALLOWED_USERS } : undefined,
  };
}
