import { z } from 'zod';

import { ConfigError } from './errors';

const DEFAULT_BASE_URL = 'https://openrouter.ai/api/v1';
const DEFAULT_MODEL = 'mistralai/mistral-small-3.2-24b-instruct:free';
const DEFAULT_KNOWLEDGE_BASE_PATH = 'data/knowledge.json';

const storeEnvSchema = z.object({
  KNOWLEDGE_BASE_PATH: z.string().trim().min(1).default(DEFAULT_KNOWLEDGE_BASE_PATH),
});

const envSchema = storeEnvSchema.extend({
  OPENAI_API_KEY: z
    .string({ required_error: 'missing, set it to your OpenRouter token' })
    .trim()
    .min(1, 'missing, set it to your OpenRouter token'),
  LLM_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  LLM_MODEL: z.string().trim().min(1).default(DEFAULT_MODEL),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  LLM_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
});

export type AppConfig = {
  apiKey: string;
  baseUrl: string;
  model: string;
  temperature: number;
  timeoutMs: number;
  maxAttempts: number;
  knowledgeBasePath: string;
};

// Empty strings in .env mean "unset", not "invalid".
const dropBlank = (env: Record<string, string | undefined>): Record<string, string> =>
  Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] =>
      typeof entry[1] === 'string' && entry[1].trim() !== ''),
  );

const parseEnv = <T extends z.ZodTypeAny>(schema: T, env: Record<string, string | undefined>): z.infer<T> => {
  const validation = schema.safeParse(dropBlank(env));

  if (!validation.success) {
    const issues = validation.error.issues.map((issue) =>
      issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message);

    throw new ConfigError(`Invalid configuration. ${issues.join('; ')}`, {
      details: { issues },
    });
  }

  return validation.data;
};

/**
 * Resolves only the knowledge store location, so commands that never call the
 * LLM (such as `--list`) work without credentials.
 */
export const loadKnowledgeBasePath = (env: Record<string, string | undefined> = process.env): string =>
  parseEnv(storeEnvSchema, env).KNOWLEDGE_BASE_PATH;

export const loadConfig = (env: Record<string, string | undefined> = process.env): AppConfig => {
  const parsed = parseEnv(envSchema, env);

  return {
    apiKey: parsed.OPENAI_API_KEY,
    baseUrl: parsed.LLM_BASE_URL,
    model: parsed.LLM_MODEL,
    temperature: parsed.LLM_TEMPERATURE,
    timeoutMs: parsed.LLM_TIMEOUT_MS,
    maxAttempts: parsed.LLM_MAX_ATTEMPTS,
    knowledgeBasePath: parsed.KNOWLEDGE_BASE_PATH,
  };
};
