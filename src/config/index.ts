/**
 * Configuration
 *
 * Validates the environment once at startup. The CLI loads `.env` through
 * `dotenv/config` before calling {@link loadConfig}.
 *
 * @module agent-orchestrator/config
 */

import { statSync } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

export { ConfigurationError } from './errors.js';

function emptyToUndefined(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

function optionalString() {
  return z.preprocess(emptyToUndefined, z.string().min(1).optional());
}

function positiveInt(defaultValue: number) {
  return z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(defaultValue));
}

function nonNegativeInt(defaultValue: number) {
  return z.preprocess(emptyToUndefined, z.coerce.number().int().min(0).default(defaultValue));
}

function isDirectory(dir: string): boolean {
  try {
    return statSync(dir).isDirectory();
  } catch {
    return false;
  }
}

export const DEFAULT_AZURE_API_VERSION = '2024-02-01';

const envSchema = z
  .object({
    AGENT_CATALOG_ROOT: z.preprocess(
      emptyToUndefined,
      z.string({ required_error: 'AGENT_CATALOG_ROOT is required' }),
    ),
    AGENT_OUTPUT_ROOT: z.preprocess(
      emptyToUndefined,
      z.string().default(path.join(os.tmpdir(), 'agent-orchestrator')),
    ),
    AGENT_TARGET_LANGUAGE: z.preprocess(emptyToUndefined, z.string().default('en')),
    // Empty means auto-detect, so no preprocessing here
    AGENT_SOURCE_LANGUAGE: z.string().trim().default(''),
    AGENT_STEP_TIMEOUT_MS: positiveInt(30 * 60 * 1000),
    AGENT_MAX_PARALLEL_STEPS: positiveInt(1),

    EMBEDDING_PROVIDER: z.preprocess(
      emptyToUndefined,
      z.enum(['openai', 'azure', 'keyword']).default('keyword'),
    ),
    EMBEDDING_MODEL: optionalString(),
    OPENAI_API_KEY: optionalString(),
    AZURE_OPENAI_ENDPOINT: z.preprocess(emptyToUndefined, z.string().url().optional()),
    AZURE_OPENAI_API_KEY: optionalString(),
    AZURE_OPENAI_API_VERSION: z.preprocess(
      emptyToUndefined,
      z.string().default(DEFAULT_AZURE_API_VERSION),
    ),
    VECTOR_STORE_PATH: optionalString(),

    RETRY_MAX_RETRIES: nonNegativeInt(3),
    RETRY_INITIAL_DELAY_MS: nonNegativeInt(1000),

    LOG_LEVEL: z.preprocess(
      emptyToUndefined,
      z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    ),
  })
  .superRefine((env, ctx) => {
    if (!isDirectory(env.AGENT_CATALOG_ROOT)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['AGENT_CATALOG_ROOT'],
        message: `AGENT_CATALOG_ROOT is not a directory: ${env.AGENT_CATALOG_ROOT}`,
      });
    }
    if (env.EMBEDDING_PROVIDER === 'openai' && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENAI_API_KEY'],
        message: 'OPENAI_API_KEY is required when EMBEDDING_PROVIDER=openai',
      });
    }
    if (env.EMBEDDING_PROVIDER === 'azure') {
      if (!env.AZURE_OPENAI_ENDPOINT) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['AZURE_OPENAI_ENDPOINT'],
          message: 'AZURE_OPENAI_ENDPOINT is required when EMBEDDING_PROVIDER=azure',
        });
      }
      if (!env.AZURE_OPENAI_API_KEY) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['AZURE_OPENAI_API_KEY'],
          message: 'AZURE_OPENAI_API_KEY is required when EMBEDDING_PROVIDER=azure',
        });
      }
    }
  });

export type EmbeddingSettings =
  | { provider: 'keyword' }
  | { provider: 'openai'; apiKey: string; model?: string }
  | { provider: 'azure'; endpoint: string; apiKey: string; apiVersion: string; model?: string };

export interface AppConfig {
  catalogRoot: string;
  outputRoot: string;
  targetLanguage: string;
  sourceLanguage: string;
  stepTimeoutMs: number;
  maxParallelSteps: number;
  embedding: EmbeddingSettings;
  /** SQLite file for embeddings; in-memory store when undefined */
  vectorStorePath?: string;
  retry: {
    maxRetries: number;
    initialDelayMs: number;
  };
  logLevel: string;
}

type ParsedEnv = z.infer<typeof envSchema>;

function toEmbeddingSettings(env: ParsedEnv): EmbeddingSettings {
  switch (env.EMBEDDING_PROVIDER) {
    case 'openai':
      return { provider: 'openai', apiKey: env.OPENAI_API_KEY ?? '', model: env.EMBEDDING_MODEL };
    case 'azure':
      return {
        provider: 'azure',
        endpoint: env.AZURE_OPENAI_ENDPOINT ?? '',
        apiKey: env.AZURE_OPENAI_API_KEY ?? '',
        apiVersion: env.AZURE_OPENAI_API_VERSION,
        model: env.EMBEDDING_MODEL,
      };
    default:
      return { provider: 'keyword' };
  }
}

/**
 * Validate the environment and build the application configuration
 *
 * @throws ConfigurationError listing every invalid or missing variable
 *
 * @example
 * ```typescript
 * import 'dotenv/config';
 * const config = loadConfig();
 * console.log(config.catalogRoot);
 * ```
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => {
        const key = issue.path.join('.');
        return issue.message.includes(key) || !key ? issue.message : `${key}: ${issue.message}`;
      }),
      parsed.error,
    );
  }

  const data = parsed.data;
  return {
    catalogRoot: path.resolve(data.AGENT_CATALOG_ROOT),
    outputRoot: path.resolve(data.AGENT_OUTPUT_ROOT),
    targetLanguage: data.AGENT_TARGET_LANGUAGE,
    sourceLanguage: data.AGENT_SOURCE_LANGUAGE,
    stepTimeoutMs: data.AGENT_STEP_TIMEOUT_MS,
    maxParallelSteps: data.AGENT_MAX_PARALLEL_STEPS,
    embedding: toEmbeddingSettings(data),
    vectorStorePath: data.VECTOR_STORE_PATH,
    retry: {
      maxRetries: data.RETRY_MAX_RETRIES,
      initialDelayMs: data.RETRY_INITIAL_DELAY_MS,
    },
    logLevel: data.LOG_LEVEL,
  };
}
