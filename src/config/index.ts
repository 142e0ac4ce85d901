/**
 * Runtime configuration, read from the environment (`.env` is loaded by the
 * entry point through dotenv) and validated with zod.
 */

import { z } from 'zod';
import { OPENAI_DEFAULT_BASE_URL } from '../llm/openai.js';
import type { ModelProviderName } from '../llm/types.js';

const TRUTHY_FLAGS = ['1', 'true', 'yes', 'on'];

// Unset and blank variables both fall back to the default
function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

const flag = z
  .string()
  .optional()
  .transform((value) => TRUTHY_FLAGS.includes((value ?? '').trim().toLowerCase()));

const envSchema = z.object({
  MODEL_PROVIDER: z.preprocess(blankToUndefined, z.enum(['openai', 'anthropic']).default('openai')),
  MODEL_NAME: z.preprocess(blankToUndefined, z.string().optional()),
  OPENAI_API_KEY: z.string().default(''),
  OPENAI_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default(OPENAI_DEFAULT_BASE_URL)),
  ANTHROPIC_API_KEY: z.string().default(''),
  AGENT_MAX_ROUNDS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(10)),
  SCHEMA_MAX_DEPTH: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(10)),
  AGENT_MEMORY: flag,
  DEBUG_LLM: flag,
});

export interface AppConfig {
  provider: ModelProviderName;
  model?: string;
  openaiApiKey: string;
  openaiBaseUrl: string;
  anthropicApiKey: string;
  maxRounds: number;
  schemaMaxDepth: number;
  memory: boolean;
  debugLlm: boolean;
}

export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }

  const values = parsed.data;
  return {
    provider: values.MODEL_PROVIDER,
    model: values.MODEL_NAME,
    openaiApiKey: values.OPENAI_API_KEY,
    openaiBaseUrl: values.OPENAI_BASE_URL,
    anthropicApiKey: values.ANTHROPIC_API_KEY,
    maxRounds: values.AGENT_MAX_ROUNDS,
    schemaMaxDepth: values.SCHEMA_MAX_DEPTH,
    memory: values.AGENT_MEMORY,
    debugLlm: values.DEBUG_LLM,
  };
}
