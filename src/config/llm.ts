import { z } from 'zod';

const DEFAULT_MODELS = ['gpt-4o-mini'];

const LlmConfigSchema = z.object({
  baseUrl: z.string().url().default('https://api.openai.com/v1'),
  apiKey: z.string().min(1).optional(),
  models: z.array(z.string().min(1)).min(1).default(DEFAULT_MODELS),
  temperature: z.coerce.number().min(0).max(2).default(0),
  maxTokens: z.coerce.number().int().positive().optional(),
  timeoutMs: z.coerce.number().int().min(100).default(15000),
  breakerThreshold: z.coerce.number().int().min(1).default(5),
  breakerResetMs: z.coerce.number().int().min(100).default(30000),
});

export type LlmConfig = z.infer<typeof LlmConfigSchema>;

function splitList(raw: string | undefined): string[] | undefined {
  if (!raw) return undefined;
  const items = raw.split(',').map((m) => m.trim()).filter(Boolean);
  return items.length > 0 ? items : undefined;
}

export function loadLlmConfig(env: NodeJS.ProcessEnv = process.env): LlmConfig {
  const models = splitList(env.LLM_MODELS);
  // LLM_MODEL is preferred and goes first in the fallback chain
  const preferred = env.LLM_MODEL?.trim();
  const chain = preferred
    ? [preferred, ...(models ?? DEFAULT_MODELS).filter((m) => m !== preferred)]
    : models;

  return LlmConfigSchema.parse({
    baseUrl: env.LLM_PROVIDER_BASEURL || undefined,
    apiKey: env.LLM_API_KEY || undefined,
    models: chain,
    temperature: env.LLM_TEMPERATURE || undefined,
    maxTokens: env.LLM_MAX_TOKENS || undefined,
    timeoutMs: env.LLM_TIMEOUT_MS || undefined,
    breakerThreshold: env.LLM_BREAKER_THRESHOLD || undefined,
    breakerResetMs: env.LLM_BREAKER_RESET_MS || undefined,
  });
}
