import { z } from 'zod';

export const GatewayConfigSchema = z.object({
  /** Total attempts for read-only tools, first call included. */
  readAttempts: z.coerce.number().int().min(1).max(10).default(3),
  initialDelayMs: z.coerce.number().int().min(0).default(200),
  maxDelayMs: z.coerce.number().int().min(1).default(4000),
  readTimeoutMs: z.coerce.number().int().min(10).default(10000),
  writeTimeoutMs: z.coerce.number().int().min(10).default(20000),
  maxConcurrent: z.coerce.number().int().min(1).default(4),
});

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;

export const ModelPolicyConfigSchema = z.object({
  extractionRetries: z.coerce.number().int().min(0).max(3).default(1),
  extractionTimeoutMs: z.coerce.number().int().min(10).default(15000),
  classifierTimeoutMs: z.coerce.number().int().min(10).default(8000),
});

export type ModelPolicyConfig = z.infer<typeof ModelPolicyConfigSchema>;

export function loadGatewayConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  return GatewayConfigSchema.parse({
    readAttempts: env.BACKEND_READ_ATTEMPTS || undefined,
    initialDelayMs: env.BACKEND_RETRY_INITIAL_MS || undefined,
    maxDelayMs: env.BACKEND_RETRY_MAX_MS || undefined,
    readTimeoutMs: env.BACKEND_READ_TIMEOUT_MS || undefined,
    writeTimeoutMs: env.BACKEND_WRITE_TIMEOUT_MS || undefined,
    maxConcurrent: env.BACKEND_MAX_CONCURRENT || undefined,
  });
}

export function loadModelPolicyConfig(env: NodeJS.ProcessEnv = process.env): ModelPolicyConfig {
  return ModelPolicyConfigSchema.parse({
    extractionRetries: env.EXTRACTION_RETRIES || undefined,
    extractionTimeoutMs: env.EXTRACTION_TIMEOUT_MS || undefined,
    classifierTimeoutMs: env.CLASSIFIER_TIMEOUT_MS || undefined,
  });
}
