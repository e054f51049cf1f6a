import { z } from 'zod';

const SessionConfigSchema = z.object({
  kind: z.enum(['memory']).default('memory'),
  ttlSec: z.coerce.number().min(60).default(3600),
  maxMessages: z.coerce.number().int().min(2).default(20),
});

export type SessionConfig = z.infer<typeof SessionConfigSchema>;

export function loadSessionConfig(env: NodeJS.ProcessEnv = process.env): SessionConfig {
  return SessionConfigSchema.parse({
    kind: env.SESSION_STORE || undefined,
    ttlSec: env.SESSION_TTL_SEC || undefined,
    maxMessages: env.SESSION_MAX_MESSAGES || undefined,
  });
}
