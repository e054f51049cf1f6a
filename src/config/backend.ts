import { z } from 'zod';

const BackendConfigSchema = z.object({
  baseUrl: z.string().url().default('http://localhost:8080/api/v1'),
  userId: z.coerce.number().int().positive().default(1),
  apiKey: z.string().min(1).optional(),
});

export type BackendConfig = z.infer<typeof BackendConfigSchema>;

export function loadBackendConfig(env: NodeJS.ProcessEnv = process.env): BackendConfig {
  return BackendConfigSchema.parse({
    baseUrl: env.BOOKING_BACKEND_URL || undefined,
    userId: env.BOOKING_USER_ID || undefined,
    apiKey: env.BOOKING_BACKEND_API_KEY || undefined,
  });
}
