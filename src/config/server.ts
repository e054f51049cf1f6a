import { z } from 'zod';

const ServerConfigSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(3000),
  bodyLimit: z.string().default('64kb'),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return ServerConfigSchema.parse({
    port: env.PORT || undefined,
    bodyLimit: env.HTTP_BODY_LIMIT || undefined,
  });
}
