import 'dotenv/config';
import { createBookingAgent, loadAgentConfig } from '../core/agent.js';
import { preloadPrompts } from '../core/prompts.js';
import { loadServerConfig } from '../config/server.js';
import { createLogger } from '../util/logging.js';
import { createApp } from './app.js';

const log = createLogger();

async function main(): Promise<void> {
  const server = loadServerConfig();
  const cfg = loadAgentConfig();
  await preloadPrompts();
  const agent = createBookingAgent(cfg, { log });
  const app = createApp(agent, log, { bodyLimit: server.bodyLimit });
  app.listen(server.port, () => {
    log.info({ port: server.port, backend: cfg.backend.baseUrl, models: cfg.llm.models }, 'server listening');
  });
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'server failed to start');
  process.exit(1);
});
