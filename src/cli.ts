import 'dotenv/config';
import readline from 'node:readline/promises';
import { randomUUID } from 'node:crypto';
import { stdin as input, stdout as output } from 'node:process';
import chalk from 'chalk';
import { createBookingAgent, loadAgentConfig } from './core/agent.js';
import { preloadPrompts } from './core/prompts.js';
import type { TurnResult } from './core/workflow.js';
import { createLogger } from './util/logging.js';

const log = createLogger({ mod: 'cli' });

const PHASE_COLORS: Record<TurnResult['phase'], (value: string) => string> = {
  INIT: chalk.gray,
  CANDIDATES_PRESENTED: chalk.cyan,
  FLIGHT_SELECTED: chalk.yellow,
  BOOKED: chalk.green,
};

function printBanner(): void {
  console.log(chalk.yellow.bold('✈️  Flight booking assistant'));
  console.log(chalk.gray('─'.repeat(60)));
  console.log(
    chalk.white('Search one-way flights, pick one and book it.\n') +
      chalk.blue('Commands: /reset (start over), /exit (quit)'),
  );
  console.log(chalk.gray('─'.repeat(60)));
  console.log();
}

function printResult(res: TurnResult): void {
  const phase = PHASE_COLORS[res.phase](`[${res.phase}]`);
  console.log(`${chalk.green.bold('Agent>')} ${phase}`);
  console.log(res.reply);
  if (res.error && res.outcome === 'failed') {
    console.log(chalk.red(`(${res.error.kind}: ${res.error.message})`));
  }
  console.log();
}

async function main(): Promise<void> {
  const cfg = loadAgentConfig();
  await preloadPrompts();
  const agent = createBookingAgent(cfg, { log });
  const rl = readline.createInterface({ input, output });
  let threadId = randomUUID();

  printBanner();
  try {
    while (true) {
      const q = (await rl.question(chalk.blue.bold('You> '))).trim();
      if (!q) continue;
      if (q === '/exit' || q.toLowerCase() === 'exit') break;
      if (q === '/reset') {
        const out = await agent.abandon(threadId);
        if (out.booking) console.log(chalk.gray(`Kept booking ${out.booking.bookingReference}.`));
        threadId = randomUUID();
        console.log(chalk.gray('Conversation reset.\n'));
        continue;
      }

      try {
        printResult(await agent.chat(q, threadId));
      } catch (error: unknown) {
        const details = error instanceof Error ? error.message : String(error);
        log.error({ threadId, error: details }, 'turn failed');
        console.log(chalk.red(`❌ Error processing request: ${details}\n`));
      }
    }
  } finally {
    rl.close();
  }
  await agent.abandon(threadId);
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'cli failed');
  process.exit(1);
});
