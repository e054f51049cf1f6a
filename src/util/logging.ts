import pino from 'pino';
import { scrubMessage, scrubPII } from './redact.js';

export type Logger = pino.Logger;

/**
 * Creates a pino logger with passenger PII redaction unless LOG_LEVEL=debug.
 */
export function createLogger(bindings?: Record<string, unknown>): Logger {
  const level = process.env.LOG_LEVEL ?? 'info';
  const redactEnabled = level !== 'debug';

  const log = pino({
    level,
    hooks: {
      logMethod(args, method) {
        const scrubbed = args.map((a: unknown) =>
          typeof a === 'string' ? scrubMessage(a, redactEnabled) : scrubPII(a, redactEnabled),
        );
        // pino's hook signature is variadic over mixed objects and strings
        method.apply(this, scrubbed as Parameters<typeof method>);
      },
    },
  });
  return bindings ? log.child(bindings) : log;
}

/**
 * Logger that drops everything; the default for components built without one.
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
