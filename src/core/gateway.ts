import {
  ExponentialBackoff,
  TaskCancelledError,
  TimeoutStrategy,
  handleWhen,
  retry,
  timeout,
  wrap,
} from 'cockatiel';
import Bottleneck from 'bottleneck';
import { z } from 'zod';
import type { GatewayConfig } from '../config/resilience.js';
import { DECLINED_STATUSES } from '../schemas/flights.js';
import { UnknownToolError, toStdError } from '../tools/errors.js';
import type { BackendOperation } from '../tools/flight_tools.js';
import type { ToolDispatcher, ToolError, ToolResult, ValidatedToolCall } from '../tools/types.js';
import { BackendHttpError, isTransientError } from '../util/fetch.js';
import type { Logger } from '../util/logging.js';
import { silentLogger } from '../util/logging.js';

const StatusField = z.object({ status: z.string() });

function declinedStatus(data: unknown): string | undefined {
  const parsed = StatusField.safeParse(data);
  if (!parsed.success) return undefined;
  const status = parsed.data.status.toUpperCase();
  return DECLINED_STATUSES.has(status) ? status : undefined;
}

function isRetryable(error: Error): boolean {
  return error instanceof TaskCancelledError || isTransientError(error);
}

function isClientError(error: unknown): error is BackendHttpError {
  return error instanceof BackendHttpError && error.status >= 400 && error.status < 500 && error.status !== 429;
}

function buildPolicies(cfg: GatewayConfig, log: Logger) {
  const retryPolicy = retry(handleWhen(isRetryable), {
    maxAttempts: cfg.readAttempts - 1,
    backoff: new ExponentialBackoff({ initialDelay: cfg.initialDelayMs, maxDelay: cfg.maxDelayMs }),
  });
  retryPolicy.onRetry((event) => log.debug({ delay: event.delay }, 'retrying read call'));
  return {
    read: wrap(retryPolicy, timeout(cfg.readTimeoutMs, TimeoutStrategy.Aggressive)),
    write: timeout(cfg.writeTimeoutMs, TimeoutStrategy.Aggressive),
  };
}

/**
 * Executes validated tool calls against the reservation backend. Reads are
 * retried on transient failures; writes go out exactly once and any outcome
 * that cannot be classified is reported as `ambiguous`.
 */
export class BackendGateway implements ToolDispatcher {
  private readonly log: Logger;
  private readonly limiter: Bottleneck;
  private readonly policies: ReturnType<typeof buildPolicies>;

  constructor(
    private readonly operations: Readonly<Record<string, BackendOperation>>,
    cfg: GatewayConfig,
    opts: { log?: Logger } = {},
  ) {
    this.log = opts.log ?? silentLogger();
    this.limiter = new Bottleneck({ maxConcurrent: cfg.maxConcurrent });
    this.policies = buildPolicies(cfg, this.log);
  }

  async call(call: ValidatedToolCall): Promise<ToolResult> {
    const operation = this.operations[call.tool];
    if (!operation) throw new UnknownToolError(call.tool);
    const write = call.spec.effect === 'write';
    const start = Date.now();

    let raw: unknown;
    try {
      raw = await this.limiter.schedule(() =>
        write
          ? this.policies.write.execute(({ signal }) => operation(call.args, signal))
          : this.policies.read.execute(({ signal }) => operation(call.args, signal)),
      );
    } catch (error: unknown) {
      const failure = write ? this.classifyWriteFailure(error) : this.classifyReadFailure(error);
      const std = toStdError(error, call.tool);
      this.log.warn(
        { tool: call.tool, kind: failure.kind, code: std.code, ms: Date.now() - start },
        'backend call failed',
      );
      return { success: false, tool: call.tool, error: failure };
    }

    const parsed = call.spec.result.safeParse(raw);
    if (!parsed.success) {
      this.log.warn({ tool: call.tool, issues: parsed.error.issues.length }, 'backend result rejected by schema');
      return {
        success: false,
        tool: call.tool,
        error: write
          ? { kind: 'ambiguous', message: 'unrecognized booking response' }
          : { kind: 'unavailable', message: 'unrecognized backend response' },
      };
    }

    if (write) {
      const status = declinedStatus(parsed.data);
      if (status) {
        this.log.info({ tool: call.tool, status }, 'booking declined by backend');
        return { success: false, tool: call.tool, error: { kind: 'declined', message: `booking ${status.toLowerCase()}` } };
      }
    }

    this.log.debug({ tool: call.tool, ms: Date.now() - start }, 'backend call succeeded');
    return { success: true, tool: call.tool, data: parsed.data };
  }

  private classifyWriteFailure(error: unknown): ToolError {
    if (error instanceof BackendHttpError && error.status < 500) {
      return { kind: 'declined', message: describeHttpFailure(error), status: error.status };
    }
    if (error instanceof BackendHttpError) {
      return { kind: 'ambiguous', message: describeHttpFailure(error), status: error.status };
    }
    if (error instanceof TaskCancelledError) return { kind: 'ambiguous', message: 'booking request timed out' };
    return { kind: 'ambiguous', message: error instanceof Error ? error.message : 'booking request failed' };
  }

  private classifyReadFailure(error: unknown): ToolError {
    if (isClientError(error)) {
      return { kind: 'declined', message: describeHttpFailure(error), status: error.status };
    }
    if (error instanceof BackendHttpError) {
      return { kind: 'unavailable', message: describeHttpFailure(error), status: error.status };
    }
    if (error instanceof TaskCancelledError) return { kind: 'unavailable', message: 'backend timed out' };
    return { kind: 'unavailable', message: error instanceof Error ? error.message : 'backend unavailable' };
  }
}

function describeHttpFailure(error: BackendHttpError): string {
  const detail = error.body.trim();
  return detail ? `${error.message}: ${detail.slice(0, 200)}` : error.message;
}
