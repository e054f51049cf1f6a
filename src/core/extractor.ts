import { TaskCancelledError, TimeoutStrategy, timeout, type TimeoutPolicy } from 'cockatiel';
import type { ModelPolicyConfig } from '../config/resilience.js';
import type { ChatMessageT } from '../schemas/chat.js';
import { ExtractionParseError, ModelUnavailableError, SchemaValidationError } from '../tools/errors.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ToolArgs } from '../tools/types.js';
import type { Logger } from '../util/logging.js';
import { silentLogger } from '../util/logging.js';
import type { LanguageModel } from './llm.js';
import { parseCandidate } from './parsers.js';
import { fillPrompt, getPrompt } from './prompts.js';

export interface ExtractionRequest {
  utterance: string;
  tool: string;
  history?: readonly ChatMessageT[];
  /** Arguments the caller already knows; they win over anything the model says. */
  known?: ToolArgs;
  /** Values from earlier turns; used only where the model leaves a field out. */
  defaults?: ToolArgs;
  signal?: AbortSignal;
}

const HISTORY_WINDOW = 6;

function renderHistory(history: readonly ChatMessageT[] | undefined): string {
  if (!history || history.length === 0) return '(none)';
  return history
    .slice(-HISTORY_WINDOW)
    .map((m) => `${m.role === 'user' ? 'User' : 'Assistant'}: ${m.content}`)
    .join('\n');
}

function describeProblem(error: ExtractionParseError | SchemaValidationError): string {
  if (error instanceof SchemaValidationError) {
    return `these fields are missing or invalid: ${error.issues.map((i) => `${i.field} (${i.reason})`).join('; ')}`;
  }
  return error.message;
}

/**
 * Converts free text into validated arguments for one tool. Model output is
 * untrusted: it is parsed, merged with known arguments and validated through
 * the registry, with a bounded number of corrective re-prompts.
 */
export class ParameterExtractor {
  private readonly log: Logger;
  private readonly modelTimeout: TimeoutPolicy;

  constructor(
    private readonly model: LanguageModel,
    private readonly registry: ToolRegistry,
    private readonly policy: Pick<ModelPolicyConfig, 'extractionRetries' | 'extractionTimeoutMs'>,
    private readonly opts: { log?: Logger; now?: () => Date } = {},
  ) {
    this.log = opts.log ?? silentLogger();
    this.modelTimeout = timeout(policy.extractionTimeoutMs, TimeoutStrategy.Aggressive);
  }

  async extract(req: ExtractionRequest): Promise<ToolArgs> {
    const fields = this.registry.fieldNames(req.tool);
    const known = req.known ?? {};
    const defaults = req.defaults ?? {};
    const today = (this.opts.now?.() ?? new Date()).toISOString().slice(0, 10);
    const base = fillPrompt(await getPrompt('slot_extractor'), {
      tool: req.tool,
      fields: this.registry.describe(req.tool),
      known: Object.keys(known).length > 0 ? JSON.stringify(known) : '(nothing)',
      defaults: Object.keys(defaults).length > 0 ? JSON.stringify(defaults) : '(nothing)',
      today,
      history: renderHistory(req.history),
      utterance: req.utterance,
    });

    let prompt = base;
    for (let attempt = 0; ; attempt++) {
      const text = await this.ask(prompt, req.signal);
      try {
        const candidate = parseCandidate(text, fields);
        const args = this.registry.validate(req.tool, { ...defaults, ...candidate, ...known });
        this.log.debug({ tool: req.tool, attempt, fields: Object.keys(args) }, 'extraction succeeded');
        return args;
      } catch (error: unknown) {
        if (!(error instanceof ExtractionParseError || error instanceof SchemaValidationError)) throw error;
        if (attempt >= this.policy.extractionRetries) {
          this.log.info({ tool: req.tool, attempts: attempt + 1, code: error.code }, 'extraction failed');
          throw error;
        }
        this.log.debug({ tool: req.tool, attempt, code: error.code }, 'extraction rejected, re-prompting');
        const correction = fillPrompt(await getPrompt('extraction_retry'), {
          problem: describeProblem(error),
          previous: text,
        });
        prompt = `${base}\n\n${correction}`;
      }
    }
  }

  private async ask(prompt: string, signal?: AbortSignal): Promise<string> {
    try {
      return await this.modelTimeout.execute(
        ({ signal: bounded }) => this.model.complete(prompt, { schemaHint: 'json', signal: bounded }),
        signal,
      );
    } catch (error: unknown) {
      if (error instanceof ModelUnavailableError) throw error;
      if (error instanceof TaskCancelledError) throw new ModelUnavailableError('extraction timed out');
      throw new ModelUnavailableError(error instanceof Error ? error.message : 'model call failed');
    }
  }
}
