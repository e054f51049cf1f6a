import {
  BrokenCircuitError,
  ConsecutiveBreaker,
  TaskCancelledError,
  TimeoutStrategy,
  circuitBreaker,
  handleAll,
  timeout,
  wrap,
} from 'cockatiel';
import { z } from 'zod';
import type { LlmConfig } from '../config/llm.js';
import { ModelUnavailableError } from '../tools/errors.js';
import { requestJSON, type FetchLike } from '../util/fetch.js';
import type { Logger } from '../util/logging.js';
import { silentLogger } from '../util/logging.js';

export type SchemaHint = 'json' | 'text';

export interface CompleteOptions {
  schemaHint: SchemaHint;
  signal?: AbortSignal;
}

/** Text-in, text-out language model. Output is untrusted. */
export interface LanguageModel {
  complete(prompt: string, opts: CompleteOptions): Promise<string>;
}

const ChatCompletion = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable().optional() }) }))
    .min(1),
});

// Simple token counter (approximate, for logs only)
function countTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/** One breaker per model, so a failing primary does not shut out its fallbacks. */
function buildPolicy(cfg: LlmConfig) {
  const breaker = circuitBreaker(handleAll, {
    halfOpenAfter: cfg.breakerResetMs,
    breaker: new ConsecutiveBreaker(cfg.breakerThreshold),
  });
  return wrap(breaker, timeout(cfg.timeoutMs, TimeoutStrategy.Aggressive));
}

/**
 * Client for an OpenAI-compatible `/chat/completions` endpoint. Models are
 * tried in configured order; the first non-empty answer wins.
 */
export class OpenAICompatibleModel implements LanguageModel {
  private readonly log: Logger;
  private readonly policies = new Map<string, ReturnType<typeof buildPolicy>>();
  private readonly url: string;

  constructor(
    private readonly cfg: LlmConfig,
    private readonly deps: { fetchImpl?: FetchLike; log?: Logger } = {},
  ) {
    this.log = deps.log ?? silentLogger();
    this.url = `${cfg.baseUrl.replace(/\/$/, '')}/chat/completions`;
  }

  async complete(prompt: string, opts: CompleteOptions): Promise<string> {
    const apiKey = this.cfg.apiKey;
    if (!apiKey) throw new ModelUnavailableError('LLM_API_KEY is not set');
    this.log.debug({ tokens: countTokens(prompt), format: opts.schemaHint }, 'llm call');

    let lastFailure = 'no models configured';
    let open = 0;
    for (const model of this.cfg.models) {
      if (opts.signal?.aborted) throw new ModelUnavailableError('model call aborted');
      try {
        const content = await this.policyFor(model).execute(
          ({ signal }) => this.request(apiKey, model, prompt, opts.schemaHint, signal),
          opts.signal,
        );
        if (content) {
          this.log.debug({ model, tokens: countTokens(content) }, 'llm call succeeded');
          return content;
        }
        lastFailure = `${model} returned empty content`;
      } catch (error: unknown) {
        if (error instanceof BrokenCircuitError) {
          open++;
          lastFailure = `${model} circuit is open`;
          continue;
        }
        lastFailure = error instanceof TaskCancelledError ? `${model} timed out` : `${model} failed`;
        this.log.debug({ model, error: error instanceof Error ? error.message : String(error) }, 'llm model failed');
      }
    }
    if (open > 0 && open === this.cfg.models.length) throw new ModelUnavailableError('language model circuit is open');
    this.log.warn({ models: this.cfg.models.length }, 'all language models failed');
    throw new ModelUnavailableError(lastFailure);
  }

  private policyFor(model: string): ReturnType<typeof buildPolicy> {
    let policy = this.policies.get(model);
    if (!policy) {
      policy = buildPolicy(this.cfg);
      this.policies.set(model, policy);
    }
    return policy;
  }

  private async request(
    apiKey: string,
    model: string,
    prompt: string,
    hint: SchemaHint,
    signal: AbortSignal,
  ): Promise<string> {
    const raw = await requestJSON(this.url, {
      method: 'POST',
      headers: { Authorization: `Bearer ${apiKey}` },
      body: {
        model,
        messages: [{ role: 'user', content: prompt }],
        temperature: this.cfg.temperature,
        ...(this.cfg.maxTokens !== undefined && { max_tokens: this.cfg.maxTokens }),
        ...(hint === 'json' && { response_format: { type: 'json_object' } }),
      },
      signal,
      fetchImpl: this.deps.fetchImpl,
      target: 'llm',
      log: this.log,
    });
    const parsed = ChatCompletion.safeParse(raw);
    if (!parsed.success) throw new Error('malformed completion response');
    return (parsed.data.choices[0]?.message.content ?? '').trim();
  }
}
