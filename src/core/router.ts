import { TimeoutStrategy, timeout, type TimeoutPolicy } from 'cockatiel';
import type { PhaseT } from '../schemas/conversation.js';
import { INTENT_LABELS, type IntentT } from '../schemas/intent.js';
import type { Logger } from '../util/logging.js';
import { silentLogger } from '../util/logging.js';
import type { LanguageModel } from './llm.js';
import { fillPrompt, getPrompt } from './prompts.js';
import { classifyByHeuristics, type HeuristicContext } from './router.optimizers.js';

export interface ClassifyContext extends HeuristicContext {
  signal?: AbortSignal;
}

const PHASE_HINTS: Record<PhaseT, string> = {
  INIT: 'No flights have been shown yet.',
  CANDIDATES_PRESENTED: 'A numbered list of flights has been shown; the user may pick one.',
  FLIGHT_SELECTED: 'One flight is selected and waits for confirmation.',
  BOOKED: 'The flight is booked.',
};

/** Accepts a bare label, tolerating case, quotes and trailing punctuation. */
export function parseIntentLabel(text: string): IntentT {
  const cleaned = text.trim().replace(/^["'`*\s]+|["'`*.!\s]+$/g, '').toUpperCase();
  return INTENT_LABELS.find((label) => label === cleaned) ?? 'UNKNOWN';
}

export class IntentClassifier {
  private readonly log: Logger;
  private readonly modelTimeout: TimeoutPolicy;

  constructor(
    private readonly model: LanguageModel,
    opts: { timeoutMs: number; log?: Logger },
  ) {
    this.log = opts.log ?? silentLogger();
    this.modelTimeout = timeout(opts.timeoutMs, TimeoutStrategy.Aggressive);
  }

  /** Never rejects: every failure is reported as UNKNOWN. */
  async classify(utterance: string, phase: PhaseT, ctx: ClassifyContext = {}): Promise<IntentT> {
    const heuristic = classifyByHeuristics(utterance, phase, ctx);
    if (heuristic) {
      this.log.debug({ phase, intent: heuristic, via: 'heuristic' }, 'intent classified');
      return heuristic;
    }

    try {
      const prompt = fillPrompt(await getPrompt('intent_classifier'), {
        phase,
        context: PHASE_HINTS[phase],
        utterance: utterance.trim(),
      });
      const raw = await this.modelTimeout.execute(
        ({ signal }) => this.model.complete(prompt, { schemaHint: 'text', signal }),
        ctx.signal,
      );
      const intent = parseIntentLabel(raw);
      this.log.debug({ phase, intent, via: 'model' }, 'intent classified');
      return intent;
    } catch (error: unknown) {
      this.log.warn({ phase, error: error instanceof Error ? error.message : String(error) }, 'intent model failed');
      return 'UNKNOWN';
    }
  }
}
