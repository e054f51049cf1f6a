import { randomUUID } from 'node:crypto';
import Bottleneck from 'bottleneck';
import { loadBackendConfig, type BackendConfig } from '../config/backend.js';
import { loadLlmConfig, type LlmConfig } from '../config/llm.js';
import {
  loadGatewayConfig,
  loadModelPolicyConfig,
  type GatewayConfig,
  type ModelPolicyConfig,
} from '../config/resilience.js';
import { loadSessionConfig, type SessionConfig } from '../config/session.js';
import { createFlightOperations, registerFlightTools } from '../tools/flight_tools.js';
import { ToolRegistry } from '../tools/registry.js';
import type { FetchLike } from '../util/fetch.js';
import type { Logger } from '../util/logging.js';
import { silentLogger } from '../util/logging.js';
import { HttpBookingBackend, type BookingBackend } from '../vendors/booking_client.js';
import { ParameterExtractor } from './extractor.js';
import { BackendGateway } from './gateway.js';
import { OpenAICompatibleModel, type LanguageModel } from './llm.js';
import { IntentClassifier } from './router.js';
import { createStore, type ConversationStore } from './session_store.js';
import { BookingWorkflow, type AbandonResult, type TurnResult } from './workflow.js';

export interface AgentConfig {
  backend: BackendConfig;
  llm: LlmConfig;
  gateway: GatewayConfig;
  models: ModelPolicyConfig;
  session: SessionConfig;
}

export function loadAgentConfig(env: NodeJS.ProcessEnv = process.env): AgentConfig {
  return {
    backend: loadBackendConfig(env),
    llm: loadLlmConfig(env),
    gateway: loadGatewayConfig(env),
    models: loadModelPolicyConfig(env),
    session: loadSessionConfig(env),
  };
}

/**
 * Conversation-facing entry point. Turns of one thread run strictly one after
 * another; different threads run concurrently.
 */
export class BookingAgent {
  private readonly turns = new Bottleneck.Group({ maxConcurrent: 1 });
  private readonly log: Logger;
  private readonly newThreadId: () => string;

  constructor(
    private readonly workflow: BookingWorkflow,
    private readonly store: ConversationStore,
    private readonly opts: { historyLimit: number; log?: Logger; newThreadId?: () => string },
  ) {
    this.log = opts.log ?? silentLogger();
    this.newThreadId = opts.newThreadId ?? randomUUID;
  }

  async chat(message: string, threadId?: string, signal?: AbortSignal): Promise<TurnResult> {
    const id = threadId ?? this.newThreadId();
    return this.turns.key(id).schedule(() => this.runTurn(id, message, signal));
  }

  /** Runs after the thread's queued turns, so none of them revives the conversation. */
  async abandon(threadId: string): Promise<AbandonResult> {
    return this.turns.key(threadId).schedule(() => this.workflow.abandon(threadId));
  }

  private async runTurn(id: string, message: string, signal?: AbortSignal): Promise<TurnResult> {
    const start = Date.now();
    const history = await this.store.getMsgs(id, this.opts.historyLimit);
    const result = await this.workflow.handleTurn({ conversationId: id, utterance: message, history, signal });
    await this.store.appendMsg(id, { role: 'user', content: message });
    await this.store.appendMsg(id, { role: 'assistant', content: result.reply });
    this.log.debug({ threadId: id, outcome: result.outcome, ms: Date.now() - start }, 'turn done');
    return result;
  }
}

export interface AgentDeps {
  model?: LanguageModel;
  backend?: BookingBackend;
  store?: ConversationStore;
  fetchImpl?: FetchLike;
  log?: Logger;
  now?: () => number;
  newBookingKey?: () => string;
  newThreadId?: () => string;
}

export function createBookingAgent(cfg: AgentConfig, deps: AgentDeps = {}): BookingAgent {
  const log = deps.log ?? silentLogger();
  const backend =
    deps.backend ?? new HttpBookingBackend(cfg.backend, { fetchImpl: deps.fetchImpl, log: log.child({ mod: 'backend' }) });
  const model =
    deps.model ?? new OpenAICompatibleModel(cfg.llm, { fetchImpl: deps.fetchImpl, log: log.child({ mod: 'llm' }) });
  const store = deps.store ?? createStore(cfg.session, { now: deps.now });

  const gateway = new BackendGateway(createFlightOperations(backend, { userId: cfg.backend.userId }), cfg.gateway, {
    log: log.child({ mod: 'gateway' }),
  });
  const registry = new ToolRegistry(gateway, { log: log.child({ mod: 'registry' }) });
  registerFlightTools(registry);

  const workflow = new BookingWorkflow({
    registry,
    extractor: new ParameterExtractor(model, registry, cfg.models, { log: log.child({ mod: 'extractor' }) }),
    classifier: new IntentClassifier(model, { timeoutMs: cfg.models.classifierTimeoutMs, log: log.child({ mod: 'router' }) }),
    store,
    userId: cfg.backend.userId,
    log: log.child({ mod: 'workflow' }),
    now: deps.now,
    newBookingKey: deps.newBookingKey,
  });
  return new BookingAgent(workflow, store, {
    historyLimit: cfg.session.maxMessages,
    log,
    newThreadId: deps.newThreadId,
  });
}
