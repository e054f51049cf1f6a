import { randomUUID } from 'node:crypto';
import type { ChatMessageT } from '../schemas/chat.js';
import { initialState, type ConversationStateT, type PhaseT } from '../schemas/conversation.js';
import {
  BookingConfirmation,
  BookingList,
  FlightOfferList,
  type BookingConfirmationT,
  type FlightOfferT,
  type PassengerT,
  type SearchCriteriaT,
} from '../schemas/flights.js';
import type { IntentT } from '../schemas/intent.js';
import {
  ExtractionParseError,
  ModelUnavailableError,
  SchemaValidationError,
  type FieldIssue,
} from '../tools/errors.js';
import {
  BOOK_FLIGHT,
  BookFlightArgs,
  GET_BOOKING_DETAILS,
  GET_MY_BOOKINGS,
  SEARCH_FLIGHTS,
  SearchFlightsArgs,
} from '../tools/flight_tools.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ToolArgs, ToolError } from '../tools/types.js';
import type { Logger } from '../util/logging.js';
import { silentLogger } from '../util/logging.js';
import * as reply from './composers.js';
import type { ParameterExtractor } from './extractor.js';
import { resolveSelection } from './option_ranker.js';
import type { IntentClassifier } from './router.js';
import { detectBookingLookup, hasPassengerSlots, type BookingLookup } from './router.optimizers.js';
import type { ConversationStore } from './session_store.js';

export type TurnOutcome =
  | 'searched'
  | 'no_results'
  | 'selected'
  | 'disambiguate'
  | 'booked'
  | 'already_booked'
  | 'needs_details'
  | 'ambiguous'
  | 'declined'
  | 'cancelled'
  | 'clarify'
  | 'bookings'
  | 'failed';

export interface TurnInput {
  conversationId: string;
  utterance: string;
  history?: readonly ChatMessageT[];
  signal?: AbortSignal;
}

export interface TurnResult {
  conversationId: string;
  intent: IntentT;
  phase: PhaseT;
  outcome: TurnOutcome;
  reply: string;
  candidates?: FlightOfferT[];
  selectedFlight?: FlightOfferT;
  booking?: BookingConfirmationT;
  bookings?: BookingConfirmationT[];
  error?: { kind: string; message: string; issues?: FieldIssue[] };
}

export interface AbandonResult {
  conversationId: string;
  /** Phase the conversation was in when it was torn down. */
  phase?: PhaseT;
  booking?: BookingConfirmationT;
  /** True when a booking attempt was still unresolved at teardown. */
  bookingUnresolved: boolean;
}

export interface WorkflowDeps {
  registry: ToolRegistry;
  extractor: ParameterExtractor;
  classifier: IntentClassifier;
  store: ConversationStore;
  userId: number;
  log?: Logger;
  now?: () => number;
  newBookingKey?: () => string;
}

type ExtractOutcome = { ok: true; args: ToolArgs } | { ok: false; result: Omit<TurnResult, 'conversationId' | 'intent' | 'phase'> };

function criteriaFromArgs(raw: ToolArgs): SearchCriteriaT {
  const args = SearchFlightsArgs.parse(raw);
  return {
    origin: args.origin,
    destination: args.destination,
    departDate: args.depart_date,
    ...(args.adults !== undefined && { adults: args.adults }),
    ...(args.cabin !== undefined && { cabin: args.cabin }),
    ...(args.max_price !== undefined && { maxPrice: args.max_price }),
    ...(args.non_stop !== undefined && { nonStop: args.non_stop }),
  };
}

function criteriaToArgs(criteria: SearchCriteriaT): ToolArgs {
  return {
    origin: criteria.origin,
    destination: criteria.destination,
    depart_date: criteria.departDate,
    ...(criteria.adults !== undefined && { adults: criteria.adults }),
    ...(criteria.cabin !== undefined && { cabin: criteria.cabin }),
    ...(criteria.maxPrice !== undefined && { max_price: criteria.maxPrice }),
    ...(criteria.nonStop !== undefined && { non_stop: criteria.nonStop }),
  };
}

function passengerFromArgs(raw: ToolArgs): PassengerT {
  const args = BookFlightArgs.parse(raw);
  return {
    firstName: args.first_name,
    lastName: args.last_name,
    dob: args.dob,
    travellerClass: args.traveller_class,
  };
}

function passengerToArgs(passenger: PassengerT): ToolArgs {
  return {
    first_name: passenger.firstName,
    last_name: passenger.lastName,
    dob: passenger.dob,
    traveller_class: passenger.travellerClass,
  };
}

/** Clears everything that belongs to one selection. */
function withoutSelection(state: ConversationStateT): ConversationStateT {
  return {
    ...state,
    selectedFlight: undefined,
    confirmed: false,
    bookingKey: undefined,
    pendingBooking: 'none',
  };
}

/**
 * Drives one conversation through INIT → CANDIDATES_PRESENTED →
 * FLIGHT_SELECTED → BOOKED. Each turn works on a copy of the stored state and
 * writes it back only after a successful transition.
 */
export class BookingWorkflow {
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly newBookingKey: () => string;
  private readonly inFlight = new Map<string, Promise<TurnResult>>();

  constructor(private readonly deps: WorkflowDeps) {
    this.log = deps.log ?? silentLogger();
    this.now = deps.now ?? Date.now;
    this.newBookingKey = deps.newBookingKey ?? randomUUID;
  }

  async handleTurn(input: TurnInput): Promise<TurnResult> {
    const id = input.conversationId;
    const state = (await this.deps.store.getState(id)) ?? initialState(id, this.now());
    const intent = await this.deps.classifier.classify(input.utterance, state.phase, {
      candidates: state.candidates,
      awaitingPassenger: state.phase === 'FLIGHT_SELECTED' && !state.passenger,
      signal: input.signal,
    });
    this.log.info({ conversationId: id, phase: state.phase, intent }, 'turn');

    switch (intent) {
      case 'CANCEL':
        return this.cancel(state);
      case 'SEARCH':
        return this.search(state, input);
      case 'SELECT':
        return this.select(state, input);
      case 'CONFIRM':
        return this.confirm(state, input);
      case 'UNKNOWN': {
        const lookup = detectBookingLookup(input.utterance);
        if (lookup) return this.lookup(state, lookup);
        return this.result(state, 'UNKNOWN', { outcome: 'clarify', reply: reply.composeClarify(state.phase) });
      }
    }
  }

  /**
   * Tears a conversation down. A booking that is in flight is awaited first,
   * so its outcome is reported instead of being lost.
   */
  async abandon(conversationId: string): Promise<AbandonResult> {
    const pending = this.inFlight.get(conversationId);
    if (pending) {
      this.log.info({ conversationId }, 'abandon waits for in-flight booking');
      const [settled] = await Promise.allSettled([pending]);
      if (settled?.status === 'rejected') {
        this.log.warn({ conversationId, error: String(settled.reason) }, 'in-flight booking turn failed');
      }
    }
    const state = await this.deps.store.getState(conversationId);
    await this.deps.store.clear(conversationId);
    this.log.info({ conversationId, phase: state?.phase }, 'conversation abandoned');
    return {
      conversationId,
      ...(state && { phase: state.phase }),
      ...(state?.booking && { booking: state.booking }),
      bookingUnresolved: state?.pendingBooking === 'ambiguous',
    };
  }

  hasBookingInFlight(conversationId: string): boolean {
    return this.inFlight.has(conversationId);
  }

  private async cancel(state: ConversationStateT): Promise<TurnResult> {
    const next = initialState(state.conversationId, this.now());
    await this.commit(next);
    return this.result(next, 'CANCEL', { outcome: 'cancelled', reply: reply.composeCancelled() });
  }

  /** Answers "show my bookings" or "booking BK123" from the backend; the phase never moves. */
  private async lookup(state: ConversationStateT, lookup: BookingLookup): Promise<TurnResult> {
    const result =
      lookup.kind === 'details'
        ? await this.deps.registry.dispatch(GET_BOOKING_DETAILS, { booking_reference: lookup.reference })
        : await this.deps.registry.dispatch(GET_MY_BOOKINGS, { user_id: this.deps.userId });
    if (!result.success) {
      if (lookup.kind === 'details' && result.error.kind === 'declined') {
        return this.result(state, 'UNKNOWN', {
          outcome: 'failed',
          reply: reply.composeBookingNotFound(lookup.reference),
          error: { kind: result.error.kind, message: result.error.message },
        });
      }
      return this.toolFailure(state, 'UNKNOWN', result.error);
    }
    const bookings =
      lookup.kind === 'details' ? [BookingConfirmation.parse(result.data)] : BookingList.parse(result.data);
    return this.result(state, 'UNKNOWN', {
      outcome: 'bookings',
      reply: lookup.kind === 'details' ? reply.composeBookingDetails(bookings) : reply.composeBookings(bookings),
      bookings,
    });
  }

  private async search(state: ConversationStateT, input: TurnInput): Promise<TurnResult> {
    if (state.pendingBooking === 'ambiguous') {
      return this.result(state, 'SEARCH', { outcome: 'ambiguous', reply: reply.composePendingBooking() });
    }
    // A search after a completed booking starts a new cycle.
    const base = state.phase === 'BOOKED' ? initialState(state.conversationId, this.now()) : state;

    const extracted = await this.extract(SEARCH_FLIGHTS, input, {
      defaults: base.criteria ? criteriaToArgs(base.criteria) : undefined,
      onInvalid: (issues) => reply.composeSearchHelp(issues),
    });
    if (!extracted.ok) return this.result(state, 'SEARCH', extracted.result);

    const result = await this.deps.registry.dispatch(SEARCH_FLIGHTS, extracted.args);
    if (!result.success) return this.toolFailure(state, 'SEARCH', result.error);

    const offers = FlightOfferList.parse(result.data);
    const criteria = criteriaFromArgs(extracted.args);
    if (offers.length === 0) {
      const next: ConversationStateT = {
        ...withoutSelection(initialState(state.conversationId, this.now())),
        passenger: base.passenger,
        criteria,
      };
      await this.commit(next);
      return this.result(next, 'SEARCH', { outcome: 'no_results', reply: reply.composeNoResults(criteria) });
    }

    const next: ConversationStateT = {
      ...withoutSelection(base),
      phase: 'CANDIDATES_PRESENTED',
      criteria,
      candidates: offers,
      booking: undefined,
    };
    await this.commit(next);
    return this.result(next, 'SEARCH', {
      outcome: 'searched',
      reply: reply.composeCandidates(criteria, offers),
      candidates: offers,
    });
  }

  private async select(state: ConversationStateT, input: TurnInput): Promise<TurnResult> {
    if (state.phase === 'INIT' || state.phase === 'BOOKED') {
      return this.result(state, 'SELECT', { outcome: 'clarify', reply: reply.composeWrongPhase(state.phase) });
    }
    if (state.pendingBooking === 'ambiguous') {
      return this.result(state, 'SELECT', { outcome: 'ambiguous', reply: reply.composePendingBooking() });
    }

    const selection = resolveSelection(input.utterance, state.candidates);
    switch (selection.kind) {
      case 'none':
        return this.result(state, 'SELECT', {
          outcome: 'disambiguate',
          reply: reply.composeSelectionHelp(state.candidates),
        });
      case 'ambiguous':
        return this.result(state, 'SELECT', {
          outcome: 'disambiguate',
          reply: reply.composeDisambiguation(selection.matches),
        });
      case 'selected': {
        const next: ConversationStateT = {
          ...withoutSelection(state),
          phase: 'FLIGHT_SELECTED',
          selectedFlight: selection.flight,
          bookingKey: this.newBookingKey(),
        };
        await this.commit(next);
        this.log.info(
          { conversationId: state.conversationId, offerId: selection.flight.offerId, via: selection.via },
          'flight selected',
        );
        return this.result(next, 'SELECT', {
          outcome: 'selected',
          reply: reply.composeSelected(selection.flight, next.passenger !== undefined),
          selectedFlight: selection.flight,
        });
      }
    }
  }

  private async confirm(state: ConversationStateT, input: TurnInput): Promise<TurnResult> {
    if (state.phase === 'BOOKED' && state.booking) {
      return this.result(state, 'CONFIRM', {
        outcome: 'already_booked',
        reply: reply.composeAlreadyBooked(state.booking),
        booking: state.booking,
      });
    }
    const flight = state.selectedFlight;
    const bookingKey = state.bookingKey;
    if (state.phase !== 'FLIGHT_SELECTED' || !flight || !bookingKey) {
      return this.result(state, 'CONFIRM', { outcome: 'clarify', reply: reply.composeWrongPhase(state.phase) });
    }

    const job = this.book(state, flight, bookingKey, input);
    this.inFlight.set(state.conversationId, job);
    try {
      return await job;
    } finally {
      this.inFlight.delete(state.conversationId);
    }
  }

  private async book(
    state: ConversationStateT,
    flight: FlightOfferT,
    bookingKey: string,
    input: TurnInput,
  ): Promise<TurnResult> {
    if (state.pendingBooking === 'ambiguous') {
      const reconciled = await this.reconcile(state, bookingKey);
      if (reconciled) return reconciled;
    }

    let args: ToolArgs;
    if (state.passenger && !hasPassengerSlots(input.utterance)) {
      args = {
        ...passengerToArgs(state.passenger),
        offer_id: flight.offerId,
        depart_date: state.criteria?.departDate ?? flight.departureTime.slice(0, 10),
        client_reference: bookingKey,
      };
    } else {
      const extracted = await this.extract(BOOK_FLIGHT, input, {
        known: {
          offer_id: flight.offerId,
          depart_date: state.criteria?.departDate ?? flight.departureTime.slice(0, 10),
          client_reference: bookingKey,
        },
        defaults: {
          ...(state.passenger && passengerToArgs(state.passenger)),
          ...(state.criteria?.cabin && { traveller_class: state.criteria.cabin }),
        },
        onInvalid: (issues) => reply.composeMissingDetails(issues),
        invalidOutcome: 'needs_details',
      });
      if (!extracted.ok) return this.result(state, 'CONFIRM', extracted.result);
      args = extracted.args;
    }

    const passenger = passengerFromArgs(args);
    this.log.info({ conversationId: state.conversationId, offerId: flight.offerId }, 'submitting booking');
    const result = await this.deps.registry.dispatch(BOOK_FLIGHT, args);

    if (result.success) {
      const booking = BookingConfirmation.parse(result.data);
      return this.markBooked(state, passenger, booking, flight);
    }

    switch (result.error.kind) {
      case 'ambiguous':
      case 'unavailable': {
        const next: ConversationStateT = { ...state, passenger, confirmed: true, pendingBooking: 'ambiguous' };
        await this.commit(next);
        return this.result(next, 'CONFIRM', {
          outcome: 'ambiguous',
          reply: reply.composeAmbiguous(),
          error: { kind: 'ambiguous', message: result.error.message },
        });
      }
      case 'declined':
      case 'invalid_arguments': {
        const next: ConversationStateT = { ...withoutSelection(state), phase: 'CANDIDATES_PRESENTED', passenger };
        await this.commit(next);
        return this.result(next, 'CONFIRM', {
          outcome: 'declined',
          reply: reply.composeDeclined(result.error.message),
          error: {
            kind: result.error.kind,
            message: result.error.message,
            ...(result.error.issues && { issues: result.error.issues }),
          },
        });
      }
    }
  }

  /**
   * Looks for a booking made under this selection's key. Returns a turn result
   * when the ambiguity is settled here; undefined means nothing was booked and
   * the same key may be submitted again.
   */
  private async reconcile(state: ConversationStateT, bookingKey: string): Promise<TurnResult | undefined> {
    const lookup = await this.deps.registry.dispatch(GET_MY_BOOKINGS, { user_id: this.deps.userId });
    if (!lookup.success) {
      this.log.warn({ conversationId: state.conversationId, kind: lookup.error.kind }, 'booking reconciliation failed');
      return this.result(state, 'CONFIRM', {
        outcome: 'ambiguous',
        reply: reply.composeAmbiguous(),
        error: { kind: 'ambiguous', message: `reconciliation failed: ${lookup.error.message}` },
      });
    }
    const match = BookingList.parse(lookup.data).find((b) => b.clientReference === bookingKey);
    if (!match) {
      this.log.info({ conversationId: state.conversationId }, 'no prior booking found, resubmitting');
      return undefined;
    }
    this.log.info({ conversationId: state.conversationId }, 'prior booking found during reconciliation');
    return this.markBooked(state, state.passenger, match, state.selectedFlight);
  }

  private async markBooked(
    state: ConversationStateT,
    passenger: PassengerT | undefined,
    booking: BookingConfirmationT,
    flight: FlightOfferT | undefined,
  ): Promise<TurnResult> {
    const next: ConversationStateT = {
      ...state,
      phase: 'BOOKED',
      passenger,
      confirmed: true,
      pendingBooking: 'none',
      booking,
    };
    await this.commit(next);
    return this.result(next, 'CONFIRM', { outcome: 'booked', reply: reply.composeBooked(booking, flight), booking });
  }

  private async extract(
    tool: string,
    input: TurnInput,
    opts: {
      known?: ToolArgs;
      defaults?: ToolArgs;
      onInvalid: (issues: FieldIssue[]) => string;
      invalidOutcome?: TurnOutcome;
    },
  ): Promise<ExtractOutcome> {
    try {
      const args = await this.deps.extractor.extract({
        utterance: input.utterance,
        tool,
        history: input.history,
        known: opts.known,
        defaults: opts.defaults,
        signal: input.signal,
      });
      return { ok: true, args };
    } catch (error: unknown) {
      if (error instanceof SchemaValidationError) {
        return {
          ok: false,
          result: {
            outcome: opts.invalidOutcome ?? 'clarify',
            reply: opts.onInvalid(error.issues),
            error: { kind: error.code, message: error.message, issues: error.issues },
          },
        };
      }
      if (error instanceof ExtractionParseError) {
        return {
          ok: false,
          result: {
            outcome: 'clarify',
            reply: reply.composeExtractionFailed(),
            error: { kind: error.code, message: error.message },
          },
        };
      }
      if (error instanceof ModelUnavailableError) {
        return {
          ok: false,
          result: {
            outcome: 'failed',
            reply: reply.composeModelUnavailable(),
            error: { kind: error.code, message: error.message },
          },
        };
      }
      throw error;
    }
  }

  private toolFailure(state: ConversationStateT, intent: IntentT, error: ToolError): TurnResult {
    this.log.warn({ conversationId: state.conversationId, kind: error.kind }, 'tool call failed');
    const text =
      error.kind === 'invalid_arguments' && error.issues
        ? reply.composeSearchHelp(error.issues)
        : error.kind === 'declined'
          ? `The reservation system rejected the request (${error.message}).`
          : reply.composeUnavailable();
    return this.result(state, intent, {
      outcome: 'failed',
      reply: text,
      error: { kind: error.kind, message: error.message, ...(error.issues && { issues: error.issues }) },
    });
  }

  private async commit(state: ConversationStateT): Promise<void> {
    await this.deps.store.setState(state.conversationId, { ...state, updatedAt: this.now() });
  }

  private result(
    state: ConversationStateT,
    intent: IntentT,
    rest: Omit<TurnResult, 'conversationId' | 'intent' | 'phase'>,
  ): TurnResult {
    return { conversationId: state.conversationId, intent, phase: state.phase, ...rest };
  }
}
