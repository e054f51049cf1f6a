import type { GatewayConfig, ModelPolicyConfig } from '../../src/config/resilience.js';
import type { CompleteOptions, LanguageModel, SchemaHint } from '../../src/core/llm.js';
import type { FlightOfferT } from '../../src/schemas/flights.js';
import type { BookFlightRequest, BookingBackend, SearchFlightsRequest } from '../../src/vendors/booking_client.js';

type Reply = string | Error | ((prompt: string, signal?: AbortSignal) => Promise<string>);

/**
 * LanguageModel double. JSON-hinted calls (extraction) and text calls
 * (intent classification) are answered from separate queues.
 */
export class ScriptedModel implements LanguageModel {
  readonly calls: Array<{ prompt: string; schemaHint: SchemaHint }> = [];
  private readonly queues: Record<SchemaHint, Reply[]> = { json: [], text: [] };

  replyJson(...replies: Reply[]): this {
    this.queues.json.push(...replies);
    return this;
  }

  replyText(...replies: Reply[]): this {
    this.queues.text.push(...replies);
    return this;
  }

  callsFor(hint: SchemaHint): string[] {
    return this.calls.filter((c) => c.schemaHint === hint).map((c) => c.prompt);
  }

  async complete(prompt: string, opts: CompleteOptions): Promise<string> {
    this.calls.push({ prompt, schemaHint: opts.schemaHint });
    const next = this.queues[opts.schemaHint].shift();
    if (next === undefined) throw new Error(`no scripted ${opts.schemaHint} reply`);
    if (next instanceof Error) throw next;
    if (typeof next === 'function') return next(prompt, opts.signal);
    return next;
  }
}

/** A call that only ends when its signal aborts. */
export function hang<T>(signal?: AbortSignal): Promise<T> {
  return new Promise<T>((_resolve, reject) => {
    signal?.addEventListener('abort', () => reject(new Error('aborted')));
  });
}

export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

type Handler<A> = (arg: A, signal?: AbortSignal) => Promise<unknown>;

export class FakeBackend implements BookingBackend {
  readonly calls = { searchFlights: 0, bookFlight: 0, listBookings: 0, getBooking: 0 };
  readonly searchRequests: SearchFlightsRequest[] = [];
  readonly bookRequests: BookFlightRequest[] = [];

  search: Handler<SearchFlightsRequest> = async () => [];
  book: Handler<BookFlightRequest> = async (req) => ({
    bookingReference: 'BK-100',
    status: 'CONFIRMED',
    offerId: req.offerId,
    clientReference: req.clientReference,
  });
  bookings: Handler<number> = async () => [];
  details: Handler<string> = async (ref) => ({ bookingReference: ref, status: 'CONFIRMED' });

  searchFlights(req: SearchFlightsRequest, signal?: AbortSignal): Promise<unknown> {
    this.calls.searchFlights++;
    this.searchRequests.push(req);
    return this.search(req, signal);
  }

  bookFlight(req: BookFlightRequest, signal?: AbortSignal): Promise<unknown> {
    this.calls.bookFlight++;
    this.bookRequests.push(req);
    return this.book(req, signal);
  }

  listBookings(userId: number, signal?: AbortSignal): Promise<unknown> {
    this.calls.listBookings++;
    return this.bookings(userId, signal);
  }

  getBooking(reference: string, signal?: AbortSignal): Promise<unknown> {
    this.calls.getBooking++;
    return this.details(reference, signal);
  }
}

export const TEST_GATEWAY: GatewayConfig = {
  readAttempts: 3,
  initialDelayMs: 1,
  maxDelayMs: 2,
  readTimeoutMs: 100,
  writeTimeoutMs: 60,
  maxConcurrent: 4,
};

export const TEST_MODEL_POLICY: ModelPolicyConfig = {
  extractionRetries: 1,
  extractionTimeoutMs: 200,
  classifierTimeoutMs: 100,
};

export const OFFERS: FlightOfferT[] = [
  {
    offerId: 'OF-1',
    price: 180,
    departureTime: '2026-03-05T09:00:00',
    arrivalTime: '2026-03-05T12:30:00',
    origin: 'BOS',
    destination: 'DEN',
    airline: 'Delta',
    flightNumber: 'DL100',
    currency: 'USD',
  },
  {
    offerId: 'OF-2',
    price: 120,
    departureTime: '2026-03-05T08:00:00',
    arrivalTime: '2026-03-05T11:10:00',
    origin: 'BOS',
    destination: 'DEN',
    airline: 'United',
    flightNumber: 'UA200',
    currency: 'USD',
  },
  {
    offerId: 'OF-3',
    price: 120,
    departureTime: '2026-03-05T07:00:00',
    arrivalTime: '2026-03-05T10:05:00',
    origin: 'BOS',
    destination: 'DEN',
    airline: 'JetBlue',
    flightNumber: 'B6300',
    currency: 'USD',
  },
];

export const SEARCH_JSON = '{"origin":"BOS","destination":"DEN","depart_date":"2026-03-05"}';
export const PASSENGER_JSON = '{"first_name":"Jane","last_name":"Doe","dob":"1990-04-12"}';
