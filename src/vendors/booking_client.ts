import type { BackendConfig } from '../config/backend.js';
import type { TravellerClassT } from '../schemas/flights.js';
import { requestJSON, type FetchLike } from '../util/fetch.js';
import type { Logger } from '../util/logging.js';
import { silentLogger } from '../util/logging.js';

export interface SearchFlightsRequest {
  origin: string;
  destination: string;
  departDate: string;
  tripType: 'ONEWAY';
  adults: number;
  cabin: TravellerClassT;
  maxPrice?: number;
  nonStop?: boolean;
}

export interface PassengerPayload {
  firstName: string;
  lastName: string;
  dob: string;
  travellerClass: TravellerClassT;
}

export interface BookFlightRequest {
  userId: number;
  offerId: string;
  tripType: 'ONEWAY';
  departDate: string;
  paymentMethod: 'CARD';
  passengers: PassengerPayload[];
  /** Idempotency key; also sent as the Idempotency-Key header. */
  clientReference: string;
}

/**
 * Operations of the reservation service. Responses are returned unparsed;
 * the gateway validates them against each tool's result schema.
 */
export interface BookingBackend {
  searchFlights(req: SearchFlightsRequest, signal?: AbortSignal): Promise<unknown>;
  bookFlight(req: BookFlightRequest, signal?: AbortSignal): Promise<unknown>;
  listBookings(userId: number, signal?: AbortSignal): Promise<unknown>;
  getBooking(reference: string, signal?: AbortSignal): Promise<unknown>;
}

export class HttpBookingBackend implements BookingBackend {
  private readonly baseUrl: string;
  private readonly log: Logger;

  constructor(
    private readonly cfg: BackendConfig,
    private readonly deps: { fetchImpl?: FetchLike; log?: Logger } = {},
  ) {
    this.baseUrl = cfg.baseUrl.replace(/\/$/, '');
    this.log = deps.log ?? silentLogger();
  }

  searchFlights(req: SearchFlightsRequest, signal?: AbortSignal): Promise<unknown> {
    return this.send('/flights/search', { method: 'POST', body: req, signal, target: 'search_flights' });
  }

  bookFlight(req: BookFlightRequest, signal?: AbortSignal): Promise<unknown> {
    return this.send('/bookings/oneway', {
      method: 'POST',
      body: req,
      signal,
      target: 'book_flight',
      headers: { 'Idempotency-Key': req.clientReference },
    });
  }

  listBookings(userId: number, signal?: AbortSignal): Promise<unknown> {
    return this.send(`/bookings/user/${userId}`, { signal, target: 'get_my_bookings' });
  }

  getBooking(reference: string, signal?: AbortSignal): Promise<unknown> {
    return this.send(`/bookings/reference/${encodeURIComponent(reference)}`, {
      signal,
      target: 'get_booking_details',
    });
  }

  private send(
    path: string,
    opts: {
      method?: 'GET' | 'POST';
      body?: unknown;
      signal?: AbortSignal;
      target: string;
      headers?: Record<string, string>;
    },
  ): Promise<unknown> {
    const headers: Record<string, string> = { ...opts.headers };
    if (this.cfg.apiKey) headers.Authorization = `Bearer ${this.cfg.apiKey}`;
    return requestJSON(`${this.baseUrl}${path}`, {
      ...opts,
      headers,
      fetchImpl: this.deps.fetchImpl,
      log: this.log,
    });
  }
}
