import { z } from 'zod';
import {
  BookingConfirmation,
  BookingList,
  FlightSearchResponse,
  IATA_CODE,
  ISO_DATE,
  TravellerClass,
} from '../schemas/flights.js';
import type { BookingBackend } from '../vendors/booking_client.js';
import type { ToolRegistry } from './registry.js';
import type { ToolArgs, ToolSpec } from './types.js';

export const SEARCH_FLIGHTS = 'search_flights';
export const BOOK_FLIGHT = 'book_flight';
export const GET_MY_BOOKINGS = 'get_my_bookings';
export const GET_BOOKING_DETAILS = 'get_booking_details';

function isCalendarDate(value: string): boolean {
  const [y, m, d] = value.split('-').map(Number);
  if (y === undefined || m === undefined || d === undefined) return false;
  const date = new Date(Date.UTC(y, m - 1, d));
  return date.getUTCFullYear() === y && date.getUTCMonth() === m - 1 && date.getUTCDate() === d;
}

const iata = (what: string) =>
  z.string().trim().toUpperCase().regex(IATA_CODE, 'must be a 3-letter IATA code').describe(what);

const isoDate = () =>
  z.string().trim().regex(ISO_DATE, 'must be YYYY-MM-DD').refine(isCalendarDate, 'not a calendar date');

const travellerClass = z.preprocess(
  (v) => (typeof v === 'string' ? v.trim().toUpperCase().replace(/[\s-]+/g, '_') : v),
  TravellerClass,
);

const flag = z.preprocess((v) => {
  if (v === 'true' || v === 'yes') return true;
  if (v === 'false' || v === 'no') return false;
  return v;
}, z.boolean());

export const SearchFlightsArgs = z.object({
  origin: iata('Origin airport or city, 3-letter IATA code (Boston=BOS, Mumbai=BOM)'),
  destination: iata('Destination airport or city, 3-letter IATA code'),
  depart_date: isoDate().describe('Departure date, YYYY-MM-DD'),
  adults: z.coerce.number().int().min(1).max(9).optional().describe('Number of adult passengers'),
  cabin: travellerClass.optional().describe('Cabin class filter'),
  max_price: z.coerce.number().positive().optional().describe('Only offers up to this price'),
  non_stop: flag.optional().describe('Only direct flights'),
});
export type SearchFlightsArgsT = z.infer<typeof SearchFlightsArgs>;

export const BookFlightArgs = z.object({
  offer_id: z.string().trim().min(1).describe('Offer id of the selected flight'),
  depart_date: isoDate().describe('Departure date, YYYY-MM-DD'),
  first_name: z.string().trim().min(1).max(60).describe("Passenger's first name"),
  last_name: z.string().trim().min(1).max(60).describe("Passenger's last name"),
  dob: isoDate()
    .refine((v) => Date.parse(v) < Date.now(), 'must be in the past')
    .describe("Passenger's date of birth, YYYY-MM-DD"),
  traveller_class: travellerClass.default('ECONOMY').describe('ECONOMY, PREMIUM_ECONOMY, BUSINESS or FIRST'),
  client_reference: z.string().min(8).max(64).describe('Idempotency key of this booking'),
});
export type BookFlightArgsT = z.infer<typeof BookFlightArgs>;

export const GetMyBookingsArgs = z.object({
  user_id: z.coerce.number().int().positive().describe('Numeric user id'),
});

export const GetBookingDetailsArgs = z.object({
  booking_reference: z
    .string()
    .trim()
    .toUpperCase()
    .regex(/^[A-Z0-9-]{4,20}$/, 'must be an alphanumeric booking reference')
    .describe('Booking reference code, e.g. BOOK123'),
});

export const FLIGHT_TOOLS: readonly ToolSpec[] = [
  {
    name: SEARCH_FLIGHTS,
    description: 'Search one-way flights between two airports on a date.',
    effect: 'read',
    args: SearchFlightsArgs,
    result: FlightSearchResponse,
  },
  {
    name: BOOK_FLIGHT,
    description: 'Book a one-way flight for one passenger using an offer id.',
    effect: 'write',
    args: BookFlightArgs,
    result: BookingConfirmation,
  },
  {
    name: GET_MY_BOOKINGS,
    description: 'List all bookings of a user.',
    effect: 'read',
    args: GetMyBookingsArgs,
    result: BookingList,
  },
  {
    name: GET_BOOKING_DETAILS,
    description: 'Get one booking by its reference code.',
    effect: 'read',
    args: GetBookingDetailsArgs,
    result: BookingConfirmation,
  },
];

export function registerFlightTools(registry: ToolRegistry): void {
  for (const spec of FLIGHT_TOOLS) registry.register(spec);
}

/** Performs exactly one backend request for already-validated arguments. */
export type BackendOperation = (args: ToolArgs, signal: AbortSignal) => Promise<unknown>;

export function createFlightOperations(
  backend: BookingBackend,
  opts: { userId: number },
): Record<string, BackendOperation> {
  return {
    [SEARCH_FLIGHTS]: (raw, signal) => {
      const args = SearchFlightsArgs.parse(raw);
      return backend.searchFlights(
        {
          origin: args.origin,
          destination: args.destination,
          departDate: args.depart_date,
          tripType: 'ONEWAY',
          adults: args.adults ?? 1,
          cabin: args.cabin ?? 'ECONOMY',
          ...(args.max_price !== undefined && { maxPrice: args.max_price }),
          ...(args.non_stop !== undefined && { nonStop: args.non_stop }),
        },
        signal,
      );
    },
    [BOOK_FLIGHT]: (raw, signal) => {
      const args = BookFlightArgs.parse(raw);
      return backend.bookFlight(
        {
          userId: opts.userId,
          offerId: args.offer_id,
          tripType: 'ONEWAY',
          departDate: args.depart_date,
          paymentMethod: 'CARD',
          clientReference: args.client_reference,
          passengers: [
            {
              firstName: args.first_name,
              lastName: args.last_name,
              dob: args.dob,
              travellerClass: args.traveller_class,
            },
          ],
        },
        signal,
      );
    },
    [GET_MY_BOOKINGS]: (raw, signal) => backend.listBookings(GetMyBookingsArgs.parse(raw).user_id, signal),
    [GET_BOOKING_DETAILS]: (raw, signal) =>
      backend.getBooking(GetBookingDetailsArgs.parse(raw).booking_reference, signal),
  };
}
