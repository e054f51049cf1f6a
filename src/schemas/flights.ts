import { z } from 'zod';

export const IATA_CODE = /^[A-Z]{3}$/;
export const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export const TravellerClass = z.enum(['ECONOMY', 'PREMIUM_ECONOMY', 'BUSINESS', 'FIRST']);
export type TravellerClassT = z.infer<typeof TravellerClass>;

/**
 * One offer as returned by the reservation backend. Unknown fields are kept,
 * so the candidate list can be stored exactly as the backend sent it.
 */
export const FlightOffer = z
  .object({
    offerId: z.string().min(1),
    price: z.coerce.number().nonnegative(),
    departureTime: z.string().min(1),
    arrivalTime: z.string().optional(),
    origin: z.string().optional(),
    destination: z.string().optional(),
    airline: z.string().optional(),
    flightNumber: z.string().optional(),
    stops: z.number().int().nonnegative().optional(),
    currency: z.string().optional(),
  })
  .passthrough();

export type FlightOfferT = z.infer<typeof FlightOffer>;

export const FlightOfferList = z.array(FlightOffer);

/** Search results arrive either as a bare list or wrapped as `{ data: [...] }`. */
export const FlightSearchResponse = z.union([
  FlightOfferList,
  z.object({ data: FlightOfferList }).transform((r) => r.data),
]);

export const BookingConfirmation = z
  .object({
    bookingReference: z.string().min(1),
    status: z.string().optional(),
    offerId: z.string().optional(),
    clientReference: z.string().optional(),
    departDate: z.string().optional(),
  })
  .passthrough();

export type BookingConfirmationT = z.infer<typeof BookingConfirmation>;

export const BookingList = z.array(BookingConfirmation);

/** Statuses the backend uses for a booking it refused to make. */
export const DECLINED_STATUSES = new Set(['FAILED', 'DECLINED', 'REJECTED', 'CANCELLED']);

export const Passenger = z.object({
  firstName: z.string().min(1),
  lastName: z.string().min(1),
  dob: z.string().regex(ISO_DATE),
  travellerClass: TravellerClass.default('ECONOMY'),
});

export type PassengerT = z.infer<typeof Passenger>;

export const SearchCriteria = z.object({
  origin: z.string().regex(IATA_CODE),
  destination: z.string().regex(IATA_CODE),
  departDate: z.string().regex(ISO_DATE),
  adults: z.number().int().min(1).max(9).optional(),
  cabin: TravellerClass.optional(),
  maxPrice: z.number().positive().optional(),
  nonStop: z.boolean().optional(),
});

export type SearchCriteriaT = z.infer<typeof SearchCriteria>;
