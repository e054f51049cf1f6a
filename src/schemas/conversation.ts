import { z } from 'zod';
import { BookingConfirmation, FlightOffer, Passenger, SearchCriteria } from './flights.js';

export const Phase = z.enum(['INIT', 'CANDIDATES_PRESENTED', 'FLIGHT_SELECTED', 'BOOKED']);
export type PhaseT = z.infer<typeof Phase>;

export const ConversationState = z.object({
  conversationId: z.string().min(1),
  phase: Phase,
  criteria: SearchCriteria.optional(),
  candidates: z.array(FlightOffer),
  selectedFlight: FlightOffer.optional(),
  passenger: Passenger.optional(),
  /** Set once the user has asked to book the selected flight. */
  confirmed: z.boolean(),
  /** Idempotency key shared by every booking attempt for the current selection. */
  bookingKey: z.string().optional(),
  pendingBooking: z.enum(['none', 'ambiguous']),
  booking: BookingConfirmation.optional(),
  updatedAt: z.number(),
});

export type ConversationStateT = z.infer<typeof ConversationState>;

export function initialState(conversationId: string, now = Date.now()): ConversationStateT {
  return {
    conversationId,
    phase: 'INIT',
    candidates: [],
    confirmed: false,
    pendingBooking: 'none',
    updatedAt: now,
  };
}
