import type { PhaseT } from '../schemas/conversation.js';
import type { BookingConfirmationT, FlightOfferT, SearchCriteriaT } from '../schemas/flights.js';
import type { FieldIssue } from '../tools/errors.js';

const FIELD_LABELS: Record<string, string> = {
  origin: 'where you fly from',
  destination: 'where you fly to',
  depart_date: 'the departure date (YYYY-MM-DD)',
  first_name: "the passenger's first name",
  last_name: "the passenger's last name",
  dob: "the passenger's date of birth (YYYY-MM-DD)",
  traveller_class: 'the travel class',
  adults: 'the number of passengers',
};

export function formatPrice(offer: FlightOfferT): string {
  const amount = offer.price.toFixed(2);
  return offer.currency ? `${amount} ${offer.currency}` : amount;
}

export function describeOffer(offer: FlightOfferT): string {
  const carrier = [offer.airline, offer.flightNumber].filter(Boolean).join(' ');
  const route = offer.origin && offer.destination ? ` ${offer.origin}→${offer.destination}` : '';
  const stops = offer.stops === undefined ? '' : offer.stops === 0 ? ', nonstop' : `, ${offer.stops} stop(s)`;
  return `${carrier || offer.offerId}${route}, departs ${offer.departureTime}${stops}, ${formatPrice(offer)}`;
}

/** Longer result lists are cut in the reply only; the stored list stays whole. */
export const MAX_LISTED_OFFERS = 7;

function listOffers(offers: readonly FlightOfferT[]): string {
  const lines = offers.slice(0, MAX_LISTED_OFFERS).map((o, i) => `${i + 1}. ${describeOffer(o)}`);
  const hidden = offers.length - MAX_LISTED_OFFERS;
  if (hidden > 0) lines.push(`…and ${hidden} more. Say "the cheapest" or give a departure time to pick one of those.`);
  return lines.join('\n');
}

function fieldList(issues: readonly FieldIssue[]): string {
  const labels = Array.from(new Set(issues.map((i) => FIELD_LABELS[i.field] ?? i.field)));
  return labels.join(', ');
}

export function composeCandidates(criteria: SearchCriteriaT, offers: readonly FlightOfferT[]): string {
  return [
    `I found ${offers.length} flight(s) from ${criteria.origin} to ${criteria.destination} on ${criteria.departDate}:`,
    listOffers(offers),
    'Which one would you like? You can say "the cheapest", "the second one" or give the departure time.',
  ].join('\n');
}

export function composeNoResults(criteria: SearchCriteriaT): string {
  return `No flights found from ${criteria.origin} to ${criteria.destination} on ${criteria.departDate}. Try another date or route.`;
}

export function composeSearchHelp(issues: readonly FieldIssue[]): string {
  if (issues.length === 0) return 'Tell me where you fly from, where to and on which date.';
  return `To search I still need ${fieldList(issues)}.`;
}

export function composeSelected(offer: FlightOfferT, hasPassenger: boolean): string {
  const next = hasPassenger
    ? 'Shall I book it?'
    : "To book it, tell me the passenger's first name, last name and date of birth (YYYY-MM-DD).";
  return `You picked ${describeOffer(offer)}. ${next}`;
}

export function composeDisambiguation(matches: readonly FlightOfferT[]): string {
  return ['More than one flight fits that:', listOffers(matches), 'Which one do you mean?'].join('\n');
}

export function composeSelectionHelp(candidates: readonly FlightOfferT[]): string {
  return ['Which flight would you like?', listOffers(candidates)].join('\n');
}

export function composeMissingDetails(issues: readonly FieldIssue[]): string {
  return `To book I still need ${fieldList(issues)}.`;
}

export function composeBooked(booking: BookingConfirmationT, offer?: FlightOfferT): string {
  const what = offer ? ` for ${describeOffer(offer)}` : '';
  return `Booked${what}. Your booking reference is ${booking.bookingReference}.`;
}

function describeBooking(booking: BookingConfirmationT): string {
  const details = [
    booking.status,
    booking.offerId && `offer ${booking.offerId}`,
    booking.departDate && `departs ${booking.departDate}`,
  ].filter(Boolean);
  return details.length > 0 ? `${booking.bookingReference} (${details.join(', ')})` : booking.bookingReference;
}

export function composeBookings(bookings: readonly BookingConfirmationT[]): string {
  if (bookings.length === 0) return 'You have no bookings yet.';
  return ['Your bookings:', ...bookings.map((b, i) => `${i + 1}. ${describeBooking(b)}`)].join('\n');
}

export function composeBookingDetails(bookings: readonly BookingConfirmationT[]): string {
  return bookings.map((b) => `Booking ${describeBooking(b)}.`).join('\n');
}

export function composeBookingNotFound(reference: string): string {
  return `I could not find a booking with reference ${reference}.`;
}

export function composeAlreadyBooked(booking: BookingConfirmationT): string {
  return `This trip is already booked. Your booking reference is ${booking.bookingReference}.`;
}

export function composeAmbiguous(): string {
  return 'The booking status is unclear: the reservation system did not give a definite answer. Please confirm again and I will check before booking.';
}

export function composeDeclined(message: string): string {
  return `The booking was declined (${message}). Please pick another flight from the list.`;
}

export function composeUnavailable(): string {
  return 'The reservation system is not responding right now. Please try again in a moment.';
}

export function composeModelUnavailable(): string {
  return 'I cannot process requests right now. Please try again in a moment.';
}

export function composeExtractionFailed(): string {
  return 'Sorry, I could not understand the details. Could you rephrase?';
}

export function composeCancelled(): string {
  return 'Okay, I cleared everything. Where would you like to fly?';
}

export function composePendingBooking(): string {
  return 'An earlier booking attempt has no definite result yet. Say "confirm" so I can check it, or "cancel" to start over.';
}

export function composeClarify(phase: PhaseT): string {
  switch (phase) {
    case 'INIT':
      return 'I can search and book one-way flights. Where and when would you like to fly?';
    case 'CANDIDATES_PRESENTED':
      return 'Please pick one of the flights above, for example "the cheapest" or "option 2".';
    case 'FLIGHT_SELECTED':
      return 'Say "confirm" to book the selected flight, pick another one, or "cancel" to start over.';
    case 'BOOKED':
      return 'Your flight is booked. You can search for another flight any time.';
  }
}

export function composeWrongPhase(phase: PhaseT): string {
  return phase === 'INIT' || phase === 'BOOKED'
    ? 'There is no flight list to choose from yet. Where and when would you like to fly?'
    : 'Please pick a flight first.';
}
