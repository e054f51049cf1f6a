// Router optimization utilities - regex guards and heuristics

import type { PhaseT } from '../schemas/conversation.js';
import type { FlightOfferT } from '../schemas/flights.js';
import type { IntentT } from '../schemas/intent.js';
import { SELECT_RE, resolveSelection } from './option_ranker.js';

export const RE = {
  // Bare command words only count at the start, so "one stop" or "non-stop" stay preferences.
  cancel:
    /^\s*(?:stop\b(?!\s*over)|reset\b|quit\b|abort\b)|\b(?:cancel|start over|never ?mind|forget (?:it|about it)|stop (?:this|it|now|the booking))\b/i,
  confirm:
    /^\s*(?:yes|yep|yeah|yup|sure|ok(?:ay)?|confirm(?:ed)?|book it|go ahead|do it|proceed|sounds good|please do)\b|\b(?:i confirm|confirm (?:the |my )?booking|book (?:it|that|this)(?: one| flight)?)\b/i,
  flightDirect: /\b(from|ex)\s+[\w\s.'-]+?\s+(to|→|-?>)\s+[\w\s.'-]+/i,
  iataPair: /\b([A-Z]{3})\s*(to|→|-?>|-)\s*([A-Z]{3})\b/,
  dateish:
    /\b(today|tomorrow|this (week|weekend|month)|next (week|month|monday|tuesday|wednesday|thursday|friday|saturday|sunday)|\d{4}-\d{2}-\d{2}|\d{1,2}[-/]\d{1,2}([-/]\d{2,4})?|(jan|feb|mar|apr|may|jun|jul|aug|sep|sept|oct|nov|dec)[a-z]*\.? \d{1,2})\b/i,
  flights: /\b(flight|flights|fly|flying|fares?|one way|search|find|look(?:ing)? for|other dates?)\b/i,
  selectVerb: /\b(pick|choose|select|take|go with|i'?ll have|want)\b.*\b(one|option|flight)\b/i,
  passengerDate: /\b\d{4}-\d{2}-\d{2}\b/,
  passengerName: /\b(?:name is|passenger(?: name)? is|first name|last name|surname)\b/i,
};

export function isDirectFlightHeuristic(msg: string): { isDirect: boolean; reason: string } {
  const m = msg.trim();
  const od = RE.flightDirect.test(m) || RE.iataPair.test(m);
  if (od) return { isDirect: true, reason: 'origin_destination' };
  const direct = RE.flights.test(m) && RE.dateish.test(m);
  return { isDirect: direct, reason: direct ? 'flights+date' : 'missing_od_or_date' };
}

export function hasPassengerSlots(msg: string): boolean {
  return RE.passengerDate.test(msg) || RE.passengerName.test(msg);
}

export function hasSelectionCue(msg: string, candidates: readonly FlightOfferT[]): boolean {
  if (resolveSelection(msg, candidates).kind !== 'none') return true;
  return RE.selectVerb.test(msg) || SELECT_RE.cheapest.test(msg);
}

export type BookingLookup = { kind: 'list' } | { kind: 'details'; reference: string };

const LOOKUP_RE = {
  list: /\b(?:my|all|show(?: me)?(?: the)?)\s+(?:bookings|reservations|trips)\b/i,
  reference:
    /\b(?:booking|reservation|ref(?:erence)?)\b(?:\s+(?:ref(?:erence)?|code|number|no\.?))?\s*(?:is\s+)?[:#]?\s*([a-z0-9][a-z0-9-]{3,19})\b/gi,
};

/** A request to see existing bookings. Booking references must contain a digit. */
export function detectBookingLookup(msg: string): BookingLookup | undefined {
  for (const match of msg.matchAll(LOOKUP_RE.reference)) {
    const reference = match[1];
    if (reference && /\d/.test(reference)) return { kind: 'details', reference: reference.toUpperCase() };
  }
  if (LOOKUP_RE.list.test(msg)) return { kind: 'list' };
  return undefined;
}

export interface HeuristicContext {
  candidates?: readonly FlightOfferT[];
  /** A flight is selected and passenger details are still missing. */
  awaitingPassenger?: boolean;
}

/**
 * Deterministic, phase-aware classification. Returns undefined when the
 * utterance carries no decisive cue.
 */
export function classifyByHeuristics(msg: string, phase: PhaseT, ctx: HeuristicContext = {}): IntentT | undefined {
  const m = msg.trim();
  if (!m) return 'UNKNOWN';
  if (RE.cancel.test(m)) return 'CANCEL';
  // Lookups move no phase; the workflow answers them on UNKNOWN.
  if (detectBookingLookup(m)) return 'UNKNOWN';

  const search = isDirectFlightHeuristic(m);
  if (search.reason === 'origin_destination') return 'SEARCH';

  if ((phase === 'FLIGHT_SELECTED' || phase === 'BOOKED') && RE.confirm.test(m)) return 'CONFIRM';

  if (phase === 'FLIGHT_SELECTED' && ctx.awaitingPassenger && hasPassengerSlots(m)) return 'CONFIRM';

  if (phase === 'CANDIDATES_PRESENTED' || phase === 'FLIGHT_SELECTED') {
    if (hasSelectionCue(m, ctx.candidates ?? [])) return 'SELECT';
  }

  if (search.isDirect || RE.flights.test(m)) return 'SEARCH';
  return undefined;
}
