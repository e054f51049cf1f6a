import type { FlightOfferT } from '../schemas/flights.js';

export type SelectionResult =
  | { kind: 'selected'; flight: FlightOfferT; index: number; via: SelectionCue }
  | { kind: 'ambiguous'; matches: FlightOfferT[]; via: SelectionCue }
  | { kind: 'none' };

export type SelectionCue = 'offer_id' | 'cheapest' | 'earliest' | 'latest' | 'ordinal' | 'time' | 'airline';

const ORDINALS: Record<string, number> = {
  first: 0,
  second: 1,
  third: 2,
  fourth: 3,
  fifth: 4,
  sixth: 5,
  seventh: 6,
  eighth: 7,
  ninth: 8,
  tenth: 9,
};

export const SELECT_RE = {
  cheapest: /\b(cheapest|lowest[- ]price[d]?|least expensive|best price)\b/i,
  earliest: /\b(earliest|first (?:flight|departure) of the day)\b/i,
  latest: /\b(latest|last (?:flight|departure) of the day)\b/i,
  ordinalWord: /\b(first|second|third|fourth|fifth|sixth|seventh|eighth|ninth|tenth|last)\b(?!\s+(?:name|class)\b)/i,
  ordinalNum: /\b(\d{1,2})(?:st|nd|rd|th)\b/i,
  optionNum: /(?:\b(?:option|number|no\.?|choice)\s*#?|#)\s*(\d{1,2})\b/i,
  bareNum: /^\s*#?(\d{1,2})\s*[.!]?\s*$/,
  time: /\b([01]?\d|2[0-3]):([0-5]\d)\b/,
};

/** Orders departure times: real timestamps when both parse, plain text otherwise. */
export function compareDeparture(a: string, b: string): number {
  const ta = Date.parse(a);
  const tb = Date.parse(b);
  if (!Number.isNaN(ta) && !Number.isNaN(tb)) return ta - tb;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Lowest price wins; equal prices go to the earlier departure, then to the
 * earlier position in the list.
 */
export function pickCheapest(candidates: readonly FlightOfferT[]): FlightOfferT | undefined {
  let best: FlightOfferT | undefined;
  for (const c of candidates) {
    if (!best || c.price < best.price || (c.price === best.price && compareDeparture(c.departureTime, best.departureTime) < 0)) {
      best = c;
    }
  }
  return best;
}

function pickByDeparture(candidates: readonly FlightOfferT[], direction: 1 | -1): FlightOfferT | undefined {
  let best: FlightOfferT | undefined;
  for (const c of candidates) {
    if (!best || direction * compareDeparture(c.departureTime, best.departureTime) < 0) best = c;
  }
  return best;
}

function clockOf(value: string): [number, number] | undefined {
  const m = /(\d{1,2}):(\d{2})/.exec(value);
  return m ? [Number(m[1]), Number(m[2])] : undefined;
}

/** "option 2", "#2" or a bare "2": always a list position, even when offer ids are numeric. */
function listedIndex(utterance: string): number | undefined {
  const num = SELECT_RE.optionNum.exec(utterance)?.[1] ?? SELECT_RE.bareNum.exec(utterance)?.[1];
  return num === undefined ? undefined : Number(num) - 1;
}

function ordinalIndex(utterance: string, count: number): number | undefined {
  const word = SELECT_RE.ordinalWord.exec(utterance)?.[1]?.toLowerCase();
  if (word === 'last') return count - 1;
  if (word !== undefined) return ORDINALS[word];
  const num = SELECT_RE.ordinalNum.exec(utterance)?.[1];
  return num === undefined ? listedIndex(utterance) : Number(num) - 1;
}

function settle(matches: FlightOfferT[], candidates: readonly FlightOfferT[], via: SelectionCue): SelectionResult {
  const [only] = matches;
  if (matches.length === 1 && only) return { kind: 'selected', flight: only, index: candidates.indexOf(only), via };
  if (matches.length > 1) return { kind: 'ambiguous', matches, via };
  return { kind: 'none' };
}

/**
 * Maps a selection utterance onto the candidate list without a model call.
 * `none` means nothing in the utterance pointed at a candidate.
 */
export function resolveSelection(utterance: string, candidates: readonly FlightOfferT[]): SelectionResult {
  if (candidates.length === 0) return { kind: 'none' };
  const text = utterance.toLowerCase();
  const tokens = new Set(text.match(/[a-z0-9_-]+/g) ?? []);

  const listed = listedIndex(utterance);
  const atPosition = listed === undefined ? undefined : candidates[listed];
  if (atPosition) return settle([atPosition], candidates, 'ordinal');

  const byId = candidates.filter((c) => tokens.has(c.offerId.toLowerCase()));
  if (byId.length > 0) return settle(byId, candidates, 'offer_id');

  if (SELECT_RE.cheapest.test(utterance)) {
    const flight = pickCheapest(candidates);
    return flight ? settle([flight], candidates, 'cheapest') : { kind: 'none' };
  }
  if (SELECT_RE.earliest.test(utterance)) {
    const flight = pickByDeparture(candidates, 1);
    return flight ? settle([flight], candidates, 'earliest') : { kind: 'none' };
  }
  if (SELECT_RE.latest.test(utterance)) {
    const flight = pickByDeparture(candidates, -1);
    return flight ? settle([flight], candidates, 'latest') : { kind: 'none' };
  }

  const time = SELECT_RE.time.exec(utterance);
  if (time) {
    const wanted = [Number(time[1]), Number(time[2])];
    const matches = candidates.filter((c) => {
      const clock = clockOf(c.departureTime);
      return clock !== undefined && clock[0] === wanted[0] && clock[1] === wanted[1];
    });
    return settle(matches, candidates, 'time');
  }

  const index = ordinalIndex(utterance, candidates.length);
  if (index !== undefined) {
    const flight = candidates[index];
    return flight ? settle([flight], candidates, 'ordinal') : { kind: 'none' };
  }

  const byAirline = candidates.filter((c) => {
    const airline = c.airline?.trim().toLowerCase();
    return airline !== undefined && airline.length > 1 && text.includes(airline);
  });
  return settle(byAirline, candidates, 'airline');
}
