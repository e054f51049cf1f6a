import { describe, it, expect, beforeEach } from '@jest/globals';
import { z } from 'zod';
import type { GatewayConfig } from '../../../src/config/resilience.js';
import { BackendGateway } from '../../../src/core/gateway.js';
import { UnknownToolError } from '../../../src/tools/errors.js';
import {
  BOOK_FLIGHT,
  SEARCH_FLIGHTS,
  createFlightOperations,
  registerFlightTools,
} from '../../../src/tools/flight_tools.js';
import { ToolRegistry } from '../../../src/tools/registry.js';
import { BackendHttpError, ExternalFetchError } from '../../../src/util/fetch.js';
import { FakeBackend, OFFERS, TEST_GATEWAY, deferred, hang } from '../../helpers/fakes.js';

const SEARCH_ARGS = { origin: 'BOS', destination: 'DEN', depart_date: '2026-03-05' };
const BOOK_ARGS = {
  offer_id: 'OF-1',
  depart_date: '2026-03-05',
  first_name: 'Jane',
  last_name: 'Doe',
  dob: '1990-04-12',
  client_reference: 'booking-key-1',
};

describe('BackendGateway', () => {
  let backend: FakeBackend;
  let registry: ToolRegistry;

  const build = (cfg: GatewayConfig = TEST_GATEWAY) => {
    registry = new ToolRegistry(new BackendGateway(createFlightOperations(backend, { userId: 7 }), cfg));
    registerFlightTools(registry);
  };

  beforeEach(() => {
    backend = new FakeBackend();
    build();
  });

  describe('read tools', () => {
    it('returns the parsed offers', async () => {
      backend.search = async () => OFFERS;
      const result = await registry.dispatch(SEARCH_FLIGHTS, SEARCH_ARGS);
      expect(result).toEqual({ success: true, tool: SEARCH_FLIGHTS, data: OFFERS });
    });

    it('unwraps offers sent inside a data envelope', async () => {
      backend.search = async () => ({ data: OFFERS });
      const result = await registry.dispatch(SEARCH_FLIGHTS, SEARCH_ARGS);
      expect(result).toEqual({ success: true, tool: SEARCH_FLIGHTS, data: OFFERS });
    });

    it('retries server errors up to the attempt limit', async () => {
      backend.search = async () => {
        throw new BackendHttpError(503, '');
      };
      const result = await registry.dispatch(SEARCH_FLIGHTS, SEARCH_ARGS);
      expect(result).toEqual({
        success: false,
        tool: SEARCH_FLIGHTS,
        error: { kind: 'unavailable', message: 'HTTP_503', status: 503 },
      });
      expect(backend.calls.searchFlights).toBe(3);
    });

    it('recovers when a retry succeeds', async () => {
      let n = 0;
      backend.search = async () => {
        n += 1;
        if (n === 1) throw new ExternalFetchError('network', 'network_error');
        return OFFERS;
      };
      const result = await registry.dispatch(SEARCH_FLIGHTS, SEARCH_ARGS);
      expect(result.success).toBe(true);
      expect(backend.calls.searchFlights).toBe(2);
    });

    it('does not retry a client error', async () => {
      backend.search = async () => {
        throw new BackendHttpError(400, 'bad date');
      };
      const result = await registry.dispatch(SEARCH_FLIGHTS, SEARCH_ARGS);
      expect(result).toEqual({
        success: false,
        tool: SEARCH_FLIGHTS,
        error: { kind: 'declined', message: 'HTTP_400: bad date', status: 400 },
      });
      expect(backend.calls.searchFlights).toBe(1);
    });

    it('retries calls that time out', async () => {
      build({ ...TEST_GATEWAY, readTimeoutMs: 20 });
      backend.search = (_req, signal) => hang(signal);
      const result = await registry.dispatch(SEARCH_FLIGHTS, SEARCH_ARGS);
      expect(result).toEqual({
        success: false,
        tool: SEARCH_FLIGHTS,
        error: { kind: 'unavailable', message: 'backend timed out' },
      });
      expect(backend.calls.searchFlights).toBe(3);
    });

    it('rejects a result that does not match the schema', async () => {
      backend.search = async () => ({ flights: [] });
      const result = await registry.dispatch(SEARCH_FLIGHTS, SEARCH_ARGS);
      expect(result).toEqual({
        success: false,
        tool: SEARCH_FLIGHTS,
        error: { kind: 'unavailable', message: 'unrecognized backend response' },
      });
    });

    it('caps concurrent backend calls', async () => {
      build({ ...TEST_GATEWAY, maxConcurrent: 1, readTimeoutMs: 1000 });
      const first = deferred<unknown>();
      let n = 0;
      backend.search = () => {
        n += 1;
        return n === 1 ? first.promise : Promise.resolve(OFFERS);
      };

      const a = registry.dispatch(SEARCH_FLIGHTS, SEARCH_ARGS);
      const b = registry.dispatch(SEARCH_FLIGHTS, SEARCH_ARGS);
      await new Promise((r) => setTimeout(r, 20));
      expect(backend.calls.searchFlights).toBe(1);

      first.resolve([]);
      const [ra, rb] = await Promise.all([a, b]);
      expect(ra).toEqual({ success: true, tool: SEARCH_FLIGHTS, data: [] });
      expect(rb).toEqual({ success: true, tool: SEARCH_FLIGHTS, data: OFFERS });
      expect(backend.calls.searchFlights).toBe(2);
    });
  });

  describe('write tools', () => {
    it('sends the booking once and returns the confirmation', async () => {
      const result = await registry.dispatch(BOOK_FLIGHT, BOOK_ARGS);
      expect(result).toEqual({
        success: true,
        tool: BOOK_FLIGHT,
        data: { bookingReference: 'BK-100', status: 'CONFIRMED', offerId: 'OF-1', clientReference: 'booking-key-1' },
      });
      expect(backend.bookRequests).toEqual([
        {
          userId: 7,
          offerId: 'OF-1',
          tripType: 'ONEWAY',
          departDate: '2026-03-05',
          paymentMethod: 'CARD',
          clientReference: 'booking-key-1',
          passengers: [{ firstName: 'Jane', lastName: 'Doe', dob: '1990-04-12', travellerClass: 'ECONOMY' }],
        },
      ]);
    });

    it('reports a timeout as ambiguous without retrying', async () => {
      backend.book = (_req, signal) => hang(signal);
      const result = await registry.dispatch(BOOK_FLIGHT, BOOK_ARGS);
      expect(result).toEqual({
        success: false,
        tool: BOOK_FLIGHT,
        error: { kind: 'ambiguous', message: 'booking request timed out' },
      });
      expect(backend.calls.bookFlight).toBe(1);
    });

    it('reports a server error as ambiguous', async () => {
      backend.book = async () => {
        throw new BackendHttpError(500, 'oops');
      };
      const result = await registry.dispatch(BOOK_FLIGHT, BOOK_ARGS);
      expect(result).toEqual({
        success: false,
        tool: BOOK_FLIGHT,
        error: { kind: 'ambiguous', message: 'HTTP_500: oops', status: 500 },
      });
      expect(backend.calls.bookFlight).toBe(1);
    });

    it('reports a network failure as ambiguous', async () => {
      backend.book = async () => {
        throw new ExternalFetchError('network', 'network_error');
      };
      const result = await registry.dispatch(BOOK_FLIGHT, BOOK_ARGS);
      expect(result).toEqual({
        success: false,
        tool: BOOK_FLIGHT,
        error: { kind: 'ambiguous', message: 'network_error' },
      });
    });

    it('reports a client error as declined', async () => {
      backend.book = async () => {
        throw new BackendHttpError(422, 'offer expired');
      };
      const result = await registry.dispatch(BOOK_FLIGHT, BOOK_ARGS);
      expect(result).toEqual({
        success: false,
        tool: BOOK_FLIGHT,
        error: { kind: 'declined', message: 'HTTP_422: offer expired', status: 422 },
      });
    });

    it('reports a malformed confirmation as ambiguous', async () => {
      backend.book = async () => ({ ok: true });
      const result = await registry.dispatch(BOOK_FLIGHT, BOOK_ARGS);
      expect(result).toEqual({
        success: false,
        tool: BOOK_FLIGHT,
        error: { kind: 'ambiguous', message: 'unrecognized booking response' },
      });
    });

    it('reports a declined booking status', async () => {
      backend.book = async () => ({ bookingReference: 'BK-1', status: 'declined' });
      const result = await registry.dispatch(BOOK_FLIGHT, BOOK_ARGS);
      expect(result).toEqual({
        success: false,
        tool: BOOK_FLIGHT,
        error: { kind: 'declined', message: 'booking declined' },
      });
    });
  });

  it('rejects a tool that has no backend operation', async () => {
    registry.register({
      name: 'cancel_booking',
      description: 'not wired',
      effect: 'write',
      args: z.object({}),
      result: z.unknown(),
    });
    await expect(registry.dispatch('cancel_booking', {})).rejects.toBeInstanceOf(UnknownToolError);
  });
});
