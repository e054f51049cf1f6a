import { describe, it, expect, beforeEach } from '@jest/globals';
import { ParameterExtractor } from '../../../src/core/extractor.js';
import { BackendGateway } from '../../../src/core/gateway.js';
import { ExtractionParseError, ModelUnavailableError, SchemaValidationError } from '../../../src/tools/errors.js';
import {
  BOOK_FLIGHT,
  SEARCH_FLIGHTS,
  createFlightOperations,
  registerFlightTools,
} from '../../../src/tools/flight_tools.js';
import { ToolRegistry } from '../../../src/tools/registry.js';
import { FakeBackend, PASSENGER_JSON, SEARCH_JSON, ScriptedModel, TEST_GATEWAY, hang } from '../../helpers/fakes.js';

const NOW = () => new Date('2026-02-20T10:00:00Z');

describe('ParameterExtractor', () => {
  let model: ScriptedModel;
  let registry: ToolRegistry;

  const extractor = (retries = 1, timeoutMs = 200) =>
    new ParameterExtractor(model, registry, { extractionRetries: retries, extractionTimeoutMs: timeoutMs }, { now: NOW });

  beforeEach(() => {
    model = new ScriptedModel();
    registry = new ToolRegistry(new BackendGateway(createFlightOperations(new FakeBackend(), { userId: 7 }), TEST_GATEWAY));
    registerFlightTools(registry);
  });

  it('returns validated arguments from a single model answer', async () => {
    model.replyJson('```json\n{"origin":"bos","destination":"den","depart_date":"2026-03-05","adults":"2"}\n```');
    const args = await extractor().extract({ utterance: 'two of us BOS to DEN on March 5', tool: SEARCH_FLIGHTS });
    expect(args).toEqual({ origin: 'BOS', destination: 'DEN', depart_date: '2026-03-05', adults: 2 });
    expect(model.callsFor('json')).toHaveLength(1);
  });

  it('builds the prompt from the tool fields, the date and the conversation', async () => {
    model.replyJson(SEARCH_JSON);
    await extractor().extract({
      utterance: 'make it Denver',
      tool: SEARCH_FLIGHTS,
      history: [
        { role: 'user', content: 'flights from Boston' },
        { role: 'assistant', content: 'Where to?' },
      ],
    });
    const [prompt] = model.callsFor('json');
    expect(prompt).toContain('You fill the arguments of the tool `search_flights`');
    expect(prompt).toContain('- depart_date (string, required): Departure date, YYYY-MM-DD');
    expect(prompt).toContain('Today is 2026-02-20.');
    expect(prompt).toContain('Already known (do not change these):\n(nothing)');
    expect(prompt).toContain('User: flights from Boston\nAssistant: Where to?');
    expect(prompt).toContain('Latest user message: make it Denver');
  });

  it('lets known arguments win over the model', async () => {
    model.replyJson('{"offer_id":"OF-9","first_name":"Jane","last_name":"Doe","dob":"1990-04-12"}');
    const args = await extractor().extract({
      utterance: 'Jane Doe, born 1990-04-12',
      tool: BOOK_FLIGHT,
      known: { offer_id: 'OF-1', depart_date: '2026-03-05', client_reference: 'booking-key-1' },
    });
    expect(args).toEqual({
      offer_id: 'OF-1',
      depart_date: '2026-03-05',
      first_name: 'Jane',
      last_name: 'Doe',
      dob: '1990-04-12',
      traveller_class: 'ECONOMY',
      client_reference: 'booking-key-1',
    });
  });

  it('fills fields the model leaves out from defaults', async () => {
    model.replyJson('{"depart_date":"2026-03-07"}');
    const args = await extractor().extract({
      utterance: 'what about the 7th',
      tool: SEARCH_FLIGHTS,
      defaults: { origin: 'BOS', destination: 'DEN', depart_date: '2026-03-05' },
    });
    expect(args).toEqual({ origin: 'BOS', destination: 'DEN', depart_date: '2026-03-07' });
  });

  it('re-prompts once with the fields that were missing', async () => {
    model.replyJson('{"origin":"BOS","destination":"DEN"}', SEARCH_JSON);
    const args = await extractor().extract({ utterance: 'BOS to DEN', tool: SEARCH_FLIGHTS });
    expect(args).toEqual({ origin: 'BOS', destination: 'DEN', depart_date: '2026-03-05' });

    const prompts = model.callsFor('json');
    expect(prompts).toHaveLength(2);
    expect(prompts[1]).toContain(
      'Your previous answer could not be used: these fields are missing or invalid: depart_date (required)',
    );
    expect(prompts[1]).toContain('Previous answer:\n{"origin":"BOS","destination":"DEN"}');
  });

  it('re-prompts after output that is not JSON', async () => {
    model.replyJson('Sure, searching now!', SEARCH_JSON);
    await extractor().extract({ utterance: 'BOS to DEN on March 5', tool: SEARCH_FLIGHTS });
    expect(model.callsFor('json')[1]).toContain('Your previous answer could not be used: no JSON object found');
  });

  it('gives up after the retry budget with the last error', async () => {
    model.replyJson('nope', 'still nope');
    await expect(extractor().extract({ utterance: 'hm', tool: SEARCH_FLIGHTS })).rejects.toBeInstanceOf(
      ExtractionParseError,
    );
    expect(model.callsFor('json')).toHaveLength(2);
  });

  it('makes a single attempt when retries are zero', async () => {
    model.replyJson(PASSENGER_JSON);
    await expect(extractor(0).extract({ utterance: 'Jane', tool: SEARCH_FLIGHTS })).rejects.toThrow(
      'unexpected fields: first_name, last_name, dob',
    );
    expect(model.callsFor('json')).toHaveLength(1);
  });

  it('reports every invalid field after the last attempt', async () => {
    model.replyJson('{"origin":"Boston"}', '{"origin":"Boston"}');
    let caught: unknown;
    try {
      await extractor().extract({ utterance: 'from Boston', tool: SEARCH_FLIGHTS });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(SchemaValidationError);
    expect(caught instanceof SchemaValidationError && caught.fields).toEqual(['origin', 'destination', 'depart_date']);
  });

  it('maps a hung model call to ModelUnavailableError', async () => {
    model.replyJson((_prompt, signal) => hang<string>(signal));
    await expect(extractor(1, 20).extract({ utterance: 'BOS to DEN', tool: SEARCH_FLIGHTS })).rejects.toEqual(
      new ModelUnavailableError('extraction timed out'),
    );
    expect(model.callsFor('json')).toHaveLength(1);
  });

  it('maps a model failure to ModelUnavailableError', async () => {
    model.replyJson(new Error('connection refused'));
    await expect(extractor().extract({ utterance: 'BOS to DEN', tool: SEARCH_FLIGHTS })).rejects.toThrow(
      new ModelUnavailableError('connection refused'),
    );
  });
});
