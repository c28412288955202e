import type { IQueryRequest, IWireLookupResult, QueryInput } from '../models';
import { toWireResult } from '../models';
import { DomainQueryError } from '../errors';
import { DomainQueryEngine } from '../services/DomainQueryEngine';
import { StreamingResponder } from '../patterns/state/StreamingResponder';
import type { IStreamChannel, IStreamOutcome } from '../patterns/state/IStreamState';
import { isRecord } from '../utils/guards';

export const NO_FRAGMENTS_MESSAGE = 'No valid domain fragments in request';

/**
 * Result of turning a raw HTTP body into query input
 */
export type ParsedQueryRequest =
  | { ok: true; input: QueryInput }
  | { ok: false; error: string };

/**
 * Controller response for the batch endpoint
 */
export type BatchResponse =
  | { statusCode: 200; body: { items: IWireLookupResult[] } }
  | { statusCode: 400; body: { error: string } };

/**
 * Candidates ready to stream, or the request-level error that prevents streaming
 */
export type StreamPreparation =
  | { ok: true; candidates: string[] }
  | { ok: false; statusCode: 400; error: string };

/**
 * Domain Query Controller - request handling shared by the batch and stream endpoints
 * Known query failures become 400 payloads; anything else propagates to the server.
 */
export class DomainQueryController {
  constructor(private readonly engine: DomainQueryEngine) {}

  /**
   * Parse and validate a JSON request body
   * @param raw - Raw body text
   * @returns Query input, or a client error message
   */
  parseRequestBody(raw: string): ParsedQueryRequest {
    if (!raw.trim()) {
      return { ok: false, error: 'Request body is empty' };
    }

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch {
      return { ok: false, error: 'Request body is not valid JSON' };
    }

    if (!isRecord(payload)) {
      return { ok: false, error: 'Request body must be a JSON object' };
    }

    const text = payload['text'];
    if (text !== undefined && text !== null && typeof text !== 'string') {
      return { ok: false, error: 'Invalid request: text must be a string' };
    }

    const lines = payload['lines'];
    if (lines !== undefined && lines !== null) {
      if (!Array.isArray(lines)) {
        return { ok: false, error: 'Invalid request: lines must be an array of strings' };
      }
      const entries: readonly unknown[] = lines;
      const checked: Array<string | null> = [];
      for (const entry of entries) {
        if (entry !== null && typeof entry !== 'string') {
          return { ok: false, error: 'Invalid request: lines must be an array of strings' };
        }
        checked.push(entry);
      }
      return { ok: true, input: this.mergeInputs({ ...(typeof text === 'string' && { text }), lines: checked }) };
    }

    return { ok: true, input: this.mergeInputs(typeof text === 'string' ? { text } : {}) };
  }

  /**
   * Combine `text` and `lines`: lines first, then text, when both carry something
   * @param request - Request fields
   * @returns Input for the engine
   */
  mergeInputs(request: IQueryRequest): QueryInput {
    const text = request.text ?? '';
    const lines = request.lines ?? [];

    if (text && lines.length > 0) {
      return [...lines, text];
    }
    if (lines.length > 0) {
      return lines;
    }
    return text;
  }

  /**
   * Run the batch endpoint
   * @param input - Parsed query input
   */
  async runBatch(input: QueryInput): Promise<BatchResponse> {
    try {
      const results = await this.engine.runBatch(input);
      if (results.length === 0) {
        return { statusCode: 400, body: { error: NO_FRAGMENTS_MESSAGE } };
      }
      return { statusCode: 200, body: { items: results.map(toWireResult) } };
    } catch (error) {
      if (error instanceof DomainQueryError) {
        return { statusCode: 400, body: { error: error.message } };
      }
      throw error;
    }
  }

  /**
   * Build the candidate list before any stream event is written
   * @param input - Parsed query input
   */
  async prepareStream(input: QueryInput): Promise<StreamPreparation> {
    try {
      const candidates = await this.engine.prepareCandidates(input);
      if (candidates.length === 0) {
        return { ok: false, statusCode: 400, error: NO_FRAGMENTS_MESSAGE };
      }
      return { ok: true, candidates };
    } catch (error) {
      if (error instanceof DomainQueryError) {
        return { ok: false, statusCode: 400, error: error.message };
      }
      throw error;
    }
  }

  /**
   * Stream lookups for prepared candidates over a channel
   * @param candidates - Output of a successful `prepareStream`
   * @param channel - Response channel
   */
  stream(candidates: readonly string[], channel: IStreamChannel): Promise<IStreamOutcome> {
    const responder = new StreamingResponder(this.engine.clientFor(), channel);
    return responder.run(candidates);
  }
}
