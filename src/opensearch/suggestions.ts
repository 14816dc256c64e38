/**
 * Suggestion requests
 *
 * Fetches contextual suggestions for one engine. At most one request is in
 * flight: a new request, an explicit cancel(), a caller signal or a caller
 * deadline detaches the current one before aborting it, so its response can
 * never produce an event.
 *
 * Failures of any kind (network, HTTP status, malformed body) end the request
 * quietly - suggestions are best-effort.
 */

import { z } from 'zod';
import type { Logger } from '../types/logger.js';
import type { Transport } from './transport.js';
import type { TemplateContext } from './template-context.js';
import type { Parameter, RequestMethod } from './types.js';
import { buildRequest } from './url-template.js';

// ═══════════════════════════════════════════════════════════════
// RESPONSE PARSING
// ═══════════════════════════════════════════════════════════════

/**
 * `[query, [suggestion, ...], ...]` - only element 1 is used.
 */
const suggestionsResponseSchema = z.tuple([z.unknown(), z.array(z.string())]).rest(z.unknown());

/**
 * Parse a suggestions response body.
 *
 * @returns the suggestion list, or null when the body does not have the
 *   expected shape
 */
export function parseSuggestionsResponse(body: string): string[] | null {
  const trimmed = body.trim();
  if (!trimmed.startsWith('[') || !trimmed.endsWith(']')) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return null;
  }

  const result = suggestionsResponseSchema.safeParse(parsed);
  return result.success ? result.data[1] : null;
}

// ═══════════════════════════════════════════════════════════════
// REQUEST MANAGER
// ═══════════════════════════════════════════════════════════════

/**
 * The engine fields a suggestions request is built from.
 */
export interface SuggestionSource {
  providesSuggestions(): boolean;
  getSuggestionsUrlTemplate(): string;
  getSuggestionsParameters(): Parameter[];
  getSuggestionsMethod(): RequestMethod;
}

export interface SuggestionRequestOptions {
  /** Caller cancellation; firing it cancels this request */
  signal?: AbortSignal | undefined;
  /** Caller deadline in ms; on expiry the request is cancelled */
  timeoutMs?: number | undefined;
}

export interface SuggestionManagerDeps {
  source: SuggestionSource;
  getTransport: () => Transport | null;
  templateContext: TemplateContext;
  onSuggestions: (suggestions: string[]) => void;
  logger: Logger;
}

interface InFlightRequest {
  id: number;
  url: string;
  controller: AbortController;
  /** Removes caller signal listeners and deadline timers */
  release: () => void;
}

export class SuggestionRequestManager {
  private inFlight: InFlightRequest | null = null;
  private nextId = 1;
  private readonly logger: Logger;

  constructor(private readonly deps: SuggestionManagerDeps) {
    this.logger = deps.logger.child({ component: 'suggestions' });
  }

  /**
   * True while a request is outstanding.
   */
  isRequesting(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Request suggestions for `term`, superseding any outstanding request.
   * Returns immediately; results arrive through `onSuggestions`.
   */
  requestSuggestions(term: string, options: SuggestionRequestOptions = {}): void {
    const { source } = this.deps;
    if (!term || !source.providesSuggestions()) {
      return;
    }

    const transport = this.deps.getTransport();
    if (!transport) {
      this.logger.debug('No transport configured, suggestions disabled');
      return;
    }

    if (options.signal?.aborted) {
      return;
    }

    this.cancel();

    const request = buildRequest(
      term,
      source.getSuggestionsUrlTemplate(),
      source.getSuggestionsParameters(),
      source.getSuggestionsMethod(),
      this.deps.templateContext
    );
    if (!request) {
      return;
    }

    const id = this.nextId++;
    const cleanups: (() => void)[] = [];

    const { signal, timeoutMs } = options;
    if (signal) {
      const onAbort = (): void => {
        this.cancelRequest(id);
      };
      signal.addEventListener('abort', onAbort, { once: true });
      cleanups.push(() => {
        signal.removeEventListener('abort', onAbort);
      });
    }
    if (timeoutMs !== undefined && timeoutMs > 0) {
      const timer = setTimeout(() => {
        this.logger.debug({ id, timeoutMs }, 'Suggestions request deadline expired');
        this.cancelRequest(id);
      }, timeoutMs);
      cleanups.push(() => {
        clearTimeout(timer);
      });
    }

    const inFlight: InFlightRequest = {
      id,
      url: request.url,
      controller: new AbortController(),
      release: () => {
        for (const cleanup of cleanups) cleanup();
      },
    };
    this.inFlight = inFlight;

    this.logger.debug({ id, method: request.method, url: request.url }, 'Requesting suggestions');

    const transportOptions = { signal: inFlight.controller.signal };
    let pending: Promise<Uint8Array>;
    try {
      pending =
        request.method === 'post'
          ? transport.post(request.url, request.body, transportOptions)
          : transport.get(request.url, transportOptions);
    } catch (error) {
      pending = Promise.reject(error instanceof Error ? error : new Error(String(error)));
    }

    void this.complete(inFlight, pending);
  }

  /**
   * Cancel the outstanding request, if any.
   */
  cancel(): void {
    if (this.inFlight) {
      this.cancelRequest(this.inFlight.id);
    }
  }

  private cancelRequest(id: number): void {
    const inFlight = this.inFlight;
    if (!inFlight || inFlight.id !== id) {
      return;
    }

    // Detach before aborting so the rejected transport call is ignored
    this.inFlight = null;
    inFlight.release();
    inFlight.controller.abort();
    this.logger.debug({ id }, 'Suggestions request cancelled');
  }

  private async complete(inFlight: InFlightRequest, pending: Promise<Uint8Array>): Promise<void> {
    let body: Uint8Array;
    try {
      body = await pending;
    } catch (error) {
      if (this.inFlight === inFlight) {
        this.finish(inFlight);
        this.logger.debug(
          {
            id: inFlight.id,
            url: inFlight.url,
            error: error instanceof Error ? error.message : String(error),
          },
          'Suggestions request failed'
        );
      }
      return;
    }

    if (this.inFlight !== inFlight) {
      this.logger.debug({ id: inFlight.id }, 'Discarding superseded suggestions response');
      return;
    }
    this.finish(inFlight);

    const suggestions = parseSuggestionsResponse(new TextDecoder('utf-8').decode(body));
    if (!suggestions) {
      this.logger.debug({ id: inFlight.id }, 'Ignoring malformed suggestions response');
      return;
    }

    this.logger.debug({ id: inFlight.id, count: suggestions.length }, 'Suggestions received');
    this.deps.onSuggestions(suggestions);
  }

  private finish(inFlight: InFlightRequest): void {
    this.inFlight = null;
    inFlight.release();
  }
}
