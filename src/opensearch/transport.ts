/**
 * HTTP transport
 *
 * The network capability used for suggestions and images. Callers may supply
 * their own implementation; FetchTransport is the default, built on the
 * global fetch with:
 * - abort support via AbortSignal
 * - optional per-request timeout
 * - response size limit
 */

import { TransportError } from '../core/errors.js';

export interface TransportRequestOptions {
  /** Aborts the request when fired */
  signal?: AbortSignal | undefined;
}

/**
 * Network capability. Both methods resolve to the raw response body and
 * reject on failure or abort.
 */
export interface Transport {
  get(url: string, options?: TransportRequestOptions): Promise<Uint8Array>;
  post(url: string, body: string, options?: TransportRequestOptions): Promise<Uint8Array>;
}

export interface FetchTransportConfig {
  /** User-Agent header sent with every request */
  userAgent: string;
  /** Per-request timeout in ms, 0 = none */
  timeoutMs: number;
  /** Maximum accepted response size in bytes */
  maxResponseBytes: number;
}

const DEFAULT_CONFIG: FetchTransportConfig = {
  userAgent: 'opensearch-description/0.1',
  timeoutMs: 0,
  maxResponseBytes: 2 * 1024 * 1024,
};

/**
 * Transport backed by the global fetch.
 */
export class FetchTransport implements Transport {
  private readonly config: FetchTransportConfig;

  constructor(config: Partial<FetchTransportConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get(url: string, options: TransportRequestOptions = {}): Promise<Uint8Array> {
    return this.send(url, { method: 'GET' }, options.signal);
  }

  post(url: string, body: string, options: TransportRequestOptions = {}): Promise<Uint8Array> {
    return this.send(
      url,
      {
        method: 'POST',
        body,
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      },
      options.signal
    );
  }

  private async send(
    url: string,
    init: { method: string; body?: string; headers?: Record<string, string> },
    signal: AbortSignal | undefined
  ): Promise<Uint8Array> {
    const controller = new AbortController();
    const onAbort = (): void => {
      controller.abort();
    };
    if (signal?.aborted) {
      controller.abort();
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    const timeoutId =
      this.config.timeoutMs > 0
        ? setTimeout(() => {
            controller.abort();
          }, this.config.timeoutMs)
        : undefined;

    try {
      const requestInit: RequestInit = {
        method: init.method,
        signal: controller.signal,
        headers: { 'User-Agent': this.config.userAgent, ...init.headers },
      };
      if (init.body !== undefined) {
        requestInit.body = init.body;
      }

      let response: Response;
      try {
        response = await fetch(url, requestInit);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new TransportError(`Request failed: ${message}`, 'NETWORK', url);
      }

      if (!response.ok) {
        throw new TransportError(
          `HTTP ${String(response.status)}: ${response.statusText}`,
          'HTTP_STATUS',
          url,
          response.status
        );
      }

      return await this.readBody(url, response);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Read the body, refusing anything over maxResponseBytes.
   */
  private async readBody(url: string, response: Response): Promise<Uint8Array> {
    const limit = this.config.maxResponseBytes;

    const contentLength = response.headers.get('content-length');
    if (contentLength && parseInt(contentLength, 10) > limit) {
      throw new TransportError(
        `Response too large: ${contentLength} bytes (max ${String(limit)})`,
        'RESPONSE_TOO_LARGE',
        url
      );
    }

    const reader = response.body?.getReader();
    if (!reader) {
      return new Uint8Array(0);
    }

    const chunks: Uint8Array[] = [];
    let totalSize = 0;

    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;

      totalSize += value.length;
      if (totalSize > limit) {
        await reader.cancel();
        throw new TransportError(
          `Response too large: exceeded ${String(limit)} bytes`,
          'RESPONSE_TOO_LARGE',
          url
        );
      }
      chunks.push(value);
    }

    const combined = new Uint8Array(totalSize);
    let offset = 0;
    for (const chunk of chunks) {
      combined.set(chunk, offset);
      offset += chunk.length;
    }
    return combined;
  }
}
