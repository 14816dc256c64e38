/**
 * Test factories and fakes.
 */

import { vi } from 'vitest';
import type { Logger } from '../../src/types/logger.js';
import type { Transport, TransportRequestOptions } from '../../src/opensearch/transport.js';
import { createTemplateContext, type TemplateContext } from '../../src/opensearch/template-context.js';

/**
 * Create a mock logger that captures all log calls.
 */
export function createMockLogger(): Logger & {
  calls: Record<string, unknown[][]>;
  reset: () => void;
} {
  const calls: Record<string, unknown[][]> = {
    debug: [],
    info: [],
    warn: [],
    error: [],
  };

  const logger = {
    debug: vi.fn((...args: unknown[]) => calls['debug']?.push(args)),
    info: vi.fn((...args: unknown[]) => calls['info']?.push(args)),
    warn: vi.fn((...args: unknown[]) => calls['warn']?.push(args)),
    error: vi.fn((...args: unknown[]) => calls['error']?.push(args)),
    child: (): Logger => logger,
    calls,
    reset: () => {
      calls['debug'] = [];
      calls['info'] = [];
      calls['warn'] = [];
      calls['error'] = [];
      vi.clearAllMocks();
    },
  };

  return logger;
}

/**
 * Template context with fixed values.
 */
export function createTestTemplateContext(
  locale = 'en_US',
  applicationName = 'test-app'
): TemplateContext {
  return createTemplateContext({ locale, applicationName });
}

/**
 * One request seen by the fake transport. Settle it with resolve/reject.
 */
export interface FakeRequest {
  method: 'get' | 'post';
  url: string;
  body: string | null;
  signal: AbortSignal | undefined;
  resolve: (body: string | Uint8Array) => void;
  reject: (error: Error) => void;
}

/**
 * Transport whose requests stay pending until the test settles them.
 * An aborted request rejects, as fetch does.
 */
export class FakeTransport implements Transport {
  readonly requests: FakeRequest[] = [];

  get(url: string, options: TransportRequestOptions = {}): Promise<Uint8Array> {
    return this.enqueue('get', url, null, options.signal);
  }

  post(url: string, body: string, options: TransportRequestOptions = {}): Promise<Uint8Array> {
    return this.enqueue('post', url, body, options.signal);
  }

  /** Most recent request; throws when none was made */
  last(): FakeRequest {
    const request = this.requests[this.requests.length - 1];
    if (!request) {
      throw new Error('No request was made');
    }
    return request;
  }

  private enqueue(
    method: 'get' | 'post',
    url: string,
    body: string | null,
    signal: AbortSignal | undefined
  ): Promise<Uint8Array> {
    return new Promise<Uint8Array>((resolve, reject) => {
      signal?.addEventListener(
        'abort',
        () => {
          reject(new Error('aborted'));
        },
        { once: true }
      );

      this.requests.push({
        method,
        url,
        body,
        signal,
        resolve: (response) => {
          resolve(typeof response === 'string' ? new TextEncoder().encode(response) : response);
        },
        reject,
      });
    });
  }
}

/**
 * Let pending promise continuations run.
 */
export async function flushPromises(): Promise<void> {
  for (let i = 0; i < 5; i++) {
    await Promise.resolve();
  }
  await new Promise<void>((resolve) => setImmediate(resolve));
}
