/**
 * Error Types
 *
 * Typed error classes. The `code` lets callers branch without string matching
 * on messages.
 */

/**
 * Error codes for classification.
 */
export type OpenSearchErrorCode =
  | 'NOT_OPENSEARCH'
  | 'MALFORMED_XML'
  | 'HTTP_STATUS'
  | 'RESPONSE_TOO_LARGE'
  | 'NETWORK'
  | 'CONFIG_INVALID'
  | 'CONFIG_UNREADABLE';

/**
 * Base error class.
 */
export class OpenSearchError extends Error {
  constructor(
    message: string,
    public readonly code: OpenSearchErrorCode
  ) {
    super(message);
    this.name = 'OpenSearchError';
  }
}

/**
 * Structural problem with a description document.
 * Reported by the reader, not thrown. Not retryable - fix the document.
 */
export class DescriptionError extends OpenSearchError {
  constructor(
    message: string,
    code: 'NOT_OPENSEARCH' | 'MALFORMED_XML',
    public readonly line?: number,
    public readonly column?: number
  ) {
    super(message, code);
    this.name = 'DescriptionError';
  }
}

/**
 * Transport failure (HTTP status, oversized body, network).
 */
export class TransportError extends OpenSearchError {
  constructor(
    message: string,
    code: 'HTTP_STATUS' | 'RESPONSE_TOO_LARGE' | 'NETWORK',
    public readonly url: string,
    public readonly status?: number
  ) {
    super(message, code);
    this.name = 'TransportError';
  }
}

/**
 * Configuration file could not be read or failed validation.
 */
export class ConfigError extends OpenSearchError {
  constructor(message: string, code: 'CONFIG_INVALID' | 'CONFIG_UNREADABLE') {
    super(message, code);
    this.name = 'ConfigError';
  }
}
