/**
 * Shared types for the OpenSearch description model.
 */

/** Namespace URI of OpenSearch 1.1 description documents */
export const OPENSEARCH_NAMESPACE = 'http://a9.com/-/spec/opensearch/1.1/';

/** Url type carrying the search (results page) template */
export const SEARCH_URL_TYPE = 'text/html';

/** Url type accepted as an alias of {@link SEARCH_URL_TYPE} */
export const XHTML_URL_TYPE = 'application/xhtml+xml';

/** Url type carrying the suggestions template */
export const SUGGESTIONS_URL_TYPE = 'application/x-suggestions+json';

/**
 * HTTP method used for search or suggestion requests.
 */
export type RequestMethod = 'get' | 'post';

export const REQUEST_METHODS: readonly RequestMethod[] = ['get', 'post'];

/**
 * Narrow a free-form method name (any case) to a RequestMethod.
 */
export function parseRequestMethod(method: string): RequestMethod | null {
  const lower = method.toLowerCase();
  return REQUEST_METHODS.find((m) => m === lower) ?? null;
}

/**
 * One request parameter. `value` is a URL template.
 * Lists of parameters keep their order and may repeat names.
 */
export interface Parameter {
  name: string;
  value: string;
}

/**
 * A request ready to hand to a transport or a delegate.
 */
export type BuiltRequest =
  | { method: 'get'; url: string }
  | { method: 'post'; url: string; body: string };

/**
 * Decoded engine icon.
 */
export interface EngineImage {
  /** MIME type detected from the image bytes */
  mimeType: string;
  /** Encoded image bytes */
  data: Uint8Array;
}

/**
 * Events published by a search engine.
 */
export type SearchEngineEvents = {
  /** Suggestions arrived for the latest request */
  suggestions: string[];
  /** The engine image was loaded or replaced */
  imageChanged: EngineImage;
};

/**
 * Receives search requests built by `requestSearchResults()`. Executing the
 * search (opening a browser tab, issuing the HTTP call) is up to the delegate.
 */
export interface SearchRequestDelegate {
  performSearchRequest(request: BuiltRequest): void;
}
