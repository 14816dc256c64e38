/**
 * OpenSearch module exports.
 */

export type {
  BuiltRequest,
  EngineImage,
  Parameter,
  RequestMethod,
  SearchEngineEvents,
  SearchRequestDelegate,
} from './types.js';
export {
  OPENSEARCH_NAMESPACE,
  SEARCH_URL_TYPE,
  SUGGESTIONS_URL_TYPE,
  XHTML_URL_TYPE,
  REQUEST_METHODS,
  parseRequestMethod,
} from './types.js';

export type { TemplateContext } from './template-context.js';
export {
  DEFAULT_APPLICATION_NAME,
  createTemplateContext,
  systemLocaleName,
} from './template-context.js';

export { percentEncode, expandTemplate, buildUrl, buildPostBody, buildRequest } from './url-template.js';

export type { Transport, TransportRequestOptions, FetchTransportConfig } from './transport.js';
export { FetchTransport } from './transport.js';

export type { ImageCodec } from './image-codec.js';
export { SignatureImageCodec } from './image-codec.js';

export type { SuggestionRequestOptions, SuggestionSource } from './suggestions.js';
export { parseSuggestionsResponse, SuggestionRequestManager } from './suggestions.js';

export { ImageLoader } from './image-loader.js';

export type { SearchEngineOptions } from './search-engine.js';
export { SearchEngine } from './search-engine.js';

export type { XmlToken, TokenizeResult } from './xml-tokens.js';
export { XmlTokenStream, tokenize } from './xml-tokens.js';

export type { DescriptionReaderOptions } from './description-reader.js';
export { DescriptionReader } from './description-reader.js';
export { DescriptionWriter } from './description-writer.js';
