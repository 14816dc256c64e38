/**
 * Search Engine
 *
 * One search engine described in OpenSearch format: metadata, the search URL
 * template, an optional suggestions URL template and their request
 * parameters. Engines are built by DescriptionReader or filled in by hand.
 *
 * An engine is valid once it has a name and a search URL template. Search
 * URLs are built here; running the search is left to a delegate. Suggestions
 * and the engine image need a transport; without one both stay disabled.
 */

import { createSilentLogger } from '../core/logger.js';
import { createEventBus, type EventBus, type EventHandler } from '../core/event-bus.js';
import type { Logger } from '../types/logger.js';
import { SignatureImageCodec, type ImageCodec } from './image-codec.js';
import { ImageLoader } from './image-loader.js';
import {
  SuggestionRequestManager,
  type SuggestionRequestOptions,
  type SuggestionSource,
} from './suggestions.js';
import { createTemplateContext, type TemplateContext } from './template-context.js';
import type { Transport } from './transport.js';
import {
  parseRequestMethod,
  type BuiltRequest,
  type EngineImage,
  type Parameter,
  type RequestMethod,
  type SearchEngineEvents,
  type SearchRequestDelegate,
} from './types.js';
import { buildRequest, buildUrl } from './url-template.js';

export interface SearchEngineOptions {
  /** Network capability for suggestions and images */
  transport?: Transport | null;
  /** Decoder for fetched images */
  imageCodec?: ImageCodec;
  /** Locale and application name used by templates */
  templateContext?: TemplateContext;
  /** Receiver of requestSearchResults() */
  delegate?: SearchRequestDelegate | null;
  logger?: Logger;
}

function copyParameters(parameters: readonly Parameter[]): Parameter[] {
  return parameters.map((p) => ({ name: p.name, value: p.value }));
}

function sameParameters(a: readonly Parameter[], b: readonly Parameter[]): boolean {
  return (
    a.length === b.length &&
    a.every((p, i) => p.name === b[i]?.name && p.value === b[i]?.value)
  );
}

export class SearchEngine implements SuggestionSource {
  private name = '';
  private description = '';
  private imageUrl = '';
  private tags = new Set<string>();

  private searchUrlTemplate = '';
  private searchParameters: Parameter[] = [];
  private searchMethod: RequestMethod = 'get';

  private suggestionsUrlTemplate = '';
  private suggestionsParameters: Parameter[] = [];
  private suggestionsMethod: RequestMethod = 'get';

  private transport: Transport | null;
  private delegate: SearchRequestDelegate | null;
  private readonly templateContext: TemplateContext;
  private readonly events: EventBus<SearchEngineEvents>;
  private readonly suggestions: SuggestionRequestManager;
  private readonly imageLoader: ImageLoader;

  constructor(options: SearchEngineOptions = {}) {
    const baseLogger: Logger = options.logger ?? createSilentLogger();
    const logger = baseLogger.child({ component: 'search-engine' });

    this.transport = options.transport ?? null;
    this.delegate = options.delegate ?? null;
    this.templateContext = options.templateContext ?? createTemplateContext();
    this.events = createEventBus<SearchEngineEvents>(logger);

    this.suggestions = new SuggestionRequestManager({
      source: this,
      getTransport: () => this.transport,
      templateContext: this.templateContext,
      onSuggestions: (list) => {
        this.events.publish('suggestions', list);
      },
      logger,
    });

    this.imageLoader = new ImageLoader({
      getImageUrl: () => this.imageUrl,
      assignImageUrl: (url) => {
        this.imageUrl = url;
      },
      getTransport: () => this.transport,
      codec: options.imageCodec ?? new SignatureImageCodec(),
      onImageChanged: (image) => {
        this.events.publish('imageChanged', image);
      },
      logger,
    });
  }

  // ═══════════════════════════════════════════════════════════════
  // METADATA
  // ═══════════════════════════════════════════════════════════════

  getName(): string {
    return this.name;
  }

  setName(name: string): void {
    this.name = name;
  }

  getDescription(): string {
    return this.description;
  }

  setDescription(description: string): void {
    this.description = description;
  }

  /**
   * Keywords identifying and categorizing the engine. Each tag appears once.
   */
  getTags(): string[] {
    return [...this.tags];
  }

  setTags(tags: Iterable<string>): void {
    this.tags = new Set(tags);
  }

  /**
   * Valid engines have a name and a search URL template.
   */
  isValid(): boolean {
    return this.name !== '' && this.searchUrlTemplate !== '';
  }

  // ═══════════════════════════════════════════════════════════════
  // SEARCH
  // ═══════════════════════════════════════════════════════════════

  getSearchUrlTemplate(): string {
    return this.searchUrlTemplate;
  }

  setSearchUrlTemplate(template: string): void {
    this.searchUrlTemplate = template;
  }

  getSearchParameters(): Parameter[] {
    return copyParameters(this.searchParameters);
  }

  setSearchParameters(parameters: readonly Parameter[]): void {
    this.searchParameters = copyParameters(parameters);
  }

  getSearchMethod(): RequestMethod {
    return this.searchMethod;
  }

  /**
   * Set the search method. Case-insensitive; anything but get/post is ignored.
   */
  setSearchMethod(method: string): void {
    this.searchMethod = parseRequestMethod(method) ?? this.searchMethod;
  }

  /**
   * Search URL for `term`, or null without a search template.
   */
  searchUrl(term: string): string | null {
    return buildUrl(
      term,
      this.searchUrlTemplate,
      this.searchParameters,
      this.searchMethod,
      this.templateContext
    );
  }

  /**
   * Full search request for `term` (URL plus POST body when applicable).
   */
  searchRequest(term: string): BuiltRequest | null {
    return buildRequest(
      term,
      this.searchUrlTemplate,
      this.searchParameters,
      this.searchMethod,
      this.templateContext
    );
  }

  getDelegate(): SearchRequestDelegate | null {
    return this.delegate;
  }

  setDelegate(delegate: SearchRequestDelegate | null): void {
    this.delegate = delegate;
  }

  /**
   * Hand the search request for `term` to the delegate. Without a delegate or
   * with an empty term nothing happens.
   */
  requestSearchResults(term: string): void {
    if (!this.delegate || !term) {
      return;
    }

    const request = this.searchRequest(term);
    if (request) {
      this.delegate.performSearchRequest(request);
    }
  }

  // ═══════════════════════════════════════════════════════════════
  // SUGGESTIONS
  // ═══════════════════════════════════════════════════════════════

  providesSuggestions(): boolean {
    return this.suggestionsUrlTemplate !== '';
  }

  getSuggestionsUrlTemplate(): string {
    return this.suggestionsUrlTemplate;
  }

  setSuggestionsUrlTemplate(template: string): void {
    this.suggestionsUrlTemplate = template;
  }

  getSuggestionsParameters(): Parameter[] {
    return copyParameters(this.suggestionsParameters);
  }

  setSuggestionsParameters(parameters: readonly Parameter[]): void {
    this.suggestionsParameters = copyParameters(parameters);
  }

  getSuggestionsMethod(): RequestMethod {
    return this.suggestionsMethod;
  }

  /**
   * Set the suggestions method. Case-insensitive; anything but get/post is ignored.
   */
  setSuggestionsMethod(method: string): void {
    this.suggestionsMethod = parseRequestMethod(method) ?? this.suggestionsMethod;
  }

  /**
   * Suggestions URL for `term`, or null without a suggestions template.
   */
  suggestionsUrl(term: string): string | null {
    return buildUrl(
      term,
      this.suggestionsUrlTemplate,
      this.suggestionsParameters,
      this.suggestionsMethod,
      this.templateContext
    );
  }

  /**
   * Request suggestions for `term`. Returns immediately; the list is
   * delivered to `onSuggestions` subscribers. A previous outstanding request
   * is cancelled and will never deliver.
   */
  requestSuggestions(term: string, options?: SuggestionRequestOptions): void {
    this.suggestions.requestSuggestions(term, options);
  }

  /**
   * Cancel the outstanding suggestions request, if any.
   */
  cancelSuggestions(): void {
    this.suggestions.cancel();
  }

  isRequestingSuggestions(): boolean {
    return this.suggestions.isRequesting();
  }

  // ═══════════════════════════════════════════════════════════════
  // IMAGE
  // ═══════════════════════════════════════════════════════════════

  getImageUrl(): string {
    return this.imageUrl;
  }

  /**
   * Set the image URL. A different URL drops the cached image; loading is
   * deferred until image() is called.
   */
  setImageUrl(url: string): void {
    if (url === this.imageUrl) {
      return;
    }
    this.imageUrl = url;
    this.imageLoader.invalidate();
  }

  /**
   * The engine image, or null while it has not been loaded. The first call
   * with an image URL starts loading; `onImageChanged` fires on arrival.
   */
  image(): EngineImage | null {
    return this.imageLoader.image();
  }

  /**
   * True while the image for the current URL is being fetched.
   */
  isLoadingImage(): boolean {
    return this.imageLoader.isLoading();
  }

  /**
   * Set the image explicitly. Without an image URL, a PNG data URI is
   * synthesized from it.
   */
  setImage(image: EngineImage): void {
    this.imageLoader.setImage(image);
  }

  // ═══════════════════════════════════════════════════════════════
  // COLLABORATORS & EVENTS
  // ═══════════════════════════════════════════════════════════════

  getTransport(): Transport | null {
    return this.transport;
  }

  setTransport(transport: Transport | null): void {
    this.transport = transport;
  }

  /**
   * @returns a function that removes the subscription
   */
  onSuggestions(handler: EventHandler<string[]>): () => void {
    const id = this.events.subscribe('suggestions', handler);
    return () => {
      this.events.unsubscribe(id);
    };
  }

  /**
   * @returns a function that removes the subscription
   */
  onImageChanged(handler: EventHandler<EngineImage>): () => void {
    const id = this.events.subscribe('imageChanged', handler);
    return () => {
      this.events.unsubscribe(id);
    };
  }

  // ═══════════════════════════════════════════════════════════════
  // COMPARISON
  // ═══════════════════════════════════════════════════════════════

  /**
   * Same description: name, description, image URL, both templates and both
   * parameter lists. Methods and tags are not compared.
   */
  equals(other: SearchEngine): boolean {
    return (
      this.name === other.name &&
      this.description === other.description &&
      this.imageUrl === other.imageUrl &&
      this.searchUrlTemplate === other.searchUrlTemplate &&
      this.suggestionsUrlTemplate === other.suggestionsUrlTemplate &&
      sameParameters(this.searchParameters, other.searchParameters) &&
      sameParameters(this.suggestionsParameters, other.suggestionsParameters)
    );
  }

  /**
   * Comparator ordering engines by name, for Array.prototype.sort.
   */
  static compareByName(a: SearchEngine, b: SearchEngine): number {
    if (a.name < b.name) return -1;
    if (a.name > b.name) return 1;
    return 0;
  }
}
