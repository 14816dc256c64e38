/**
 * Description Reader
 *
 * Reads an OpenSearch 1.1 description document into a SearchEngine.
 *
 * read() always returns a new engine, even when the document is rejected;
 * check hasError() and then isValid() on the engine. Only two conditions are
 * errors: a document that is not well-formed XML, and a root element other
 * than OpenSearchDescription in the OpenSearch 1.1 namespace. Everything else
 * the reader does not understand (unknown elements, Url elements without a
 * template or of an unknown type, incomplete Param elements, repeated Url
 * types) is skipped.
 */

import { DescriptionError } from '../core/errors.js';
import { createSilentLogger } from '../core/logger.js';
import type { Logger } from '../types/logger.js';
import { SearchEngine, type SearchEngineOptions } from './search-engine.js';
import {
  OPENSEARCH_NAMESPACE,
  SEARCH_URL_TYPE,
  SUGGESTIONS_URL_TYPE,
  XHTML_URL_TYPE,
  type Parameter,
} from './types.js';
import { tokenize, type XmlToken, type XmlTokenStream } from './xml-tokens.js';

type StartToken = Extract<XmlToken, { kind: 'start' }>;

export interface DescriptionReaderOptions {
  /** Options passed to every engine the reader creates */
  engine?: SearchEngineOptions;
  logger?: Logger;
}

/**
 * Walks the token stream of one document and fills in one engine.
 */
class DescriptionParser {
  constructor(
    private readonly stream: XmlTokenStream,
    private readonly engine: SearchEngine,
    private readonly logger: Logger
  ) {}

  parse(): DescriptionError | null {
    const { stream } = this;

    while (stream.current.kind !== 'start' && !stream.atEnd()) {
      stream.readNext();
    }

    const root = stream.current;
    if (
      root.kind !== 'start' ||
      root.localName !== 'OpenSearchDescription' ||
      root.namespaceUri !== OPENSEARCH_NAMESPACE
    ) {
      return new DescriptionError('The file is not an OpenSearch 1.1 file.', 'NOT_OPENSEARCH');
    }

    for (;;) {
      const token = stream.readNext();
      if (token.kind === 'end' || token.kind === 'endDocument') break;
      if (token.kind !== 'start') continue;

      switch (token.localName) {
        case 'ShortName':
          this.engine.setName(this.readElementText());
          break;
        case 'Description':
          this.engine.setDescription(this.readElementText());
          break;
        case 'Url':
          this.readUrl(token);
          break;
        case 'Image':
          this.engine.setImageUrl(this.readElementText());
          break;
        case 'Tags':
          this.engine.setTags(this.readElementText().split(' ').filter((tag) => tag !== ''));
          break;
        default:
          this.skipSubtree();
      }
    }

    return null;
  }

  private readUrl(token: StartToken): void {
    let type = token.attributes.get('type') ?? '';
    const template = token.attributes.get('template') ?? '';
    const method = token.attributes.get('method') ?? '';

    if (type === '' || type === XHTML_URL_TYPE) {
      type = SEARCH_URL_TYPE;
    }

    if (template === '') {
      this.skipSubtree();
      return;
    }

    if (
      (type === SUGGESTIONS_URL_TYPE && this.engine.providesSuggestions()) ||
      (type === SEARCH_URL_TYPE && this.engine.getSearchUrlTemplate() !== '')
    ) {
      this.logger.debug({ type, template }, 'Ignoring repeated Url element');
      this.skipSubtree();
      return;
    }

    const parameters: Parameter[] = [];
    for (;;) {
      const child = this.stream.readNext();
      if (child.kind === 'end' || child.kind === 'endDocument') break;
      if (child.kind !== 'start') continue;

      if (child.localName === 'Param' || child.localName === 'Parameter') {
        const name = child.attributes.get('name') ?? '';
        const value = child.attributes.get('value') ?? '';
        if (name !== '' && value !== '') {
          parameters.push({ name, value });
        }
      }
      this.skipSubtree();
    }

    if (type === SUGGESTIONS_URL_TYPE) {
      this.engine.setSuggestionsUrlTemplate(template);
      this.engine.setSuggestionsParameters(parameters);
      this.engine.setSuggestionsMethod(method);
    } else if (type === SEARCH_URL_TYPE) {
      this.engine.setSearchUrlTemplate(template);
      this.engine.setSearchParameters(parameters);
      this.engine.setSearchMethod(method);
    }
  }

  /**
   * Text of the current element up to its end; nested elements are skipped.
   */
  private readElementText(): string {
    let text = '';
    for (;;) {
      const token = this.stream.readNext();
      if (token.kind === 'text') {
        text += token.text;
      } else if (token.kind === 'start') {
        this.skipSubtree();
      } else {
        return text;
      }
    }
  }

  /**
   * Consume everything up to and including the end of the current element.
   */
  private skipSubtree(): void {
    for (;;) {
      const token = this.stream.readNext();
      if (token.kind === 'end' || token.kind === 'endDocument') return;
      if (token.kind === 'start') this.skipSubtree();
    }
  }
}

export class DescriptionReader {
  private lastError: DescriptionError | null = null;
  private readonly logger: Logger;

  constructor(private readonly options: DescriptionReaderOptions = {}) {
    const baseLogger: Logger = options.logger ?? createSilentLogger();
    this.logger = baseLogger.child({ component: 'description-reader' });
  }

  /**
   * Read a description document (text or UTF-8 bytes) into a new engine.
   * The engine is returned even when the document is rejected.
   */
  read(document: string | Uint8Array): SearchEngine {
    this.lastError = null;
    const engine = new SearchEngine(this.options.engine);

    const result = tokenize(document);
    if (!result.ok) {
      this.lastError = new DescriptionError(
        `Malformed XML at line ${String(result.line)}, column ${String(result.column)}: ${result.message}`,
        'MALFORMED_XML',
        result.line,
        result.column
      );
    } else {
      this.lastError = new DescriptionParser(result.stream, engine, this.logger).parse();
    }

    if (this.lastError) {
      this.logger.debug({ error: this.lastError.message }, 'Description rejected');
    } else {
      this.logger.debug({ name: engine.getName(), valid: engine.isValid() }, 'Description read');
    }

    return engine;
  }

  /**
   * True when the last read() hit a structural error.
   */
  hasError(): boolean {
    return this.lastError !== null;
  }

  /**
   * Message of the last structural error, '' when there was none.
   */
  errorString(): string {
    return this.lastError?.message ?? '';
  }

  get error(): DescriptionError | null {
    return this.lastError;
  }
}
