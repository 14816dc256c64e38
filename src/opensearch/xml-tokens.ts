/**
 * XML token stream
 *
 * Flattens a document into start-element / text / end-element tokens with
 * resolved namespace URIs, so readers can walk it with a cursor instead of
 * poking at a parsed object tree.
 *
 * Well-formedness is checked with fast-xml-parser's validator; the ordered
 * tree comes from its `preserveOrder` mode. Namespace scopes (`xmlns`,
 * `xmlns:prefix`) are resolved here because the parser keeps prefixes as-is.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';

// ═══════════════════════════════════════════════════════════════
// TOKENS
// ═══════════════════════════════════════════════════════════════

interface ElementName {
  /** Name as written, including any prefix */
  name: string;
  localName: string;
  /** Resolved namespace URI, '' when none is in scope */
  namespaceUri: string;
}

export type XmlToken =
  | ({ kind: 'start'; attributes: ReadonlyMap<string, string> } & ElementName)
  | ({ kind: 'end' } & ElementName)
  | { kind: 'text'; text: string }
  | { kind: 'endDocument' };

const END_DOCUMENT: XmlToken = { kind: 'endDocument' };

const XML_NAMESPACE = 'http://www.w3.org/XML/1998/namespace';

/**
 * Forward-only cursor over a token list.
 */
export class XmlTokenStream {
  private index = -1;

  constructor(private readonly tokens: readonly XmlToken[]) {}

  /** Token under the cursor; endDocument before the first readNext() */
  get current(): XmlToken {
    return this.tokens[this.index] ?? END_DOCUMENT;
  }

  /** Advance and return the new current token. */
  readNext(): XmlToken {
    if (this.index < this.tokens.length) {
      this.index++;
    }
    return this.current;
  }

  atEnd(): boolean {
    return this.index >= this.tokens.length;
  }
}

export type TokenizeResult =
  | { ok: true; stream: XmlTokenStream }
  | { ok: false; message: string; line: number; column: number };

// ═══════════════════════════════════════════════════════════════
// TREE WALK
// ═══════════════════════════════════════════════════════════════

const ATTRIBUTE_PREFIX = '@_';
const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_KEY,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  processEntities: true,
  // numeric character references (&#233; &#xE9;)
  htmlEntities: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readAttributes(node: Record<string, unknown>): Map<string, string> {
  const attributes = new Map<string, string>();
  const raw = node[ATTRIBUTES_KEY];
  if (!isRecord(raw)) {
    return attributes;
  }

  for (const [key, value] of Object.entries(raw)) {
    if (!key.startsWith(ATTRIBUTE_PREFIX)) continue;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      attributes.set(key.slice(ATTRIBUTE_PREFIX.length), String(value));
    }
  }
  return attributes;
}

/**
 * Derive the namespace scope of an element from its parent's scope and its
 * own xmlns declarations.
 */
function openScope(
  parent: ReadonlyMap<string, string>,
  attributes: ReadonlyMap<string, string>
): ReadonlyMap<string, string> {
  let scope: Map<string, string> | null = null;

  for (const [name, value] of attributes) {
    let prefix: string | null = null;
    if (name === 'xmlns') {
      prefix = '';
    } else if (name.startsWith('xmlns:')) {
      prefix = name.slice('xmlns:'.length);
    }
    if (prefix === null) continue;

    scope ??= new Map(parent);
    scope.set(prefix, value);
  }

  return scope ?? parent;
}

function resolveName(name: string, scope: ReadonlyMap<string, string>): ElementName {
  const colon = name.indexOf(':');
  const prefix = colon >= 0 ? name.slice(0, colon) : '';
  const localName = colon >= 0 ? name.slice(colon + 1) : name;
  return { name, localName, namespaceUri: scope.get(prefix) ?? '' };
}

function walk(nodes: unknown, scope: ReadonlyMap<string, string>, tokens: XmlToken[]): void {
  if (!Array.isArray(nodes)) {
    return;
  }

  for (const node of nodes) {
    if (!isRecord(node)) continue;

    for (const [key, value] of Object.entries(node)) {
      if (key === ATTRIBUTES_KEY) continue;

      if (key === TEXT_KEY) {
        if (typeof value === 'string' || typeof value === 'number') {
          tokens.push({ kind: 'text', text: String(value) });
        }
        continue;
      }

      const attributes = readAttributes(node);
      const elementScope = openScope(scope, attributes);
      const name = resolveName(key, elementScope);

      tokens.push({ kind: 'start', ...name, attributes });
      walk(value, elementScope, tokens);
      tokens.push({ kind: 'end', ...name });
    }
  }
}

// ═══════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════

/**
 * Decode raw bytes as UTF-8 (BOM dropped) or strip a BOM from text.
 */
export function decodeDocument(document: string | Uint8Array): string {
  if (typeof document === 'string') {
    return document.startsWith('\uFEFF') ? document.slice(1) : document;
  }
  return new TextDecoder('utf-8').decode(document);
}

/**
 * Tokenize an XML document.
 *
 * An empty document yields an empty stream. A document that is not
 * well-formed yields the validator's message and position.
 */
export function tokenize(document: string | Uint8Array): TokenizeResult {
  const xml = decodeDocument(document);

  if (xml.trim() === '') {
    return { ok: true, stream: new XmlTokenStream([]) };
  }

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    return { ok: false, message: msg, line, column: col };
  }

  const tree: unknown = parser.parse(xml);
  const tokens: XmlToken[] = [];
  walk(tree, new Map([['xml', XML_NAMESPACE]]), tokens);

  return { ok: true, stream: new XmlTokenStream(tokens) };
}
