/**
 * URL Template Engine
 *
 * Expands OpenSearch 1.1 URL templates and turns an engine's template,
 * parameters and method into a concrete request.
 *
 * Supported placeholders, substituted in this order:
 * - `{count}` -> "20"
 * - `{startIndex}` -> "0"
 * - `{startPage}` -> "0"
 * - `{language}` -> locale name in RFC 3066 form (`en_US` -> `en-US`)
 * - `{inputEncoding}`, `{outputEncoding}` -> "UTF-8"
 * - `{source}`, `{source?}`, `{prefix:source}`, `{prefix:source?}` -> application name
 * - `{searchTerms}` -> the search term, percent-encoded
 *
 * Text produced by one substitution is never matched by a later one, so a
 * search term or application name containing `{count}` stays literal.
 * Unknown placeholders are left as they are.
 */

import type { BuiltRequest, Parameter, RequestMethod } from './types.js';
import { createTemplateContext, type TemplateContext } from './template-context.js';

// ═══════════════════════════════════════════════════════════════
// PERCENT-ENCODING
// ═══════════════════════════════════════════════════════════════

const UNRESERVED = /^[A-Za-z0-9\-._~]$/;

/** Characters left as-is inside a query name or value */
const QUERY_SAFE = /^[A-Za-z0-9\-._~!$'()*,:@/?]$/;

function encodeBytes(text: string, safe: RegExp): string {
  let out = '';
  for (const byte of Buffer.from(text, 'utf-8')) {
    const char = String.fromCharCode(byte);
    out += byte < 0x80 && safe.test(char)
      ? char
      : `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
  }
  return out;
}

/**
 * Percent-encode everything except RFC 3986 unreserved characters.
 */
export function percentEncode(text: string): string {
  return encodeBytes(text, UNRESERVED);
}

/**
 * Escape a query name or value, keeping percent-escapes already present.
 */
function escapeQueryComponent(text: string): string {
  return text
    .split(/(%[0-9A-Fa-f]{2})/)
    .map((part, index) => (index % 2 === 1 ? part : encodeBytes(part, QUERY_SAFE)))
    .join('');
}

/**
 * Append `name=value` to the query of `url`, before any fragment.
 */
function appendQueryPair(url: string, name: string, value: string): string {
  const hashIndex = url.indexOf('#');
  const base = hashIndex >= 0 ? url.slice(0, hashIndex) : url;
  const fragment = hashIndex >= 0 ? url.slice(hashIndex) : '';

  let separator = '?';
  if (base.includes('?')) {
    separator = base.endsWith('?') || base.endsWith('&') ? '' : '&';
  }

  return `${base}${separator}${escapeQueryComponent(name)}=${escapeQueryComponent(value)}${fragment}`;
}

// ═══════════════════════════════════════════════════════════════
// SUBSTITUTION
// ═══════════════════════════════════════════════════════════════

interface Segment {
  text: string;
  /** Produced by a substitution, closed to further matching */
  substituted: boolean;
}

interface Substitution {
  pattern: RegExp;
  value: (term: string, context: TemplateContext) => string;
}

const SUBSTITUTIONS: readonly Substitution[] = [
  { pattern: /\{count\}/g, value: () => '20' },
  { pattern: /\{startIndex\}/g, value: () => '0' },
  { pattern: /\{startPage\}/g, value: () => '0' },
  { pattern: /\{language\}/g, value: (_term, ctx) => ctx.localeName().replace(/_/g, '-') },
  { pattern: /\{inputEncoding\}/g, value: () => 'UTF-8' },
  { pattern: /\{outputEncoding\}/g, value: () => 'UTF-8' },
  { pattern: /\{(?:[^}]*:)?source\??\}/g, value: (_term, ctx) => ctx.applicationName() },
  { pattern: /\{searchTerms\}/g, value: (term) => percentEncode(term) },
];

function substitute(segments: Segment[], pattern: RegExp, replacement: string): Segment[] {
  const result: Segment[] = [];

  for (const segment of segments) {
    if (segment.substituted) {
      result.push(segment);
      continue;
    }

    let last = 0;
    for (const match of segment.text.matchAll(pattern)) {
      const index = match.index ?? 0;
      if (index > last) {
        result.push({ text: segment.text.slice(last, index), substituted: false });
      }
      result.push({ text: replacement, substituted: true });
      last = index + match[0].length;
    }
    if (last < segment.text.length) {
      result.push({ text: segment.text.slice(last), substituted: false });
    }
  }

  return result;
}

let defaultContext: TemplateContext | null = null;

function getDefaultContext(): TemplateContext {
  defaultContext ??= createTemplateContext();
  return defaultContext;
}

/**
 * Expand every supported placeholder in `template` for `term`.
 */
export function expandTemplate(
  term: string,
  template: string,
  context: TemplateContext = getDefaultContext()
): string {
  let segments: Segment[] = [{ text: template, substituted: false }];

  for (const { pattern, value } of SUBSTITUTIONS) {
    if (!segments.some((s) => !s.substituted && s.text.includes('{'))) {
      break;
    }
    segments = substitute(segments, pattern, value(term, context));
  }

  return segments.map((s) => s.text).join('');
}

// ═══════════════════════════════════════════════════════════════
// REQUEST BUILDING
// ═══════════════════════════════════════════════════════════════

/**
 * Build the request URL.
 *
 * For `get`, each parameter is appended to the query in order with its value
 * expanded. For `post`, the expanded base URL is returned as-is and the
 * parameters travel in the body (see {@link buildPostBody}).
 *
 * @returns null when no template is configured
 */
export function buildUrl(
  term: string,
  template: string,
  parameters: readonly Parameter[],
  method: RequestMethod,
  context?: TemplateContext
): string | null {
  if (!template) {
    return null;
  }

  let url = expandTemplate(term, template, context);

  if (method !== 'post') {
    for (const parameter of parameters) {
      url = appendQueryPair(url, parameter.name, expandTemplate(term, parameter.value, context));
    }
  }

  return url;
}

/**
 * Serialize parameters as a POST body: `name=value` pairs joined by `&`.
 *
 * Values are used literally - placeholders are NOT expanded here, unlike the
 * query pairs built for GET requests.
 */
export function buildPostBody(parameters: readonly Parameter[]): string {
  return parameters.map((p) => `${p.name}=${p.value}`).join('&');
}

/**
 * Build a complete request for `term`.
 *
 * @returns null when no template is configured
 */
export function buildRequest(
  term: string,
  template: string,
  parameters: readonly Parameter[],
  method: RequestMethod,
  context?: TemplateContext
): BuiltRequest | null {
  const url = buildUrl(term, template, parameters, method, context);
  if (url === null) {
    return null;
  }

  return method === 'post'
    ? { method, url, body: buildPostBody(parameters) }
    : { method, url };
}
