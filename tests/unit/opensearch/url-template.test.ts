/**
 * URL Template Tests
 *
 * Placeholder expansion, percent-encoding and the GET/POST request shapes.
 */

import { describe, it, expect } from 'vitest';
import {
  buildPostBody,
  buildRequest,
  buildUrl,
  expandTemplate,
  percentEncode,
} from '../../../src/opensearch/url-template.js';
import { createTemplateContext } from '../../../src/opensearch/template-context.js';
import { createTestTemplateContext } from '../../helpers/factories.js';

const context = createTestTemplateContext('en_US', 'test-app');

describe('percentEncode', () => {
  it('keeps unreserved characters', () => {
    expect(percentEncode('AZaz09-._~')).toBe('AZaz09-._~');
  });

  it('encodes reserved characters and UTF-8 bytes', () => {
    expect(percentEncode('a b&c/ä~')).toBe('a%20b%26c%2F%C3%A4~');
  });
});

describe('expandTemplate', () => {
  it('substitutes every supported placeholder', () => {
    const template =
      'https://search.example.com/?q={searchTerms}&n={count}&s={startIndex}&p={startPage}' +
      '&l={language}&ie={inputEncoding}&oe={outputEncoding}&src={source}';

    expect(expandTemplate('foo bar', template, context)).toBe(
      'https://search.example.com/?q=foo%20bar&n=20&s=0&p=0&l=en-US&ie=UTF-8&oe=UTF-8&src=test-app'
    );
  });

  it('accepts optional and prefixed source placeholders', () => {
    expect(expandTemplate('x', '{source?}|{moz:source}|{moz:source?}', context)).toBe(
      'test-app|test-app|test-app'
    );
  });

  it('returns a template without placeholders unchanged', () => {
    expect(expandTemplate('x', 'https://plain.example.com/path?a=1', context)).toBe(
      'https://plain.example.com/path?a=1'
    );
  });

  it('expands a template of only the search terms', () => {
    expect(expandTemplate('a b', '{searchTerms}', context)).toBe('a%20b');
  });

  it('expands the fixed placeholders', () => {
    expect(
      expandTemplate(
        'x',
        '{language}-{count}-{startIndex}-{startPage}-{inputEncoding}-{outputEncoding}',
        context
      )
    ).toBe('en-US-20-0-0-UTF-8-UTF-8');
  });

  it('leaves unknown placeholders untouched', () => {
    expect(expandTemplate('x', '{unknown}&{startIndex?}', context)).toBe('{unknown}&{startIndex?}');
  });

  it('does not expand placeholders produced by a substitution', () => {
    const tricky = createTemplateContext({ locale: 'en_US', applicationName: '{searchTerms}' });

    expect(expandTemplate('a', 'https://x.example.com/?src={source}&q={searchTerms}', tricky)).toBe(
      'https://x.example.com/?src={searchTerms}&q=a'
    );
  });

  it('converts the locale name to RFC 3066 form', () => {
    const german = createTemplateContext({ locale: 'de_DE', applicationName: 'test-app' });

    expect(expandTemplate('x', '{language}', german)).toBe('de-DE');
  });

  it('falls back to the package name without a context', () => {
    expect(expandTemplate('x', '{source}')).toBe('opensearch-description');
  });
});

describe('buildUrl', () => {
  const parameters = [
    { name: 'q', value: '{searchTerms}' },
    { name: 'client', value: 'test' },
  ];

  it('returns null for an empty template', () => {
    expect(buildUrl('term', '', parameters, 'get', context)).toBeNull();
    expect(buildRequest('term', '', parameters, 'post', context)).toBeNull();
  });

  it('appends expanded parameters to the query for GET', () => {
    expect(buildUrl('hello world', 'https://e.example.com/search', parameters, 'get', context)).toBe(
      'https://e.example.com/search?q=hello%20world&client=test'
    );
  });

  it('extends an existing query', () => {
    const params = [{ name: 'a', value: 'b' }];

    expect(buildUrl('t', 'https://e.example.com/s?x=1', params, 'get', context)).toBe(
      'https://e.example.com/s?x=1&a=b'
    );
    expect(buildUrl('t', 'https://e.example.com/s?', params, 'get', context)).toBe(
      'https://e.example.com/s?a=b'
    );
  });

  it('inserts parameters before a fragment', () => {
    expect(
      buildUrl('t', 'https://e.example.com/s#top', [{ name: 'a', value: 'b' }], 'get', context)
    ).toBe('https://e.example.com/s?a=b#top');
  });

  it('escapes literal parameter values', () => {
    expect(
      buildUrl('t', 'https://e.example.com/s', [{ name: 'tag', value: 'a b' }], 'get', context)
    ).toBe('https://e.example.com/s?tag=a%20b');
  });

  it('keeps duplicate parameter names in order', () => {
    const params = [
      { name: 'a', value: '1' },
      { name: 'a', value: '2' },
    ];

    expect(buildUrl('t', 'https://e.example.com/s', params, 'get', context)).toBe(
      'https://e.example.com/s?a=1&a=2'
    );
  });

  it('ignores parameters for POST', () => {
    expect(
      buildUrl('term', 'https://e.example.com/search?q={searchTerms}', parameters, 'post', context)
    ).toBe('https://e.example.com/search?q=term');
  });
});

// GET expands parameter values, POST sends them literally. Kept deliberately.
describe('POST body', () => {
  it('joins parameters without expanding their values', () => {
    expect(
      buildPostBody([
        { name: 'q', value: '{searchTerms}' },
        { name: 'client', value: 'test' },
      ])
    ).toBe('q={searchTerms}&client=test');
  });

  it('is empty without parameters', () => {
    expect(buildPostBody([])).toBe('');
  });

  it('differs from the GET expansion of the same parameters', () => {
    const params = [{ name: 'q', value: '{searchTerms}' }];

    expect(buildRequest('cats', 'https://e.example.com/s', params, 'get', context)).toEqual({
      method: 'get',
      url: 'https://e.example.com/s?q=cats',
    });
    expect(buildRequest('cats', 'https://e.example.com/s', params, 'post', context)).toEqual({
      method: 'post',
      url: 'https://e.example.com/s',
      body: 'q={searchTerms}',
    });
  });
});
