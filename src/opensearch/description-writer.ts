/**
 * Description Writer
 *
 * Serializes a SearchEngine as an OpenSearch 1.1 description document that
 * DescriptionReader reads back into an equal engine.
 */

import { XMLBuilder } from 'fast-xml-parser';
import type { SearchEngine } from './search-engine.js';
import {
  OPENSEARCH_NAMESPACE,
  SEARCH_URL_TYPE,
  SUGGESTIONS_URL_TYPE,
  type Parameter,
  type RequestMethod,
} from './types.js';

/** Ordered node in fast-xml-parser's preserveOrder shape */
type XmlNode = { [key: string]: XmlNode[] | Record<string, string> | string };

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>\n';

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  format: true,
  indentBy: '  ',
  suppressEmptyNode: true,
  processEntities: true,
});

function textElement(name: string, text: string): XmlNode {
  return { [name]: [{ '#text': text }] };
}

function urlElement(
  type: string,
  template: string,
  method: RequestMethod,
  parameters: readonly Parameter[]
): XmlNode {
  return {
    Url: parameters.map((p) => ({ Param: [], ':@': { '@_name': p.name, '@_value': p.value } })),
    ':@': { '@_type': type, '@_method': method, '@_template': template },
  };
}

export class DescriptionWriter {
  /**
   * Serialize `engine` to an XML document.
   */
  write(engine: SearchEngine): string {
    const children: XmlNode[] = [textElement('ShortName', engine.getName())];

    if (engine.getDescription()) {
      children.push(textElement('Description', engine.getDescription()));
    }

    if (engine.getSearchUrlTemplate()) {
      children.push(
        urlElement(
          SEARCH_URL_TYPE,
          engine.getSearchUrlTemplate(),
          engine.getSearchMethod(),
          engine.getSearchParameters()
        )
      );
    }

    if (engine.providesSuggestions()) {
      children.push(
        urlElement(
          SUGGESTIONS_URL_TYPE,
          engine.getSuggestionsUrlTemplate(),
          engine.getSuggestionsMethod(),
          engine.getSuggestionsParameters()
        )
      );
    }

    if (engine.getImageUrl()) {
      children.push(textElement('Image', engine.getImageUrl()));
    }

    const tags = engine.getTags();
    if (tags.length > 0) {
      children.push(textElement('Tags', tags.join(' ')));
    }

    const document: XmlNode[] = [
      { OpenSearchDescription: children, ':@': { '@_xmlns': OPENSEARCH_NAMESPACE } },
    ];

    const xml: unknown = builder.build(document);
    return XML_DECLARATION + String(xml).trim() + '\n';
  }
}
