import { describe, it, expect, vi } from 'vitest';
import { SearchEngine } from '../../../src/opensearch/search-engine.js';
import { SignatureImageCodec } from '../../../src/opensearch/image-codec.js';
import type { EngineImage } from '../../../src/opensearch/types.js';
import { FakeTransport, flushPromises } from '../../helpers/factories.js';

const PNG_BYTES = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const GIF_BYTES = new TextEncoder().encode('GIF89a');

function createEngine(transport: FakeTransport | null): SearchEngine {
  const engine = new SearchEngine({ transport });
  engine.setName('Example');
  engine.setSearchUrlTemplate('https://example.com/?q={searchTerms}');
  return engine;
}

describe('engine image', () => {
  it('does not fetch without an image URL', () => {
    const transport = new FakeTransport();
    const engine = createEngine(transport);

    expect(engine.image()).toBeNull();
    expect(transport.requests).toHaveLength(0);
  });

  it('fetches once, then caches and publishes the decoded image', async () => {
    const transport = new FakeTransport();
    const engine = createEngine(transport);
    const handler = vi.fn();
    engine.onImageChanged(handler);
    engine.setImageUrl('https://example.com/icon.png');

    expect(engine.isLoadingImage()).toBe(false);
    expect(engine.image()).toBeNull();
    expect(engine.image()).toBeNull();
    expect(engine.isLoadingImage()).toBe(true);
    expect(transport.requests).toHaveLength(1);
    expect(transport.last().url).toBe('https://example.com/icon.png');

    transport.last().resolve(PNG_BYTES);
    await flushPromises();

    expect(engine.isLoadingImage()).toBe(false);

    const expected: EngineImage = { mimeType: 'image/png', data: PNG_BYTES };
    expect(handler).toHaveBeenCalledWith(expected);
    expect(engine.image()).toEqual(expected);
    expect(transport.requests).toHaveLength(1);
  });

  it('ignores bytes the codec cannot decode', async () => {
    const transport = new FakeTransport();
    const engine = createEngine(transport);
    const handler = vi.fn();
    engine.onImageChanged(handler);
    engine.setImageUrl('https://example.com/icon.png');

    engine.image();
    transport.last().resolve('<html>not an image</html>');
    await flushPromises();

    expect(handler).not.toHaveBeenCalled();
    expect(engine.image()).toBeNull();
    expect(transport.requests).toHaveLength(2);
  });

  it('drops a fetch for a replaced URL', async () => {
    const transport = new FakeTransport();
    const engine = createEngine(transport);
    const handler = vi.fn();
    engine.onImageChanged(handler);

    engine.setImageUrl('https://example.com/old.png');
    engine.image();
    engine.setImageUrl('https://example.com/new.png');
    expect(engine.isLoadingImage()).toBe(false);

    transport.requests[0]?.resolve(PNG_BYTES);
    await flushPromises();

    expect(handler).not.toHaveBeenCalled();
    expect(engine.image()).toBeNull();
    expect(transport.last().url).toBe('https://example.com/new.png');
  });

  it('invalidates the cache when the URL changes', async () => {
    const transport = new FakeTransport();
    const engine = createEngine(transport);
    engine.setImageUrl('https://example.com/a.png');
    engine.image();
    transport.last().resolve(PNG_BYTES);
    await flushPromises();
    expect(engine.image()).not.toBeNull();

    engine.setImageUrl('https://example.com/a.png');
    expect(engine.image()).not.toBeNull();

    engine.setImageUrl('https://example.com/b.png');
    expect(engine.image()).toBeNull();
  });

  it('synthesizes a PNG data URI for an explicit image without URL', () => {
    const engine = createEngine(null);
    const handler = vi.fn();
    engine.onImageChanged(handler);
    const image: EngineImage = { mimeType: 'image/png', data: PNG_BYTES };

    engine.setImage(image);

    expect(engine.getImageUrl()).toBe('data:image/png;base64,iVBORw0KGgo=');
    expect(engine.image()).toBe(image);
    expect(handler).toHaveBeenCalledWith(image);
  });

  it('keeps the URL empty when the image cannot be encoded as PNG', () => {
    const engine = createEngine(null);
    const image: EngineImage = { mimeType: 'image/gif', data: GIF_BYTES };

    engine.setImage(image);

    expect(engine.getImageUrl()).toBe('');
    expect(engine.image()).toBe(image);
  });

  it('keeps an existing URL when an image is set', () => {
    const engine = createEngine(null);
    engine.setImageUrl('https://example.com/icon.png');

    engine.setImage({ mimeType: 'image/png', data: PNG_BYTES });

    expect(engine.getImageUrl()).toBe('https://example.com/icon.png');
  });

  it('does not fetch without a transport', () => {
    const engine = createEngine(null);
    engine.setImageUrl('https://example.com/icon.png');

    expect(engine.image()).toBeNull();
  });
});

describe('SignatureImageCodec', () => {
  const codec = new SignatureImageCodec();

  it.each([
    ['image/png', PNG_BYTES],
    ['image/gif', GIF_BYTES],
    ['image/jpeg', new Uint8Array([0xff, 0xd8, 0xff, 0xe0])],
    ['image/x-icon', new Uint8Array([0x00, 0x00, 0x01, 0x00, 0x01])],
    ['image/svg+xml', new TextEncoder().encode('<svg xmlns="http://www.w3.org/2000/svg"/>')],
  ])('recognizes %s', (mimeType, bytes) => {
    expect(codec.decode(bytes)).toEqual({ mimeType, data: bytes });
  });

  it('rejects empty and unknown data', () => {
    expect(codec.decode(new Uint8Array(0))).toBeNull();
    expect(codec.decode(new TextEncoder().encode('hello'))).toBeNull();
  });

  it('encodes only PNG images', () => {
    expect(codec.encodePng({ mimeType: 'image/png', data: PNG_BYTES })).toBe(PNG_BYTES);
    expect(codec.encodePng({ mimeType: 'image/gif', data: GIF_BYTES })).toBeNull();
  });
});
