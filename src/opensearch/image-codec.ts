/**
 * Image codec capability.
 *
 * Decoding and encoding pixels is outside this package; the engine only needs
 * to know whether fetched bytes are an image and, for data URIs, PNG bytes.
 */

import type { EngineImage } from './types.js';

export interface ImageCodec {
  /** Decode fetched bytes, null when they are not a usable image */
  decode(bytes: Uint8Array): EngineImage | null;
  /** PNG encoding of `image`, null when it cannot be produced */
  encodePng(image: EngineImage): Uint8Array | null;
}

interface Signature {
  mimeType: string;
  matches: (bytes: Uint8Array) => boolean;
}

function startsWith(bytes: Uint8Array, prefix: readonly number[], offset = 0): boolean {
  if (bytes.length < offset + prefix.length) return false;
  return prefix.every((byte, i) => bytes[offset + i] === byte);
}

const SIGNATURES: readonly Signature[] = [
  {
    mimeType: 'image/png',
    matches: (b) => startsWith(b, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]),
  },
  { mimeType: 'image/gif', matches: (b) => startsWith(b, [0x47, 0x49, 0x46, 0x38]) },
  { mimeType: 'image/jpeg', matches: (b) => startsWith(b, [0xff, 0xd8, 0xff]) },
  { mimeType: 'image/x-icon', matches: (b) => startsWith(b, [0x00, 0x00, 0x01, 0x00]) },
  { mimeType: 'image/bmp', matches: (b) => startsWith(b, [0x42, 0x4d]) },
  {
    mimeType: 'image/webp',
    matches: (b) =>
      startsWith(b, [0x52, 0x49, 0x46, 0x46]) && startsWith(b, [0x57, 0x45, 0x42, 0x50], 8),
  },
  {
    mimeType: 'image/svg+xml',
    matches: (b) => {
      const head = new TextDecoder('utf-8').decode(b.subarray(0, 512)).trimStart();
      return head.startsWith('<svg') || (head.startsWith('<?xml') && head.includes('<svg'));
    },
  },
];

/**
 * Codec that recognizes common icon formats by their magic bytes and keeps
 * the encoded bytes untouched. It can only "encode" images that already are
 * PNG.
 */
export class SignatureImageCodec implements ImageCodec {
  decode(bytes: Uint8Array): EngineImage | null {
    if (bytes.length === 0) return null;

    const signature = SIGNATURES.find((s) => s.matches(bytes));
    return signature ? { mimeType: signature.mimeType, data: bytes } : null;
  }

  encodePng(image: EngineImage): Uint8Array | null {
    return image.mimeType === 'image/png' && image.data.length > 0 ? image.data : null;
  }
}
