/**
 * Lazy loader for the engine image.
 *
 * The first image() call with a URL and no cached image starts a fetch and
 * returns null; the decoded image is published through `onImageChanged` once
 * it arrives. A fetch started for a URL the engine no longer has is dropped.
 */

import type { Logger } from '../types/logger.js';
import type { ImageCodec } from './image-codec.js';
import type { Transport } from './transport.js';
import type { EngineImage } from './types.js';

export interface ImageLoaderDeps {
  getImageUrl: () => string;
  /** Store a synthesized URL without invalidating the cache */
  assignImageUrl: (url: string) => void;
  getTransport: () => Transport | null;
  codec: ImageCodec;
  onImageChanged: (image: EngineImage) => void;
  logger: Logger;
}

export class ImageLoader {
  private cached: EngineImage | null = null;
  private pendingUrl: string | null = null;
  private readonly logger: Logger;

  constructor(private readonly deps: ImageLoaderDeps) {
    this.logger = deps.logger.child({ component: 'image-loader' });
  }

  /**
   * Cached image, or null while it is missing (a fetch may have started).
   */
  image(): EngineImage | null {
    if (this.cached) {
      return this.cached;
    }
    this.load();
    return null;
  }

  /**
   * Replace the image. Without an image URL, a PNG data URI is synthesized.
   */
  setImage(image: EngineImage): void {
    if (!this.deps.getImageUrl()) {
      const png = this.deps.codec.encodePng(image);
      if (png) {
        this.deps.assignImageUrl(`data:image/png;base64,${Buffer.from(png).toString('base64')}`);
      }
    }

    this.pendingUrl = null;
    this.cached = image;
    this.deps.onImageChanged(image);
  }

  /**
   * Forget the cached image and orphan any pending fetch.
   */
  invalidate(): void {
    this.cached = null;
    this.pendingUrl = null;
  }

  /**
   * True while a fetch for the current URL is outstanding.
   */
  isLoading(): boolean {
    return this.pendingUrl !== null;
  }

  private load(): void {
    const url = this.deps.getImageUrl();
    if (!url || this.pendingUrl === url) {
      return;
    }

    const transport = this.deps.getTransport();
    if (!transport) {
      this.logger.debug({ url }, 'No transport configured, image not loaded');
      return;
    }

    this.pendingUrl = url;
    this.logger.debug({ url }, 'Loading image');

    let pending: Promise<Uint8Array>;
    try {
      pending = transport.get(url);
    } catch (error) {
      pending = Promise.reject(error instanceof Error ? error : new Error(String(error)));
    }
    void this.complete(url, pending);
  }

  private async complete(url: string, pending: Promise<Uint8Array>): Promise<void> {
    let bytes: Uint8Array;
    try {
      bytes = await pending;
    } catch (error) {
      if (this.pendingUrl === url) {
        this.pendingUrl = null;
      }
      this.logger.debug(
        { url, error: error instanceof Error ? error.message : String(error) },
        'Image request failed'
      );
      return;
    }

    if (this.pendingUrl !== url) {
      return;
    }
    this.pendingUrl = null;

    const image = this.deps.codec.decode(bytes);
    if (!image) {
      this.logger.debug({ url, size: bytes.length }, 'Image data could not be decoded');
      return;
    }

    this.cached = image;
    this.deps.onImageChanged(image);
  }
}
