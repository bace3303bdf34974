import { readFileSync } from 'fs';

import { logger } from '../../logger';
import { FontFace, OpentypeFace } from '../text/fontFace';
import { ResourceResolver } from './resourceResolver';

export interface ImageResource {
  /** Absolute path the bytes were read from; doubles as the cache key. */
  key: string;
  data: Buffer;
}

/**
 * Decoded fonts and raw icon bytes, keyed by resolved path so an override file
 * and the bundled file with the same logical path never collide. One cache per
 * renderer; it is the only mutable state shared between renders.
 */
export class ResourceCache {
  private readonly fonts = new Map<string, FontFace>();
  private readonly images = new Map<string, ImageResource>();

  constructor(readonly resolver: ResourceResolver) {}

  font(logicalPath: string): FontFace {
    const resolved = this.resolver.resolve(logicalPath);
    const cached = this.fonts.get(resolved);
    if (cached) return cached;
    logger.debug(`[Resources] Loading font ${resolved}`);
    const face = OpentypeFace.fromBuffer(readFileSync(resolved), logicalPath);
    this.fonts.set(resolved, face);
    return face;
  }

  image(logicalPath: string): ImageResource {
    const resolved = this.resolver.resolve(logicalPath);
    const cached = this.images.get(resolved);
    if (cached) return cached;
    logger.debug(`[Resources] Loading image ${resolved}`);
    const resource = { key: resolved, data: readFileSync(resolved) };
    this.images.set(resolved, resource);
    return resource;
  }

  get size(): { fonts: number; images: number } {
    return { fonts: this.fonts.size, images: this.images.size };
  }
}
