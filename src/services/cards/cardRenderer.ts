import { logger } from '../../logger';
import type { SpellRecord } from '../records/spellRecord';
import { ResourceCache } from '../resources/resourceCache';
import type { ResourceResolver } from '../resources/resourceResolver';
import type { StyleConfig } from '../style/styleConfig';
import { CardCompositor, type ComposedCard } from './cardCompositor';
import { CardRasterizer } from './cardRasterizer';

export interface RenderedCard {
  name: string;
  /** PNG images, one per page, in page order. */
  pages: Buffer[];
  composed: ComposedCard;
}

interface CardRendererOptions {
  config: StyleConfig;
  resolver: ResourceResolver;
}

/**
 * One renderer per batch: it owns the resource cache, so fonts and icons are
 * read once. Independent renderers can run side by side.
 */
export class CardRenderer {
  readonly resources: ResourceCache;
  private readonly compositor: CardCompositor;
  private readonly rasterizer = new CardRasterizer();

  constructor(private readonly options: CardRendererOptions) {
    this.resources = new ResourceCache(options.resolver);
    this.compositor = new CardCompositor(options.config, this.resources);
  }

  get config(): StyleConfig {
    return this.options.config;
  }

  compose(record: SpellRecord): ComposedCard {
    return this.compositor.compose(record);
  }

  async render(record: SpellRecord): Promise<RenderedCard> {
    const composed = this.compositor.compose(record);
    const pages: Buffer[] = [];
    for (const page of composed.pages) {
      pages.push(await this.rasterizer.rasterize(page));
    }
    logger.debug(`[Cards] Rendered ${record.name} (${pages.length} page(s))`);
    return { name: record.name, pages, composed };
  }
}
