import sharp, { type OverlayOptions } from 'sharp';

import type { CardLayer, CardPage, ImageLayer } from './cardCompositor';

function vectorElement(layer: Exclude<CardLayer, ImageLayer>): string {
  switch (layer.kind) {
    case 'rect':
      return `<rect x="${layer.box.x}" y="${layer.box.y}" width="${layer.box.width}" height="${layer.box.height}" fill="${layer.fill}" />`;
    case 'circle':
      return `<circle cx="${layer.cx}" cy="${layer.cy}" r="${layer.radius}" fill="${layer.fill}" />`;
    case 'text':
      return layer.path ? `<path d="${layer.path}" fill="${layer.fill}" />` : '';
  }
}

function svgDocument(width: number, height: number, elements: string[]): Buffer {
  const svg = `
    <svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">
      ${elements.join('\n      ')}
    </svg>
  `;
  return Buffer.from(svg);
}

/**
 * Paints composed pages with sharp. Runs of vector layers become one SVG
 * overlay, icons are resized into their boxes; draw order is preserved.
 */
export class CardRasterizer {
  private readonly icons = new Map<string, Promise<Buffer>>();

  async rasterize(page: CardPage): Promise<Buffer> {
    const composites: OverlayOptions[] = [];
    let vectors: string[] = [];
    const flush = () => {
      if (vectors.length === 0) return;
      composites.push({ input: svgDocument(page.width, page.height, vectors), left: 0, top: 0 });
      vectors = [];
    };

    for (const layer of page.layers) {
      if (layer.kind !== 'image') {
        const element = vectorElement(layer);
        if (element) vectors.push(element);
        continue;
      }
      flush();
      composites.push({
        input: await this.icon(layer),
        left: Math.round(layer.box.x),
        top: Math.round(layer.box.y),
      });
    }
    flush();

    return sharp({
      create: {
        width: page.width,
        height: page.height,
        channels: 4,
        background: page.background,
      },
    })
      .composite(composites)
      .png()
      .toBuffer();
  }

  private icon(layer: ImageLayer): Promise<Buffer> {
    const width = Math.round(layer.box.width);
    const height = Math.round(layer.box.height);
    const key = `${layer.image.key}@${width}x${height}`;
    const cached = this.icons.get(key);
    if (cached) return cached;

    const pending = sharp(layer.image.data)
      .resize(width, height, { fit: 'contain', background: { r: 0, g: 0, b: 0, alpha: 0 } })
      .png()
      .toBuffer()
      .catch((error: unknown) => {
        this.icons.delete(key);
        throw error;
      });
    this.icons.set(key, pending);
    return pending;
  }
}
