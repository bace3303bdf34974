import sharp from 'sharp';
import { describe, expect, it } from 'vitest';

import type { CardPage } from '../../../src/services/cards/cardCompositor';
import { CardRasterizer } from '../../../src/services/cards/cardRasterizer';

const emptyFit = { fontSize: 10, lines: [], lineHeight: 0, height: 0 };

function page(layers: CardPage['layers']): CardPage {
  return {
    index: 0,
    total: 1,
    width: 10,
    height: 10,
    background: '#FFFFFF',
    continued: false,
    layers,
    sidebar: [],
    bodyText: '',
    body: emptyFit,
  };
}

async function pixel(png: Buffer, x: number, y: number): Promise<number[]> {
  const { data, info } = await sharp(png).raw().toBuffer({ resolveWithObject: true });
  const offset = (y * info.width + x) * info.channels;
  return Array.from(data.subarray(offset, offset + 3));
}

describe('CardRasterizer', () => {
  it('paints the background and vector layers in order', async () => {
    const rasterizer = new CardRasterizer();
    const png = await rasterizer.rasterize(
      page([
        { kind: 'rect', box: { x: 0, y: 0, width: 5, height: 10 }, fill: '#FF0000' },
        { kind: 'rect', box: { x: 0, y: 0, width: 5, height: 5 }, fill: '#0000FF' },
      ])
    );

    const metadata = await sharp(png).metadata();
    expect(metadata).toMatchObject({ format: 'png', width: 10, height: 10 });
    expect(await pixel(png, 2, 7)).toEqual([255, 0, 0]);
    expect(await pixel(png, 2, 2)).toEqual([0, 0, 255]);
    expect(await pixel(png, 7, 7)).toEqual([255, 255, 255]);
  });

  it('scales image layers into their boxes', async () => {
    const icon = Buffer.from(
      '<svg xmlns="http://www.w3.org/2000/svg" width="100" height="100"><rect width="100" height="100" fill="#00FF00"/></svg>'
    );
    const rasterizer = new CardRasterizer();
    const png = await rasterizer.rasterize(
      page([{ kind: 'image', box: { x: 6, y: 6, width: 4, height: 4 }, image: { key: 'green.svg', data: icon } }])
    );

    expect(await pixel(png, 8, 8)).toEqual([0, 255, 0]);
    expect(await pixel(png, 2, 2)).toEqual([255, 255, 255]);
  });

  it('skips text layers without outlines', async () => {
    const rasterizer = new CardRasterizer();
    const png = await rasterizer.rasterize(
      page([{ kind: 'text', field: 'source', box: { x: 0, y: 0, width: 10, height: 10 }, fill: '#000000', fit: emptyFit, path: '' }])
    );

    expect(await pixel(png, 5, 5)).toEqual([255, 255, 255]);
  });
});
