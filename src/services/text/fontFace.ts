import { parse, type Font, type Glyph } from 'opentype.js';

/**
 * Everything the layout code needs to know about a font. Sizes are in pixels.
 */
export interface FontFace {
  readonly name: string;
  measure(text: string, size: number): number;
  lineHeight(size: number): number;
  ascent(size: number): number;
  /** SVG path data for `text` with its baseline starting at (x, baseline). */
  outline(text: string, x: number, baseline: number, size: number): string;
}

interface PlacedGlyph {
  glyph: Glyph;
  /** Pen position in font units, kerning applied. */
  x: number;
}

/**
 * Lays text out glyph by glyph: advance widths plus pair kerning, no GSUB
 * substitutions. opentype.js 1.x throws on the chained contextual lookups the
 * bundled DejaVu fonts carry, so its whole-string helpers stay unused.
 */
export class OpentypeFace implements FontFace {
  /** Advance widths in font units, per string. Layout measures the same words over and over. */
  private readonly advances = new Map<string, number>();

  constructor(
    private readonly font: Font,
    readonly name: string
  ) {}

  static fromBuffer(buffer: Buffer, name: string): OpentypeFace {
    const bytes = buffer.buffer.slice(buffer.byteOffset, buffer.byteOffset + buffer.byteLength);
    return new OpentypeFace(parse(bytes), name);
  }

  private place(text: string): { glyphs: PlacedGlyph[]; advance: number } {
    const glyphs: PlacedGlyph[] = [];
    let pen = 0;
    let previous: Glyph | undefined;
    for (const char of text) {
      const glyph = this.font.charToGlyph(char);
      if (previous) pen += this.font.getKerningValue(previous, glyph);
      glyphs.push({ glyph, x: pen });
      pen += glyph.advanceWidth ?? 0;
      previous = glyph;
    }
    return { glyphs, advance: pen };
  }

  measure(text: string, size: number): number {
    let advance = this.advances.get(text);
    if (advance === undefined) {
      advance = this.place(text).advance;
      this.advances.set(text, advance);
    }
    return (advance / this.font.unitsPerEm) * size;
  }

  lineHeight(size: number): number {
    return ((this.font.ascender - this.font.descender) / this.font.unitsPerEm) * size;
  }

  ascent(size: number): number {
    return (this.font.ascender / this.font.unitsPerEm) * size;
  }

  outline(text: string, x: number, baseline: number, size: number): string {
    const scale = size / this.font.unitsPerEm;
    return this.place(text)
      .glyphs.map(({ glyph, x: pen }) => glyph.getPath(x + pen * scale, baseline, size).toPathData(2))
      .join('');
  }
}
