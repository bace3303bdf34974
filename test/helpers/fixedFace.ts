import type { FontFace } from '../../src/services/text/fontFace';

/**
 * Every character advances half the font size; a line is exactly one font
 * size tall. Keeps expected layouts easy to work out by hand.
 */
export function createFixedFace(): FontFace {
  return {
    name: 'fixed',
    measure: (text, size) => text.length * size * 0.5,
    lineHeight: (size) => size,
    ascent: (size) => size * 0.8,
    outline: (text, x, baseline) => (text ? `M${x} ${baseline}` : ''),
  };
}
