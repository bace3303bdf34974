import { TextOverflowError } from '../../errors';
import type { Box } from '../style/styleConfig';
import type { FontFace } from './fontFace';

export interface FittedText {
  fontSize: number;
  lines: string[];
  lineHeight: number;
  height: number;
}

/** Lays `text` out at a given size inside a box, or throws when it cannot fit. */
export type Fitter = (text: string, box: Box) => FittedText;

/**
 * Greedy word wrap. Paragraphs are separated by `\n` and an empty paragraph
 * becomes a blank line. A word wider than `width` gets a line of its own.
 */
export function wrapText(text: string, width: number, face: FontFace, size: number): string[] {
  const spaceWidth = face.measure(' ', size);
  const lines: string[] = [];
  for (const paragraph of text.split('\n')) {
    const words = paragraph.split(/[ \t]+/).filter((word) => word.length > 0);
    if (words.length === 0) {
      lines.push('');
      continue;
    }
    let line = '';
    let lineWidth = 0;
    for (const word of words) {
      const wordWidth = face.measure(word, size);
      if (!line) {
        line = word;
        lineWidth = wordWidth;
      } else if (lineWidth + spaceWidth + wordWidth <= width) {
        line = `${line} ${word}`;
        lineWidth += spaceWidth + wordWidth;
      } else {
        lines.push(line);
        line = word;
        lineWidth = wordWidth;
      }
    }
    lines.push(line);
  }
  return lines;
}

function layoutAt(text: string, box: Box, face: FontFace, size: number): FittedText {
  const lines = wrapText(text, box.width, face, size);
  const lineHeight = face.lineHeight(size);
  return { fontSize: size, lines, lineHeight, height: lines.length * lineHeight };
}

/**
 * Finds the largest integer size in [minSize, maxSize] at which the wrapped
 * text fits the box height, stepping down one size at a time. Pure: no
 * drawing, same output for the same input.
 */
export function fitText(text: string, box: Box, face: FontFace, maxSize: number, minSize: number): FittedText {
  if (minSize <= 0 || minSize > maxSize) {
    throw new RangeError(`Invalid font size bounds ${minSize}..${maxSize}`);
  }
  if (text.length === 0) {
    return { fontSize: maxSize, lines: [], lineHeight: 0, height: 0 };
  }

  // widths grow linearly with size, so nothing fits if the smallest size does not
  const smallest = layoutAt(text, box, face, minSize);
  if (smallest.height > box.height) {
    throw new TextOverflowError({ minSize, requiredHeight: smallest.height, availableHeight: box.height });
  }
  for (let size = maxSize; size > minSize; size -= 1) {
    const layout = layoutAt(text, box, face, size);
    if (layout.height <= box.height) {
      return layout;
    }
  }
  return smallest;
}

export function createFitter(face: FontFace, maxSize: number, minSize: number): Fitter {
  return (text, box) => fitText(text, box, face, maxSize, minSize);
}
