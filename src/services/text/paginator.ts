import { TextOverflowError } from '../../errors';
import { logger } from '../../logger';
import type { Box } from '../style/styleConfig';
import type { FittedText, Fitter } from './textFitter';

export interface PageChunk {
  /** Exact slice of the source text, trailing whitespace included. */
  text: string;
  fit: FittedText;
}

const SENTENCE_END = new Set(['.', '!', '?']);

function isSpace(char: string | undefined): boolean {
  return char !== undefined && /\s/.test(char);
}

/**
 * Cuts text after sentence terminators followed by whitespace and after
 * newlines. Each unit keeps the whitespace that follows it, so joining the
 * units gives back the input.
 */
export function splitUnits(text: string): string[] {
  const units: string[] = [];
  let start = 0;
  let index = 0;
  while (index < text.length) {
    const char = text[index];
    const next = text[index + 1];
    const endsSentence = SENTENCE_END.has(char) && (next === undefined || isSpace(next));
    if (char === '\n' || endsSentence) {
      let end = index + 1;
      while (end < text.length && isSpace(text[end])) end += 1;
      units.push(text.slice(start, end));
      start = end;
      index = end;
      continue;
    }
    index += 1;
  }
  if (start < text.length) {
    units.push(text.slice(start));
  }
  return units;
}

/** Word-level units, each word carrying the whitespace after it. */
function splitWords(text: string): string[] {
  return text.match(/\S+\s*|\s+/g) ?? [];
}

function tryFit(text: string, box: Box, fitter: Fitter): FittedText | undefined {
  try {
    return fitter(text.trimEnd(), box);
  } catch (error) {
    if (error instanceof TextOverflowError) return undefined;
    throw error;
  }
}

/**
 * Splits text that overflows one box into page-sized chunks, breaking on
 * sentence and paragraph boundaries and only falling back to word boundaries
 * for a sentence too long for a whole page.
 */
export function paginate(text: string, box: Box, fitter: Fitter): PageChunk[] {
  const chunks: PageChunk[] = [];
  const pending = splitUnits(text).reverse();
  let current = '';
  let currentFit: FittedText | undefined;

  for (let unit = pending.pop(); unit !== undefined; unit = pending.pop()) {
    const grown = tryFit(current + unit, box, fitter);
    if (grown) {
      current += unit;
      currentFit = grown;
      continue;
    }
    if (current && currentFit) {
      chunks.push({ text: current, fit: currentFit });
    }
    current = '';
    currentFit = undefined;

    const alone = tryFit(unit, box, fitter);
    if (alone) {
      current = unit;
      currentFit = alone;
      continue;
    }
    const words = splitWords(unit);
    if (words.length > 1) {
      pending.push(...words.reverse());
      continue;
    }
    // one word taller than an empty box: the fitter reports the overflow
    chunks.push({ text: unit, fit: fitter(unit.trimEnd(), box) });
  }

  if (current && currentFit) {
    chunks.push({ text: current, fit: currentFit });
  }
  logger.debug(`[Cards] Paginated ${text.length} characters into ${chunks.length} chunk(s)`);
  return chunks;
}
