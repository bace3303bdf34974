import { describe, expect, it } from 'vitest';

import { TextOverflowError } from '../../../src/errors';
import { paginate, splitUnits } from '../../../src/services/text/paginator';
import { createFitter } from '../../../src/services/text/textFitter';
import { createFixedFace } from '../../helpers/fixedFace';

const face = createFixedFace();
// size 10 only: 5px per character, 10px per line
const fitter = createFitter(face, 10, 10);

describe('splitUnits', () => {
  it('cuts after sentence ends and newlines, keeping trailing whitespace', () => {
    expect(splitUnits('One. Two! Three?\nFour')).toEqual(['One. ', 'Two! ', 'Three?\n', 'Four']);
  });

  it('does not cut inside numbers or abbreviations without a following space', () => {
    expect(splitUnits('Range 2.5 ft. Then more')).toEqual(['Range 2.5 ft. ', 'Then more']);
  });

  it('keeps paragraph gaps with the paragraph before them', () => {
    expect(splitUnits('First part\n\nSecond part')).toEqual(['First part\n\n', 'Second part']);
  });
});

describe('paginate', () => {
  it('packs whole sentences into each chunk', () => {
    const text = 'Aaaa bbbb. Cccc dddd. Eeee ffff. Gggg.';
    const box = { x: 0, y: 0, width: 100, height: 20 };

    const chunks = paginate(text, box, fitter);

    expect(chunks.map((chunk) => chunk.text)).toEqual(['Aaaa bbbb. Cccc dddd. Eeee ffff. ', 'Gggg.']);
    expect(chunks[0].fit.lines).toEqual(['Aaaa bbbb. Cccc', 'dddd. Eeee ffff.']);
    expect(chunks[1].fit.lines).toEqual(['Gggg.']);
  });

  it('falls back to word boundaries for a sentence longer than a page', () => {
    const text = 'alpha beta gamma delta.';
    const box = { x: 0, y: 0, width: 50, height: 10 };

    const chunks = paginate(text, box, fitter);

    expect(chunks.map((chunk) => chunk.text)).toEqual(['alpha beta ', 'gamma ', 'delta.']);
  });

  it('is lossless and every chunk fits the box', () => {
    const text = Array.from(
      { length: 30 },
      (_, index) => `Sentence ${index + 1} goes on for a little while.${index % 7 === 6 ? '\n\n' : ' '}`
    ).join('');
    const box = { x: 0, y: 0, width: 200, height: 60 };

    const chunks = paginate(text, box, fitter);

    expect(chunks.length).toBeGreaterThan(1);
    expect(chunks.map((chunk) => chunk.text).join('')).toBe(text);
    for (const chunk of chunks) {
      expect(chunk.fit).toEqual(fitter(chunk.text.trimEnd(), box));
      expect(chunk.fit.height).toBeLessThanOrEqual(box.height);
    }
  });

  it('fails when a single word cannot fit an empty box', () => {
    const box = { x: 0, y: 0, width: 100, height: 5 };

    expect(() => paginate('word', box, fitter)).toThrow(TextOverflowError);
  });
});
