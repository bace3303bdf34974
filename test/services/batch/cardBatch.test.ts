import { existsSync, readdirSync } from 'fs';
import path from 'path';
import { describe, expect, it } from 'vitest';

import { cardFileBase, cardFileNames, generateCards, selectRecord } from '../../../src/services/batch/cardBatch';
import { parseSpellRecord } from '../../../src/services/records/spellRecord';
import { createTestRenderer, tempDir } from '../../helpers/renderer';

const records = [
  parseSpellRecord({ name: 'Magic Missile', level: 1, school: 'evocation', classes: ['Wizard'], description: 'Darts.' }),
  parseSpellRecord({ name: 'Chaos Bolt', level: 1, school: 'wildmagic', description: 'Unpredictable.' }),
  parseSpellRecord({ name: 'Mirror Veil', level: 0, school: 'illusion', description: 'A shimmer.' }),
];

describe('cardFileNames', () => {
  it('numbers every page after the first', () => {
    expect(cardFileNames('Magic Missile', 3)).toEqual(['Magic Missile.png', 'Magic Missile_2.png', 'Magic Missile_3.png']);
  });

  it('drops characters that are unsafe in file names', () => {
    expect(cardFileBase('Tasha\'s Hideous: Laughter?')).toBe('Tashas Hideous Laughter');
    expect(cardFileBase('Évocation d’été')).toBe('Évocation dété');
    expect(cardFileBase('///')).toBe('card');
  });
});

describe('selectRecord', () => {
  it('tries the exact name, then title case, then lower case', () => {
    expect(selectRecord(records, 'Magic Missile')?.name).toBe('Magic Missile');
    expect(selectRecord(records, 'magic missile')?.name).toBe('Magic Missile');
    expect(selectRecord(records, 'MIRROR VEIL')?.name).toBe('Mirror Veil');
    expect(selectRecord(records, 'Fireball')).toBeUndefined();
  });
});

describe('generateCards', () => {
  it('writes every card it can and records the failures', async () => {
    const outputDirectory = path.join(tempDir(), 'out');

    const result = await generateCards(records, createTestRenderer(), { outputDirectory });

    expect(result.cancelled).toBe(false);
    expect(result.rendered).toEqual([
      { name: 'Magic Missile', files: [path.join(outputDirectory, 'Magic Missile.png')] },
      { name: 'Mirror Veil', files: [path.join(outputDirectory, 'Mirror Veil.png')] },
    ]);
    expect(result.failed).toEqual([
      {
        name: 'Chaos Bolt',
        message: 'Unknown school "wildmagic": no entry in the card configuration',
        code: 'UNKNOWN_CATEGORY_VALUE',
      },
    ]);
    expect(readdirSync(outputDirectory).sort()).toEqual(['Magic Missile.png', 'Mirror Veil.png']);
  });

  it('renders only the selected spell', async () => {
    const outputDirectory = tempDir();

    const result = await generateCards(records, createTestRenderer(), { outputDirectory, only: 'mirror veil' });

    expect(result.rendered.map((card) => card.name)).toEqual(['Mirror Veil']);
    expect(readdirSync(outputDirectory)).toEqual(['Mirror Veil.png']);
  });

  it('reports a selected spell that is not in the input', async () => {
    const outputDirectory = path.join(tempDir(), 'never-created');

    const result = await generateCards(records, createTestRenderer(), { outputDirectory, only: 'Fireball' });

    expect(result.failed).toEqual([{ name: 'Fireball', message: 'Spell is not defined in the input file' }]);
    expect(existsSync(outputDirectory)).toBe(false);
  });

  it('stops before the next card once cancelled', async () => {
    const outputDirectory = tempDir();
    const controller = new AbortController();
    controller.abort();

    const result = await generateCards(records, createTestRenderer(), { outputDirectory, signal: controller.signal });

    expect(result).toEqual({ rendered: [], failed: [], cancelled: true });
    expect(readdirSync(outputDirectory)).toEqual([]);
  });
});
