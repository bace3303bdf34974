import { writeFileSync } from 'fs';
import path from 'path';
import { describe, expect, it } from 'vitest';

import { RecordValidationError } from '../../../src/errors';
import {
  CSV_HEADERS,
  loadSpellsFromFile,
  parseSpellsCsv,
  parseSpellsYaml,
  splitClasses,
} from '../../../src/services/records/recordLoader';
import { bundledDir, tempDir } from '../../helpers/renderer';

const YAML_DATASET = `
Magic Missile:
  level: 1
  school: evocation
  classes: Sorcerer, Wizard
  range: 120 feet
  cast_time: 1 action
  duration: Instantaneous
  verbal: true
  somatic: true
  rules: Three glowing darts strike targets you choose.
  source: Sample Codex
Stoneskin Ward:
  level: 4
  school: transmutation
  classes: [Druid, Wizard]
  concentration: true
  verbal: true
  material: true
  material_text: diamond dust
  material_cost: 100 gp
  material_consumed: true
`;

function csvLine(values: Record<string, string>): string {
  return CSV_HEADERS.map((header) => {
    const value = values[header] ?? '';
    return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
  }).join(',');
}

describe('parseSpellsYaml', () => {
  it('maps entries to records keyed by spell name', () => {
    const [missile, ward] = parseSpellsYaml(YAML_DATASET);

    expect(missile).toEqual({
      name: 'Magic Missile',
      level: 1,
      school: 'evocation',
      castingTime: '1 action',
      range: '120 feet',
      duration: 'Instantaneous',
      components: ['verbal', 'somatic'],
      ritual: false,
      concentration: false,
      materialConsumed: false,
      classes: ['Sorcerer', 'Wizard'],
      description: 'Three glowing darts strike targets you choose.',
      source: 'Sample Codex',
    });
    expect(ward).toMatchObject({
      name: 'Stoneskin Ward',
      components: ['verbal', 'material'],
      classes: ['Druid', 'Wizard'],
      concentration: true,
      materialText: 'diamond dust',
      materialCost: '100 gp',
      materialConsumed: true,
      castingTime: 'Unknown',
    });
  });

  it('rejects an entry without a level', () => {
    let caught: unknown;
    try {
      parseSpellsYaml('Nameless Spell:\n  school: evocation\n');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(RecordValidationError);
    expect(caught).toMatchObject({ spell: 'Nameless Spell', path: 'level' });
  });

  it('rejects wrongly typed fields', () => {
    expect(() => parseSpellsYaml('Odd:\n  level: one\n  school: evocation\n')).toThrow(RecordValidationError);
  });

  it('requires a mapping at the top level', () => {
    expect(() => parseSpellsYaml('- just\n- a list\n')).toThrow(
      'Invalid spell entry "<yaml>" at "<root>": expected a mapping of spell names to entries'
    );
  });
});

describe('parseSpellsCsv', () => {
  it('reads yes/no flags and comma separated classes', () => {
    const content = [
      CSV_HEADERS.join(','),
      csvLine({
        level: '2',
        name: 'Read the Omens',
        school: 'divination',
        classes: 'Cleric, Wizard',
        range: 'Self',
        cast_time: '1 minute',
        duration: '1 hour',
        concentration: 'no',
        ritual: 'yes',
        verbal: 'yes',
        somatic: 'no',
        material: 'yes',
        material_costly: 'yes',
        material_consumed: 'no',
        material_text: 'a silver coin',
        material_cost: '25 gp',
        rules: 'You glimpse what comes next, "briefly".',
        source: 'Sample Codex',
      }),
    ].join('\n');

    const [record] = parseSpellsCsv(content);

    expect(record).toEqual({
      name: 'Read the Omens',
      level: 2,
      school: 'divination',
      castingTime: '1 minute',
      range: 'Self',
      duration: '1 hour',
      components: ['verbal', 'material'],
      ritual: true,
      concentration: false,
      materialText: 'a silver coin',
      materialCost: '25 gp',
      materialConsumed: false,
      classes: ['Cleric', 'Wizard'],
      description: 'You glimpse what comes next, "briefly".',
      source: 'Sample Codex',
    });
  });

  it('drops the cost when the spell has no material component', () => {
    const content = [
      CSV_HEADERS.join(','),
      csvLine({ level: '0', name: 'Spark', school: 'evocation', verbal: 'yes', material: 'no', material_cost: '5 gp' }),
    ].join('\n');

    const [record] = parseSpellsCsv(content);

    expect(record.components).toEqual(['verbal']);
    expect(record.materialCost).toBeUndefined();
    expect(record.materialText).toBeUndefined();
  });

  it('rejects a file missing one of the expected columns', () => {
    const headers = CSV_HEADERS.filter((header) => header !== 'rules');
    const content = [headers.join(','), headers.map((header) => (header === 'level' ? '1' : 'x')).join(',')].join('\n');

    let caught: unknown;
    try {
      parseSpellsCsv(content);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(RecordValidationError);
    expect(caught).toMatchObject({ spell: '<csv>', path: 'rules', reason: 'missing column "rules"' });
  });

  it('accepts columns in any order and ignores extra ones', () => {
    const headers = ['notes', ...[...CSV_HEADERS].reverse()];
    const values: Record<string, string> = { notes: 'ignored', level: '3', name: 'Spark', school: 'evocation', rules: 'Zap.' };
    const content = [headers.join(','), headers.map((header) => values[header] ?? '').join(',')].join('\n');

    const [record] = parseSpellsCsv(content);

    expect(record).toMatchObject({ name: 'Spark', level: 3, school: 'evocation', description: 'Zap.' });
  });

  it('returns no records for a header without rows', () => {
    expect(parseSpellsCsv(CSV_HEADERS.join(','))).toEqual([]);
    expect(parseSpellsCsv('')).toEqual([]);
  });

  it('reports a non-numeric level', () => {
    const content = [CSV_HEADERS.join(','), csvLine({ level: 'high', name: 'Spark', school: 'evocation' })].join('\n');

    expect(() => parseSpellsCsv(content)).toThrow(RecordValidationError);
  });
});

describe('splitClasses', () => {
  it('trims names and drops empty ones', () => {
    expect(splitClasses(' Bard ,, Wizard ')).toEqual(['Bard', 'Wizard']);
    expect(splitClasses(['Druid ', ''])).toEqual(['Druid']);
  });
});

describe('loadSpellsFromFile', () => {
  it('picks the parser from the file extension', () => {
    const dir = tempDir();
    const yamlFile = path.join(dir, 'spells.yml');
    const csvFile = path.join(dir, 'spells.csv');
    writeFileSync(yamlFile, YAML_DATASET);
    writeFileSync(csvFile, [CSV_HEADERS.join(','), csvLine({ level: '1', name: 'Spark', school: 'evocation' })].join('\n'));

    expect(loadSpellsFromFile(yamlFile).map((record) => record.name)).toEqual(['Magic Missile', 'Stoneskin Ward']);
    expect(loadSpellsFromFile(csvFile).map((record) => record.name)).toEqual(['Spark']);
  });

  it('loads the bundled sample dataset', () => {
    const records = loadSpellsFromFile(path.join(bundledDir, 'resources', 'spells', 'default-spells.yaml'));

    expect(records).toHaveLength(8);
    expect(new Set(records.map((record) => record.school)).size).toBe(8);
  });
});
