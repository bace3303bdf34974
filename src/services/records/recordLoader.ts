import { parse as parseCsv } from 'csv-parse/sync';
import { readFileSync } from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { RecordValidationError } from '../../errors';
import { logger } from '../../logger';
import { parseSpellRecord, type SpellRecord } from './spellRecord';

export const CSV_HEADERS = [
  'level',
  'name',
  'school',
  'classes',
  'range',
  'cast_time',
  'duration',
  'concentration',
  'ritual',
  'verbal',
  'somatic',
  'material',
  'material_costly',
  'material_consumed',
  'material_text',
  'material_cost',
  'rules',
  'source',
] as const;

const COMPONENT_FLAGS = ['verbal', 'somatic', 'material'] as const;

const csvRowSchema = z.array(z.string());

const yamlEntrySchema = z
  .object({
    level: z.number().int().default(-1),
    school: z.string().default(''),
    classes: z.union([z.string(), z.array(z.string())]).default([]),
    range: z.string().default('Unknown'),
    cast_time: z.string().default('Unknown'),
    duration: z.string().default('Unknown'),
    concentration: z.boolean().default(false),
    ritual: z.boolean().default(false),
    verbal: z.boolean().default(false),
    somatic: z.boolean().default(false),
    material: z.boolean().default(false),
    material_costly: z.boolean().default(false),
    material_consumed: z.boolean().default(false),
    material_text: z.string().optional(),
    material_cost: z.string().optional(),
    rules: z.string().default(''),
    source: z.string().default(''),
  })
  .passthrough();

export function splitClasses(value: string | string[]): string[] {
  const list = Array.isArray(value) ? value : value.split(',');
  return list.map((name) => name.trim()).filter((name) => name.length > 0);
}

function componentsFrom(flags: Partial<Record<(typeof COMPONENT_FLAGS)[number], boolean>>): string[] {
  return COMPONENT_FLAGS.filter((flag) => flags[flag]);
}

function yes(value: string | undefined): boolean {
  return value?.trim().toLowerCase() === 'yes';
}

export function recordFromCsvRow(row: Record<string, string>): SpellRecord {
  const name = row.name ?? '';
  const material = yes(row.material);
  const level = Number.parseInt(row.level ?? '', 10);
  return parseSpellRecord(
    {
      name,
      level: Number.isNaN(level) ? row.level : level,
      school: row.school ?? '',
      castingTime: row.cast_time ?? '',
      range: row.range ?? '',
      duration: row.duration ?? '',
      components: componentsFrom({ verbal: yes(row.verbal), somatic: yes(row.somatic), material }),
      ritual: yes(row.ritual),
      concentration: yes(row.concentration),
      materialText: material ? row.material_text : undefined,
      materialCost: material && row.material_cost ? row.material_cost : undefined,
      materialConsumed: yes(row.material_consumed),
      classes: splitClasses(row.classes ?? ''),
      description: row.rules ?? '',
      source: row.source ?? '',
    },
    name || undefined
  );
}

export function recordFromYamlEntry(name: string, entry: unknown): SpellRecord {
  const parsed = yamlEntrySchema.safeParse(entry ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new RecordValidationError(name, issue?.path.join('.') ?? '', issue?.message ?? 'invalid entry');
  }
  const value = parsed.data;
  return parseSpellRecord(
    {
      name,
      level: value.level,
      school: value.school,
      castingTime: value.cast_time,
      range: value.range,
      duration: value.duration,
      components: componentsFrom(value),
      ritual: value.ritual,
      concentration: value.concentration,
      materialText: value.material ? value.material_text ?? '' : undefined,
      materialCost: value.material && value.material_cost ? value.material_cost : undefined,
      materialConsumed: value.material_consumed,
      classes: splitClasses(value.classes),
      description: value.rules,
      source: value.source,
    },
    name
  );
}

/**
 * The first row names the columns, in any order; every column in
 * `CSV_HEADERS` must be present. Extra columns are ignored.
 */
export function parseSpellsCsv(content: string): SpellRecord[] {
  const rows: unknown = parseCsv(content, { skip_empty_lines: true, bom: true });
  const parsed = z.array(csvRowSchema).safeParse(rows);
  if (!parsed.success) {
    throw new RecordValidationError('<csv>', '', 'expected a header row followed by spell rows');
  }
  const [header, ...body] = parsed.data;
  if (!header) return [];

  const columns = header.map((name) => name.trim());
  const missing = CSV_HEADERS.find((name) => !columns.includes(name));
  if (missing) {
    throw new RecordValidationError('<csv>', missing, `missing column "${missing}"`);
  }
  return body.map((values) =>
    recordFromCsvRow(Object.fromEntries(columns.map((name, index) => [name, values[index] ?? ''])))
  );
}

export function parseSpellsYaml(content: string): SpellRecord[] {
  const document: unknown = parseYaml(content);
  if (typeof document !== 'object' || document === null || Array.isArray(document)) {
    throw new RecordValidationError('<yaml>', '', 'expected a mapping of spell names to entries');
  }
  return Object.entries(document).map(([name, entry]) => recordFromYamlEntry(name, entry));
}

/**
 * Reads a dataset file. `.yaml`/`.yml` are YAML mappings keyed by spell name,
 * everything else is treated as CSV.
 */
export function loadSpellsFromFile(filePath: string): SpellRecord[] {
  const content = readFileSync(filePath, 'utf-8');
  const extension = path.extname(filePath).toLowerCase();
  const records = extension === '.yaml' || extension === '.yml' ? parseSpellsYaml(content) : parseSpellsCsv(content);
  logger.info(`[Records] Loaded ${records.length} spell(s) from ${filePath}`);
  return records;
}
