import { z } from 'zod';

import { RecordValidationError } from '../../errors';

/** Some sources use U+2212 for negative modifiers; the card fonts lack it. */
export function normalizeRulesText(text: string): string {
  return text.replace(/\r\n?/g, '\n').replace(/\u2212/g, '-');
}

export const spellRecordSchema = z.object({
  name: z.string().trim().min(1, 'name is required'),
  level: z.number().int().min(0).max(9),
  school: z.string().trim().min(1, 'school is required'),
  castingTime: z.string().default(''),
  range: z.string().default(''),
  duration: z.string().default(''),
  components: z.array(z.string().trim().min(1)).default([]),
  ritual: z.boolean().default(false),
  concentration: z.boolean().default(false),
  materialText: z.string().optional(),
  materialCost: z.string().optional(),
  materialConsumed: z.boolean().default(false),
  classes: z.array(z.string().trim().min(1)).default([]),
  description: z.string().default('').transform(normalizeRulesText),
  source: z.string().default(''),
});

export type SpellRecord = z.output<typeof spellRecordSchema>;
export type SpellRecordInput = z.input<typeof spellRecordSchema>;

export function parseSpellRecord(input: unknown, label?: string): SpellRecord {
  const result = spellRecordSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const spell =
      label ??
      (typeof input === 'object' && input !== null && 'name' in input && typeof input.name === 'string'
        ? input.name
        : '<unnamed>');
    throw new RecordValidationError(spell, issue?.path.join('.') ?? '', issue?.message ?? 'invalid entry');
  }
  return result.data;
}

export function ordinal(level: number): string {
  const suffix = level === 1 ? 'st' : level === 2 ? 'nd' : level === 3 ? 'rd' : 'th';
  return `${level}${suffix}`;
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/** "3rd-level evocation", "Illusion cantrip", with " (ritual)" when it applies. */
export function describeLevelAndSchool(record: Pick<SpellRecord, 'level' | 'school' | 'ritual'>): string {
  const school = record.school.trim();
  const base = record.level === 0 ? `${capitalize(school)} cantrip` : `${ordinal(record.level)}-level ${school.toLowerCase()}`;
  return record.ritual ? `${base} (ritual)` : base;
}

export function levelLabel(level: number): string {
  return level === 0 ? 'Cantrip' : `Lv ${level}`;
}
