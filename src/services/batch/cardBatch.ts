import { mkdir, writeFile } from 'fs/promises';
import path from 'path';

import { logger } from '../../logger';
import type { CardRenderer } from '../cards/cardRenderer';
import type { SpellRecord } from '../records/spellRecord';

export interface BatchOptions {
  outputDirectory: string;
  /** Render only the spell with this name. */
  only?: string;
  /** Checked between records; a card that has started always finishes. */
  signal?: AbortSignal;
}

export interface BatchFailure {
  name: string;
  message: string;
  code?: string;
}

export interface BatchResult {
  rendered: { name: string; files: string[] }[];
  failed: BatchFailure[];
  cancelled: boolean;
}

/** Letters, digits and `._- ` survive; everything else is dropped. */
export function cardFileBase(name: string): string {
  const base = Array.from(name)
    .filter((char) => /[\p{L}\p{N}._\- ]/u.test(char))
    .join('')
    .trim();
  return base || 'card';
}

export function cardFileNames(name: string, pageCount: number): string[] {
  const base = cardFileBase(name);
  return Array.from({ length: pageCount }, (_, index) => (index === 0 ? `${base}.png` : `${base}_${index + 1}.png`));
}

function titleCase(value: string): string {
  return value.replace(/\w\S*/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

/**
 * Same lookup order as a user would expect from the command line: exact name,
 * then Title Case, then lower case.
 */
export function selectRecord(records: readonly SpellRecord[], name: string): SpellRecord | undefined {
  for (const candidate of [name, titleCase(name), name.toLowerCase()]) {
    const match = records.find((record) => record.name === candidate);
    if (match) return match;
  }
  return undefined;
}

export async function generateCards(
  records: readonly SpellRecord[],
  renderer: CardRenderer,
  options: BatchOptions
): Promise<BatchResult> {
  const result: BatchResult = { rendered: [], failed: [], cancelled: false };
  let targets: readonly SpellRecord[] = records;
  if (options.only !== undefined) {
    const match = selectRecord(records, options.only);
    if (!match) {
      result.failed.push({ name: options.only, message: 'Spell is not defined in the input file' });
      logger.error(`[Batch] Spell "${options.only}" is not defined in the input file`);
      return result;
    }
    targets = [match];
  }

  await mkdir(options.outputDirectory, { recursive: true });

  for (const [index, record] of targets.entries()) {
    if (options.signal?.aborted) {
      result.cancelled = true;
      logger.warn(`[Batch] Cancelled after ${index} of ${targets.length} card(s)`);
      break;
    }
    try {
      const card = await renderer.render(record);
      const names = cardFileNames(record.name, card.pages.length);
      const files: string[] = [];
      for (const [page, image] of card.pages.entries()) {
        const file = path.join(options.outputDirectory, names[page]);
        await writeFile(file, image);
        files.push(file);
      }
      result.rendered.push({ name: record.name, files });
      logger.info(`[Batch] Generated ${record.name} -> ${files.join(', ')}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const code = typeof error === 'object' && error !== null && 'code' in error ? String(error.code) : undefined;
      result.failed.push({ name: record.name, message, code });
      logger.error(`[Batch] Failed to generate ${record.name}: ${message}`);
    }
  }
  return result;
}
