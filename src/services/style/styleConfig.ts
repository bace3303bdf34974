import { readFileSync } from 'fs';
import { ZodError, type ZodIssue } from 'zod';

import { ConfigValidationError, UnknownCategoryValueError, type CategoryName } from '../../errors';
import { DEFAULT_STYLE } from './defaultStyle';
import { styleConfigSchema, type StyleDocument } from './styleSchema';

export type DeepReadonly<T> = T extends (infer E)[]
  ? readonly DeepReadonly<E>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type StyleConfig = DeepReadonly<StyleDocument>;
export type TemplateConfig = StyleConfig['template'];
export type CategoryEntry = StyleConfig['school'][string];
export type TextBox = TemplateConfig['title'];
export type FontRole = TextBox['font'];

export interface Box {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

/** Tables whose entries are addressed by free-form keys. */
const CATEGORY_TABLES = new Set(['school', 'component', 'indicator']);

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstIssue(error: ZodError): ConfigValidationError {
  const issue: ZodIssue | undefined = error.issues[0];
  if (!issue) return new ConfigValidationError('', 'invalid configuration');
  return new ConfigValidationError(issue.path.join('.'), issue.message);
}

/**
 * Validates a parsed configuration document. Unknown keys, missing fields and
 * wrong types are rejected; the first violation is reported.
 */
export function loadStyleConfig(raw: unknown): StyleConfig {
  const result = styleConfigSchema.safeParse(raw);
  if (!result.success) {
    throw firstIssue(result.error);
  }
  return deepFreeze(result.data);
}

export function defaultStyleDocument(): StyleDocument {
  return structuredClone(DEFAULT_STYLE);
}

export function makeDefaultStyleConfig(): StyleConfig {
  return loadStyleConfig(defaultStyleDocument());
}

/** Keys that would reach an object's prototype through plain assignment. */
const FORBIDDEN_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

function mergeInto(base: Record<string, unknown>, override: Record<string, unknown>, trail: string[]) {
  for (const [name, value] of Object.entries(override)) {
    if (FORBIDDEN_KEYS.has(name)) {
      throw new ConfigValidationError(trail.join('.'), `unrecognized key "${name}"`);
    }
    const current = Object.hasOwn(base, name) ? base[name] : undefined;
    // category entries are replaced whole so a partial entry stays an error
    const replaceWhole = trail.length === 1 && CATEGORY_TABLES.has(trail[0]);
    if (!replaceWhole && isPlainObject(current) && isPlainObject(value)) {
      mergeInto(current, value, [...trail, name]);
    } else {
      base[name] = value;
    }
  }
}

/**
 * Layers a user document over the default one: plain objects merge key by
 * key, arrays and scalars replace, category entries replace whole.
 */
export function mergeWithDefaults(overrides: unknown): unknown {
  if (!isPlainObject(overrides)) {
    throw new ConfigValidationError('', 'configuration must be a JSON object');
  }
  const merged: Record<string, unknown> = { ...defaultStyleDocument() };
  mergeInto(merged, structuredClone(overrides), []);
  return merged;
}

export function readStyleConfigFile(filePath: string): StyleConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError('', `could not read ${filePath}: ${reason}`);
  }
  return loadStyleConfig(mergeWithDefaults(parsed));
}

/**
 * Exact key first, then a case-insensitive match. Never falls back to a
 * default entry.
 */
export function lookupCategory(
  table: Readonly<Record<string, CategoryEntry>>,
  category: CategoryName,
  value: string
): CategoryEntry {
  const exact = table[value];
  if (exact) return exact;
  const wanted = value.toLowerCase();
  const key = Object.keys(table).find((candidate) => candidate.toLowerCase() === wanted);
  const entry = key === undefined ? undefined : table[key];
  if (!entry) {
    throw new UnknownCategoryValueError(category, value);
  }
  return entry;
}
