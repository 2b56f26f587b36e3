/**
 * Outfit Engine - Catalog & Intent Validation
 *
 * Raw records from the catalog and the intent parser are untrusted.
 * Bad records are skipped (never thrown) and reported as DataWarnings.
 *
 * RULE: Everything downstream sees lowercased, trimmed, de-duplicated terms.
 */

import { z } from 'zod';

import { ROLE_ALIASES, formatIssuePath, isRole } from './config';
import { lookupOwn, normalizeTerm } from './vocabulary';
import type {
  AttributeBag,
  CatalogItem,
  ConfidenceBag,
  DataWarning,
  Intent,
  Role,
} from './types';

// ============================================
// HELPERS
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function uniqueTerms(values: Iterable<string>): string[] {
  const terms: string[] = [];
  for (const value of values) {
    const term = normalizeTerm(value);
    if (term.length > 0 && !terms.includes(term)) terms.push(term);
  }
  return terms;
}

/**
 * Canonical role for a raw role string ("Outerwear" → outer), or null.
 */
export function resolveRole(raw: string): Role | null {
  const normalized = normalizeTerm(raw);
  if (isRole(normalized)) return normalized;
  return lookupOwn(ROLE_ALIASES, normalized) ?? null;
}

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}

// ============================================
// CATALOG ITEMS
// ============================================

const RawValueSchema = z.union([z.string(), z.array(z.string())]);

const RawItemSchema = z.object({
  id: z.union([z.string().trim().min(1), z.number().finite()]),
  role: z.string().min(1),
  price: z.number().finite().nonnegative(),
  availability: z.object({
    in_stock: z.boolean(),
    sizes: z.array(z.union([z.string(), z.number()])).default([]),
  }),
  attributes: z.record(RawValueSchema).default({}),
  attribute_confidence: z.record(z.number().finite()).default({}),
  popularity_score: z.number().finite().optional(),
  recency_score: z.number().finite().optional(),
  title: z.string().optional(),
});

type RawItem = z.infer<typeof RawItemSchema>;

export interface NormalizedCatalog {
  items: CatalogItem[];
  warnings: DataWarning[];
}

function rawIdOf(raw: unknown): string | undefined {
  if (!isRecord(raw)) return undefined;
  const id = raw.id;
  if (typeof id === 'string' && id.trim().length > 0) return id.trim();
  if (typeof id === 'number' && Number.isFinite(id)) return String(id);
  return undefined;
}

function normalizeAttributes(raw: RawItem['attributes']): AttributeBag {
  const attributes: Record<string, string[]> = {};
  for (const [key, value] of Object.entries(raw)) {
    const terms = uniqueTerms(typeof value === 'string' ? [value] : value);
    if (terms.length > 0) attributes[normalizeTerm(key)] = terms;
  }
  return attributes;
}

function normalizeConfidence(
  raw: RawItem['attribute_confidence'],
  itemId: string,
  warnings: DataWarning[]
): ConfidenceBag {
  const confidence: Record<string, number> = {};
  for (const [key, value] of Object.entries(raw)) {
    const clamped = clampUnit(value);
    if (clamped !== value) {
      warnings.push({
        code: 'VALUE_CLAMPED',
        item_id: itemId,
        field: `attribute_confidence.${key}`,
        message: `confidence ${value} clamped to ${clamped}`,
      });
    }
    confidence[normalizeTerm(key)] = clamped;
  }
  return confidence;
}

function normalizeScore(
  value: number | undefined,
  field: 'popularity_score' | 'recency_score',
  itemId: string,
  warnings: DataWarning[]
): number | undefined {
  if (value === undefined) return undefined;
  const clamped = clampUnit(value);
  if (clamped !== value) {
    warnings.push({
      code: 'VALUE_CLAMPED',
      item_id: itemId,
      field,
      message: `${field} ${value} clamped to ${clamped}`,
    });
  }
  return clamped;
}

/**
 * Validate and normalize raw catalog records.
 * Invalid records are skipped; duplicates keep the first occurrence.
 */
export function normalizeCatalogItems(records: Iterable<unknown>): NormalizedCatalog {
  const items: CatalogItem[] = [];
  const warnings: DataWarning[] = [];
  const seenIds = new Set<string>();

  let index = 0;
  for (const record of records) {
    const position = index++;
    const parsed = RawItemSchema.safeParse(record);

    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      warnings.push({
        code: 'INVALID_ITEM',
        item_id: rawIdOf(record),
        index: position,
        field: issue ? formatIssuePath(issue.path) : undefined,
        message: issue ? issue.message : 'invalid item record',
      });
      continue;
    }

    const raw = parsed.data;
    const id = String(raw.id);
    const role = resolveRole(raw.role);

    if (role === null) {
      warnings.push({
        code: 'INVALID_ITEM',
        item_id: id,
        index: position,
        field: 'role',
        message: `unknown role "${raw.role}"`,
      });
      continue;
    }

    if (seenIds.has(id)) {
      warnings.push({
        code: 'DUPLICATE_ITEM',
        item_id: id,
        index: position,
        message: `duplicate item id "${id}" skipped`,
      });
      continue;
    }
    seenIds.add(id);

    const item: CatalogItem = {
      id,
      role,
      price: raw.price,
      availability: {
        in_stock: raw.availability.in_stock,
        sizes: uniqueTerms(raw.availability.sizes.map(String)),
      },
      attributes: normalizeAttributes(raw.attributes),
      attribute_confidence: normalizeConfidence(raw.attribute_confidence, id, warnings),
    };

    const popularity = normalizeScore(raw.popularity_score, 'popularity_score', id, warnings);
    const recency = normalizeScore(raw.recency_score, 'recency_score', id, warnings);
    if (popularity !== undefined) item.popularity_score = popularity;
    if (recency !== undefined) item.recency_score = recency;
    if (raw.title !== undefined) item.title = raw.title;

    items.push(item);
  }

  return { items, warnings };
}

// ============================================
// INTENT
// ============================================

const TermSchema = z
  .string()
  .transform(normalizeTerm)
  .refine(term => term.length > 0, { message: 'must not be empty' });

const TermListSchema = z
  .union([z.array(z.string()), z.set(z.string())])
  .transform(values => uniqueTerms(values));

const IntentSchema = z.object({
  activity: TermSchema.optional(),
  occasion: TermSchema.optional(),
  budget_max: z.number().finite().positive().optional(),
  budget_strict: z.boolean().optional(),
  objectives: TermListSchema.default([]),
  palette: TermListSchema.optional(),
  formality: z.enum(['casual', 'elevated', 'athleisure', 'unspecified']).default('unspecified'),
  size: z
    .union([z.string(), z.number()])
    .transform(value => normalizeTerm(String(value)))
    .refine(size => size.length > 0, { message: 'must not be empty' })
    .optional(),
  hard_exclusions: TermListSchema.default([]),
  season: TermSchema.optional(),
  categories: TermListSchema.optional(),
});

export interface NormalizedIntent {
  intent: Intent;
  warnings: DataWarning[];
}

/**
 * Validate a parsed intent. Malformed fields are dropped with a warning;
 * null fields are treated as absent.
 */
export function normalizeIntent(raw: unknown): NormalizedIntent {
  const warnings: DataWarning[] = [];

  const fields: Record<string, unknown> = {};
  if (isRecord(raw)) {
    for (const [key, value] of Object.entries(raw)) {
      if (value !== null && value !== undefined) fields[key] = value;
    }
  } else {
    warnings.push({
      code: 'INVALID_INTENT_FIELD',
      field: '(root)',
      message: 'intent is not an object; using an empty intent',
    });
  }

  const first = IntentSchema.safeParse(fields);
  if (first.success) {
    return { intent: first.data, warnings };
  }

  const dropped = new Set<string>();
  for (const issue of first.error.issues) {
    const key = issue.path[0];
    if (typeof key !== 'string' || dropped.has(key)) continue;
    dropped.add(key);
    delete fields[key];
    warnings.push({
      code: 'INVALID_INTENT_FIELD',
      field: key,
      message: `${key}: ${issue.message}`,
    });
  }

  const second = IntentSchema.safeParse(fields);
  if (second.success) {
    return { intent: second.data, warnings };
  }

  warnings.push({
    code: 'INVALID_INTENT_FIELD',
    field: '(root)',
    message: 'intent could not be repaired; using an empty intent',
  });
  return { intent: IntentSchema.parse({}), warnings };
}
