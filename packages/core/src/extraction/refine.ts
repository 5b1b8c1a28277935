/**
 * Extraction refinement
 *
 * Turns raw element texts into field values. Drivers only supply a reader that
 * returns the raw strings matched by a selector; the selector fallback chain,
 * filtering and shaping live here so every driver behaves the same.
 */

import type {
  ExtractionFallback,
  ExtractionSpec,
  ExtractedData,
  ExtractedValue,
  FieldExtraction,
} from '../types/task.js';

/**
 * Reads the raw values matched by a selector (text, or an attribute)
 */
export type SelectorReader = (selector: string, attribute?: string) => Promise<string[]>;

function collect(
  raw: readonly string[],
  field: FieldExtraction,
  accept: (text: string) => boolean
): string[] {
  const minLength = field.minLength ?? 0;
  const values: string[] = [];

  for (const value of raw) {
    const text = value.trim();
    if (text.length <= minLength || !accept(text)) continue;
    if (field.unique && values.includes(text)) continue;

    values.push(text);
    if (field.limit !== undefined && values.length >= field.limit) break;
  }

  return values;
}

/**
 * Trim, drop short values, dedupe and cap raw values for a field
 */
export function refineValues(raw: readonly string[], field: FieldExtraction): string[] {
  return collect(raw, field, () => true);
}

/**
 * Keep the values of a fallback scan that mention the fallback text
 */
export function filterFallbackValues(
  raw: readonly string[],
  fallback: ExtractionFallback,
  field: FieldExtraction
): string[] {
  const needle = fallback.contains.toLowerCase();
  const scan = { ...field, limit: fallback.limit ?? field.limit };
  return collect(raw, scan, (text) =>
    text !== fallback.contains &&
    text.toLowerCase().includes(needle) &&
    (fallback.maxLength === undefined || text.length < fallback.maxLength)
  );
}

/**
 * Shape refined values into a field value
 */
export function toExtractedValue(values: string[], field: FieldExtraction): ExtractedValue {
  if (field.multiple) {
    return values;
  }
  return values[0] ?? null;
}

/**
 * Resolve one field: selectors in order, first non-empty wins, then the fallback scan
 */
export async function extractField(
  field: FieldExtraction,
  read: SelectorReader
): Promise<ExtractedValue> {
  for (const selector of field.selectors) {
    const values = refineValues(await read(selector, field.attribute), field);
    if (values.length > 0) {
      return toExtractedValue(values, field);
    }
  }

  if (field.fallback) {
    const raw = await read(field.fallback.selector, field.attribute);
    return toExtractedValue(filterFallbackValues(raw, field.fallback, field), field);
  }

  return toExtractedValue([], field);
}

/**
 * Resolve every field of an extraction specification
 */
export async function extractAll(spec: Readonly<ExtractionSpec>, read: SelectorReader): Promise<ExtractedData> {
  const data: ExtractedData = {};
  for (const [name, field] of Object.entries(spec)) {
    data[name] = await extractField(field, read);
  }
  return data;
}
