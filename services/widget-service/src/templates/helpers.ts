import { PathError, TemplateError } from '../errors';
import { JsonValue } from '../interfaces/json';
import { MappedData } from '../interfaces/widget';
import { logger } from '../logger';
import { resolvePath } from '../modules/pathResolver';

/** String form of a mapped value; null and missing become "". */
export function toText(value: JsonValue | undefined): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/** A field's text, or `fallback` when the field is missing or null. */
export function field(data: MappedData, key: string, fallback = ''): string {
  const value: JsonValue | undefined = data[key];
  return value === null || value === undefined ? fallback : toText(value);
}

/**
 * A list field. Missing or null reads as empty; anything else that is not an
 * array cannot be rendered.
 */
export function listField(data: MappedData, key: string, message: string): JsonValue[] {
  const value: JsonValue | undefined = data[key];
  if (value === null || value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new TemplateError(message, { field: key });
  }
  return value;
}

/** Per-item path configured through the mapping table, e.g. `metric_title_path`. */
export function itemPath(data: MappedData, key: string, fallback: string): string {
  const value = field(data, key);
  return value || fallback;
}

/** Optional per-item value: a failed lookup reads as "". */
export function optionalAt(item: JsonValue, path: string): string {
  try {
    return toText(resolvePath(item, path));
  } catch (err) {
    if (err instanceof PathError) return '';
    throw err;
  }
}

/**
 * Render each item of a capped list; an item whose required lookup fails is
 * skipped and logged.
 */
export function renderItems(
  items: JsonValue[],
  limit: number,
  kind: string,
  render: (item: JsonValue) => string
): string[] {
  const rendered: string[] = [];

  for (const item of items.slice(0, limit)) {
    try {
      rendered.push(render(item));
    } catch (err) {
      if (!(err instanceof PathError)) throw err;
      logger.warn({ kind, path: err.path, reason: err.message }, 'Skipping list item');
    }
  }

  return rendered;
}

/** Join fragment lines, dropping the conditional ones that were left out. */
export function lines(...parts: Array<string | false | null | undefined>): string {
  return parts.filter((part): part is string => Boolean(part)).join('\n');
}
