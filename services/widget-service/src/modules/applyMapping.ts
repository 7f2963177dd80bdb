import { PathError, errorMessage } from "../errors";
import { JsonValue, isJsonValue } from "../interfaces/json";
import { FieldResult, ResolvedField } from "../interfaces/mapping";
import { MappedData, RawData } from "../interfaces/widget";
import { logger } from "../logger";
import { resolvePath } from "./pathResolver";

/**
 * A mapping table entry.
 *
 * - `"a.b[0]"`: path expression
 * - `{ path: "a.b", default: "N/A" }`: path with a fallback for failures and nulls
 * - `{ const: 42 }`: literal value, no lookup
 */
export type FieldMappingEntry =
  | string
  | { path: string; default?: JsonValue }
  | { const: JsonValue };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toMappingEntry(field: string, entry: unknown): FieldMappingEntry {
  if (typeof entry === "string") return entry;

  if (isRecord(entry)) {
    const { path, const: constant, default: fallback } = entry;

    if (Object.prototype.hasOwnProperty.call(entry, "const") && isJsonValue(constant)) {
      return { const: constant };
    }
    if (typeof path === "string") {
      return isJsonValue(fallback) ? { path, default: fallback } : { path };
    }
  }

  throw new PathError(`Unsupported mapping entry for field '${field}'`, "");
}

function resolveEntry(raw: RawData, entry: FieldMappingEntry): FieldResult {
  if (typeof entry === "string") {
    return { ok: true, value: resolvePath(raw, entry) };
  }

  if ("const" in entry) {
    return { ok: true, value: entry.const };
  }

  const fallback = entry.default ?? null;
  try {
    return { ok: true, value: resolvePath(raw, entry.path) ?? fallback };
  } catch (err) {
    if (err instanceof PathError) return { ok: false, error: err, fallback };
    throw err;
  }
}

/**
 * Resolve every field independently. Never throws.
 */
export function resolveFields(raw: RawData, mapping: Record<string, unknown>): ResolvedField[] {
  return Object.entries(mapping).map(([field, entry]): ResolvedField => {
    try {
      return { field, result: resolveEntry(raw, toMappingEntry(field, entry)) };
    } catch (err) {
      const error =
        err instanceof PathError
          ? err
          : new PathError(errorMessage(err), typeof entry === "string" ? entry : "");
      return { field, result: { ok: false, error, fallback: null } };
    }
  });
}

/**
 * Build MappedData from resolved fields, degrading failures to their fallback.
 */
export function materialize(fields: ResolvedField[]): MappedData {
  // fromEntries defines own properties, so a "__proto__" field stays a field
  return Object.fromEntries(
    fields.map(({ field, result }): [string, JsonValue] => {
      if (result.ok) return [field, result.value];

      logger.warn(
        { field, path: result.error.path, reason: result.error.message },
        "Failed to extract mapped field"
      );
      return [field, result.fallback];
    })
  );
}

export function applyMapping(raw: RawData, mapping: Record<string, unknown>): MappedData {
  return materialize(resolveFields(raw, mapping));
}
