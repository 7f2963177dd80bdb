import { PathError } from "../errors";
import { JsonObject, JsonValue, isJsonObject } from "../interfaces/json";

const NUMERIC_LITERAL = /^\s*[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?\s*$/;
const INDEX_LITERAL = /^\s*[+-]?\d+\s*$/;

function hasKey(value: JsonObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(value, key);
}

function typeName(value: JsonValue): string {
  if (value === null) return "null";
  return Array.isArray(value) ? "array" : typeof value;
}

/**
 * A path with no dots or brackets.
 *
 * A key that exists wins; otherwise numeric-looking text is returned as a
 * literal so a mapping table entry like `"5"` injects a constant.
 */
function resolveSingleKey(data: JsonValue, path: string): JsonValue {
  if (isJsonObject(data) && hasKey(data, path)) {
    return data[path];
  }

  if (NUMERIC_LITERAL.test(path)) {
    return path;
  }

  if (isJsonObject(data)) {
    return null;
  }

  throw new PathError(`Cannot access '${path}' on ${typeName(data)}`, path);
}

function descendKey(current: JsonValue, key: string, path: string): JsonValue {
  if (!isJsonObject(current)) {
    throw new PathError(`Cannot access '${key}' on non-object type ${typeName(current)}`, path);
  }
  if (!hasKey(current, key)) {
    throw new PathError(`Key not found: ${key}`, path);
  }
  return current[key];
}

function descendIndex(current: JsonValue, rawIndex: string, path: string): JsonValue {
  if (!INDEX_LITERAL.test(rawIndex)) {
    throw new PathError(`Invalid array index: ${rawIndex}`, path);
  }
  if (!Array.isArray(current) && typeof current !== "string") {
    throw new PathError(`Cannot index ${typeName(current)} with [${rawIndex.trim()}]`, path);
  }

  // strings index by character (code point)
  const items: JsonValue[] = typeof current === "string" ? Array.from(current) : current;
  const index = Number.parseInt(rawIndex, 10);
  const position = index < 0 ? items.length + index : index;

  if (position < 0 || position >= items.length) {
    throw new PathError(`Invalid array index: ${rawIndex.trim()}`, path);
  }

  return items[position];
}

/**
 * Resolve a path expression such as `a.b[0].c` against nested JSON.
 *
 * Segments are walked left to right and the first failing one aborts with a
 * PathError. Each segment takes at most one `[index]`, applied to an array or
 * a string; negative indices count from the end.
 */
export function resolvePath(data: JsonValue, path: string): JsonValue {
  if (!path) {
    return data;
  }

  if (!path.includes(".") && !path.includes("[") && !path.includes("]")) {
    return resolveSingleKey(data, path);
  }

  let current = data;

  for (const segment of path.split(".")) {
    if (segment === "") continue;

    if (segment.includes("[") && segment.includes("]")) {
      const open = segment.indexOf("[");
      const name = segment.slice(0, open);
      const rawIndex = segment.slice(open + 1).replace(/\]+$/, "");

      if (name) {
        current = descendKey(current, name, path);
      }
      current = descendIndex(current, rawIndex, path);
    } else {
      current = descendKey(current, segment, path);
    }
  }

  return current;
}
