import { PathError } from '../errors';
import { JsonValue } from './json';

export type FieldResult =
  | { ok: true; value: JsonValue }
  | { ok: false; error: PathError; fallback: JsonValue };

export interface ResolvedField {
  field: string;
  result: FieldResult;
}
