/**
 * Field-level coercion used by the recovery strategies.
 *
 * Each declared kind knows how to turn the usual model mistakes into a
 * valid value: numbers sent as strings (comma decimals included), yes/no
 * tokens for booleans, JSON or comma-separated strings for arrays.
 */

import { fieldDefault } from '../schema/defaults.js';
import type { FieldIssue } from '../schema/errors.js';
import { isPlainObject } from '../schema/types.js';
import type { FieldDescriptor, RecordInstance, TypeDescriptor } from '../schema/types.js';
import { decodeJson } from './json.js';
import { isAbsent, joinPath, receivedLabel, validateValue, expectedLabel } from './validate.js';

export type CoercionResult = { ok: true; value: unknown } | { ok: false; reason: string };

const TRUTHY_TOKENS = new Set(['true', '1', 'yes', 'y', 'on', 't', 'sim', 's', 'verdadeiro']);
const FALSY_TOKENS = new Set(['false', '0', 'no', 'n', 'off', 'f', 'nao', 'não', 'falso']);

const CURRENCY_PREFIX_RE = /^(?:R\$|US\$|\$|€|£)\s*/i;
const NUMERIC_RE = /^[+-]?[\d.,]+(?:[eE][+-]?\d+)?$/;

function countOf(text: string, char: string): number {
  return text.split(char).length - 1;
}

/**
 * Parse "200,50", "1.234,56", "1,234.56", "R$ 10" and plain numbers.
 * A single comma is read as the decimal separator.
 */
export function parseNumericString(raw: string): number | undefined {
  const text = raw.trim().replace(CURRENCY_PREFIX_RE, '').replace(/\s+/g, '');
  if (!NUMERIC_RE.test(text)) {
    return undefined;
  }

  const lastComma = text.lastIndexOf(',');
  const lastDot = text.lastIndexOf('.');
  let normalized = text;

  if (lastComma !== -1 && lastDot !== -1) {
    normalized = lastComma > lastDot
      ? text.replace(/\./g, '').replace(',', '.')
      : text.replace(/,/g, '');
  } else if (lastComma !== -1) {
    normalized = countOf(text, ',') === 1 ? text.replace(',', '.') : text.replace(/,/g, '');
  } else if (lastDot !== -1 && countOf(text, '.') > 1) {
    normalized = text.replace(/\./g, '');
  }

  const value = Number(normalized);
  return Number.isFinite(value) ? value : undefined;
}

export function parseBooleanToken(raw: string): boolean | undefined {
  const token = raw.trim().toLowerCase();
  if (TRUTHY_TOKENS.has(token)) {
    return true;
  }
  if (FALSY_TOKENS.has(token)) {
    return false;
  }
  return undefined;
}

function fail(type: TypeDescriptor, value: unknown): CoercionResult {
  return { ok: false, reason: `cannot convert ${receivedLabel(value)} to ${expectedLabel(type)}` };
}

function toArrayCandidates(value: unknown): unknown[] {
  if (Array.isArray(value)) {
    return value;
  }
  if (typeof value === 'string') {
    const decoded = decodeJson(value);
    if (decoded.ok) {
      return Array.isArray(decoded.value) ? decoded.value : [decoded.value];
    }
    return value
      .split(',')
      .map((part) => part.trim())
      .filter((part) => part.length > 0);
  }
  return [value];
}

export type RepairMode = 'repair' | 'subset';

/**
 * Rebuild an object field by field.
 *
 * repair: keep valid fields, coerce invalid ones, default missing/unfixable
 *         required fields, drop unfixable optional ones.
 * subset: keep only fields that are present and coercible; default the rest,
 *         required or not.
 */
export function repairObject(
  data: Record<string, unknown>,
  fields: readonly FieldDescriptor[],
  path: string,
  issues: FieldIssue[],
  mode: RepairMode = 'repair'
): RecordInstance {
  const output: RecordInstance = {};

  const applyDefault = (entry: FieldDescriptor, fieldPath: string): void => {
    const fallback = fieldDefault(entry);
    if (fallback.ok) {
      output[entry.name] = fallback.value;
    } else if (entry.required) {
      issues.push({ path: fieldPath, code: 'no_default', message: fallback.reason });
    }
  };

  for (const entry of fields) {
    const fieldPath = joinPath(path, entry.name);
    const raw = data[entry.name];

    if (isAbsent(entry, raw)) {
      if (entry.required || mode === 'subset' || entry.default !== undefined) {
        applyDefault(entry, fieldPath);
      }
      continue;
    }

    const coerced = coerceValue(raw, entry.type, fieldPath, issues);
    if (coerced.ok) {
      output[entry.name] = coerced.value;
      continue;
    }

    issues.push({ path: fieldPath, code: 'coercion_failed', message: coerced.reason });
    if (entry.required || mode === 'subset') {
      applyDefault(entry, fieldPath);
    }
  }

  return output;
}

export function coerceValue(
  value: unknown,
  type: TypeDescriptor,
  path: string,
  issues: FieldIssue[]
): CoercionResult {
  const scratch: FieldIssue[] = [];
  const valid = validateValue(value, type, path, scratch);
  if (valid.ok) {
    return valid;
  }

  switch (type.kind) {
    case 'string':
      if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
        return { ok: true, value: String(value) };
      }
      if (typeof value === 'object' && value !== null) {
        return { ok: true, value: JSON.stringify(value) };
      }
      return fail(type, value);

    case 'integer':
    case 'number': {
      let numeric: number | undefined;
      if (typeof value === 'number' && Number.isFinite(value)) {
        numeric = value;
      } else if (typeof value === 'string') {
        numeric = parseNumericString(value);
      }
      if (numeric === undefined) {
        return fail(type, value);
      }
      return { ok: true, value: type.kind === 'integer' ? Math.trunc(numeric) : numeric };
    }

    case 'boolean': {
      if (typeof value === 'number') {
        return { ok: true, value: value !== 0 };
      }
      const token = typeof value === 'string' ? parseBooleanToken(value) : undefined;
      return token === undefined ? fail(type, value) : { ok: true, value: token };
    }

    case 'null':
      return value === undefined || value === 'null' ? { ok: true, value: null } : fail(type, value);

    case 'enum': {
      if (typeof value !== 'string' && typeof value !== 'number') {
        return fail(type, value);
      }
      const wanted = String(value).trim().toLowerCase();
      const match = type.choices.find((choice) => choice.toLowerCase() === wanted);
      return match === undefined ? fail(type, value) : { ok: true, value: match };
    }

    case 'array': {
      const items: unknown[] = [];
      toArrayCandidates(value).forEach((item, index) => {
        const itemPath = joinPath(path, index);
        const coerced = coerceValue(item, type.items, itemPath, issues);
        if (coerced.ok) {
          items.push(coerced.value);
        } else {
          issues.push({ path: itemPath, code: 'coercion_failed', message: `${coerced.reason}; item dropped` });
        }
      });
      return { ok: true, value: items };
    }

    case 'union': {
      for (const alternative of type.alternatives) {
        if (alternative.kind === 'null') {
          continue;
        }
        const coerced = coerceValue(value, alternative, path, []);
        if (coerced.ok) {
          return coerced;
        }
      }
      if (type.alternatives.some((alternative) => alternative.kind === 'null') && value === 'null') {
        return { ok: true, value: null };
      }
      return fail(type, value);
    }

    case 'ref': {
      try {
        return coerceValue(value, type.resolve(), path, issues);
      } catch (error) {
        return { ok: false, reason: error instanceof Error ? error.message : String(error) };
      }
    }

    case 'object': {
      let candidate = value;
      if (typeof candidate === 'string') {
        const decoded = decodeJson(candidate);
        candidate = decoded.ok ? decoded.value : undefined;
      }
      if (!isPlainObject(candidate)) {
        return fail(type, value);
      }
      return { ok: true, value: repairObject(candidate, type.fields, path, issues) };
    }

    default: {
      const unknownType: never = type;
      return { ok: false, reason: `unsupported type ${JSON.stringify(unknownType)}` };
    }
  }
}
