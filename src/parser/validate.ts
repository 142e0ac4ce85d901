/**
 * Strict structural validation of a decoded payload against a type
 * descriptor. Produces a fresh value containing only declared fields.
 */

import type { FieldIssue } from '../schema/errors.js';
import { isPlainObject } from '../schema/types.js';
import type { FieldDescriptor, ObjectType, RecordInstance, TypeDescriptor } from '../schema/types.js';

export type ValueCheck = { ok: true; value: unknown } | { ok: false };

export type ValidationResult =
  | { ok: true; value: RecordInstance }
  | { ok: false; issues: FieldIssue[] };

export function expectedLabel(type: TypeDescriptor): string {
  switch (type.kind) {
    case 'enum':
      return `one of ${type.choices.map((choice) => JSON.stringify(choice)).join(', ')}`;
    case 'union':
      return type.alternatives.map(expectedLabel).join(' | ');
    case 'ref':
      return type.name;
    case 'object':
      return type.name ?? 'object';
    default:
      return type.kind;
  }
}

export function receivedLabel(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  return typeof value;
}

export function joinPath(path: string, segment: string | number): string {
  return path ? `${path}.${segment}` : String(segment);
}

export function acceptsNull(type: TypeDescriptor): boolean {
  if (type.kind === 'null') {
    return true;
  }
  return type.kind === 'union' && type.alternatives.some(acceptsNull);
}

/** Absent, or an explicit null on an optional field that does not accept null */
export function isAbsent(entry: FieldDescriptor, value: unknown): boolean {
  return value === undefined || (value === null && !entry.required && !acceptsNull(entry.type));
}

function invalidType(path: string, type: TypeDescriptor, value: unknown, issues: FieldIssue[]): ValueCheck {
  issues.push({
    path: path || '$',
    code: 'invalid_type',
    message: `expected ${expectedLabel(type)}, received ${receivedLabel(value)}`,
  });
  return { ok: false };
}

export function validateFields(
  data: Record<string, unknown>,
  fields: readonly FieldDescriptor[],
  path: string,
  issues: FieldIssue[]
): RecordInstance | undefined {
  const output: RecordInstance = {};
  let valid = true;

  for (const entry of fields) {
    const fieldPath = joinPath(path, entry.name);
    const raw = data[entry.name];

    if (isAbsent(entry, raw)) {
      if (entry.required) {
        issues.push({ path: fieldPath, code: 'missing', message: 'required field is missing' });
        valid = false;
      } else if (entry.default !== undefined) {
        output[entry.name] = structuredClone(entry.default);
      }
      continue;
    }

    const checked = validateValue(raw, entry.type, fieldPath, issues);
    if (checked.ok) {
      output[entry.name] = checked.value;
    } else {
      valid = false;
    }
  }

  return valid ? output : undefined;
}

export function validateValue(
  value: unknown,
  type: TypeDescriptor,
  path: string,
  issues: FieldIssue[]
): ValueCheck {
  switch (type.kind) {
    case 'string':
      return typeof value === 'string' ? { ok: true, value } : invalidType(path, type, value, issues);

    case 'integer':
      return typeof value === 'number' && Number.isInteger(value)
        ? { ok: true, value }
        : invalidType(path, type, value, issues);

    case 'number':
      return typeof value === 'number' && Number.isFinite(value)
        ? { ok: true, value }
        : invalidType(path, type, value, issues);

    case 'boolean':
      return typeof value === 'boolean' ? { ok: true, value } : invalidType(path, type, value, issues);

    case 'null':
      return value === null ? { ok: true, value } : invalidType(path, type, value, issues);

    case 'enum':
      if (typeof value === 'string' && type.choices.includes(value)) {
        return { ok: true, value };
      }
      issues.push({
        path: path || '$',
        code: 'invalid_enum',
        message: `expected ${expectedLabel(type)}, received ${JSON.stringify(value) ?? 'undefined'}`,
      });
      return { ok: false };

    case 'array': {
      if (!Array.isArray(value)) {
        return invalidType(path, type, value, issues);
      }
      const items: unknown[] = [];
      let valid = true;
      value.forEach((item, index) => {
        const checked = validateValue(item, type.items, joinPath(path, index), issues);
        if (checked.ok) {
          items.push(checked.value);
        } else {
          valid = false;
        }
      });
      return valid ? { ok: true, value: items } : { ok: false };
    }

    case 'union': {
      for (const alternative of type.alternatives) {
        const scratch: FieldIssue[] = [];
        const checked = validateValue(value, alternative, path, scratch);
        if (checked.ok) {
          return checked;
        }
      }
      return invalidType(path, type, value, issues);
    }

    case 'ref': {
      let target: TypeDescriptor;
      try {
        target = type.resolve();
      } catch (error) {
        issues.push({
          path: path || '$',
          code: 'invalid_type',
          message: `type ${type.name} cannot be resolved: ${error instanceof Error ? error.message : String(error)}`,
        });
        return { ok: false };
      }
      return validateValue(value, target, path, issues);
    }

    case 'object': {
      if (!isPlainObject(value)) {
        return invalidType(path, type, value, issues);
      }
      const output = validateFields(value, type.fields, path, issues);
      return output ? { ok: true, value: output } : { ok: false };
    }

    default: {
      const unknownType: never = type;
      issues.push({ path: path || '$', code: 'invalid_type', message: `unsupported type ${JSON.stringify(unknownType)}` });
      return { ok: false };
    }
  }
}

export function validateRecord(data: unknown, schema: ObjectType): ValidationResult {
  const issues: FieldIssue[] = [];
  const checked = validateValue(data, schema, '', issues);
  if (checked.ok && isPlainObject(checked.value)) {
    return { ok: true, value: checked.value };
  }
  return { ok: false, issues };
}
