/**
 * Kind-appropriate default values, used by the parser to fill fields that
 * are missing or cannot be repaired.
 */

import type { FieldDescriptor, RecordInstance, TypeDescriptor } from './types.js';

const MAX_DEFAULT_DEPTH = 10;

export type DefaultResult = { ok: true; value: unknown } | { ok: false; reason: string };

function minimalObject(
  fields: readonly FieldDescriptor[],
  resolving: Set<string>,
  depth: number
): RecordInstance {
  const instance: RecordInstance = {};
  for (const entry of fields) {
    if (!entry.required) {
      continue;
    }
    const result = fieldDefaultNode(entry, resolving, depth + 1);
    if (!result.ok) {
      // Nested required chain has no finite default
      return {};
    }
    instance[entry.name] = result.value;
  }
  return instance;
}

function fieldDefaultNode(entry: FieldDescriptor, resolving: Set<string>, depth: number): DefaultResult {
  if (entry.default !== undefined) {
    return { ok: true, value: structuredClone(entry.default) };
  }
  return defaultNode(entry.type, resolving, depth);
}

function defaultNode(type: TypeDescriptor, resolving: Set<string>, depth: number): DefaultResult {
  switch (type.kind) {
    case 'string':
      return { ok: true, value: '' };
    case 'integer':
    case 'number':
      return { ok: true, value: 0 };
    case 'boolean':
      return { ok: true, value: false };
    case 'null':
      return { ok: true, value: null };
    case 'array':
      return { ok: true, value: [] };
    case 'enum':
      return type.choices.length > 0
        ? { ok: true, value: type.choices[0] }
        : { ok: false, reason: 'enum has no choices' };
    case 'union': {
      if (type.alternatives.some((alternative) => alternative.kind === 'null')) {
        return { ok: true, value: null };
      }
      const first = type.alternatives[0];
      return first ? defaultNode(first, resolving, depth) : { ok: false, reason: 'union has no alternatives' };
    }
    case 'ref': {
      if (resolving.has(type.name)) {
        return { ok: false, reason: `circular reference: ${type.name}` };
      }
      resolving.add(type.name);
      try {
        return defaultNode(type.resolve(), resolving, depth);
      } catch (error) {
        return { ok: false, reason: error instanceof Error ? error.message : String(error) };
      } finally {
        resolving.delete(type.name);
      }
    }
    case 'object': {
      if (depth > MAX_DEFAULT_DEPTH || (type.name && resolving.has(`object:${type.name}`))) {
        return { ok: true, value: {} };
      }
      const key = type.name ? `object:${type.name}` : undefined;
      if (key) {
        resolving.add(key);
      }
      try {
        return { ok: true, value: minimalObject(type.fields, resolving, depth) };
      } finally {
        if (key) {
          resolving.delete(key);
        }
      }
    }
    default: {
      const unknownType: never = type;
      return { ok: false, reason: `unsupported type descriptor: ${JSON.stringify(unknownType)}` };
    }
  }
}

export function defaultFor(type: TypeDescriptor): DefaultResult {
  return defaultNode(type, new Set(), 0);
}

export function fieldDefault(entry: FieldDescriptor): DefaultResult {
  return fieldDefaultNode(entry, new Set(), 0);
}
