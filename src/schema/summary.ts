/**
 * Human-readable type summary of a record, embedded in prompts that ask the
 * model for a structured answer.
 */

import type { ObjectType, RecordSchema, TypeDescriptor } from './types.js';

function renderType(type: TypeDescriptor, resolving: Set<string>, indent: number): string {
  switch (type.kind) {
    case 'string':
    case 'integer':
    case 'number':
    case 'boolean':
    case 'null':
      return type.kind;
    case 'enum':
      return type.choices.map((choice) => JSON.stringify(choice)).join(' | ');
    case 'array':
      return `Array<${renderType(type.items, resolving, indent)}>`;
    case 'union':
      return type.alternatives.map((alternative) => renderType(alternative, resolving, indent)).join(' | ');
    case 'ref': {
      if (resolving.has(type.name)) {
        return type.name;
      }
      try {
        return renderType(type.resolve(), resolving, indent);
      } catch {
        return type.name;
      }
    }
    case 'object':
      return renderObject(type, resolving, indent);
    default: {
      const unknownType: never = type;
      return String(unknownType);
    }
  }
}

function renderObject(type: ObjectType, resolving: Set<string>, indent: number): string {
  if (type.name && resolving.has(type.name)) {
    return type.name;
  }
  if (type.fields.length === 0) {
    return '{}';
  }

  if (type.name) {
    resolving.add(type.name);
  }
  try {
    const pad = '  '.repeat(indent + 1);
    const lines = type.fields.map((entry) => {
      const optional = entry.required ? '' : ' (optional)';
      return `${pad}"${entry.name}": ${renderType(entry.type, resolving, indent + 1)}${optional}`;
    });
    return `{\n${lines.join(',\n')}\n${'  '.repeat(indent)}}`;
  } finally {
    if (type.name) {
      resolving.delete(type.name);
    }
  }
}

export function renderRecordSummary(schema: RecordSchema): string {
  return renderObject(schema, new Set(), 0);
}
