/**
 * Builders for type descriptors and record schemas.
 *
 * Example:
 *   const Node: RecordSchema = record('Node', [
 *     field('name', t.string()),
 *     field('child', t.nullable(t.ref('Node', () => Node)), { required: false }),
 *   ]);
 */

import { ValueError } from './errors.js';
import type {
  ArrayType,
  BooleanType,
  EnumType,
  FieldDescriptor,
  IntegerType,
  NullType,
  NumberType,
  ObjectType,
  RecordSchema,
  RefType,
  StringType,
  TypeDescriptor,
  UnionType,
} from './types.js';

function described<T extends { description?: string }>(base: T, description?: string): T {
  return description ? { ...base, description } : base;
}

function assertUniqueFields(owner: string, fields: readonly FieldDescriptor[]): void {
  const seen = new Set<string>();
  for (const entry of fields) {
    if (!entry.name || entry.name.trim().length === 0) {
      throw new ValueError(`${owner} has a field without a name`);
    }
    if (seen.has(entry.name)) {
      throw new ValueError(`${owner} declares field '${entry.name}' more than once`);
    }
    seen.add(entry.name);
  }
}

export const t = {
  string(description?: string): StringType {
    return described<StringType>({ kind: 'string' }, description);
  },

  integer(description?: string): IntegerType {
    return described<IntegerType>({ kind: 'integer' }, description);
  },

  number(description?: string): NumberType {
    return described<NumberType>({ kind: 'number' }, description);
  },

  boolean(description?: string): BooleanType {
    return described<BooleanType>({ kind: 'boolean' }, description);
  },

  null(): NullType {
    return { kind: 'null' };
  },

  array(items: TypeDescriptor, description?: string): ArrayType {
    return described<ArrayType>({ kind: 'array', items }, description);
  },

  enumOf(choices: readonly string[], description?: string): EnumType {
    return described<EnumType>({ kind: 'enum', choices: [...choices] }, description);
  },

  union(alternatives: readonly TypeDescriptor[], description?: string): UnionType {
    return described<UnionType>({ kind: 'union', alternatives: [...alternatives] }, description);
  },

  nullable(type: TypeDescriptor, description?: string): UnionType {
    return described<UnionType>({ kind: 'union', alternatives: [type, { kind: 'null' }] }, description);
  },

  /** Anonymous nested object */
  object(fields: readonly FieldDescriptor[], description?: string): ObjectType {
    assertUniqueFields('object', fields);
    return described<ObjectType>({ kind: 'object', fields: [...fields] }, description);
  },

  ref(name: string, resolve: () => TypeDescriptor): RefType {
    return { kind: 'ref', name, resolve };
  },
};

export interface FieldOptions {
  required?: boolean;
  description?: string;
  default?: unknown;
}

/**
 * Declare a field. Fields are required unless they carry a default
 * or `required: false` is given.
 */
export function field(name: string, type: TypeDescriptor, options: FieldOptions = {}): FieldDescriptor {
  const hasDefault = options.default !== undefined;
  const entry: FieldDescriptor = {
    name,
    type,
    required: options.required ?? !hasDefault,
  };
  if (options.description) {
    entry.description = options.description;
  }
  if (hasDefault) {
    entry.default = options.default;
  }
  return entry;
}

export function record(name: string, fields: readonly FieldDescriptor[], description?: string): RecordSchema {
  if (!name || name.trim().length === 0) {
    throw new ValueError('record schema requires a name');
  }
  assertUniqueFields(`record ${name}`, fields);
  const schema: RecordSchema = { kind: 'object', name, fields: [...fields] };
  if (description) {
    schema.description = description;
  }
  return schema;
}
