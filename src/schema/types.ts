/**
 * Type Descriptor Model
 *
 * In-memory description of record and field types. Descriptors are plain
 * tagged variants so the describe/parse/default functions can switch on
 * `kind` without depending on any validation library.
 */

export type TypeKind =
  | 'string'
  | 'integer'
  | 'number'
  | 'boolean'
  | 'object'
  | 'array'
  | 'enum'
  | 'union'
  | 'null'
  | 'ref';

interface TypeBase {
  description?: string;
}

export interface StringType extends TypeBase {
  kind: 'string';
}

export interface IntegerType extends TypeBase {
  kind: 'integer';
}

export interface NumberType extends TypeBase {
  kind: 'number';
}

export interface BooleanType extends TypeBase {
  kind: 'boolean';
}

// Alternative used inside unions to mark a value as nullable
export interface NullType extends TypeBase {
  kind: 'null';
}

export interface FieldDescriptor {
  name: string;
  type: TypeDescriptor;
  required: boolean;
  description?: string;
  // Declared default; takes precedence over the kind default
  default?: unknown;
}

export interface ObjectType extends TypeBase {
  kind: 'object';
  // Named objects take part in cycle detection
  name?: string;
  fields: readonly FieldDescriptor[];
}

export interface ArrayType extends TypeBase {
  kind: 'array';
  items: TypeDescriptor;
}

export interface EnumType extends TypeBase {
  kind: 'enum';
  choices: readonly string[];
}

export interface UnionType extends TypeBase {
  kind: 'union';
  alternatives: readonly TypeDescriptor[];
}

/**
 * Lazily resolved, named reference. This is how a type refers to itself
 * (or to a type declared later) without an infinite literal.
 */
export interface RefType extends TypeBase {
  kind: 'ref';
  name: string;
  resolve: () => TypeDescriptor;
}

export type TypeDescriptor =
  | StringType
  | IntegerType
  | NumberType
  | BooleanType
  | NullType
  | ObjectType
  | ArrayType
  | EnumType
  | UnionType
  | RefType;

/** A named object type used as a tool's argument contract */
export interface RecordSchema extends ObjectType {
  name: string;
}

export type SchemaType = 'object' | 'array' | 'string' | 'integer' | 'number' | 'boolean';

/** Wire-level schema consumed by tool-calling models */
export interface SchemaDescription {
  type: SchemaType;
  properties?: Record<string, SchemaDescription>;
  required?: string[];
  items?: SchemaDescription;
  enum?: string[];
  description?: string;
}

/** A parsed, validated record instance */
export type RecordInstance = Record<string, unknown>;

export function isRecordSchema(value: unknown): value is RecordSchema {
  if (!isPlainObject(value)) {
    return false;
  }
  return (
    value.kind === 'object' &&
    typeof value.name === 'string' &&
    value.name.length > 0 &&
    Array.isArray(value.fields)
  );
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
