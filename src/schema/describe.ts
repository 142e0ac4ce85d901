/**
 * Schema Description Engine
 *
 * Converts type descriptors into the inlined wire schema understood by
 * tool-calling models. Self-referential and arbitrarily deep types are cut
 * off by a per-call guard (names being resolved + depth bound) that is
 * threaded through the recursion, never shared between calls.
 */

import { SchemaConversionError, ValueError } from './errors.js';
import { isRecordSchema } from './types.js';
import type { ObjectType, RecordSchema, SchemaDescription, TypeDescriptor } from './types.js';

export const DEFAULT_MAX_DEPTH = 10;

export interface DescribeOptions {
  maxDepth?: number;
}

interface DescribeContext {
  readonly resolving: Set<string>;
  readonly maxDepth: number;
  // Placeholders produced by the guard, so field descriptions can keep the diagnostic
  readonly degraded: WeakSet<SchemaDescription>;
}

function createContext(options: DescribeOptions): DescribeContext {
  return {
    resolving: new Set(),
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    degraded: new WeakSet(),
  };
}

function placeholder(
  ctx: DescribeContext,
  type: 'object' | 'string',
  description: string
): SchemaDescription {
  const schema: SchemaDescription = { type, description };
  ctx.degraded.add(schema);
  return schema;
}

function withDescription(schema: SchemaDescription, description?: string): SchemaDescription {
  return description ? { ...schema, description } : schema;
}

function refKey(name: string): string {
  return `ref:${name}`;
}

function describeObject(
  type: ObjectType,
  ctx: DescribeContext,
  depth: number,
  path: string
): SchemaDescription {
  if (type.name && ctx.resolving.has(type.name)) {
    return placeholder(ctx, 'object', `circular reference: ${type.name}`);
  }
  if (depth > ctx.maxDepth) {
    return placeholder(ctx, 'object', `max depth ${ctx.maxDepth} exceeded`);
  }

  if (type.name) {
    ctx.resolving.add(type.name);
  }
  try {
    const properties: Record<string, SchemaDescription> = {};
    const required: string[] = [];

    for (const entry of type.fields) {
      const fieldPath = path ? `${path}.${entry.name}` : entry.name;
      let schema: SchemaDescription;
      try {
        schema = describeNode(entry.type, ctx, depth + 1, fieldPath);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        console.warn(`[SchemaDescriber] Field '${fieldPath}' degraded to string: ${reason}`);
        schema = placeholder(ctx, 'string', `unresolved field ${fieldPath}: ${reason}`);
      }

      if (entry.description) {
        schema = ctx.degraded.has(schema)
          ? { ...schema, description: `${entry.description} (${schema.description ?? 'degraded'})` }
          : { ...schema, description: entry.description };
      }

      properties[entry.name] = schema;
      if (entry.required) {
        required.push(entry.name);
      }
    }

    const result: SchemaDescription = { type: 'object', properties };
    if (required.length > 0) {
      result.required = required;
    }
    return withDescription(result, type.description);
  } finally {
    if (type.name) {
      ctx.resolving.delete(type.name);
    }
  }
}

function describeNode(
  type: TypeDescriptor,
  ctx: DescribeContext,
  depth: number,
  path: string
): SchemaDescription {
  switch (type.kind) {
    case 'string':
    case 'integer':
    case 'number':
    case 'boolean':
      return withDescription({ type: type.kind }, type.description);

    case 'null':
      return placeholder(ctx, 'string', type.description ?? 'null value');

    case 'enum':
      return withDescription({ type: 'string', enum: [...type.choices] }, type.description);

    case 'array': {
      if (depth > ctx.maxDepth) {
        return placeholder(ctx, 'object', `max depth ${ctx.maxDepth} exceeded`);
      }
      const items = describeNode(type.items, ctx, depth + 1, `${path}[]`);
      return withDescription({ type: 'array', items }, type.description);
    }

    case 'union': {
      // Lossy: only the first non-null alternative survives
      const alternative = type.alternatives.find((candidate) => candidate.kind !== 'null');
      if (!alternative) {
        return placeholder(ctx, 'string', type.description ?? 'null-only union');
      }
      return withDescription(describeNode(alternative, ctx, depth, path), type.description);
    }

    case 'ref': {
      if (ctx.resolving.has(type.name) || ctx.resolving.has(refKey(type.name))) {
        return placeholder(ctx, 'object', `circular reference: ${type.name}`);
      }
      ctx.resolving.add(refKey(type.name));
      try {
        return withDescription(describeNode(type.resolve(), ctx, depth, path), type.description);
      } finally {
        ctx.resolving.delete(refKey(type.name));
      }
    }

    case 'object':
      return describeObject(type, ctx, depth, path);

    default: {
      const unknownType: never = type;
      throw new Error(`unsupported type descriptor: ${JSON.stringify(unknownType)}`);
    }
  }
}

/**
 * Describe any type descriptor. Always terminates; defects below the top
 * level degrade to placeholders.
 */
export function describeType(type: TypeDescriptor, options: DescribeOptions = {}): SchemaDescription {
  return describeNode(type, createContext(options), 0, '');
}

/**
 * Describe a record schema as tool arguments (`type: "object"` at the top).
 */
export function describeRecord(schema: RecordSchema, options: DescribeOptions = {}): SchemaDescription {
  if (!isRecordSchema(schema)) {
    throw new ValueError(`expected a record schema, received ${typeof schema}`);
  }

  const result = describeNode(schema, createContext(options), 0, '');
  if (result.type !== 'object' || !result.properties) {
    throw new SchemaConversionError(schema.name, 'top-level schema must be an object with properties');
  }
  return result;
}
