/**
 * Base Tool
 *
 * Binds a name, a description and an argument schema to an invocable
 * capability. The schema is either given as a record or derived once, at
 * construction, from a declared parameter list.
 */

import { field, record } from '../schema/builders.js';
import { describeRecord } from '../schema/describe.js';
import { ValueError } from '../schema/errors.js';
import type { RecordInstance, RecordSchema, SchemaDescription, TypeDescriptor } from '../schema/types.js';
import { StructuredParser } from '../parser/parser.js';
import type { ToolDescriptor } from './types.js';

/** One declared parameter of a capability */
export interface ToolParameter {
  name: string;
  type: TypeDescriptor;
  description?: string;
  // A parameter with a default is optional
  default?: unknown;
  optional?: boolean;
}

export interface BaseToolConfig {
  name: string;
  description: string;
  argumentSchema?: RecordSchema;
  parameters?: readonly ToolParameter[];
  // Append the per-argument summary to the description (default: true)
  augmentDescription?: boolean;
  maxDepth?: number;
}

function pascalCase(name: string): string {
  return name
    .split(/[^a-zA-Z0-9]+/)
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join('');
}

/**
 * Build the argument record for a parameter list.
 */
export function schemaFromParameters(toolName: string, parameters: readonly ToolParameter[]): RecordSchema {
  const fields = parameters.map((param) =>
    field(param.name, param.type, {
      required: param.default === undefined && !param.optional,
      description: param.description ?? `Parameter ${param.name} for tool ${toolName}`,
      default: param.default,
    })
  );
  return record(`${pascalCase(toolName) || 'Tool'}Arguments`, fields);
}

function argumentLines(schema: RecordSchema, description: SchemaDescription): string[] {
  return schema.fields.map((entry) => {
    const property = description.properties?.[entry.name];
    const type = property?.enum ? property.enum.map((choice) => JSON.stringify(choice)).join(' | ') : property?.type ?? 'string';
    const detail = property?.description ? ` - ${property.description}` : '';
    return `- ${entry.name}: ${type} (${entry.required ? 'required' : 'optional'})${detail}`;
  });
}

export abstract class BaseTool {
  readonly name: string;
  description: string;
  argumentSchema: RecordSchema;

  private baseDescription: string;
  private augment: boolean;
  private maxDepth?: number;
  private parser: StructuredParser;
  private descriptor: ToolDescriptor;

  constructor(config: BaseToolConfig) {
    if (!config.name || config.name.trim().length === 0) {
      throw new ValueError('tool requires a name');
    }
    if (!config.description || config.description.trim().length === 0) {
      throw new ValueError(`tool ${config.name} requires a description`);
    }
    if (config.argumentSchema && config.parameters) {
      throw new ValueError(`tool ${config.name} takes either an argument schema or a parameter list, not both`);
    }

    let schema: RecordSchema;
    if (config.argumentSchema) {
      schema = config.argumentSchema;
    } else if (config.parameters) {
      schema = schemaFromParameters(config.name, config.parameters);
    } else {
      throw new ValueError(`tool ${config.name} requires an argument schema or a parameter list`);
    }

    this.name = config.name;
    this.baseDescription = config.description;
    this.augment = config.augmentDescription ?? true;
    this.maxDepth = config.maxDepth;
    this.argumentSchema = schema;
    this.parser = new StructuredParser(schema);
    this.descriptor = this.buildDescriptor();
    this.description = this.descriptor.description;
  }

  /**
   * Run the capability with validated, name-bound arguments.
   * Failures propagate to the caller unchanged.
   */
  abstract execute(args: RecordInstance): Promise<unknown>;

  describe(): ToolDescriptor {
    return this.descriptor;
  }

  /** Non-strict parse of untrusted arguments against the argument schema */
  parseArguments(raw: unknown): RecordInstance {
    return this.parser.parse(raw);
  }

  async invoke(raw: unknown): Promise<unknown> {
    return this.execute(this.parseArguments(raw));
  }

  replaceArgumentSchema(schema: RecordSchema): void {
    this.parser = new StructuredParser(schema);
    this.argumentSchema = schema;
    this.descriptor = this.buildDescriptor();
    this.description = this.descriptor.description;
  }

  private buildDescriptor(): ToolDescriptor {
    const argumentSchema = describeRecord(this.argumentSchema, { maxDepth: this.maxDepth });
    let description = this.baseDescription;
    if (this.augment && this.argumentSchema.fields.length > 0) {
      description = `${description}\n\nArguments:\n${argumentLines(this.argumentSchema, argumentSchema).join('\n')}`;
    }
    return { name: this.name, description, argumentSchema };
  }
}
