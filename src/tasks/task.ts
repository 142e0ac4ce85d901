import { v4 as uuid } from 'uuid';
import { PROMPT_SLICES, fillSlice } from '../agents/prompts.js';
import { ValueError } from '../schema/errors.js';
import type { RecordSchema } from '../schema/types.js';
import type { TaskOutput } from './task-output.js';

export type TaskInputValue = string | number | boolean | Record<string, unknown> | unknown[];
export type TaskInputs = Record<string, TaskInputValue>;

export interface TaskConfig {
  name?: string;
  description: string;
  expectedOutput: string;
  // When set, the agent must submit its answer as an instance of this record
  outputSchema?: RecordSchema;
}

const PLACEHOLDER_RE = /\{([a-zA-Z_][a-zA-Z0-9_-]*)\}/g;

function renderInput(value: TaskInputValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Replace `{name}` placeholders with inputs. Braces that do not wrap a plain
 * identifier (JSON examples, for instance) are left alone.
 */
export function interpolateOnly(template: string, inputs: TaskInputs, label = 'template'): string {
  return template.replace(PLACEHOLDER_RE, (_match, key: string) => {
    if (!Object.prototype.hasOwnProperty.call(inputs, key)) {
      throw new ValueError(`missing required template variable '${key}' in ${label}`);
    }
    return renderInput(inputs[key]);
  });
}

export class Task {
  readonly id: string = uuid();
  readonly name?: string;
  description: string;
  expectedOutput: string;
  readonly outputSchema?: RecordSchema;
  output?: TaskOutput;

  // Templates as declared, so inputs can be interpolated again
  private readonly originalDescription: string;
  private readonly originalExpectedOutput: string;

  constructor(config: TaskConfig) {
    if (!config.description || config.description.trim().length === 0) {
      throw new ValueError('task requires a description');
    }
    if (!config.expectedOutput || config.expectedOutput.trim().length === 0) {
      throw new ValueError('task requires an expected output');
    }
    this.name = config.name;
    this.description = config.description;
    this.expectedOutput = config.expectedOutput;
    this.outputSchema = config.outputSchema;
    this.originalDescription = config.description;
    this.originalExpectedOutput = config.expectedOutput;
  }

  prompt(): string {
    return [
      this.description,
      fillSlice(PROMPT_SLICES.expectedOutput, { expected_output: this.expectedOutput }),
    ].join('\n');
  }

  interpolateInputs(inputs: TaskInputs): void {
    if (Object.keys(inputs).length === 0) {
      return;
    }
    this.description = interpolateOnly(this.originalDescription, inputs, 'description');
    this.expectedOutput = interpolateOnly(this.originalExpectedOutput, inputs, 'expected output');
  }
}
