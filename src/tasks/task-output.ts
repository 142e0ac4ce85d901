import { v4 as uuid } from 'uuid';
import type { RecordInstance } from '../schema/types.js';

export type OutputFormat = 'raw' | 'structured';

export interface TaskOutputInit {
  description: string;
  name?: string;
  expectedOutput?: string;
  raw?: string;
  structured?: RecordInstance;
  agent: string;
}

/** Result of one task execution */
export class TaskOutput {
  readonly id: string = uuid();
  readonly description: string;
  readonly name?: string;
  readonly expectedOutput?: string;
  readonly raw: string;
  readonly structured?: RecordInstance;
  readonly agent: string;
  readonly outputFormat: OutputFormat;

  constructor(init: TaskOutputInit) {
    this.description = init.description;
    this.name = init.name;
    this.expectedOutput = init.expectedOutput;
    this.raw = init.raw ?? '';
    this.structured = init.structured;
    this.agent = init.agent;
    this.outputFormat = init.structured ? 'structured' : 'raw';
  }

  toDict(): RecordInstance {
    return this.structured ? { ...this.structured } : {};
  }

  toString(): string {
    return this.structured ? JSON.stringify(this.structured) : this.raw;
  }
}
