/**
 * Resilient Structured Parser
 *
 * Turns untrusted tool-call arguments (JSON text or an already decoded map)
 * into a validated record instance. Strict mode validates once; non-strict
 * mode walks the recovery strategies until one yields a valid instance.
 */

import { ToolParsingError, ValueError } from '../schema/errors.js';
import type { FieldIssue } from '../schema/errors.js';
import { isPlainObject, isRecordSchema } from '../schema/types.js';
import type { RecordInstance, RecordSchema } from '../schema/types.js';
import { decodeJson } from './json.js';
import { DEFAULT_RECOVERY_STRATEGIES } from './recovery.js';
import type { RecoveryStrategy } from './recovery.js';
import { validateRecord } from './validate.js';

export interface ParseOptions {
  strict?: boolean;
}

function dedupe(issues: readonly FieldIssue[]): FieldIssue[] {
  const seen = new Set<string>();
  return issues.filter((issue) => {
    const key = `${issue.path}|${issue.code}|${issue.message}`;
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}

export class StructuredParser {
  readonly schema: RecordSchema;
  private strategies: readonly RecoveryStrategy[];

  constructor(schema: RecordSchema, strategies: readonly RecoveryStrategy[] = DEFAULT_RECOVERY_STRATEGIES) {
    if (!isRecordSchema(schema)) {
      throw new ValueError(`parser target must be a record schema, received ${typeof schema}`);
    }
    this.schema = schema;
    this.strategies = strategies;
  }

  parse(raw: unknown, options: ParseOptions = {}): RecordInstance {
    const strict = options.strict ?? false;
    const diagnostics: FieldIssue[] = [];
    const data = this.normalize(raw, strict, diagnostics);

    if (strict) {
      const result = validateRecord(data, this.schema);
      if (!result.ok) {
        throw new ToolParsingError(this.schema.name, result.issues);
      }
      return result.value;
    }

    for (const [index, strategy] of this.strategies.entries()) {
      const instance = strategy.attempt(data, this.schema, diagnostics);
      if (instance) {
        if (index > 0) {
          console.warn(`[StructuredParser] ${this.schema.name} recovered via ${strategy.name} (${diagnostics.length} issue(s))`);
        }
        return instance;
      }
    }

    throw new ToolParsingError(this.schema.name, dedupe(diagnostics), 'all recovery strategies failed');
  }

  /**
   * Parse several raw tool calls shaped either `{ function: { arguments } }`
   * or `{ arguments }`. Entries that cannot be parsed are logged and skipped.
   */
  parseMany(toolCalls: readonly unknown[]): RecordInstance[] {
    const results: RecordInstance[] = [];

    toolCalls.forEach((call, index) => {
      if (!isPlainObject(call)) {
        console.warn(`[StructuredParser] Tool call ${index} is not an object (${typeof call})`);
        return;
      }

      let args: unknown;
      if (isPlainObject(call.function) && 'arguments' in call.function) {
        args = call.function.arguments;
      } else if ('arguments' in call) {
        args = call.arguments;
      } else {
        console.warn(`[StructuredParser] Unrecognized tool call shape at index ${index}`);
        return;
      }

      try {
        results.push(this.parse(args));
      } catch (error) {
        console.error(`[StructuredParser] Failed to parse tool call ${index}:`, error);
      }
    });

    return results;
  }

  private normalize(raw: unknown, strict: boolean, diagnostics: FieldIssue[]): Record<string, unknown> {
    let value = raw;

    if (typeof raw === 'string') {
      const decoded = decodeJson(raw);
      if (!decoded.ok) {
        const issue: FieldIssue = {
          path: '$',
          code: 'invalid_json',
          message: `arguments are not valid JSON: ${decoded.error}`,
        };
        if (strict) {
          throw new ToolParsingError(this.schema.name, [issue], 'invalid arguments');
        }
        diagnostics.push(issue);
        return {};
      }
      value = decoded.value;
    }

    if (isPlainObject(value)) {
      return value;
    }

    const issue: FieldIssue = {
      path: '$',
      code: 'invalid_json',
      message: `arguments must be a JSON object, received ${value === null ? 'null' : Array.isArray(value) ? 'array' : typeof value}`,
    };
    if (strict) {
      throw new ToolParsingError(this.schema.name, [issue], 'invalid arguments');
    }
    diagnostics.push(issue);
    return {};
  }
}

/** One-shot parse against `target` */
export function parseArguments(raw: unknown, target: RecordSchema, options: ParseOptions = {}): RecordInstance {
  return new StructuredParser(target).parse(raw, options);
}
