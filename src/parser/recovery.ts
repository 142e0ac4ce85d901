/**
 * Recovery strategies for non-strict parsing, tried in order.
 * The first one that produces a valid instance wins.
 */

import { fieldDefault } from '../schema/defaults.js';
import type { FieldIssue } from '../schema/errors.js';
import type { RecordInstance, RecordSchema } from '../schema/types.js';
import { repairObject } from './coerce.js';
import { validateRecord } from './validate.js';

export interface RecoveryStrategy {
  readonly name: string;
  attempt(
    data: Record<string, unknown>,
    target: RecordSchema,
    diagnostics: FieldIssue[]
  ): RecordInstance | undefined;
}

function validated(
  candidate: Record<string, unknown>,
  target: RecordSchema,
  diagnostics: FieldIssue[]
): RecordInstance | undefined {
  const result = validateRecord(candidate, target);
  if (result.ok) {
    return result.value;
  }
  diagnostics.push(...result.issues);
  return undefined;
}

export const directValidation: RecoveryStrategy = {
  name: 'direct',
  attempt: (data, target, diagnostics) => validated(data, target, diagnostics),
};

export const fieldRepair: RecoveryStrategy = {
  name: 'field-repair',
  attempt: (data, target, diagnostics) =>
    validated(repairObject(data, target.fields, '', diagnostics, 'repair'), target, diagnostics),
};

export const safeSubset: RecoveryStrategy = {
  name: 'safe-subset',
  attempt: (data, target, diagnostics) =>
    validated(repairObject(data, target.fields, '', diagnostics, 'subset'), target, diagnostics),
};

export const minimalInstance: RecoveryStrategy = {
  name: 'minimal',
  attempt: (_data, target, diagnostics) => {
    const candidate: RecordInstance = {};
    for (const entry of target.fields) {
      if (!entry.required) {
        continue;
      }
      const fallback = fieldDefault(entry);
      if (!fallback.ok) {
        diagnostics.push({ path: entry.name, code: 'no_default', message: fallback.reason });
        return undefined;
      }
      candidate[entry.name] = fallback.value;
    }
    return validated(candidate, target, diagnostics);
  },
};

export const DEFAULT_RECOVERY_STRATEGIES: readonly RecoveryStrategy[] = [
  directValidation,
  fieldRepair,
  safeSubset,
  minimalInstance,
];
