export { StructuredParser, parseArguments, type ParseOptions } from './parser.js';
export {
  DEFAULT_RECOVERY_STRATEGIES,
  directValidation,
  fieldRepair,
  safeSubset,
  minimalInstance,
  type RecoveryStrategy,
} from './recovery.js';
export { coerceValue, repairObject, parseNumericString, parseBooleanToken, type CoercionResult } from './coerce.js';
export { validateRecord, validateValue, type ValidationResult } from './validate.js';
export { decodeJson, stripMarkdownCodeFence, extractJsonObject, type DecodeResult } from './json.js';
