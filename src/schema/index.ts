export * from './types.js';
export * from './errors.js';
export { t, field, record, type FieldOptions } from './builders.js';
export { describeRecord, describeType, DEFAULT_MAX_DEPTH, type DescribeOptions } from './describe.js';
export { defaultFor, fieldDefault, type DefaultResult } from './defaults.js';
export { renderRecordSummary } from './summary.js';
