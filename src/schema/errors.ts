/**
 * Errors raised by the schema bridge
 */

/** Construction-time misuse, e.g. a non-record passed where a record is required */
export class ValueError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValueError';
  }
}

/** The final wire schema violates its structural invariant */
export class SchemaConversionError extends Error {
  readonly schemaName: string;

  constructor(schemaName: string, message: string) {
    super(`schema conversion failed for ${schemaName}: ${message}`);
    this.name = 'SchemaConversionError';
    this.schemaName = schemaName;
  }
}

export type FieldIssueCode =
  | 'missing'
  | 'invalid_type'
  | 'invalid_enum'
  | 'invalid_json'
  | 'coercion_failed'
  | 'no_default';

export interface FieldIssue {
  // Dotted path, '$' for the payload itself
  path: string;
  code: FieldIssueCode;
  message: string;
}

export function formatFieldIssues(issues: readonly FieldIssue[]): string {
  return issues
    .map((issue) => (issue.path === '$' ? issue.message : `field '${issue.path}': ${issue.message}`))
    .join('; ');
}

/** Every parse attempt (or the single strict attempt) failed */
export class ToolParsingError extends Error {
  readonly schemaName: string;
  readonly issues: readonly FieldIssue[];

  constructor(schemaName: string, issues: readonly FieldIssue[], prefix = 'validation failed') {
    super(`${prefix} for ${schemaName}: ${formatFieldIssues(issues)}`);
    this.name = 'ToolParsingError';
    this.schemaName = schemaName;
    this.issues = issues;
  }
}
