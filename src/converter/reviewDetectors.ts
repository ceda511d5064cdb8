import type { ObjectType, Severity } from '../types/sql';

export type ReviewIssueType =
  | 'UPDATE_FROM_syntax'
  | 'LATERAL_FLATTEN'
  | 'QUALIFY_clause'
  | 'Dynamic_SQL'
  | 'External_language'
  | 'Complex_data_types'
  | 'Row_access_policy_removed'
  | 'Masking_policy_removed';

export interface ReviewIssue {
  issueType: ReviewIssueType;
  severity: Severity;
  description: string;
  suggestedAction: string;
}

export const REVIEW_ISSUES: Record<ReviewIssueType, ReviewIssue> = {
  UPDATE_FROM_syntax: {
    issueType: 'UPDATE_FROM_syntax',
    severity: 'ERROR',
    description: 'UPDATE ... FROM join syntax has no direct equivalent in the target dialect',
    suggestedAction: 'Rewrite as a MERGE statement or an UPDATE with a correlated subquery'
  },
  LATERAL_FLATTEN: {
    issueType: 'LATERAL_FLATTEN',
    severity: 'WARNING',
    description: 'LATERAL FLATTEN unnests semi-structured data',
    suggestedAction: 'Rewrite with JSON_TABLE or an equivalent unnesting construct'
  },
  QUALIFY_clause: {
    issueType: 'QUALIFY_clause',
    severity: 'WARNING',
    description: 'QUALIFY filters on window function results',
    suggestedAction: 'Move the window function into a subquery and filter it with WHERE'
  },
  Dynamic_SQL: {
    issueType: 'Dynamic_SQL',
    severity: 'WARNING',
    description: 'Dynamic SQL is built at run time and cannot be converted statically',
    suggestedAction: 'Check that the generated SQL text is valid for the target dialect'
  },
  External_language: {
    issueType: 'External_language',
    severity: 'ERROR',
    description: 'Routine body is written in an external language',
    suggestedAction: "Reimplement the routine in the target's procedural language"
  },
  Complex_data_types: {
    issueType: 'Complex_data_types',
    severity: 'INFO',
    description: 'Column uses a semi-structured or spatial type',
    suggestedAction: 'Confirm the mapped target type preserves the stored values, e.g. JSON text in a CLOB'
  },
  Row_access_policy_removed: {
    issueType: 'Row_access_policy_removed',
    severity: 'WARNING',
    description: 'Row access policy was removed from the table definition',
    suggestedAction: 'Re-create the row-level security rule with the target database features'
  },
  Masking_policy_removed: {
    issueType: 'Masking_policy_removed',
    severity: 'WARNING',
    description: 'Column masking policy was removed from the table definition',
    suggestedAction: 'Re-create the masking rule with the target database features, e.g. Oracle Data Redaction'
  }
};

const STATEMENT_PATTERNS: Array<{ issue: ReviewIssue; pattern: RegExp }> = [
  { issue: REVIEW_ISSUES.UPDATE_FROM_syntax, pattern: /\bUPDATE\s+[\w".]+(?:\s+(?:AS\s+)?\w+)?\s+SET\b[\s\S]*?\bFROM\b/i },
  { issue: REVIEW_ISSUES.LATERAL_FLATTEN, pattern: /\bLATERAL\s+FLATTEN\s*\(/i },
  { issue: REVIEW_ISSUES.QUALIFY_clause, pattern: /\bQUALIFY\b/i },
  { issue: REVIEW_ISSUES.Dynamic_SQL, pattern: /\bEXECUTE\s+IMMEDIATE\b/i },
  { issue: REVIEW_ISSUES.External_language, pattern: /\bLANGUAGE\s+(?:JAVASCRIPT|PYTHON|JAVA|SCALA)\b/i }
];

/** Issues whose pattern appears in the statement text; pass text with comments already removed. */
export function detectStatementIssues(sql: string): ReviewIssue[] {
  return STATEMENT_PATTERNS.filter(({ pattern }) => pattern.test(sql)).map(({ issue }) => issue);
}

const CREATED_OBJECT =
  /^\s*CREATE\s+(?:OR\s+REPLACE\s+)?(?:(?:SECURE|TEMPORARY|TEMP|TRANSIENT|GLOBAL|LOCAL)\s+)*(TABLE|VIEW|FUNCTION|PROCEDURE|SEQUENCE|PACKAGE)\s+(?:IF\s+NOT\s+EXISTS\s+)?([\w".$]+)/i;

/** Name and type of the object a CREATE statement defines, or null for other statements. */
export function describeCreatedObject(sql: string): { name: string; type: ObjectType } | null {
  const match = sql.match(CREATED_OBJECT);
  if (!match) return null;
  const type = match[1].toUpperCase();
  const objectType: ObjectType =
    type === 'TABLE' || type === 'VIEW' || type === 'FUNCTION' || type === 'PROCEDURE' || type === 'SEQUENCE' || type === 'PACKAGE'
      ? type
      : 'UNKNOWN';
  return { name: match[2].replace(/"/g, ''), type: objectType };
}
