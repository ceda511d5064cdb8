import type { AST } from 'node-sql-parser';

export interface Identifier {
  name: string;
  quoted: boolean;
}

export interface QualifiedName {
  parts: Identifier[];
}

export interface DataType {
  kind: 'data_type';
  // Upper-cased, possibly multi-word: `TIMESTAMP WITH LOCAL TIME ZONE`
  name: string;
  args: string[];
}

export interface IdentityOptions {
  always: boolean;
  start?: string;
  increment?: string;
}

export type ColumnConstraintBody =
  | { kind: 'not_null' }
  | { kind: 'null' }
  | { kind: 'default'; expression: string }
  | { kind: 'primary_key' }
  | { kind: 'unique' }
  | { kind: 'references'; table: QualifiedName; columns: Identifier[] }
  | { kind: 'check'; expression: string }
  | { kind: 'comment'; text: string }
  | { kind: 'collate'; collation: string }
  | { kind: 'computed'; expression: string; syntax: 'as' | 'generated'; storage?: 'VIRTUAL' | 'STORED' }
  | ({ kind: 'identity' } & IdentityOptions)
  | { kind: 'extension'; withKeyword: boolean; property: ExtensionProperty };

export interface ColumnConstraint {
  name?: Identifier;
  body: ColumnConstraintBody;
}

export interface ColumnDefinition {
  kind: 'column';
  name: Identifier;
  dataType?: DataType;
  constraints: ColumnConstraint[];
}

export type TableConstraintBody =
  | { kind: 'primary_key'; columns: Identifier[] }
  | { kind: 'unique'; columns: Identifier[] }
  | { kind: 'foreign_key'; columns: Identifier[]; table: QualifiedName; referencedColumns: Identifier[] }
  | { kind: 'check'; expression: string };

export interface TableConstraint {
  kind: 'table_constraint';
  name?: Identifier;
  body: TableConstraintBody;
  options: string[];
}

export type TableElement = ColumnDefinition | TableConstraint;

export interface TableClause {
  kind: 'cluster_by' | 'partition_by';
  expressions: string[];
}

export interface RowAccessPolicyProperty {
  kind: 'row_access_policy';
  policy: QualifiedName;
  columns: Identifier[];
}

export interface TagProperty {
  kind: 'tags';
  tags: Array<{ key: QualifiedName; value: string }>;
}

export interface MaskingPolicyProperty {
  kind: 'masking_policy';
  policy: QualifiedName;
  // Extra columns passed to a conditional masking policy
  using: Identifier[];
}

export type ExtensionProperty = RowAccessPolicyProperty | TagProperty | MaskingPolicyProperty;

export type TablePropertyBody =
  | { kind: 'comment'; text: string }
  | { kind: 'key_value'; key: string; value: string }
  | { kind: 'flag'; keyword: string }
  | ExtensionProperty;

export interface TableProperty {
  withKeyword: boolean;
  body: TablePropertyBody;
}

export interface CreateTableStatement {
  kind: 'create_table';
  replace: boolean;
  modifiers: string[];
  ifNotExists: boolean;
  name: QualifiedName;
  elements: TableElement[];
  clauses: TableClause[];
  properties: TableProperty[] | null;
  asQuery?: string;
}

export interface GenericStatement {
  kind: 'generic';
  statementType: string;
  ast: AST;
}

export interface OpaqueStatement {
  kind: 'opaque';
  reason: string;
}

export type StatementNode = CreateTableStatement | GenericStatement | OpaqueStatement;

export interface ParsedStatement {
  node: StatementNode;
  // Source text of the statement, without the terminator and without leading comments
  text: string;
  // Same text with every comment removed and whitespace collapsed
  textWithoutComments: string;
  leadingComments: string[];
  span: { start: number; end: number };
  lineNumber: number;
}

export function isColumn(element: TableElement): element is ColumnDefinition {
  return element.kind === 'column';
}
