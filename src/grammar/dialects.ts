import { Dialect as TranspileDialect } from '@polyglot-sql/sdk';
import type { ExtensionProperty } from './ast';
import type { SqlPrinter } from './printer';
import type { TokenStream } from './tokenStream';

export const DIALECT_NAMES = ['snowflake', 'oracle', 'postgresql', 'mysql', 'bigquery', 'sqlserver', 'greenplum'] as const;

export type DialectName = (typeof DIALECT_NAMES)[number];

export type FormatterLanguage = 'snowflake' | 'plsql' | 'postgresql' | 'mysql' | 'bigquery' | 'transactsql';

export type IdentityStyle = 'generated' | 'identity' | 'auto_increment' | 'sqlserver';

export interface DialectSettings {
  name: DialectName;
  identifierQuotes: Array<[open: string, close: string]>;
  lineComments: string[];
  backslashEscapes: boolean;
  dollarQuotedStrings: boolean;
  // `database` option passed to node-sql-parser; undefined when it has no grammar for the dialect
  parserDatabase?: string;
  formatterLanguage: FormatterLanguage;
  // Dialect handed to the transpiler that re-prints statements other than CREATE TABLE
  transpileDialect: TranspileDialect;
  identityStyle: IdentityStyle;
  dropTableSuffix: string;
}

/**
 * Parse hook tried at a table-property position of CREATE TABLE, or after the other
 * constraints of a column. Returns null when its keywords are absent.
 */
export interface ClauseRule {
  name: string;
  parse(stream: TokenStream): ExtensionProperty | null;
}

export type PrintRule = (property: ExtensionProperty, printer: SqlPrinter) => string;

export class UnsupportedDialectError extends Error {
  constructor(readonly dialect: string) {
    super(`Unsupported dialect '${dialect}'. Expected one of: ${DIALECT_NAMES.join(', ')}`);
    this.name = 'UnsupportedDialectError';
  }
}

const DIALECT_SETTINGS: Record<DialectName, DialectSettings> = {
  snowflake: {
    name: 'snowflake',
    identifierQuotes: [['"', '"']],
    lineComments: ['--', '//'],
    backslashEscapes: true,
    dollarQuotedStrings: true,
    parserDatabase: 'Snowflake',
    formatterLanguage: 'snowflake',
    transpileDialect: TranspileDialect.Snowflake,
    identityStyle: 'identity',
    dropTableSuffix: ''
  },
  oracle: {
    name: 'oracle',
    identifierQuotes: [['"', '"']],
    lineComments: ['--'],
    backslashEscapes: false,
    dollarQuotedStrings: false,
    formatterLanguage: 'plsql',
    transpileDialect: TranspileDialect.Oracle,
    identityStyle: 'generated',
    dropTableSuffix: ' CASCADE CONSTRAINTS'
  },
  postgresql: {
    name: 'postgresql',
    identifierQuotes: [['"', '"']],
    lineComments: ['--'],
    backslashEscapes: false,
    dollarQuotedStrings: true,
    parserDatabase: 'PostgresQL',
    formatterLanguage: 'postgresql',
    transpileDialect: TranspileDialect.PostgreSQL,
    identityStyle: 'generated',
    dropTableSuffix: ' CASCADE'
  },
  greenplum: {
    name: 'greenplum',
    identifierQuotes: [['"', '"']],
    lineComments: ['--'],
    backslashEscapes: false,
    dollarQuotedStrings: true,
    parserDatabase: 'PostgresQL',
    formatterLanguage: 'postgresql',
    transpileDialect: TranspileDialect.PostgreSQL,
    identityStyle: 'generated',
    dropTableSuffix: ' CASCADE'
  },
  mysql: {
    name: 'mysql',
    identifierQuotes: [['`', '`'], ['"', '"']],
    lineComments: ['--', '#'],
    backslashEscapes: true,
    dollarQuotedStrings: false,
    parserDatabase: 'MySQL',
    formatterLanguage: 'mysql',
    transpileDialect: TranspileDialect.MySQL,
    identityStyle: 'auto_increment',
    dropTableSuffix: ''
  },
  bigquery: {
    name: 'bigquery',
    identifierQuotes: [['`', '`']],
    lineComments: ['--', '#'],
    backslashEscapes: true,
    dollarQuotedStrings: false,
    parserDatabase: 'BigQuery',
    formatterLanguage: 'bigquery',
    transpileDialect: TranspileDialect.BigQuery,
    identityStyle: 'identity',
    dropTableSuffix: ''
  },
  sqlserver: {
    name: 'sqlserver',
    identifierQuotes: [['[', ']'], ['"', '"']],
    lineComments: ['--'],
    backslashEscapes: false,
    dollarQuotedStrings: false,
    parserDatabase: 'TransactSQL',
    formatterLanguage: 'transactsql',
    transpileDialect: TranspileDialect.TSQL,
    identityStyle: 'sqlserver',
    dropTableSuffix: ''
  }
};

const ALIASES: Record<string, DialectName> = {
  postgres: 'postgresql',
  tsql: 'sqlserver',
  mssql: 'sqlserver'
};

export class Dialect {
  readonly clauseRules: ClauseRule[] = [];
  readonly columnRules: ClauseRule[] = [];
  readonly printRules = new Map<ExtensionProperty['kind'], PrintRule>();
  private readonly extensions = new Set<string>();

  constructor(readonly settings: DialectSettings) {}

  get name(): DialectName {
    return this.settings.name;
  }

  hasExtension(marker: string): boolean {
    return this.extensions.has(marker);
  }

  markExtension(marker: string): void {
    this.extensions.add(marker);
  }

  quoteIdentifier(name: string): string {
    const [open, close] = this.settings.identifierQuotes[0];
    return `${open}${name.split(close).join(close + close)}${close}`;
  }
}

export function resolveDialectName(name: string): DialectName {
  const normalized = name.trim().toLowerCase();
  const match = DIALECT_NAMES.find(candidate => candidate === normalized) ?? ALIASES[normalized];
  if (!match) {
    throw new UnsupportedDialectError(name);
  }
  return match;
}

/** Builds an unshared dialect instance with no grammar extensions registered. */
export function createDialect(name: string): Dialect {
  const resolved = resolveDialectName(name);
  return new Dialect({ ...DIALECT_SETTINGS[resolved] });
}

// Print rules for extension properties, shared so any target printer can render a property it did not parse
export const extensionPrintRules = new Map<ExtensionProperty['kind'], PrintRule>();

const registry = new Map<DialectName, Dialect>();

/** Process-wide dialect instance; grammar extensions registered on it are visible to every caller. */
export function getDialect(name: string): Dialect {
  const resolved = resolveDialectName(name);
  let dialect = registry.get(resolved);
  if (!dialect) {
    dialect = createDialect(resolved);
    registry.set(resolved, dialect);
  }
  return dialect;
}
