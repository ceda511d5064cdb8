import type { ExtensionProperty, TagProperty } from './ast';
import { DIALECT_NAMES, extensionPrintRules, getDialect, type ClauseRule, type Dialect, type DialectName } from './dialects';
import type { SqlPrinter } from './printer';

const EXTENSION_MARKER = 'vendor-table-properties';

// ROW ACCESS POLICY <name> ON (<columns>)
const rowAccessPolicyRule: ClauseRule = {
  name: 'row_access_policy',
  parse(stream) {
    if (!stream.matchWords('ROW', 'ACCESS', 'POLICY')) return null;
    const policy = stream.parseQualifiedName();
    stream.expectWords('ON');
    return { kind: 'row_access_policy', policy, columns: stream.parseIdentifierList() };
  }
};

// TAG (<name> = '<value>', ...)
const tagRule: ClauseRule = {
  name: 'tags',
  parse(stream) {
    if (!stream.isWord('TAG') || !stream.isPunct('(', 1)) return null;
    stream.next();
    stream.expectPunct('(');

    const tags: TagProperty['tags'] = [];
    do {
      const key = stream.parseQualifiedName();
      if (!stream.matchOperator('=')) {
        throw stream.error("Expected '=' in TAG list");
      }
      const value = stream.next();
      tags.push({ key, value: stream.source.slice(value.start, value.end) });
    } while (stream.matchPunct(','));

    stream.expectPunct(')');
    return { kind: 'tags', tags };
  }
};

// MASKING POLICY <name> [USING (<columns>)]
const maskingPolicyRule: ClauseRule = {
  name: 'masking_policy',
  parse(stream) {
    if (!stream.matchWords('MASKING', 'POLICY')) return null;
    const policy = stream.parseQualifiedName();
    const using = stream.matchWords('USING') ? stream.parseIdentifierList() : [];
    return { kind: 'masking_policy', policy, using };
  }
};

function printExtensionProperty(property: ExtensionProperty, printer: SqlPrinter): string {
  switch (property.kind) {
    case 'row_access_policy': {
      const columns = property.columns.map(column => printer.identifier(column)).join(', ');
      return `ROW ACCESS POLICY ${printer.qualifiedName(property.policy)} ON (${columns})`;
    }
    case 'tags': {
      const tags = property.tags.map(tag => `${printer.qualifiedName(tag.key)} = ${tag.value}`).join(', ');
      return `TAG (${tags})`;
    }
    case 'masking_policy': {
      const policy = `MASKING POLICY ${printer.qualifiedName(property.policy)}`;
      if (property.using.length === 0) return policy;
      return `${policy} USING (${property.using.map(column => printer.identifier(column)).join(', ')})`;
    }
  }
}

interface GrammarExtension {
  table: ClauseRule[];
  column: ClauseRule[];
}

const EXTENSIONS: Partial<Record<DialectName, GrammarExtension>> = {
  snowflake: {
    table: [rowAccessPolicyRule, tagRule],
    column: [maskingPolicyRule, tagRule]
  }
};

const EXTENSION_KINDS: ReadonlyArray<ExtensionProperty['kind']> = ['row_access_policy', 'tags', 'masking_policy'];

/**
 * Teaches a dialect's CREATE TABLE grammar the vendor table and column properties it would otherwise reject.
 * Without an argument every registered dialect that has extensions is patched.
 *
 * Safe to call repeatedly: a dialect already carrying the marker is left untouched.
 * @returns true when at least one dialect was patched by this call
 */
export function registerGrammarExtensions(dialect?: Dialect): boolean {
  if (!dialect) {
    return DIALECT_NAMES.map(name => registerGrammarExtensions(getDialect(name))).some(Boolean);
  }

  const extension = EXTENSIONS[dialect.name];
  if (!extension || dialect.hasExtension(EXTENSION_MARKER)) {
    return false;
  }

  dialect.clauseRules.push(...extension.table);
  dialect.columnRules.push(...extension.column);
  for (const kind of EXTENSION_KINDS) {
    dialect.printRules.set(kind, printExtensionProperty);
    extensionPrintRules.set(kind, printExtensionProperty);
  }
  dialect.markExtension(EXTENSION_MARKER);
  return true;
}

export const CREATE_TABLE_PREFIX = /^\s*CREATE\s+(?:OR\s+REPLACE\s+)?TABLE\b/i;

// Clauses the grammar cannot place, removed textually before a recovery reparse
const UNPARSEABLE_CLAUSES: RegExp[] = [
  /\s+WITH\s+ROW\s+ACCESS\s+POLICY\s+[A-Za-z0-9_".]+\s+ON\s*\([^)]*\)/gi,
  /\s+WITH\s+MASKING\s+POLICY\s+[A-Za-z0-9_".]+(?:\s+USING\s*\([^)]*\))?/gi,
  /\s+WITH\s+TAG\s*\((?:'(?:[^']|'')*'|[^')])*\)/gi
];

/**
 * Removes known-unparseable vendor clauses from CREATE TABLE text.
 * @returns the repaired text, or null when nothing was removed
 */
export function stripUnparseableClauses(sql: string): string | null {
  let repaired = sql;
  for (const pattern of UNPARSEABLE_CLAUSES) {
    repaired = repaired.replace(pattern, '');
  }
  return repaired === sql ? null : repaired;
}
