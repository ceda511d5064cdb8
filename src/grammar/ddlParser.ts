import type {
  ColumnConstraint,
  ColumnConstraintBody,
  ColumnDefinition,
  CreateTableStatement,
  DataType,
  Identifier,
  IdentityOptions,
  TableClause,
  TableConstraint,
  TableConstraintBody,
  TableElement,
  TableProperty
} from './ast';
import type { Dialect } from './dialects';
import { tokenize } from './tokenizer';
import { TokenStream } from './tokenStream';

const TABLE_MODIFIERS = new Set(['LOCAL', 'GLOBAL', 'TEMP', 'TEMPORARY', 'VOLATILE', 'TRANSIENT']);

const CONSTRAINT_OPTIONS = new Set(['ENFORCED', 'RELY', 'NORELY', 'ENABLE', 'DISABLE', 'VALIDATE', 'NOVALIDATE']);

// Words that end a DEFAULT expression when they appear outside parentheses
const COLUMN_CONSTRAINT_WORDS = new Set([
  'NOT', 'NULL', 'PRIMARY', 'UNIQUE', 'REFERENCES', 'CHECK', 'COMMENT', 'CONSTRAINT',
  'COLLATE', 'AUTOINCREMENT', 'AUTO_INCREMENT', 'IDENTITY', 'GENERATED', 'AS', 'WITH', 'MASKING'
]);

/** True when the stream is positioned at `CREATE [OR REPLACE] [modifiers] TABLE`. Does not consume. */
export function isCreateTable(stream: TokenStream): boolean {
  if (!stream.isWord('CREATE')) return false;
  let offset = 1;
  if (stream.isWord('OR', offset) && stream.isWord('REPLACE', offset + 1)) offset += 2;
  for (let token = stream.peek(offset); token?.type === 'word'; token = stream.peek(offset)) {
    const word = token.value.toUpperCase();
    if (word === 'TABLE') return true;
    if (!TABLE_MODIFIERS.has(word)) return false;
    offset++;
  }
  return false;
}

export function parseCreateTable(stream: TokenStream, dialect: Dialect): CreateTableStatement {
  stream.expectWords('CREATE');
  const replace = stream.matchWords('OR', 'REPLACE');

  const modifiers: string[] = [];
  while (!stream.isWord('TABLE')) {
    const word = stream.next().value.toUpperCase();
    if (!TABLE_MODIFIERS.has(word)) {
      throw stream.error(`Unexpected table modifier ${word}`);
    }
    modifiers.push(word);
  }
  stream.expectWords('TABLE');

  const ifNotExists = stream.matchWords('IF', 'NOT', 'EXISTS');
  const name = stream.parseQualifiedName();

  const elements: TableElement[] = [];
  if (stream.matchPunct('(')) {
    do {
      elements.push(parseTableElement(stream, dialect));
    } while (stream.matchPunct(','));
    stream.expectPunct(')');
  }

  const statement: CreateTableStatement = {
    kind: 'create_table',
    replace,
    modifiers,
    ifNotExists,
    name,
    elements,
    clauses: [],
    properties: null
  };

  while (!stream.done) {
    if (stream.matchWords('AS')) {
      statement.asQuery = stream.readRest();
      break;
    }

    const clause = parseTableClause(stream);
    if (clause) {
      statement.clauses.push(clause);
      continue;
    }

    const property = parseTableProperty(stream, dialect);
    statement.properties = [...(statement.properties ?? []), property];
  }

  return statement;
}

/** Parses a standalone type such as `VARCHAR2(4000 CHAR)` against the given dialect's lexical rules. */
export function parseDataTypeText(text: string, dialect: Dialect): DataType {
  const stream = new TokenStream(
    tokenize(text, dialect.settings).filter(token => token.type !== 'comment'),
    text
  );
  const dataType = parseDataType(stream);
  if (!stream.done) {
    throw stream.error(`Unexpected text after type ${dataType.name}`);
  }
  return dataType;
}

export function parseDataType(stream: TokenStream): DataType {
  const token = stream.peek();
  if (token?.type !== 'word') {
    throw stream.error('Expected a data type');
  }
  stream.next();

  let name = token.value.toUpperCase();
  if (name === 'DOUBLE' && stream.matchWords('PRECISION')) {
    name = 'DOUBLE PRECISION';
  } else if ((name === 'CHARACTER' || name === 'CHAR') && stream.matchWords('VARYING')) {
    name = `${name} VARYING`;
  } else if (name === 'LONG' && stream.matchWords('RAW')) {
    name = 'LONG RAW';
  }

  let args = parseTypeArguments(stream);

  if (name === 'TIMESTAMP' || name === 'TIME') {
    if (stream.matchWords('WITH', 'LOCAL', 'TIME', 'ZONE')) {
      name = `${name} WITH LOCAL TIME ZONE`;
    } else if (stream.matchWords('WITH', 'TIME', 'ZONE')) {
      name = `${name} WITH TIME ZONE`;
    } else if (stream.matchWords('WITHOUT', 'TIME', 'ZONE')) {
      name = `${name} WITHOUT TIME ZONE`;
    }
    if (args.length === 0) {
      args = parseTypeArguments(stream);
    }
  }

  return { kind: 'data_type', name, args };
}

function parseTypeArguments(stream: TokenStream): string[] {
  if (!stream.isPunct('(')) return [];
  return stream
    .readParenthesized()
    .split(',')
    .map(arg => arg.trim().replace(/\s+/g, ' '));
}

function parseTableElement(stream: TokenStream, dialect: Dialect): TableElement {
  const startsConstraint =
    stream.isWord('CONSTRAINT') ||
    stream.isWords('PRIMARY', 'KEY') ||
    stream.isWords('FOREIGN', 'KEY') ||
    ((stream.isWord('UNIQUE') || stream.isWord('CHECK')) && stream.isPunct('(', 1));
  return startsConstraint ? parseTableConstraint(stream) : parseColumn(stream, dialect);
}

function parseColumn(stream: TokenStream, dialect: Dialect): ColumnDefinition {
  const name = stream.parseIdentifier();
  const column: ColumnDefinition = { kind: 'column', name, constraints: [] };

  const startsWithConstraint = stream.isWord('AS') || stream.isWord('GENERATED');
  if (!startsWithConstraint && !stream.isPunct(',') && !stream.isPunct(')')) {
    column.dataType = parseDataType(stream);
  }

  while (!stream.done && !stream.isPunct(',') && !stream.isPunct(')')) {
    column.constraints.push(parseColumnConstraint(stream, dialect));
  }
  return column;
}

function parseColumnConstraint(stream: TokenStream, dialect: Dialect): ColumnConstraint {
  let name: Identifier | undefined;
  if (stream.matchWords('CONSTRAINT')) {
    name = stream.parseIdentifier();
  }
  return { name, body: parseColumnConstraintBody(stream, dialect) };
}

function parseColumnConstraintBody(stream: TokenStream, dialect: Dialect): ColumnConstraintBody {
  if (stream.matchWords('NOT', 'NULL')) return { kind: 'not_null' };
  if (stream.matchWords('NULL')) return { kind: 'null' };
  if (stream.matchWords('PRIMARY', 'KEY')) return { kind: 'primary_key' };
  if (stream.matchWords('UNIQUE')) return { kind: 'unique' };

  if (stream.matchWords('DEFAULT')) {
    return { kind: 'default', expression: stream.readExpression(COLUMN_CONSTRAINT_WORDS) };
  }

  if (stream.matchWords('REFERENCES')) {
    const table = stream.parseQualifiedName();
    const columns = stream.isPunct('(') ? stream.parseIdentifierList() : [];
    return { kind: 'references', table, columns };
  }

  if (stream.matchWords('CHECK')) {
    return { kind: 'check', expression: stream.readParenthesized() };
  }

  if (stream.matchWords('COMMENT')) {
    stream.matchOperator('=');
    return { kind: 'comment', text: stream.expectString() };
  }

  if (stream.matchWords('COLLATE')) {
    const token = stream.next();
    return { kind: 'collate', collation: stream.source.slice(token.start, token.end) };
  }

  if (stream.matchWords('AS')) {
    const expression = stream.isPunct('(') ? stream.readParenthesized() : stream.readExpression(COLUMN_CONSTRAINT_WORDS);
    return { kind: 'computed', expression, syntax: 'as' };
  }

  if (stream.matchWords('GENERATED')) {
    return parseGenerated(stream);
  }

  if (stream.matchWords('AUTOINCREMENT') || stream.matchWords('IDENTITY')) {
    return { kind: 'identity', ...parseIdentityOptions(stream, false) };
  }

  if (stream.matchWords('AUTO_INCREMENT')) {
    return { kind: 'identity', always: false };
  }

  const withKeyword = stream.matchWords('WITH');
  for (const rule of dialect.columnRules) {
    const property = rule.parse(stream);
    if (property) return { kind: 'extension', withKeyword, property };
  }

  throw stream.error('Unsupported column constraint');
}

function parseGenerated(stream: TokenStream): ColumnConstraintBody {
  let always = true;
  if (stream.matchWords('BY', 'DEFAULT')) {
    always = false;
    stream.matchWords('ON', 'NULL');
  } else {
    stream.matchWords('ALWAYS');
  }
  stream.expectWords('AS');

  if (stream.matchWords('IDENTITY')) {
    return { kind: 'identity', ...parseIdentityOptions(stream, always) };
  }

  const expression = stream.readParenthesized();
  let storage: 'VIRTUAL' | 'STORED' | undefined;
  if (stream.matchWords('VIRTUAL')) storage = 'VIRTUAL';
  else if (stream.matchWords('STORED')) storage = 'STORED';
  return { kind: 'computed', expression, syntax: 'generated', storage };
}

function parseIdentityOptions(stream: TokenStream, always: boolean): IdentityOptions {
  const options: IdentityOptions = { always };

  if (stream.isPunct('(')) {
    const inner = stream.readParenthesized();
    const shorthand = inner.match(/^\s*([+-]?\d+)\s*,\s*([+-]?\d+)\s*$/);
    if (shorthand) {
      options.start = shorthand[1];
      options.increment = shorthand[2];
    } else {
      const start = inner.match(/START\s+(?:WITH\s+)?([+-]?\d+)/i);
      const increment = inner.match(/INCREMENT\s+(?:BY\s+)?([+-]?\d+)/i);
      options.start = start?.[1];
      options.increment = increment?.[1];
    }
  }

  if (stream.matchWords('START')) {
    stream.matchWords('WITH');
    options.start = stream.next().value;
  }
  if (stream.matchWords('INCREMENT')) {
    stream.matchWords('BY');
    options.increment = stream.next().value;
  }
  if (!stream.matchWords('ORDER')) {
    stream.matchWords('NOORDER');
  }
  return options;
}

function parseTableConstraint(stream: TokenStream): TableConstraint {
  let name: Identifier | undefined;
  if (stream.matchWords('CONSTRAINT')) {
    name = stream.parseIdentifier();
  }

  let body: TableConstraintBody;
  if (stream.matchWords('PRIMARY', 'KEY')) {
    body = { kind: 'primary_key', columns: stream.parseIdentifierList() };
  } else if (stream.matchWords('UNIQUE')) {
    body = { kind: 'unique', columns: stream.parseIdentifierList() };
  } else if (stream.matchWords('FOREIGN', 'KEY')) {
    const columns = stream.parseIdentifierList();
    stream.expectWords('REFERENCES');
    const table = stream.parseQualifiedName();
    const referencedColumns = stream.isPunct('(') ? stream.parseIdentifierList() : [];
    body = { kind: 'foreign_key', columns, table, referencedColumns };
  } else if (stream.matchWords('CHECK')) {
    body = { kind: 'check', expression: stream.readParenthesized() };
  } else {
    throw stream.error('Unsupported table constraint');
  }

  const options: string[] = [];
  for (;;) {
    if (stream.matchWords('NOT', 'ENFORCED')) {
      options.push('NOT ENFORCED');
      continue;
    }
    const token = stream.peek();
    if (token?.type === 'word' && CONSTRAINT_OPTIONS.has(token.value.toUpperCase())) {
      options.push(stream.next().value.toUpperCase());
      continue;
    }
    break;
  }

  return { kind: 'table_constraint', name, body, options };
}

function parseTableClause(stream: TokenStream): TableClause | null {
  let kind: TableClause['kind'];
  if (stream.matchWords('CLUSTER', 'BY')) {
    kind = 'cluster_by';
  } else if (stream.matchWords('PARTITION', 'BY')) {
    kind = 'partition_by';
  } else {
    return null;
  }

  const expressions: string[] = [];
  if (stream.matchPunct('(')) {
    do {
      expressions.push(stream.readExpression());
    } while (stream.matchPunct(','));
    stream.expectPunct(')');
  } else {
    expressions.push(stream.readExpression(new Set(['CLUSTER', 'PARTITION', 'COMMENT', 'WITH', 'AS'])));
  }
  return { kind, expressions };
}

function parseTableProperty(stream: TokenStream, dialect: Dialect): TableProperty {
  const withKeyword = stream.matchWords('WITH');

  for (const rule of dialect.clauseRules) {
    const body = rule.parse(stream);
    if (body) return { withKeyword, body };
  }

  if (stream.matchWords('COMMENT')) {
    stream.matchOperator('=');
    return { withKeyword, body: { kind: 'comment', text: stream.expectString() } };
  }

  if (stream.matchWords('COPY', 'GRANTS')) {
    return { withKeyword, body: { kind: 'flag', keyword: 'COPY GRANTS' } };
  }

  const key = stream.peek();
  if (key?.type === 'word' && stream.isOperator('=', 1)) {
    stream.next();
    stream.next();
    const value = stream.isPunct('(') ? `(${stream.readParenthesized()})` : valueText(stream);
    return { withKeyword, body: { kind: 'key_value', key: key.value.toUpperCase(), value } };
  }

  throw stream.error('Unsupported table clause');
}

function valueText(stream: TokenStream): string {
  const token = stream.next();
  return stream.source.slice(token.start, token.end);
}
