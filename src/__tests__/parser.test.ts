import { describe, expect, it } from 'vitest';
import { SQLParser } from '../converter/parser';
import { createDialect } from '../grammar/dialects';
import { TokenizeError } from '../grammar/tokenizer';
import { ParseError } from '../grammar/tokenStream';

const snowflake = createDialect('snowflake');

describe('SQLParser', () => {
  it('splits a script into statements with their comments and line numbers', () => {
    const script = "-- file header\nCREATE TABLE a (x INT);\n\n/* two */\nSELECT 1;\nSELECT ';' AS semi";

    const statements = new SQLParser(snowflake).parse(script);

    expect(statements.map(statement => [statement.text, statement.leadingComments, statement.lineNumber])).toEqual([
      ['CREATE TABLE a (x INT)', ['-- file header'], 2],
      ['SELECT 1', ['/* two */'], 5],
      ["SELECT ';' AS semi", [], 6]
    ]);
    expect(statements[0].node.kind).toBe('create_table');
    expect(statements[0].span).toEqual({ start: 15, end: 37 });
  });

  it('drops comments from the comparison text', () => {
    const [statement] = new SQLParser(snowflake).parse('SELECT a /* c */ , b -- x\n FROM t');
    expect(statement.textWithoutComments).toBe('SELECT a , b FROM t');
  });

  it('ignores empty statements', () => {
    expect(new SQLParser(snowflake).parse(';;\n-- only a comment\n')).toEqual([]);
  });

  it('turns statements without a grammar into opaque nodes', () => {
    const [statement] = new SQLParser(createDialect('oracle')).parse('SELECT 1 FROM dual');
    expect(statement.node).toEqual({ kind: 'opaque', reason: 'No general-purpose grammar for dialect oracle' });
  });

  it('keeps a rejected CREATE TABLE as an opaque node unless asked to raise', () => {
    const sql = 'CREATE TABLE t (a INT) FOO BAR';

    const [statement] = new SQLParser(snowflake).parse(sql);
    expect(statement.node).toEqual({ kind: 'opaque', reason: "Unsupported table clause near 'FOO'" });

    expect(() => new SQLParser(snowflake, { errorLevel: 'raise' }).parse(sql)).toThrow(ParseError);
  });

  it('throws when the script cannot be tokenized', () => {
    expect(() => new SQLParser(snowflake).parse("SELECT 'x")).toThrow(TokenizeError);
  });

  it('parses a single statement with its terminator', () => {
    expect(new SQLParser(snowflake).parseStatement('CREATE TABLE t (a INT);').kind).toBe('create_table');
  });
});
