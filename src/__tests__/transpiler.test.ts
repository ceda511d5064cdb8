import { describe, expect, it, vi } from 'vitest';
import { SQLParser } from '../converter/parser';
import { StatementRouter } from '../converter/statementRouter';
import { DDLTransformer } from '../converter/transformers/ddlTransformer';
import { TranspileError, transpileSQL } from '../converter/transpiler';
import { createDialect } from '../grammar/dialects';
import { emptyRuleSet } from '../rules/ruleSet';

vi.mock('@polyglot-sql/sdk', async importOriginal => ({
  ...(await importOriginal<typeof import('@polyglot-sql/sdk')>()),
  transpile: vi.fn(() => ({ success: false, error: 'unsupported syntax' }))
}));

const snowflake = createDialect('snowflake');
const oracle = createDialect('oracle');

describe('transpileSQL', () => {
  it('raises the transpiler error when no output is produced', () => {
    expect(() => transpileSQL('SELECT 1', snowflake, oracle)).toThrow(new TranspileError('unsupported syntax'));
  });

  it('passes text through between dialects sharing a grammar', () => {
    expect(transpileSQL('SELECT a::INT FROM t', createDialect('greenplum'), createDialect('postgresql'))).toBe('SELECT a::INT FROM t');
  });

  it('keeps the source text when a statement cannot be transpiled', () => {
    const parser = new SQLParser(snowflake);
    const router = new StatementRouter(parser, new DDLTransformer(emptyRuleSet(), snowflake, oracle), oracle);
    const [statement] = parser.parse('select a from t;');

    const result = router.route(statement, 'script.sql');

    expect(result.statements).toEqual(['SELECT\n  a\nFROM\n  t']);
    expect(result.logs).toEqual([
      {
        action: 'transpile_fallback',
        details: 'Could not transpile statement type select, kept the source text: unsupported syntax',
        file: 'script.sql'
      }
    ]);
  });
});
