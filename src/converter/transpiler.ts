import { transpile } from '@polyglot-sql/sdk';
import type { Dialect } from '../grammar/dialects';

export class TranspileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TranspileError';
  }
}

/**
 * Translates one statement from the source dialect's grammar into the target's.
 * Text passes through unchanged when both sides share a grammar.
 */
export function transpileSQL(sql: string, source: Dialect, target: Dialect): string {
  const read = source.settings.transpileDialect;
  const write = target.settings.transpileDialect;
  if (read === write) return sql;

  const result = transpile(sql, read, write);
  if (!result.success || !result.sql || result.sql.length === 0) {
    throw new TranspileError(result.error ?? `No ${target.name} output for the statement`);
  }
  return result.sql.join(';\n');
}
