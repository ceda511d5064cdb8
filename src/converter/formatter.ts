import { format } from 'sql-formatter';
import type { Dialect } from '../grammar/dialects';

/** Re-prints a statement with the target dialect's keyword casing and indentation. Throws when the text cannot be tokenized. */
export function formatSQL(sql: string, dialect: Dialect): string {
  return format(sql, {
    language: dialect.settings.formatterLanguage,
    keywordCase: 'upper',
    indentStyle: 'standard',
    linesBetweenQueries: 2
  });
}
