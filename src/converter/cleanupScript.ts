import type { Dialect } from '../grammar/dialects';

export const CLEANUP_SCRIPT_FILE = '00_cleanup.sql';

// Part of a possibly qualified name; each part may be quoted on its own
const NAME_PART = '(?:"[^"]+"|[\\w$#]+)';

const CREATED_OBJECT = new RegExp(
  '^\\s*CREATE\\s+(?:OR\\s+REPLACE\\s+)?(?:(?:GLOBAL|LOCAL|TEMPORARY|TEMP|TRANSIENT|VOLATILE|SECURE)\\s+)*' +
    '(MATERIALIZED\\s+VIEW|TABLE|VIEW|SEQUENCE|PROCEDURE|FUNCTION|PACKAGE(?:\\s+BODY)?)\\s+' +
    `(?:IF\\s+NOT\\s+EXISTS\\s+)?(${NAME_PART}(?:\\.${NAME_PART})*)`,
  'gim'
);

const LINE_COMMENT = /^\s*--.*$/gm;

const STRING_LITERAL = /'(?:[^']|'')*'/g;

export interface CreatedObject {
  type: string;
  name: string;
}

function normalizeObjectType(type: string): string {
  const normalized = type.toUpperCase().replace(/\s+/g, ' ');
  // DROP PACKAGE removes the body as well
  return normalized === 'PACKAGE BODY' ? 'PACKAGE' : normalized;
}

/**
 * Objects created by CREATE statements that start a line, outside comment lines and string literals.
 * Unique by (type, name) and sorted by type then name.
 */
export function collectCreatedObjects(sql: string): CreatedObject[] {
  const code = sql.replace(LINE_COMMENT, '').replace(STRING_LITERAL, "''");
  const objects = new Map<string, CreatedObject>();

  for (const match of code.matchAll(CREATED_OBJECT)) {
    const object = { type: normalizeObjectType(match[1]), name: match[2].replace(/"/g, '') };
    objects.set(`${object.type}\u0000${object.name}`, object);
  }

  return [...objects.values()].sort((a, b) => compare(a.type, b.type) || compare(a.name, b.name));
}

/** DROP statements for every object the converted scripts create, or null when they create none. */
export function buildCleanupScript(convertedSql: string[], targetDialect: Dialect): string | null {
  const objects = collectCreatedObjects(convertedSql.join('\n'));
  if (objects.length === 0) return null;

  const drops = objects.map(({ type, name }) => {
    const suffix = type === 'TABLE' ? targetDialect.settings.dropTableSuffix : '';
    return `DROP ${type} ${name}${suffix};`;
  });
  return `${drops.join('\n')}\n`;
}

function compare(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
