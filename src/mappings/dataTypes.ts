/** Upper-cased source type name → value, with an underscore-free alias for every key that has underscores. */
export type TypeNameMap<T> = Map<string, T>;

// Source types whose target mapping usually needs a human decision
export const COMPLEX_SOURCE_TYPES = new Set(['VARIANT', 'OBJECT', 'ARRAY', 'GEOGRAPHY', 'GEOMETRY']);

export function normalizeTypeName(name: string): string {
  return name.trim().replace(/\s+/g, ' ').toUpperCase();
}

/**
 * Later sources win. Aliases never shadow an explicit key:
 * `TIMESTAMP_NTZ` also answers to `TIMESTAMPNTZ` unless that key is configured itself.
 */
export function buildTypeNameMap<T>(...sources: Array<Record<string, T>>): TypeNameMap<T> {
  const map: TypeNameMap<T> = new Map();
  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      map.set(normalizeTypeName(key), value);
    }
  }

  for (const [key, value] of [...map]) {
    const alias = key.replace(/_/g, '');
    if (alias !== key && !map.has(alias)) {
      map.set(alias, value);
    }
  }
  return map;
}

/** Resolves a type name to the map key it matches, trying the underscore-free spelling second. */
export function resolveTypeKey<T>(map: TypeNameMap<T>, typeName: string): string | undefined {
  const name = normalizeTypeName(typeName);
  if (map.has(name)) return name;
  const alias = name.replace(/_/g, '');
  return map.has(alias) ? alias : undefined;
}

export function lookupTypeName<T>(map: TypeNameMap<T>, typeName: string): T | undefined {
  const key = resolveTypeKey(map, typeName);
  return key === undefined ? undefined : map.get(key);
}

/** Replaces each upper-case alias as a whole word, longest alias first, in a single pass. */
export function applyOutputAliases(sql: string, aliases: TypeNameMap<string>): string {
  if (aliases.size === 0) return sql;
  const keys = [...aliases.keys()].sort((a, b) => b.length - a.length);
  const pattern = new RegExp(`\\b(${keys.map(escapeRegExp).join('|')})\\b`, 'g');
  return sql.replace(pattern, match => aliases.get(match) ?? match);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
