import * as TOML from 'smol-toml';

export type TomlTable = Record<string, unknown>;

/**
 * Narrow a parsed TOML value to a table (not an array, date or primitive).
 */
export function isTomlTable(value: unknown): value is TomlTable {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Parse TOML text into a plain table. Throws smol-toml's TomlError on
 * malformed input.
 */
export function parseToml(text: string): TomlTable {
  const parsed: unknown = TOML.parse(text);
  if (!isTomlTable(parsed)) {
    throw new TypeError('TOML document did not produce a table');
  }
  return parsed;
}

export function stringifyToml(table: TomlTable): string {
  return TOML.stringify(table);
}

export function getString(table: TomlTable, key: string): string | undefined {
  const value = table[key];
  return typeof value === 'string' ? value : undefined;
}
