/**
 * SQL identifier helpers
 *
 * Table and column names only reach SQL text after they have been matched
 * against the catalog, and always double-quoted.
 */

/**
 * Double-quote a PostgreSQL identifier, escaping embedded quotes.
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Schema-qualified, quoted name usable as a pg_dump `-t` pattern.
 * Quoting makes pattern characters match literally.
 */
export function qualifiedTablePattern(table: string, schema = 'public'): string {
  return `${quoteIdentifier(schema)}.${quoteIdentifier(table)}`;
}

