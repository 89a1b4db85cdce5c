/**
 * SQL text scanner
 *
 * Replaces string literals, quoted identifiers, dollar-quoted bodies and
 * comments with spaces. The result has the same length as the input, so
 * offsets found in the masked text are valid in the original.
 */

const DOLLAR_TAG = /^\$([A-Za-z_][A-Za-z0-9_]*)?\$/;

function blank(text: string): string {
  return text.replace(/[^\n]/g, ' ');
}

export function maskSql(sql: string): string {
  let out = '';
  let i = 0;

  while (i < sql.length) {
    const ch = sql.charAt(i);
    const next = sql.charAt(i + 1);

    // -- line comment
    if (ch === '-' && next === '-') {
      const end = sql.indexOf('\n', i);
      const stop = end === -1 ? sql.length : end;
      out += blank(sql.slice(i, stop));
      i = stop;
      continue;
    }

    // /* block comment */ (PostgreSQL allows nesting)
    if (ch === '/' && next === '*') {
      let depth = 1;
      let j = i + 2;
      while (j < sql.length && depth > 0) {
        if (sql[j] === '/' && sql[j + 1] === '*') { depth++; j += 2; }
        else if (sql[j] === '*' && sql[j + 1] === '/') { depth--; j += 2; }
        else j++;
      }
      out += blank(sql.slice(i, j));
      i = j;
      continue;
    }

    // 'string' and "identifier", doubled quote escapes
    if (ch === "'" || ch === '"') {
      let j = i + 1;
      while (j < sql.length) {
        if (sql[j] === ch) {
          if (sql[j + 1] === ch) { j += 2; continue; }
          break;
        }
        j++;
      }
      const stop = Math.min(j + 1, sql.length);
      out += blank(sql.slice(i, stop));
      i = stop;
      continue;
    }

    // $tag$ body $tag$
    if (ch === '$') {
      const tag = DOLLAR_TAG.exec(sql.slice(i));
      if (tag) {
        const delimiter = tag[0];
        const close = sql.indexOf(delimiter, i + delimiter.length);
        const stop = close === -1 ? sql.length : close + delimiter.length;
        out += blank(sql.slice(i, stop));
        i = stop;
        continue;
      }
    }

    out += ch;
    i++;
  }

  return out;
}

/**
 * Split SQL text into its non-empty statements on top-level semicolons.
 */
export function splitStatements(sql: string): string[] {
  const masked = maskSql(sql);
  const statements: string[] = [];
  let start = 0;
  for (let i = 0; i <= masked.length; i++) {
    if (i === masked.length || masked[i] === ';') {
      if (masked.slice(start, i).trim()) {
        statements.push(sql.slice(start, i).trim());
      }
      start = i + 1;
    }
  }
  return statements;
}
