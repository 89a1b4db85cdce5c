/**
 * Named parameter binding
 *
 * Rewrites `:name` placeholders to positional `$n` for the pg driver.
 * Casts (`::int`), literals, quoted identifiers and comments are left alone.
 * A name used twice binds to the same position.
 */

import { ValidationError } from '../types/errors.js';
import { maskSql } from './scanner.js';

const NAMED_PARAM = /(?<!:):([A-Za-z_][A-Za-z0-9_]*)/g;

export interface BoundQuery {
  text: string;
  values: unknown[];
}

export function bindNamedParams(sql: string, params: Record<string, unknown>): BoundQuery {
  const masked = maskSql(sql);
  const positions = new Map<string, number>();
  const values: unknown[] = [];
  let text = '';
  let last = 0;

  for (const match of masked.matchAll(NAMED_PARAM)) {
    const name = match[1];
    const index = match.index;
    if (name === undefined || index === undefined) continue;

    if (!Object.hasOwn(params, name)) {
      throw new ValidationError(`Missing value for parameter :${name}`, { field: name });
    }

    let position = positions.get(name);
    if (position === undefined) {
      values.push(params[name]);
      position = values.length;
      positions.set(name, position);
    }

    text += `${sql.slice(last, index)}$${position}`;
    last = index + match[0].length;
  }

  text += sql.slice(last);
  return { text, values };
}
