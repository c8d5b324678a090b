/**
 * Query Parameter Reading
 *
 * The app uses Express's simple query parser, so a value is either a string
 * or, for a repeated key, an array of strings. The last occurrence wins.
 */

import type { Request } from 'express';

export function readQueryParam(query: Request['query'], key: string): string | undefined {
  const value: unknown = query[key];

  if (typeof value === 'string') {
    return value;
  }

  if (Array.isArray(value)) {
    for (let i = value.length - 1; i >= 0; i--) {
      const item: unknown = value[i];
      if (typeof item === 'string') {
        return item;
      }
    }
  }

  return undefined;
}
