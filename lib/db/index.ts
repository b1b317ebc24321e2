import { neon } from '@neondatabase/serverless';
import { getConfig } from '@/lib/config';
import { ConfigurationError } from '@/lib/errors';

/**
 * Tagged-template query function: parameters are sent separately from the
 * statement text, never interpolated.
 */
export type SqlTag = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => Promise<Record<string, unknown>[]>;

// Lazy-initialized so importing this module never needs DATABASE_URL
let _sql: SqlTag | null = null;

export function getSql(): SqlTag {
  if (!_sql) {
    const databaseUrl = getConfig().databaseUrl;
    if (!databaseUrl) {
      throw new ConfigurationError('DATABASE_URL');
    }
    _sql = neon(databaseUrl);
  }
  return _sql;
}

export const sql: SqlTag = (strings, ...values) => getSql()(strings, ...values);

export function isDatabaseConfigured(): boolean {
  return Boolean(getConfig().databaseUrl);
}
