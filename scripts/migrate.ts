import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { getSql } from '@/lib/db';
import { log } from '@/lib/logging/logger';

const schemaPath = path.join(path.dirname(fileURLToPath(import.meta.url)), '../lib/db/schema.sql');

/**
 * Statements in file order, comments and blank lines dropped
 */
function splitStatements(schema: string): string[] {
  return schema
    .split('\n')
    .filter((line) => !line.trim().startsWith('--'))
    .join('\n')
    .split(';')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function asTemplate(statement: string): TemplateStringsArray {
  return Object.assign([statement], { raw: [statement] });
}

async function migrate() {
  const sql = getSql();
  const statements = splitStatements(fs.readFileSync(schemaPath, 'utf8'));

  log.info('Applying schema', { statements: statements.length });

  for (const statement of statements) {
    // Each statement is sent verbatim
    await sql(asTemplate(statement));
  }

  const tables = await sql`
    SELECT table_name
    FROM information_schema.tables
    WHERE table_schema = 'public'
    ORDER BY table_name
  `;

  log.info('Schema migration complete', { tables: tables.map((row) => row.table_name) });
}

migrate().catch((error: unknown) => {
  log.fatal('Migration failed', error instanceof Error ? error : { error: String(error) });
  process.exit(1);
});
