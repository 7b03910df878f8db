import { Logger } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import { QueryTypes } from 'sequelize';
import { Sequelize } from 'sequelize-typescript';

const logger = new Logger('Migrations');

export const MIGRATIONS_DIR = path.join(__dirname, 'migrations');

export const ENGAGEMENT_TABLES = [
  'ev_event',
  'ev_event_stop',
  'ev_event_membership',
  'ev_event_invite',
  'ev_event_join_request',
  'ev_event_chat_message',
  'ev_message_report',
  'ev_event_favorite',
  'ev_direct_chat',
  'ev_direct_message',
  'ev_direct_chat_leave',
];

const IDEMPOTENT_FAILURES = ['already exists', 'duplicate'];

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/** Splits a migration file into statements; statements must not embed `;`. */
export function splitStatements(sql: string): string[] {
  return sql
    .split(';')
    .map((statement) => statement.trim())
    .filter((statement) => statement.replace(/^--.*$/gm, '').trim().length > 0);
}

/**
 * Executes every *.sql file in `migrationsDir` in filename order. Statements
 * are idempotent, so this runs on every boot.
 */
export async function runMigrations(
  sequelize: Sequelize,
  migrationsDir: string = MIGRATIONS_DIR,
): Promise<number> {
  if (!fs.existsSync(migrationsDir)) {
    logger.warn(`Migrations directory not found at ${migrationsDir}, skipping`);
    return 0;
  }

  const migrationFiles = fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith('.sql'))
    .sort();
  if (migrationFiles.length === 0) {
    logger.warn('No migration files found');
    return 0;
  }

  logger.log(`Found ${migrationFiles.length} migration file(s)`);
  for (const file of migrationFiles) {
    const statements = splitStatements(fs.readFileSync(path.join(migrationsDir, file), 'utf-8'));
    try {
      for (const statement of statements) {
        await executeStatement(sequelize, statement);
      }
    } catch (error) {
      logger.error(`Migration failed: ${file}`, error instanceof Error ? error.stack : undefined);
      throw error;
    }
    logger.log(`Migration completed: ${file} (${statements.length} statements)`);
  }
  return migrationFiles.length;
}

async function executeStatement(sequelize: Sequelize, statement: string): Promise<void> {
  try {
    await sequelize.query(statement);
  } catch (error) {
    const message = errorMessage(error);
    if (!IDEMPOTENT_FAILURES.some((fragment) => message.includes(fragment))) {
      throw error;
    }
    logger.debug(`Skipped: ${message.substring(0, 80)}`);
  }
}

/** Reports which engagement tables are missing after migrations ran. */
export async function checkMigrationStatus(sequelize: Sequelize): Promise<string[]> {
  const rows = await sequelize.query<{ tablename: string }>(
    `SELECT tablename FROM pg_tables WHERE schemaname = 'public' AND tablename LIKE 'ev\\_%'`,
    { type: QueryTypes.SELECT },
  );
  const present = new Set(rows.map((row) => row.tablename));
  const missing = ENGAGEMENT_TABLES.filter((table) => !present.has(table));

  if (missing.length > 0) {
    logger.warn(`Missing tables: ${missing.join(', ')}`);
  } else {
    logger.log(`Schema status: all ${ENGAGEMENT_TABLES.length} engagement tables present`);
  }
  return missing;
}
