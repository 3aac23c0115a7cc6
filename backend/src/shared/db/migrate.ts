/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations reliably.
 * - TS migrations live in: src/shared/db/migrations
 * - We run this file with `tsx`, so dynamic imports of `.ts` migrations work.
 *
 * HOW TO USE:
 * - npm run db:migrate -w @punchcard/backend
 */

import 'dotenv/config';

import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { readdir } from 'node:fs/promises';

import { Migrator, type Migration, type MigrationProvider } from 'kysely';
import { z } from 'zod';
import { createDb } from './db';
import { logger } from '../logger/logger';

const EnvSchema = z.object({
  DATABASE_URL: z.string().min(1),
});

function isMigration(mod: unknown): mod is Migration {
  return (
    typeof mod === 'object' &&
    mod !== null &&
    'up' in mod &&
    typeof mod.up === 'function' &&
    (!('down' in mod) || typeof mod.down === 'function')
  );
}

function createMigrationProvider(migrationsDir: string): MigrationProvider {
  return {
    async getMigrations() {
      const files = (await readdir(migrationsDir)).filter((f) => f.endsWith('.ts')).sort();

      logger.info('migrations.found', { count: files.length, files });

      const migrations: Record<string, Migration> = {};

      for (const file of files) {
        const url = pathToFileURL(path.join(migrationsDir, file)).href;
        const mod: unknown = await import(url);

        if (!isMigration(mod)) {
          throw new Error(`Migration ${file} must export an up() function`);
        }

        migrations[file.replace(/\.ts$/, '')] = mod;
      }

      return migrations;
    },
  };
}

async function runMigrations(): Promise<void> {
  const env = EnvSchema.parse(process.env);
  const db = createDb(env.DATABASE_URL);

  // Point directly at the SOURCE migrations folder (run from backend/).
  const migrationsDir = path.join(process.cwd(), 'src/shared/db/migrations');
  const migrator = new Migrator({ db, provider: createMigrationProvider(migrationsDir) });

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('migrations.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('migrations.error', { migration: r.migrationName });
  });

  await db.destroy();

  if (error) {
    logger.error('migrations.failed', { err: error });
    process.exit(1);
  }

  logger.info('migrations.up_to_date');
}

void runMigrations().catch((err: unknown) => {
  logger.error('migrations.fatal', { err });
  process.exit(1);
});
