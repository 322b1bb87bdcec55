/**
 * Seed CLI Script — Demo Users
 * Layer: Entry Point (CLI, not HTTP)
 *
 *   npm run seed [-- --count 50]
 *
 * Creates the `users` table when it does not exist yet and appends `count`
 * demo users (default 25) in batches, each batch in its own transaction.
 * Talks to the primary database through knex; the HTTP service never loads
 * this file.
 */
import { config } from '@core/config';
import knex from 'knex';

import { demoUsers, parseCount } from './demoUsers';

const BATCH_SIZE = 500;
const DEFAULT_COUNT = 25;

const count = parseCount(process.argv.slice(2), DEFAULT_COUNT);

async function main(): Promise<void> {
  // eslint-disable-next-line no-console
  const log = console.log;
  const { primary } = config.database;

  const db = knex({
    client: 'pg',
    connection: {
      user: primary.user,
      password: primary.password,
      host: primary.host,
      port: primary.port,
      database: primary.database,
    },
    pool: { min: 0, max: 2 },
  });

  try {
    log(`  Database:   ${primary.host}:${primary.port}/${primary.database}`);

    if (!(await db.schema.hasTable('users'))) {
      await db.schema.createTable('users', (table) => {
        table.increments('id').primary();
        table.string('username', 100).notNullable().unique();
        table.string('email', 255).notNullable().unique();
        table.timestamp('created_at', { useTz: true }).notNullable().defaultTo(db.fn.now());
      });
      log('  Created table "users"');
    }

    const existing = await db('users').count<{ count: string }[]>({ count: '*' });
    const offset = Number(existing[0]?.count ?? 0);
    const rows = demoUsers(count, offset);

    for (let start = 0; start < rows.length; start += BATCH_SIZE) {
      const batch = rows.slice(start, start + BATCH_SIZE);
      await db.transaction(async (trx) => {
        await trx('users').insert(batch);
      });
      log(`  Inserted ${Math.min(start + BATCH_SIZE, rows.length)}/${rows.length} users`);
    }

    log(`  ✓ Seed complete (${offset + rows.length} users in total)`);
  } finally {
    await db.destroy();
  }
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Seed failed:', err);
  process.exit(1);
});
