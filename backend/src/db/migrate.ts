import { Pool } from 'pg';
import fs from 'fs';
import path from 'path';

interface Migration {
  name: string;
  path: string;
}

/**
 * Get all migration files from the migrations directory
 */
const getMigrationFiles = (): Migration[] => {
  const migrationsDir = path.join(__dirname, 'migrations');

  if (!fs.existsSync(migrationsDir)) {
    console.log('[migrate] No migrations directory found');
    return [];
  }

  return fs.readdirSync(migrationsDir)
    .filter(file => file.endsWith('.sql'))
    .sort()
    .map(file => ({
      name: file.replace('.sql', ''),
      path: path.join(migrationsDir, file)
    }));
};

/**
 * Run all pending migrations, each inside its own transaction
 */
export const runMigrations = async (pool: Pool): Promise<void> => {
  console.log('[migrate] Starting database migrations...');

  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id SERIAL PRIMARY KEY,
      migration_name VARCHAR(255) UNIQUE NOT NULL,
      applied_at TIMESTAMPTZ DEFAULT NOW()
    )
  `);

  const migrations = getMigrationFiles();
  if (migrations.length === 0) {
    console.log('[migrate] No migrations found');
    return;
  }

  for (const migration of migrations) {
    const applied = await pool.query(
      'SELECT 1 FROM schema_migrations WHERE migration_name = $1',
      [migration.name]
    );

    if ((applied.rowCount ?? 0) > 0) {
      console.log(`[migrate] ✓ ${migration.name} already applied`);
      continue;
    }

    console.log(`[migrate] Running ${migration.name}`);
    const sql = fs.readFileSync(migration.path, 'utf8');
    const client = await pool.connect();

    try {
      await client.query('BEGIN');
      await client.query(sql);
      await client.query(
        'INSERT INTO schema_migrations (migration_name) VALUES ($1)',
        [migration.name]
      );
      await client.query('COMMIT');
      console.log(`[migrate] ✓ ${migration.name} completed`);
    } catch (error) {
      await client.query('ROLLBACK');
      console.error(`[migrate] ${migration.name} failed:`, error);
      throw error;
    } finally {
      client.release();
    }
  }

  console.log('[migrate] All migrations completed');
};

if (require.main === module) {
  import('../config/database')
    .then(({ default: pool }) => runMigrations(pool).finally(() => pool.end()))
    .then(() => {
      process.exit(0);
    })
    .catch((error: unknown) => {
      console.error('[migrate] Migration process failed:', error);
      process.exit(1);
    });
}
