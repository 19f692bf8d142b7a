import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { Pool } from 'pg';
import type { ConnectionPool } from './index';
import { TransactionManager } from './transaction.manager';

const TAG = '[migrate]';
const MIGRATIONS_DIR = path.resolve(__dirname, '../../migrations');

/** Applies every migrations/*.sql file not yet recorded in schema_migrations, in name order. */
export async function migrate(pool: ConnectionPool, dir: string = MIGRATIONS_DIR): Promise<string[]> {
    await pool.query(
        `CREATE TABLE IF NOT EXISTS schema_migrations (
            name TEXT PRIMARY KEY,
            applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
        )`,
    );

    const applied = await pool.query<{ name: string }>('SELECT name FROM schema_migrations');
    const done = new Set(applied.rows.map((row) => row.name));
    const pending = fs.readdirSync(dir).filter((f) => f.endsWith('.sql') && !done.has(f)).sort();

    const tx = new TransactionManager(pool);
    for (const file of pending) {
        const sql = fs.readFileSync(path.join(dir, file), 'utf-8');
        await tx.run(async (client) => {
            await client.query(sql);
            await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
        });
        console.log(`${TAG} applied ${file}`);
    }

    return pending;
}

if (require.main === module) {
    const pool = new Pool({ connectionString: process.env.DATABASE_URL });
    migrate(pool)
        .then((files) => console.log(`${TAG} ${files.length} migration(s) applied`))
        .catch((err) => {
            console.error(`${TAG} failed:`, err);
            process.exitCode = 1;
        })
        .finally(() => pool.end());
}
