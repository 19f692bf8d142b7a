import { Pool, PoolClient } from 'pg';

/**
 * Runs multi-statement writes atomically: commits when the callback
 * resolves, rolls back and re-throws when it rejects.
 */
export class TransactionManager {
    constructor(private readonly pool: Pick<Pool, 'connect'>) { }

    /**
     * @example
     * await txManager.run(async (client) => {
     *   await client.query('INSERT INTO executions ...');
     *   await client.query('INSERT INTO execution_queue ...');
     * });
     */
    async run<T>(callback: (client: PoolClient) => Promise<T>): Promise<T> {
        const client = await this.pool.connect();

        try {
            await client.query('BEGIN');
            const result = await callback(client);
            await client.query('COMMIT');
            return result;
        } catch (e) {
            await client.query('ROLLBACK');
            throw e;
        } finally {
            client.release();
        }
    }
}
