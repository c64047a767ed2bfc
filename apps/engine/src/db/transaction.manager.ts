import { Pool, PoolClient } from 'pg';

/**
 * Runs multi-statement units of work atomically with automatic rollback.
 */
export class TransactionManager {
    constructor(private readonly pool: Pool) { }

    /**
     * Executes a callback within a database transaction.
     * Commits on success, rolls back and re-throws on error.
     *
     * @example
     * await txManager.run(async (client) => {
     *   await client.query('INSERT INTO workflows ...');
     *   await client.query('INSERT INTO workflow_steps ...');
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
