import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';

export abstract class BaseRepository {
  constructor(protected pool: Pool) {}

  protected async query<R extends QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<QueryResult<R>> {
    return this.pool.query<R>(text, params);
  }

  /**
   * Run callback inside BEGIN/COMMIT on a single client. Queries that belong
   * to the transaction must go through the client passed in.
   */
  protected async transaction<T>(callback: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await callback(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }
}
