import { Client, QueryResult } from 'pg';
import { DatabaseConfig } from '../../config';
import { childLogger } from '../../utils/logger';

const log = childLogger('postgres');

/** The part of a pg client the repositories need. */
export interface Queryable {
    query(text: string, values?: unknown[]): Promise<Pick<QueryResult, 'rows' | 'rowCount'>>;
}

export const makeClient = (db: DatabaseConfig) => new Client(db);

/**
 * Runs `fn` on one connected client and always closes it afterwards.
 * Errors from `fn` reach the caller unchanged.
 */
export async function withClient<T>(db: DatabaseConfig, fn: (client: Client) => Promise<T>): Promise<T> {
    const client = makeClient(db);
    await client.connect();
    log.debug('Connected to the database.');
    try {
        return await fn(client);
    } finally {
        await client.end();
        log.debug('Database connection closed.');
    }
}
