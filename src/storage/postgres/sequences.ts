import { SequenceStore } from '../../types';
import { Queryable } from './client';
import { quoteIdentifier } from './identifiers';

export class PostgresSequenceRepository implements SequenceStore {
    constructor(private readonly db: Queryable) {}

    async maxId(table: string): Promise<bigint | null> {
        // int8 comes back from pg as a string, which BigInt() takes without losing precision
        const r = await this.db.query(`SELECT MAX(id)::bigint AS max_id FROM ${quoteIdentifier(table)}`);
        const raw: unknown = r.rows[0]?.max_id ?? null;
        if (raw === null) return null;
        if (typeof raw !== 'string' && typeof raw !== 'number' && typeof raw !== 'bigint') {
            throw new Error(`unexpected MAX(id) value from ${table}: ${String(raw)}`);
        }
        return BigInt(raw);
    }

    async setValue(sequence: string, value: bigint): Promise<void> {
        // setval(seq, n) leaves is_called = true, so nextval() returns n + 1
        await this.db.query('SELECT setval($1::regclass, $2)', [quoteIdentifier(sequence), value.toString()]);
    }
}
