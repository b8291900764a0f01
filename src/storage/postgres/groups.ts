import { Group, GroupStore } from '../../types';
import { Queryable } from './client';

// Table owned by the host application's auth subsystem: auth_group(id serial, name unique).
export class PostgresGroupRepository implements GroupStore {
    constructor(private readonly db: Queryable) {}

    async findByName(name: string): Promise<Group | null> {
        const r = await this.db.query('SELECT id, name FROM auth_group WHERE name = $1', [name]);
        return r.rows.length ? toGroup(r.rows[0]) : null;
    }

    async create(name: string): Promise<Group> {
        const r = await this.db.query('INSERT INTO auth_group (name) VALUES ($1) RETURNING id, name', [name]);
        return toGroup(r.rows[0]);
    }

    async count(): Promise<number> {
        const r = await this.db.query('SELECT COUNT(*)::int AS c FROM auth_group');
        return Number(r.rows[0]?.c ?? 0);
    }

    async listNames(): Promise<string[]> {
        const r = await this.db.query('SELECT name FROM auth_group ORDER BY name');
        return r.rows.map(row => String(row.name));
    }
}

function toGroup(row: Record<string, unknown>): Group {
    return { id: Number(row.id), name: String(row.name) };
}
