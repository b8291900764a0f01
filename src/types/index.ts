export type Group = {
    id: number;
    name: string;
};

export type RoleDefinition = {
    name: string;
    // informational only; auth_group has no column for it
    description: string;
};

export type SeedReport = {
    created: string[];
    existing: string[];
    total: number;
    groups: string[];
};

export type SequenceTarget = {
    table: string;
    sequence: string;
};

export type SequenceRepairResult =
    | { status: 'empty'; target: SequenceTarget }
    | { status: 'updated'; target: SequenceTarget; maxId: bigint; nextId: bigint };

export interface GroupStore {
    findByName(name: string): Promise<Group | null>;
    create(name: string): Promise<Group>;
    count(): Promise<number>;
    listNames(): Promise<string[]>;
}

export interface SequenceStore {
    /** `SELECT MAX(id)` over the table; null when it has no rows. */
    maxId(table: string): Promise<bigint | null>;
    /** Sets the sequence's current value so the next `nextval` returns `value + 1`. */
    setValue(sequence: string, value: bigint): Promise<void>;
}

/** Line sink for the human-readable command report. */
export interface Output {
    write(line: string): void;
}
