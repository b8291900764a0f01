import { Output, SequenceRepairResult, SequenceStore, SequenceTarget } from '../types';

export const CANCELLATION_REASON_SEQUENCE: SequenceTarget = {
    table: 'settings_cancellationreason',
    sequence: 'settings_cancellationreason_id_seq',
};

// Read-then-set without a transaction: a row inserted by another writer in between can still collide.
export async function repairSequence(
    store: SequenceStore,
    output: Output,
    target: SequenceTarget = CANCELLATION_REASON_SEQUENCE
): Promise<SequenceRepairResult> {
    const maxId = await store.maxId(target.table);
    if (maxId === null) {
        output.write(`No records found in ${target.table} table`);
        return { status: 'empty', target };
    }

    await store.setValue(target.sequence, maxId);
    const nextId = maxId + 1n;
    output.write(`Successfully updated sequence to start from ${nextId}`);
    return { status: 'updated', target, maxId, nextId };
}
