import { AppConfig } from '../config';
import { repairSequence } from '../admin/fix-sequence';
import { PostgresSequenceRepository } from '../storage/postgres/sequences';
import { withClient } from '../storage/postgres/client';
import { Output, SequenceRepairResult } from '../types';
import { logInfo } from '../utils/logger';

export async function fixSequence(config: AppConfig, output: Output): Promise<SequenceRepairResult> {
    const result = await withClient(config.database, client =>
        repairSequence(new PostgresSequenceRepository(client), output)
    );
    if (result.status === 'updated') {
        logInfo('Sequence resynchronized', { sequence: result.target.sequence, nextId: result.nextId.toString() });
    } else {
        logInfo('Sequence left unchanged, table is empty', { table: result.target.table });
    }
    return result;
}
