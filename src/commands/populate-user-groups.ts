import { AppConfig } from '../config';
import { seedGroups } from '../admin/seed-groups';
import { PostgresGroupRepository } from '../storage/postgres/groups';
import { withClient } from '../storage/postgres/client';
import { Output, SeedReport } from '../types';
import { logInfo } from '../utils/logger';

export async function populateUserGroups(config: AppConfig, output: Output): Promise<SeedReport> {
    const report = await withClient(config.database, client =>
        seedGroups(new PostgresGroupRepository(client), output)
    );
    logInfo('User groups populated', {
        created: report.created.length,
        existing: report.existing.length,
        total: report.total,
    });
    return report;
}
