// Ensures the fixed sales roles exist as auth groups. Safe to run repeatedly.
import { loadConfig } from '../src/config';
import { populateUserGroups } from '../src/commands/populate-user-groups';
import { stdoutOutput } from '../src/admin/output';
import { logError } from '../src/utils/logger';

async function main() {
    await populateUserGroups(loadConfig(), stdoutOutput);
}

main().catch((err) => {
    logError('populate-user-groups failed', { error: err instanceof Error ? err.message : String(err) });
    process.exitCode = 1;
});
