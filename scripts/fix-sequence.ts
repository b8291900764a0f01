// Resets settings_cancellationreason_id_seq to MAX(id) so the next insert gets MAX(id) + 1.
import { loadConfig } from '../src/config';
import { fixSequence } from '../src/commands/fix-sequence';
import { stdoutOutput } from '../src/admin/output';
import { logError } from '../src/utils/logger';

async function main() {
    await fixSequence(loadConfig(), stdoutOutput);
}

main().catch((err) => {
    logError('fix-sequence failed', { error: err instanceof Error ? err.message : String(err) });
    process.exitCode = 1;
});
