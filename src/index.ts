export { loadConfig } from './config';
export type { AppConfig, DatabaseConfig } from './config';
export { DEFAULT_ROLES } from './admin/roles';
export { seedGroups } from './admin/seed-groups';
export { repairSequence, CANCELLATION_REASON_SEQUENCE } from './admin/fix-sequence';
export { stdoutOutput, BufferedOutput } from './admin/output';
export { populateUserGroups } from './commands/populate-user-groups';
export { fixSequence } from './commands/fix-sequence';
export { PostgresGroupRepository } from './storage/postgres/groups';
export { PostgresSequenceRepository } from './storage/postgres/sequences';
export { withClient, makeClient } from './storage/postgres/client';
export type { Queryable } from './storage/postgres/client';
export * from './types';
