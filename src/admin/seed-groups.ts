import { GroupStore, Output, RoleDefinition, SeedReport } from '../types';
import { DEFAULT_ROLES } from './roles';

const byCodePoint = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Ensures every role exists as a group, by exact name. Lookup precedes creation,
 * so an existing group is reported rather than treated as a conflict. Safe to re-run.
 */
export async function seedGroups(
    store: GroupStore,
    output: Output,
    roles: readonly RoleDefinition[] = DEFAULT_ROLES
): Promise<SeedReport> {
    const created: string[] = [];
    const existing: string[] = [];

    output.write('Creating User Groups...');
    for (const role of roles) {
        const found = await store.findByName(role.name);
        if (found) {
            existing.push(found.name);
            output.write(`• Group already exists: ${found.name}`);
            continue;
        }
        const group = await store.create(role.name);
        created.push(group.name);
        output.write(`✓ Created group: ${group.name}`);
    }

    output.write('');
    output.write('✅ Successfully populated user groups!');

    const total = await store.count();
    output.write('');
    output.write(`Total groups: ${total}`);

    // sorted here so the listing does not depend on the database collation
    const groups = [...(await store.listNames())].sort(byCodePoint);
    output.write('');
    output.write('Available Groups:');
    for (const name of groups) {
        output.write(`  • ${name}`);
    }

    return { created, existing, total, groups };
}
