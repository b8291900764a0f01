import { RoleDefinition } from '../types';

// Seeded in this order.
export const DEFAULT_ROLES: readonly RoleDefinition[] = [
    { name: 'Director', description: 'Full system access and management capabilities' },
    { name: 'Sales Manager', description: 'Manage sales team and approve requests' },
    { name: 'Sales Executive', description: 'Create and manage client requests' },
    { name: 'Sales Coordinator', description: 'Coordinate sales activities and support' },
    { name: 'Admin', description: 'System administration and configuration' },
    { name: 'Viewer', description: 'Read-only access to system data' },
];
