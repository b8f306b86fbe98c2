import { z } from 'zod';

export const HealthCheckSchema = z.object({
    status: z.string(),
    timestamp: z.string()
});

export type HealthCheckDto = z.infer<typeof HealthCheckSchema>;

// Custom lobbies (roles, pool status)
export * from './lol-custom.schema.js';

// Linked Riot accounts
export * from './accounts.schema.js';
