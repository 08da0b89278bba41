import {z} from 'zod';

/**
 * Outcome of a statement run without RETURNING.
 * `tag` is the backend status string, e.g. `UPDATE 1` or `INSERT 0 1`.
 */
export const CommandStatusZ = z.object({
    command: z.string(),
    rowCount: z.number().int().min(0),
    tag: z.string(),
});

export const PoolStateZ = z.enum(['uninitialized', 'connecting', 'connected']);

export const HealthViewZ = z.object({
    status: z.literal('ok'),
    database: PoolStateZ,
});

export type CommandStatus = z.infer<typeof CommandStatusZ>;
export type PoolState = z.infer<typeof PoolStateZ>;
export type HealthView = z.infer<typeof HealthViewZ>;
