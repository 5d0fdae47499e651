import { z } from 'zod';

export const CombatHandlerStatusSchema = z.enum(['active', 'ended']);

/**
 * Persisted view of a combat handler. Combatants are referenced by id; the
 * live objects stay with whoever owns them.
 */
export const CombatHandlerSnapshotSchema = z.object({
    id: z.string(),
    turn: z.number().int().min(0),
    combatantIds: z.array(z.string()),
    // combatant id -> turn the flee started
    fleeing: z.record(z.number().int().min(0)),
    defeatedIds: z.array(z.string()),
    status: CombatHandlerStatusSchema
});

export type CombatHandlerSnapshot = z.infer<typeof CombatHandlerSnapshotSchema>;

export const CombatHandlerRecordSchema = CombatHandlerSnapshotSchema.extend({
    createdAt: z.string().datetime(),
    updatedAt: z.string().datetime()
});

export type CombatHandlerRecord = z.infer<typeof CombatHandlerRecordSchema>;

export const CombatLinkSchema = z.object({
    combatantId: z.string(),
    handlerId: z.string(),
    linkedAt: z.string().datetime()
});

export type CombatLink = z.infer<typeof CombatLinkSchema>;
