import { z } from 'zod';

/**
 * Runtime configuration, read from the environment.
 *
 * - COMBAT_DB_PATH: SQLite file for handler identities and combatant links
 *   (`:memory:` when NODE_ENV=test)
 * - COMBAT_FLEE_TIMEOUT: turns a flee must last before the combatant escapes
 * - COMBAT_DIE_SIDES: sides of the check die (d20 by default)
 * - COMBAT_TURN_INTERVAL_MS: delay between turns when a ticker drives combat
 */
export const CombatConfigSchema = z.object({
    dbPath: z.string().min(1),
    fleeTimeout: z.coerce.number().int().min(1),
    dieSides: z.coerce.number().int().min(2),
    turnIntervalMs: z.coerce.number().int().positive()
});

export type CombatConfig = z.infer<typeof CombatConfigSchema>;

export const DEFAULT_CONFIG: CombatConfig = {
    dbPath: 'combat.db',
    fleeTimeout: 1,
    dieSides: 20,
    turnIntervalMs: 30000
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CombatConfig {
    const result = CombatConfigSchema.safeParse({
        dbPath: env.COMBAT_DB_PATH || (env.NODE_ENV === 'test' ? ':memory:' : DEFAULT_CONFIG.dbPath),
        fleeTimeout: env.COMBAT_FLEE_TIMEOUT ?? DEFAULT_CONFIG.fleeTimeout,
        dieSides: env.COMBAT_DIE_SIDES ?? DEFAULT_CONFIG.dieSides,
        turnIntervalMs: env.COMBAT_TURN_INTERVAL_MS ?? DEFAULT_CONFIG.turnIntervalMs
    });

    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid combat configuration: ${issues}`);
    }

    return result.data;
}

let cached: CombatConfig | null = null;

export function getConfig(): CombatConfig {
    if (!cached) cached = loadConfig();
    return cached;
}

/**
 * Drop the cached configuration so the next getConfig() re-reads the environment.
 */
export function resetConfig(): void {
    cached = null;
}
