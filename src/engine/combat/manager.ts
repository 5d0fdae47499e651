import { v4 as uuidv4 } from 'uuid';
import type { DieRoller } from '../../math/dice.js';
import type { CombatHandlerRepository } from '../../storage/repos/combat-handler.repo.js';
import { CombatHandler } from './handler.js';
import type { Combatant, EventEmitter, Location } from './types.js';

export interface CombatManagerOptions {
    repo: CombatHandlerRepository;
    roller: DieRoller;
    emitter?: EventEmitter;
    fleeTimeout?: number;
    dieSides?: number;
}

/**
 * Live handlers by id. Which handler a combatant belongs to is looked up
 * through the persisted link table, never through the combatant itself.
 */
export class CombatManager {
    private handlers: Map<string, CombatHandler> = new Map();

    constructor(private options: CombatManagerOptions) { }

    /**
     * The handler the combatant is fighting in, or a new one with the
     * combatant as its first participant.
     */
    getOrCreate(combatant: Combatant, location: Location): CombatHandler {
        const existing = this.getForCombatant(combatant);
        if (existing) return existing;

        const { repo } = this.options;
        const staleId = repo.getHandlerId(combatant.id);
        if (staleId) {
            // link to a handler this process no longer holds
            console.error(`[Combat] Dropping stale link of ${combatant.id} to handler ${staleId}`);
            repo.unlink(combatant.id);
        }

        const id = uuidv4();
        repo.create({
            id,
            turn: 0,
            combatantIds: [],
            fleeing: {},
            defeatedIds: [],
            status: 'active'
        });

        const handler = new CombatHandler({
            id,
            location,
            roller: this.options.roller,
            store: repo,
            emitter: this.options.emitter,
            fleeTimeout: this.options.fleeTimeout,
            dieSides: this.options.dieSides,
            onStop: () => this.handlers.delete(id)
        });
        this.handlers.set(id, handler);

        handler.addCombatants(combatant);
        console.error(`[Combat] Handler ${id} created for ${combatant.key}`);
        return handler;
    }

    get(id: string): CombatHandler | null {
        return this.handlers.get(id) || null;
    }

    getForCombatant(combatant: Combatant): CombatHandler | null {
        const id = this.options.repo.getHandlerId(combatant.id);
        return id ? this.get(id) : null;
    }

    isInCombat(combatant: Combatant): boolean {
        return this.getForCombatant(combatant) !== null;
    }

    list(): string[] {
        return Array.from(this.handlers.keys());
    }

    /**
     * Stop and forget a handler
     */
    delete(id: string): boolean {
        const handler = this.handlers.get(id);
        if (!handler) return false;
        handler.stopCombat();
        this.handlers.delete(id);
        return true;
    }

    clear(): void {
        for (const handler of Array.from(this.handlers.values())) {
            handler.stopCombat();
        }
        this.handlers.clear();
    }
}
