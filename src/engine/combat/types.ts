import type { Ability } from '../../schema/combat-action.js';
import type { CombatHandlerSnapshot } from '../../schema/combat-handler.js';
import type { Equipment, Wieldable } from './equipment.js';

/**
 * A participant in combat. Owned elsewhere (character sheet, monster
 * template); the handler only reads and mutates it through this contract.
 */
export interface Combatant {
    readonly id: string;
    /** Display name, also the key used in message templates */
    readonly key: string;
    /** May go negative */
    health: number;
    readonly maxHealth: number;
    readonly armor: number;
    readonly equipment: Equipment;
    /** Derived from equipment slots */
    readonly weapon: Wieldable;
    getAbility(ability: Ability): number;
    isAllyOf(other: Combatant): boolean;
    sendMessage(text: string): void;
    /** Called once when the combatant is swept out of combat at health <= 0 */
    atDefeat?(): void;
}

/**
 * A consumable or otherwise usable item (potion, scroll, wand)
 */
export interface UsableItem {
    readonly key: string;
    /** null means unlimited */
    remainingUses: number | null;
    readonly destroyed: boolean;
    use(user: Combatant, target: Combatant): void;
    destroy(): void;
}

export interface BroadcastOptions {
    exclude: Combatant[];
    from: Combatant | null;
    /** Names usable in `$You(name)` templates */
    mapping: Record<string, Combatant>;
}

export interface Location {
    broadcast(text: string, options: BroadcastOptions): void;
}

/**
 * Side table linking combatants to the handler they are engaged in.
 */
export interface CombatLinkStore {
    getHandlerId(combatantId: string): string | null;
    link(combatantId: string, handlerId: string): void;
    unlink(combatantId: string): void;
    saveState(snapshot: CombatHandlerSnapshot): void;
    delete(handlerId: string): boolean;
}

export interface EventEmitter {
    publish(topic: string, payload: unknown): void;
}
