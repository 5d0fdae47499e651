import type { DieRoller } from '../../src/math/dice.js';
import type { Ability } from '../../src/schema/combat-action.js';
import { Equipment, WieldLocation, type Wieldable } from '../../src/engine/combat/equipment.js';
import type { Combatant, UsableItem } from '../../src/engine/combat/types.js';

/**
 * Every roll comes up the same number, whatever the range
 */
export class FixedDieRoller implements DieRoller {
    constructor(public value: number) { }

    roll(_min: number, _max: number): number {
        return this.value;
    }
}

/**
 * Rolls come from a script, in order. Running out is a test bug.
 */
export class ScriptedDieRoller implements DieRoller {
    readonly calls: Array<[number, number]> = [];

    constructor(private values: number[]) { }

    roll(min: number, max: number): number {
        this.calls.push([min, max]);
        const value = this.values.shift();
        if (value === undefined) {
            throw new Error('ScriptedDieRoller ran out of rolls');
        }
        return value;
    }
}

export interface TestCombatantOptions {
    side?: string;
    health?: number;
    maxHealth?: number;
    armor?: number;
    abilities?: Partial<Record<Ability, number>>;
}

export class TestCombatant implements Combatant {
    readonly equipment = new Equipment();
    readonly side: string;
    readonly maxHealth: number;
    readonly armor: number;
    health: number;
    readonly sendMessage = vi.fn<(text: string) => void>();
    readonly atDefeat = vi.fn<() => void>();
    abilities: Partial<Record<Ability, number>>;

    constructor(readonly id: string, readonly key: string, options: TestCombatantOptions = {}) {
        this.side = options.side ?? 'players';
        this.health = options.health ?? 4;
        this.maxHealth = options.maxHealth ?? 4;
        this.armor = options.armor ?? 11;
        this.abilities = options.abilities ?? {};
    }

    get weapon(): Wieldable {
        return this.equipment.weapon;
    }

    getAbility(ability: Ability): number {
        return this.abilities[ability] ?? 1;
    }

    isAllyOf(other: Combatant): boolean {
        return other instanceof TestCombatant && other.side === this.side;
    }
}

export class TestItem implements UsableItem {
    destroyed = false;
    readonly use = vi.fn<(user: Combatant, target: Combatant) => void>();

    constructor(readonly key: string, public remainingUses: number | null) { }

    destroy(): void {
        this.destroyed = true;
    }
}

export function makeWeapon(key: string, overrides: Partial<Wieldable> = {}): Wieldable {
    return {
        key,
        wieldSlot: WieldLocation.WEAPON_HAND,
        attackType: 'strength',
        defenseType: 'armor',
        damageRoll: '1d6',
        ...overrides
    };
}
