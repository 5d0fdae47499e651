import type { DieRoller } from '../../math/dice.js';
import type { Ability, DefenseType } from '../../schema/combat-action.js';
import type { Combatant } from './types.js';

export const DEFAULT_DIE_SIDES = 20;

/** Ability defences are bonus + 10 */
export const DEFENSE_BASE = 10;

export type CheckQuality = 'critical-success' | 'critical-failure' | null;

export interface RollOptions {
    advantage?: boolean;
    disadvantage?: boolean;
    dieSides?: number;
}

export interface D20Roll {
    /** The die that counts */
    roll: number;
    /** Every die thrown (two with advantage or disadvantage) */
    rolls: number[];
}

/**
 * Result of a check with all dice exposed
 */
export interface CheckResult {
    roll: number;
    rolls: number[];
    bonus: number;
    total: number;
    target: number;
    success: boolean;
    quality: CheckQuality;
}

export interface SavingThrowOptions extends RollOptions {
    bonus: number;
    target: number;
}

export interface OpposedCheckOptions extends RollOptions {
    attackType: Ability;
    defenseType: DefenseType;
}

/**
 * Roll the check die. Advantage keeps the higher of two dice, disadvantage
 * the lower; having both is the same as having neither.
 */
export function rollD20(roller: DieRoller, options: RollOptions = {}): D20Roll {
    const sides = options.dieSides ?? DEFAULT_DIE_SIDES;
    const advantage = !!options.advantage && !options.disadvantage;
    const disadvantage = !!options.disadvantage && !options.advantage;

    if (!advantage && !disadvantage) {
        const roll = roller.roll(1, sides);
        return { roll, rolls: [roll] };
    }

    const first = roller.roll(1, sides);
    const second = roller.roll(1, sides);
    return {
        roll: advantage ? Math.max(first, second) : Math.min(first, second),
        rolls: [first, second]
    };
}

/**
 * die + bonus must beat target; ties go to the defender.
 * A natural max always succeeds, a natural 1 always fails.
 */
export function savingThrow(roller: DieRoller, options: SavingThrowOptions): CheckResult {
    const sides = options.dieSides ?? DEFAULT_DIE_SIDES;
    const { roll, rolls } = rollD20(roller, options);
    const total = roll + options.bonus;

    let quality: CheckQuality = null;
    let success = total > options.target;

    if (roll === sides) {
        quality = 'critical-success';
        success = true;
    } else if (roll === 1) {
        quality = 'critical-failure';
        success = false;
    }

    return {
        roll,
        rolls,
        bonus: options.bonus,
        total,
        target: options.target,
        success,
        quality
    };
}

export function defenseValue(defender: Combatant, defenseType: DefenseType): number {
    if (defenseType === 'armor') {
        return defender.armor;
    }
    return defender.getAbility(defenseType) + DEFENSE_BASE;
}

/**
 * Attacker's ability check against the defender's defence
 */
export function opposedSavingThrow(
    roller: DieRoller,
    attacker: Combatant,
    defender: Combatant,
    options: OpposedCheckOptions
): CheckResult {
    return savingThrow(roller, {
        bonus: attacker.getAbility(options.attackType),
        target: defenseValue(defender, options.defenseType),
        advantage: options.advantage,
        disadvantage: options.disadvantage,
        dieSides: options.dieSides
    });
}

/**
 * Short breakdown for combat messages, e.g. "(rolled 11+1 = 12 vs 11)"
 */
export function describeCheck(result: CheckResult): string {
    const sign = result.bonus >= 0 ? '+' : '-';
    const dice = result.rolls.length > 1 ? `[${result.rolls.join(', ')}] ${result.roll}` : `${result.roll}`;
    let text = `(rolled ${dice}${sign}${Math.abs(result.bonus)} = ${result.total} vs ${result.target})`;
    if (result.quality === 'critical-success') text += ' Critical success!';
    if (result.quality === 'critical-failure') text += ' Critical failure!';
    return text;
}
