import { rollDice } from '../../math/dice.js';
import type {
    Ability,
    AttackActionDeclaration,
    CombatActionDeclaration,
    DefenseType,
    FleeActionDeclaration,
    HinderActionDeclaration,
    NothingActionDeclaration,
    StuntActionDeclaration,
    UseItemActionDeclaration,
    WieldActionDeclaration
} from '../../schema/combat-action.js';
import type { CombatHandler } from './handler.js';
import { type CheckResult, describeCheck, opposedSavingThrow } from './rules.js';
import type { Combatant } from './types.js';

/**
 * Base for all action resolvers. One is built per declaration, run once,
 * and thrown away.
 */
export abstract class CombatAction<T extends CombatActionDeclaration = CombatActionDeclaration> {
    constructor(
        protected readonly handler: CombatHandler,
        protected readonly combatant: Combatant,
        protected readonly declaration: T
    ) { }

    get key(): T['key'] {
        return this.declaration.key;
    }

    abstract execute(): void;

    /**
     * Whether the action can still be carried out (the item exists, etc)
     */
    canUse(): boolean {
        return true;
    }

    /**
     * Broadcast a `$You()`-style template with this combatant as sender
     */
    msg(text: string): void {
        this.handler.msg(text, { from: this.combatant });
    }

    giveAdvantage(recipient: Combatant, target: Combatant): void {
        this.handler.giveAdvantage(recipient, target);
    }

    giveDisadvantage(recipient: Combatant, target: Combatant): void {
        this.handler.giveDisadvantage(recipient, target);
    }

    hasAdvantage(combatant: Combatant, target: Combatant): boolean {
        return this.handler.hasAdvantage(combatant, target);
    }

    hasDisadvantage(combatant: Combatant, target: Combatant): boolean {
        return this.handler.hasDisadvantage(combatant, target);
    }

    loseAdvantage(combatant: Combatant, target: Combatant): void {
        this.handler.loseAdvantage(combatant, target);
    }

    loseDisadvantage(combatant: Combatant, target: Combatant): void {
        this.handler.loseDisadvantage(combatant, target);
    }

    flee(combatant: Combatant): void {
        this.handler.flee(combatant);
    }

    unflee(combatant: Combatant): void {
        this.handler.unflee(combatant);
    }

    /**
     * Still in this combat and on their feet
     */
    protected isActiveTarget(target: Combatant): boolean {
        return this.handler.combatants.has(target) && target.health > 0;
    }

    /**
     * Contested roll of this combatant against a defender, spending any
     * advantage/disadvantage banked for the pair.
     */
    protected rollAgainst(defender: Combatant, attackType: Ability, defenseType: DefenseType): CheckResult {
        const { advantage, disadvantage } = this.handler.consumeRollModifiers(this.combatant, defender);
        return opposedSavingThrow(this.handler.roller, this.combatant, defender, {
            attackType,
            defenseType,
            advantage,
            disadvantage,
            dieSides: this.handler.dieSides
        });
    }
}

export class CombatActionDoNothing extends CombatAction<NothingActionDeclaration> {
    execute(): void {
        this.msg('$You() $conj(hesitate).');
    }
}

export class CombatActionAttack extends CombatAction<AttackActionDeclaration> {
    execute(): void {
        const { target } = this.declaration;

        if (!this.isActiveTarget(target)) {
            this.msg(`$You() $conj(look) for ${target.key}, but they are no longer in the fight.`);
            return;
        }

        const weapon = this.combatant.weapon;
        const result = this.rollAgainst(target, weapon.attackType, weapon.defenseType);

        if (!result.success) {
            this.msg(`$You() $conj(attack) $you(${target.key}) with ${weapon.key}, but $conj(miss). ${describeCheck(result)}`);
            return;
        }

        let damage = rollDice(this.handler.roller, weapon.damageRoll).total;
        if (result.quality === 'critical-success') {
            // critical hits roll the damage dice twice
            damage += rollDice(this.handler.roller, weapon.damageRoll).total;
        }
        damage = Math.max(0, damage);

        target.health -= damage;
        this.msg(`$You() $conj(hit) $you(${target.key}) with ${weapon.key} for ${damage} damage. ${describeCheck(result)}`);
    }
}

/**
 * Trip, feint, distract. On success the recipient banks advantage (or
 * disadvantage) against the target.
 */
export class CombatActionStunt extends CombatAction<StuntActionDeclaration> {
    execute(): void {
        const { recipient, target, advantage, stuntType, defenseType } = this.declaration;

        if (!this.isActiveTarget(target) || !this.handler.combatants.has(recipient)) {
            this.msg(`$You() $conj(prepare) a stunt, but the moment has passed.`);
            return;
        }

        // whoever stands to lose from the stunt resists it
        const defender = recipient === target || advantage ? target : recipient;
        const result = this.rollAgainst(defender, stuntType, defenseType);

        if (!result.success) {
            this.msg(`$You() $conj(attempt) a stunt on $you(${defender.key}), but $conj(fail). ${describeCheck(result)}`);
            return;
        }

        if (advantage) {
            this.giveAdvantage(recipient, target);
        } else {
            this.giveDisadvantage(recipient, target);
        }

        const effect = advantage ? 'Advantage' : 'Disadvantage';
        this.msg(
            `$You() $conj(pull) off a stunt on $you(${defender.key}). ${describeCheck(result)} ` +
            `${effect} for $you(${recipient.key}) against $you(${target.key}).`
        );
    }
}

export class CombatActionUseItem extends CombatAction<UseItemActionDeclaration> {
    canUse(): boolean {
        const { item } = this.declaration;
        return !item.destroyed && (item.remainingUses === null || item.remainingUses > 0);
    }

    execute(): void {
        const { item } = this.declaration;
        const target = this.declaration.target ?? this.combatant;

        if (!this.canUse()) {
            this.msg(`$You() $conj(reach) for ${item.key}, but it is used up.`);
            return;
        }
        if (!this.handler.combatants.has(target)) {
            this.msg(`$You() $conj(hold) ${item.key}, but ${target.key} is out of reach.`);
            return;
        }

        item.use(this.combatant, target);

        if (item.remainingUses !== null) {
            item.remainingUses -= 1;
            if (item.remainingUses <= 0) {
                item.destroy();
            }
        }

        if (target === this.combatant) {
            this.msg(`$You() $conj(use) ${item.key}.`);
        } else {
            this.msg(`$You() $conj(use) ${item.key} on $you(${target.key}).`);
        }
    }
}

export class CombatActionWield extends CombatAction<WieldActionDeclaration> {
    execute(): void {
        const { item } = this.declaration;
        const equipment = this.combatant.equipment;

        if (equipment.isEquipped(item)) {
            this.msg(`$You() already $conj(wield) ${item.key}.`);
            return;
        }

        equipment.move(item);
        this.msg(`$You() $conj(wield) ${item.key}.`);
    }
}

/**
 * Start (or keep up) a retreat. The handler lets the combatant go at the end
 * of the turn once the flee has survived fleeTimeout further turns without
 * being hindered; with the default of 1 the second flee completes the escape.
 */
export class CombatActionFlee extends CombatAction<FleeActionDeclaration> {
    execute(): void {
        const handler = this.handler;

        this.flee(this.combatant);

        const startedTurn = handler.fleeingCombatants.get(this.combatant) ?? handler.turn;
        // turns still to survive after this one
        const turnsLeft = startedTurn + handler.fleeTimeout - handler.turn;

        if (turnsLeft > 0) {
            this.msg(
                `$You() $conj(retreat), exposed to attack while doing so ` +
                `(will escape in ${turnsLeft} $pluralize(turn, ${turnsLeft})).`
            );
        } else {
            this.msg('$You() $conj(retreat) and $conj(are) about to get away.');
        }
    }
}

/**
 * Contest a fleeing combatant. Success cancels their retreat.
 */
export class CombatActionHinder extends CombatAction<HinderActionDeclaration> {
    execute(): void {
        const { target } = this.declaration;

        if (!this.isActiveTarget(target) || !this.handler.fleeingCombatants.has(target)) {
            this.msg(`$You() $conj(move) to cut off ${target.key}, who is not trying to escape.`);
            return;
        }

        const result = this.rollAgainst(target, 'dexterity', 'dexterity');

        if (result.success) {
            this.unflee(target);
            this.msg(`$You() $conj(block) the retreat of $you(${target.key}). ${describeCheck(result)}`);
        } else {
            this.msg(`$You() $conj(fail) to stop $you(${target.key}) from retreating. ${describeCheck(result)}`);
        }
    }
}

function assertNever(value: never): never {
    throw new Error(`Unhandled combat action: ${String(value)}`);
}

/**
 * Build the resolver for a declaration
 */
export function createCombatAction(
    handler: CombatHandler,
    combatant: Combatant,
    declaration: CombatActionDeclaration
): CombatAction {
    switch (declaration.key) {
        case 'nothing':
            return new CombatActionDoNothing(handler, combatant, declaration);
        case 'attack':
            return new CombatActionAttack(handler, combatant, declaration);
        case 'stunt':
            return new CombatActionStunt(handler, combatant, declaration);
        case 'use':
            return new CombatActionUseItem(handler, combatant, declaration);
        case 'wield':
            return new CombatActionWield(handler, combatant, declaration);
        case 'flee':
            return new CombatActionFlee(handler, combatant, declaration);
        case 'hinder':
            return new CombatActionHinder(handler, combatant, declaration);
        default:
            return assertNever(declaration);
    }
}
