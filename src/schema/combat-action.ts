import { z } from 'zod';
import type { Combatant, UsableItem } from '../engine/combat/types.js';
import type { Wieldable } from '../engine/combat/equipment.js';

export const AbilitySchema = z.enum([
    'strength',
    'dexterity',
    'constitution',
    'intelligence',
    'wisdom',
    'charisma'
]);

export type Ability = z.infer<typeof AbilitySchema>;

/**
 * What a roll is made against: a flat armor value, or an ability defence (bonus + 10)
 */
export const DefenseTypeSchema = z.union([AbilitySchema, z.literal('armor')]);

export type DefenseType = z.infer<typeof DefenseTypeSchema>;

function isCombatant(value: unknown): value is Combatant {
    return typeof value === 'object' && value !== null
        && 'id' in value && typeof value.id === 'string'
        && 'getAbility' in value && typeof value.getAbility === 'function';
}

function isUsableItem(value: unknown): value is UsableItem {
    return typeof value === 'object' && value !== null
        && 'remainingUses' in value
        && 'use' in value && typeof value.use === 'function';
}

function isWieldable(value: unknown): value is Wieldable {
    return typeof value === 'object' && value !== null
        && 'wieldSlot' in value && typeof value.wieldSlot === 'string'
        && 'damageRoll' in value && typeof value.damageRoll === 'string';
}

const CombatantRefSchema = z.custom<Combatant>(isCombatant, { message: 'Expected a combatant' });
const UsableItemRefSchema = z.custom<UsableItem>(isUsableItem, { message: 'Expected a usable item' });
const WieldableRefSchema = z.custom<Wieldable>(isWieldable, { message: 'Expected a wieldable item' });

export const NothingActionSchema = z.object({
    key: z.literal('nothing')
});

export const AttackActionSchema = z.object({
    key: z.literal('attack'),
    target: CombatantRefSchema
});

/**
 * A stunt gives `recipient` advantage (or disadvantage) against `target`
 * on their next contested roll.
 */
export const StuntActionSchema = z.object({
    key: z.literal('stunt'),
    recipient: CombatantRefSchema,
    target: CombatantRefSchema,
    advantage: z.boolean().default(true),
    stuntType: AbilitySchema.default('strength'),
    defenseType: AbilitySchema.default('dexterity')
});

// target defaults to the user
export const UseItemActionSchema = z.object({
    key: z.literal('use'),
    item: UsableItemRefSchema,
    target: CombatantRefSchema.optional()
});

export const WieldActionSchema = z.object({
    key: z.literal('wield'),
    item: WieldableRefSchema
});

export const FleeActionSchema = z.object({
    key: z.literal('flee')
});

export const HinderActionSchema = z.object({
    key: z.literal('hinder'),
    target: CombatantRefSchema
});

export const CombatActionSchema = z.discriminatedUnion('key', [
    NothingActionSchema,
    AttackActionSchema,
    StuntActionSchema,
    UseItemActionSchema,
    WieldActionSchema,
    FleeActionSchema,
    HinderActionSchema
]);

/** Validated action declaration, as stored in a combatant's queue */
export type CombatActionDeclaration = z.infer<typeof CombatActionSchema>;

/** Action declaration as callers write it (defaults not yet applied) */
export type CombatActionInput = z.input<typeof CombatActionSchema>;

export type CombatActionKey = CombatActionDeclaration['key'];

export type NothingActionDeclaration = z.infer<typeof NothingActionSchema>;
export type AttackActionDeclaration = z.infer<typeof AttackActionSchema>;
export type StuntActionDeclaration = z.infer<typeof StuntActionSchema>;
export type UseItemActionDeclaration = z.infer<typeof UseItemActionSchema>;
export type WieldActionDeclaration = z.infer<typeof WieldActionSchema>;
export type FleeActionDeclaration = z.infer<typeof FleeActionSchema>;
export type HinderActionDeclaration = z.infer<typeof HinderActionSchema>;

export const COMBAT_ACTION_KEYS: readonly CombatActionKey[] = [
    'nothing',
    'attack',
    'stunt',
    'use',
    'wield',
    'flee',
    'hinder'
];
