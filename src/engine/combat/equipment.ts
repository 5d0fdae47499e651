import type { Ability, DefenseType } from '../../schema/combat-action.js';

export const WieldLocation = {
    WEAPON_HAND: 'weapon_hand',
    SHIELD_HAND: 'shield_hand',
    TWO_HANDS: 'two_hands',
    BODY: 'body',
    HEAD: 'head',
    BACKPACK: 'backpack'
} as const;

export type WieldLocation = typeof WieldLocation[keyof typeof WieldLocation];

export type EquipSlot = Exclude<WieldLocation, 'backpack'>;

/**
 * Anything that can be wielded or worn: weapons, shields, armor, rune stones
 */
export interface Wieldable {
    readonly key: string;
    readonly wieldSlot: EquipSlot;
    readonly attackType: Ability;
    readonly defenseType: DefenseType;
    /** Dice notation, e.g. "1d6" */
    readonly damageRoll: string;
}

export const BARE_HANDS: Wieldable = {
    key: 'Empty Fists',
    wieldSlot: WieldLocation.WEAPON_HAND,
    attackType: 'strength',
    defenseType: 'armor',
    damageRoll: '1d4'
};

const EQUIP_SLOTS: readonly EquipSlot[] = ['weapon_hand', 'shield_hand', 'two_hands', 'body', 'head'];

export type EquipmentSlots = Record<EquipSlot, Wieldable | null>;

/**
 * Equipment slots of one combatant.
 *
 * Exclusivity:
 * - two_hands cannot coexist with weapon_hand or shield_hand
 * - body and head hold one item each
 * Anything pushed out of a slot goes to the backpack.
 */
export class Equipment {
    readonly slots: EquipmentSlots = {
        weapon_hand: null,
        shield_hand: null,
        two_hands: null,
        body: null,
        head: null
    };
    readonly backpack: Wieldable[] = [];

    get weapon(): Wieldable {
        return this.slots.two_hands ?? this.slots.weapon_hand ?? BARE_HANDS;
    }

    isEquipped(item: Wieldable): boolean {
        return Object.values(this.slots).includes(item);
    }

    /**
     * Equip an item into its slot, displacing whatever conflicts with it.
     * Equipping an item that is already equipped changes nothing.
     */
    move(item: Wieldable): void {
        if (this.isEquipped(item)) return;

        this.removeFromBackpack(item);

        const slot = item.wieldSlot;
        let displaced: Array<Wieldable | null> = [];

        switch (slot) {
            case WieldLocation.TWO_HANDS:
                displaced = [this.slots.weapon_hand, this.slots.shield_hand, this.slots.two_hands];
                this.slots.weapon_hand = null;
                this.slots.shield_hand = null;
                break;
            case WieldLocation.WEAPON_HAND:
            case WieldLocation.SHIELD_HAND:
                displaced = [this.slots.two_hands, this.slots[slot]];
                this.slots.two_hands = null;
                break;
            case WieldLocation.BODY:
            case WieldLocation.HEAD:
                displaced = [this.slots[slot]];
                break;
        }

        this.slots[slot] = item;

        for (const obj of displaced) {
            if (obj) this.backpack.push(obj);
        }
    }

    /**
     * Take an item out of its slot and put it in the backpack
     */
    unequip(item: Wieldable): boolean {
        for (const slot of EQUIP_SLOTS) {
            if (this.slots[slot] === item) {
                this.slots[slot] = null;
                this.backpack.push(item);
                return true;
            }
        }
        return false;
    }

    private removeFromBackpack(item: Wieldable): void {
        const index = this.backpack.indexOf(item);
        if (index !== -1) this.backpack.splice(index, 1);
    }
}
