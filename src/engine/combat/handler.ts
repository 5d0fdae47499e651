import { getConfig } from '../../config.js';
import type { DieRoller } from '../../math/dice.js';
import {
    CombatActionSchema,
    type CombatActionDeclaration,
    type CombatActionInput,
    type CombatActionKey
} from '../../schema/combat-action.js';
import type { CombatHandlerSnapshot } from '../../schema/combat-handler.js';
import { createCombatAction } from './actions.js';
import { CombatHandlerError } from './errors.js';
import type { Combatant, CombatLinkStore, EventEmitter, Location } from './types.js';

export interface CombatHandlerOptions {
    id: string;
    location: Location;
    roller: DieRoller;
    store?: CombatLinkStore;
    emitter?: EventEmitter;
    /** Full turns a flee must survive before the combatant escapes (COMBAT_FLEE_TIMEOUT) */
    fleeTimeout?: number;
    /** COMBAT_DIE_SIDES */
    dieSides?: number;
    /** Called once, after the handler has torn itself down */
    onStop?: (handler: CombatHandler) => void;
}

export interface MsgOptions {
    from?: Combatant | null;
    exclude?: Combatant[];
}

type PairMatrix = Map<Combatant, Map<Combatant, boolean>>;

/**
 * Turn-based combat handler.
 *
 * Every combatant declares at most one action per turn with queueAction().
 * executeFullTurn() then resolves all declarations in join order against
 * live state, so an earlier action can change what a later one finds (a
 * combatant dropped to 0 health does not get to act later in the same turn).
 * After the turn the defeated and the escaped are swept out, and the handler
 * stops itself once no two opposing sides remain.
 */
export class CombatHandler {
    private _id: string | null;
    private destroyed = false;
    private store?: CombatLinkStore;
    private emitter?: EventEmitter;
    private onStop?: (handler: CombatHandler) => void;

    readonly location: Location;
    readonly roller: DieRoller;
    readonly fleeTimeout: number;
    readonly dieSides: number;

    turn = 0;
    /** Combatant -> pending declaration (at most one) */
    readonly combatants: Map<Combatant, CombatActionDeclaration[]> = new Map();
    /** actor -> target -> actor has advantage on its next roll against target */
    readonly advantageMatrix: PairMatrix = new Map();
    readonly disadvantageMatrix: PairMatrix = new Map();
    /** Combatant -> turn the flee started */
    readonly fleeingCombatants: Map<Combatant, number> = new Map();
    /** Out of the fight, through defeat or escape */
    readonly defeatedCombatants: Combatant[] = [];

    constructor(options: CombatHandlerOptions) {
        this._id = options.id;
        this.location = options.location;
        this.roller = options.roller;
        this.store = options.store;
        this.emitter = options.emitter;
        this.onStop = options.onStop;
        const config = getConfig();
        this.fleeTimeout = options.fleeTimeout ?? config.fleeTimeout;
        this.dieSides = options.dieSides ?? config.dieSides;
    }

    /** Persistence identity; null once combat has stopped */
    get id(): string | null {
        return this._id;
    }

    get isDestroyed(): boolean {
        return this.destroyed;
    }

    // ============================================================
    // LIFECYCLE
    // ============================================================

    /**
     * Nothing is added unless every combatant can join.
     */
    addCombatants(...combatants: Combatant[]): void {
        const id = this.assertActive();
        const joining = Array.from(new Set(combatants)).filter(c => !this.combatants.has(c));

        for (const combatant of joining) {
            const linkedTo = this.store?.getHandlerId(combatant.id) ?? null;
            if (linkedTo !== null && linkedTo !== id) {
                throw new CombatHandlerError(
                    'ALREADY_ENGAGED',
                    `${combatant.key} is already engaged in combat ${linkedTo}`
                );
            }
        }

        for (const combatant of joining) {
            this.combatants.set(combatant, []);
            this.store?.link(combatant.id, id);
            this.emitter?.publish('combat', {
                type: 'combatant_added',
                handlerId: id,
                combatantId: combatant.id
            });
        }
    }

    /**
     * Take a combatant out of every table. Does not check whether combat is over.
     */
    removeCombatant(combatant: Combatant): boolean {
        const id = this.assertActive();

        if (!this.combatants.delete(combatant)) return false;

        this.purgeMatrix(this.advantageMatrix, combatant);
        this.purgeMatrix(this.disadvantageMatrix, combatant);
        this.fleeingCombatants.delete(combatant);
        this.store?.unlink(combatant.id);

        this.emitter?.publish('combat', {
            type: 'combatant_removed',
            handlerId: id,
            combatantId: combatant.id
        });
        return true;
    }

    /**
     * Split everyone else into allies and enemies of the given combatant
     */
    getSides(combatant: Combatant): [Combatant[], Combatant[]] {
        this.assertActive();
        this.assertParticipant(combatant);

        const allies: Combatant[] = [];
        const enemies: Combatant[] = [];

        for (const other of this.combatants.keys()) {
            if (other === combatant) continue;
            if (combatant.isAllyOf(other)) {
                allies.push(other);
            } else {
                enemies.push(other);
            }
        }

        return [allies, enemies];
    }

    /**
     * Tear down. Clears all tables, drops every combatant link and the
     * persisted handler. Calling it again does nothing.
     */
    stopCombat(): void {
        if (this.destroyed) return;

        const id = this._id;
        const turns = this.turn;

        for (const combatant of this.combatants.keys()) {
            this.store?.unlink(combatant.id);
        }

        this.combatants.clear();
        this.advantageMatrix.clear();
        this.disadvantageMatrix.clear();
        this.fleeingCombatants.clear();
        this.defeatedCombatants.length = 0;

        this.destroyed = true;
        this._id = null;

        if (id) {
            this.store?.delete(id);
            this.emitter?.publish('combat', {
                type: 'combat_ended',
                handlerId: id,
                turns
            });
        }

        console.error(`[Combat] Handler ${id} stopped after ${turns} turn(s)`);
        this.onStop?.(this);
    }

    /**
     * Broadcast to the location, with every engaged combatant available
     * to `$You(name)` templates.
     */
    msg(text: string, options: MsgOptions = {}): void {
        this.assertActive();
        const mapping: Record<string, Combatant> = {};
        for (const combatant of this.combatants.keys()) {
            mapping[combatant.key] = combatant;
        }

        this.location.broadcast(text, {
            exclude: options.exclude ?? [],
            from: options.from ?? null,
            mapping
        });
    }

    // ============================================================
    // ACTION QUEUE
    // ============================================================

    /**
     * Declare the combatant's action for the coming turn. Replaces any
     * earlier declaration from the same combatant.
     */
    queueAction(combatant: Combatant, declaration: CombatActionInput): void {
        this.assertActive();
        const queue = this.assertParticipant(combatant);

        const action = CombatActionSchema.parse(declaration);
        queue.length = 0;
        queue.push(action);
    }

    /**
     * Resolve the combatant's pending declaration (doing nothing if none)
     */
    executeNextAction(combatant: Combatant): void {
        const id = this.assertActive();
        const queue = this.assertParticipant(combatant);

        const declaration: CombatActionDeclaration = queue.shift() ?? { key: 'nothing' };
        const action = createCombatAction(this, combatant, declaration);
        action.execute();

        this.emitter?.publish('combat', {
            type: 'action_executed',
            handlerId: id,
            combatantId: combatant.id,
            key: declaration.key,
            turn: this.turn
        });
    }

    /**
     * Resolve one full turn for everyone, sweep out the defeated and the
     * escaped, and stop if the fight is decided.
     */
    executeFullTurn(): void {
        const id = this.assertActive();

        for (const combatant of Array.from(this.combatants.keys())) {
            // stopped from outside between two actions
            if (this.destroyed) return;
            const queue = this.combatants.get(combatant);
            if (!queue) continue;

            if (combatant.health <= 0) {
                queue.length = 0;
                continue;
            }

            try {
                this.executeNextAction(combatant);
            } catch (e) {
                const message = e instanceof Error ? e.message : String(e);
                console.error(`[Combat] Action by ${combatant.key} failed in handler ${id}: ${message}`);
                if (this.destroyed) return;
                this.msg('$You() $conj(falter) and $conj(lose) the moment.', { from: combatant });
            }
        }

        if (this.destroyed) return;

        this.turn += 1;
        this.sweepDefeated(id);
        this.sweepEscaped(id);

        this.store?.saveState(this.snapshot());
        this.emitter?.publish('combat', {
            type: 'turn_executed',
            handlerId: id,
            turn: this.turn,
            combatantIds: Array.from(this.combatants.keys()).map(c => c.id)
        });

        this.checkEndOfCombat();
    }

    // ============================================================
    // ADVANTAGE / DISADVANTAGE
    // Pairs only exist between present combatants, so on a stopped
    // handler these read false and change nothing.
    // ============================================================

    giveAdvantage(recipient: Combatant, target: Combatant): void {
        this.setPair(this.advantageMatrix, recipient, target);
    }

    giveDisadvantage(recipient: Combatant, target: Combatant): void {
        this.setPair(this.disadvantageMatrix, recipient, target);
    }

    hasAdvantage(combatant: Combatant, target: Combatant): boolean {
        return this.advantageMatrix.get(combatant)?.get(target) ?? false;
    }

    hasDisadvantage(combatant: Combatant, target: Combatant): boolean {
        return this.disadvantageMatrix.get(combatant)?.get(target) ?? false;
    }

    loseAdvantage(combatant: Combatant, target: Combatant): void {
        this.advantageMatrix.get(combatant)?.delete(target);
    }

    loseDisadvantage(combatant: Combatant, target: Combatant): void {
        this.disadvantageMatrix.get(combatant)?.delete(target);
    }

    /**
     * Read and spend whatever the pair has banked. Every contested roll
     * between actor and target goes through here exactly once.
     */
    consumeRollModifiers(actor: Combatant, target: Combatant): { advantage: boolean; disadvantage: boolean } {
        const advantage = this.hasAdvantage(actor, target);
        const disadvantage = this.hasDisadvantage(actor, target);
        this.loseAdvantage(actor, target);
        this.loseDisadvantage(actor, target);
        return { advantage, disadvantage };
    }

    // ============================================================
    // FLEEING
    // ============================================================

    flee(combatant: Combatant): void {
        if (!this.combatants.has(combatant) || this.fleeingCombatants.has(combatant)) return;
        this.fleeingCombatants.set(combatant, this.turn);
    }

    unflee(combatant: Combatant): void {
        this.fleeingCombatants.delete(combatant);
    }

    // ============================================================
    // QUERIES
    // ============================================================

    /**
     * Action keys that make sense for the combatant right now
     */
    getAvailableActions(combatant: Combatant): CombatActionKey[] {
        const [, enemies] = this.getSides(combatant);
        const actions: CombatActionKey[] = ['nothing'];

        if (enemies.length > 0) {
            actions.push('attack', 'stunt');
        }
        actions.push('use', 'wield');
        if (!this.fleeingCombatants.has(combatant)) {
            actions.push('flee');
        }
        if (enemies.some(enemy => this.fleeingCombatants.has(enemy))) {
            actions.push('hinder');
        }

        return actions;
    }

    /**
     * Status block as seen by one combatant
     */
    getCombatSummary(combatant: Combatant): string {
        const [allies, enemies] = this.getSides(combatant);

        const describe = (c: Combatant, name: string) => {
            const fleeing = this.fleeingCombatants.has(c) ? ' (fleeing)' : '';
            return `${name} (${c.health} / ${c.maxHealth} health)${fleeing}`;
        };
        const list = (group: Combatant[]) =>
            group.length > 0 ? group.map(c => describe(c, c.key)).join(', ') : 'none';

        return [
            `Turn ${this.turn + 1}`,
            describe(combatant, 'You'),
            `Allies: ${list(allies)}`,
            `Enemies: ${list(enemies)}`
        ].join('\n');
    }

    snapshot(): CombatHandlerSnapshot {
        const fleeing: Record<string, number> = {};
        for (const [combatant, startedTurn] of this.fleeingCombatants) {
            fleeing[combatant.id] = startedTurn;
        }

        return {
            id: this._id ?? '',
            turn: this.turn,
            combatantIds: Array.from(this.combatants.keys()).map(c => c.id),
            fleeing,
            defeatedIds: this.defeatedCombatants.map(c => c.id),
            status: this.destroyed ? 'ended' : 'active'
        };
    }

    // ============================================================
    // INTERNALS
    // ============================================================

    private sweepDefeated(handlerId: string): void {
        for (const combatant of Array.from(this.combatants.keys())) {
            if (combatant.health > 0) continue;

            this.msg('$You() $conj(fall) and $conj(are) out of the fight.', { from: combatant });
            this.defeatedCombatants.push(combatant);
            this.removeCombatant(combatant);
            combatant.atDefeat?.();
            this.emitter?.publish('combat', {
                type: 'combatant_defeated',
                handlerId,
                combatantId: combatant.id,
                health: combatant.health
            });
        }
    }

    private sweepEscaped(handlerId: string): void {
        for (const [combatant, startedTurn] of Array.from(this.fleeingCombatants)) {
            // the flee must survive fleeTimeout full turns after the one it started in
            if (this.turn - startedTurn <= this.fleeTimeout) continue;

            this.msg('$You() successfully $conj(flee) from combat.', { from: combatant });
            this.defeatedCombatants.push(combatant);
            this.removeCombatant(combatant);
            this.emitter?.publish('combat', {
                type: 'combatant_fled',
                handlerId,
                combatantId: combatant.id
            });
        }
    }

    private checkEndOfCombat(): void {
        const remaining = Array.from(this.combatants.keys());

        if (remaining.length === 0) {
            this.msg('No one stands after the dust settles.');
            this.stopCombat();
            return;
        }

        const opposed = remaining.some(combatant => this.getSides(combatant)[1].length > 0);
        if (!opposed) {
            this.msg(`The combat is over. Still standing: ${remaining.map(c => c.key).join(', ')}.`);
            this.stopCombat();
        }
    }

    private setPair(matrix: PairMatrix, recipient: Combatant, target: Combatant): void {
        if (!this.combatants.has(recipient) || !this.combatants.has(target)) return;

        let row = matrix.get(recipient);
        if (!row) {
            row = new Map();
            matrix.set(recipient, row);
        }
        row.set(target, true);
    }

    private purgeMatrix(matrix: PairMatrix, combatant: Combatant): void {
        matrix.delete(combatant);
        for (const row of matrix.values()) {
            row.delete(combatant);
        }
    }

    private assertActive(): string {
        if (this.destroyed || this._id === null) {
            throw new CombatHandlerError('HANDLER_DESTROYED', 'Combat handler has already been stopped');
        }
        return this._id;
    }

    private assertParticipant(combatant: Combatant): CombatActionDeclaration[] {
        const queue = this.combatants.get(combatant);
        if (!queue) {
            throw new CombatHandlerError('INVALID_PARTICIPANT', `${combatant.key} is not part of this combat`);
        }
        return queue;
    }
}
