import Database from 'better-sqlite3';
import { initDB } from '../../src/storage/db.js';
import { migrate } from '../../src/storage/migrations.js';
import { CombatHandlerRepository } from '../../src/storage/repos/combat-handler.repo.js';
import { CombatManager } from '../../src/engine/combat/manager.js';
import { PubSub } from '../../src/engine/pubsub.js';
import { Room } from '../../src/engine/world/room.js';
import { FixedDieRoller, TestCombatant } from './fixtures.js';

describe('CombatManager', () => {
    let db: Database.Database;
    let repo: CombatHandlerRepository;
    let manager: CombatManager;
    let room: Room;
    let hero: TestCombatant;
    let monster: TestCombatant;

    beforeEach(() => {
        db = initDB(':memory:');
        migrate(db);
        repo = new CombatHandlerRepository(db);
        manager = new CombatManager({ repo, roller: new FixedDieRoller(10) });
        room = new Room('testroom');
        hero = new TestCombatant('char-1', 'testchar');
        monster = new TestCombatant('mob-1', 'testmonster', { side: 'monsters' });
        room.enter(hero);
        room.enter(monster);
    });

    afterEach(() => {
        db.close();
    });

    it('should create and persist a handler for a new combatant', () => {
        const handler = manager.getOrCreate(hero, room);
        const id = handler.id ?? '';

        expect(manager.list()).toEqual([id]);
        expect(manager.get(id)).toBe(handler);
        expect(repo.findById(id)?.turn).toBe(0);
        expect(repo.getHandlerId('char-1')).toBe(id);
        expect(Array.from(handler.combatants.keys())).toEqual([hero]);
    });

    it('should return the handler the combatant is already in', () => {
        const handler = manager.getOrCreate(hero, room);
        handler.addCombatants(monster);

        expect(manager.getOrCreate(monster, room)).toBe(handler);
        expect(manager.getForCombatant(monster)).toBe(handler);
        expect(manager.list()).toHaveLength(1);
    });

    it('should report who is in combat', () => {
        manager.getOrCreate(hero, room);

        expect(manager.isInCombat(hero)).toBe(true);
        expect(manager.isInCombat(monster)).toBe(false);
        expect(manager.getForCombatant(monster)).toBeNull();
    });

    it('should drop a link to a handler it does not hold', () => {
        repo.create({ id: 'stale-handler', turn: 3, combatantIds: ['char-1'], fleeing: {}, defeatedIds: [], status: 'active' });
        repo.link('char-1', 'stale-handler');

        const handler = manager.getOrCreate(hero, room);

        expect(handler.id).not.toBe('stale-handler');
        expect(repo.getHandlerId('char-1')).toBe(handler.id);
    });

    it('should pass rule settings to new handlers', () => {
        const tuned = new CombatManager({ repo, roller: new FixedDieRoller(10), fleeTimeout: 3, dieSides: 12 });

        const handler = tuned.getOrCreate(hero, room);

        expect(handler.fleeTimeout).toBe(3);
        expect(handler.dieSides).toBe(12);
    });

    it('should forget a handler once its combat ends', () => {
        const handler = manager.getOrCreate(hero, room);
        handler.addCombatants(monster);
        const id = handler.id ?? '';

        monster.health = 0;
        handler.executeFullTurn();

        expect(handler.isDestroyed).toBe(true);
        expect(manager.get(id)).toBeNull();
        expect(manager.isInCombat(hero)).toBe(false);
        expect(repo.findById(id)).toBeNull();
    });

    it('should stop a handler on delete', () => {
        const handler = manager.getOrCreate(hero, room);
        const id = handler.id ?? '';

        expect(manager.delete(id)).toBe(true);
        expect(handler.isDestroyed).toBe(true);
        expect(manager.delete(id)).toBe(false);
    });

    it('should stop every handler on clear', () => {
        const first = manager.getOrCreate(hero, room);
        const second = manager.getOrCreate(monster, room);

        manager.clear();

        expect(first.isDestroyed).toBe(true);
        expect(second.isDestroyed).toBe(true);
        expect(manager.list()).toEqual([]);
        expect(repo.list()).toEqual([]);
    });

    it('should publish through the configured emitter', () => {
        const pubsub = new PubSub();
        const events = vi.fn();
        pubsub.subscribe('combat', events);
        const publishing = new CombatManager({ repo, roller: new FixedDieRoller(10), emitter: pubsub });

        const handler = publishing.getOrCreate(hero, room);

        expect(events).toHaveBeenCalledWith({ type: 'combatant_added', handlerId: handler.id, combatantId: 'char-1' });
    });
});
