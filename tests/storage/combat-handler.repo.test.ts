import Database from 'better-sqlite3';
import { initDB } from '../../src/storage/db.js';
import { migrate } from '../../src/storage/migrations.js';
import { CombatHandlerRepository } from '../../src/storage/repos/combat-handler.repo.js';
import { closeDb, configureDbPath, getDb, getDbPath } from '../../src/storage/index.js';
import type { CombatHandlerSnapshot } from '../../src/schema/combat-handler.js';

function snapshot(overrides: Partial<CombatHandlerSnapshot> = {}): CombatHandlerSnapshot {
    return {
        id: 'handler-1',
        turn: 0,
        combatantIds: [],
        fleeing: {},
        defeatedIds: [],
        status: 'active',
        ...overrides
    };
}

describe('CombatHandlerRepository', () => {
    let db: Database.Database;
    let repo: CombatHandlerRepository;

    beforeEach(() => {
        db = initDB(':memory:');
        migrate(db);
        repo = new CombatHandlerRepository(db);
    });

    afterEach(() => {
        db.close();
    });

    it('should create and find a handler', () => {
        repo.create(snapshot({ combatantIds: ['char-1', 'mob-1'] }));

        const found = repo.findById('handler-1');

        expect(found).not.toBeNull();
        expect(found?.combatantIds).toEqual(['char-1', 'mob-1']);
        expect(found?.turn).toBe(0);
        expect(found?.status).toBe('active');
        expect(found?.createdAt).toBe(found?.updatedAt);
    });

    it('should return null for an unknown handler', () => {
        expect(repo.findById('missing')).toBeNull();
    });

    it('should reject invalid snapshots', () => {
        expect(() => repo.create(snapshot({ turn: -1 }))).toThrow();
        expect(repo.list()).toEqual([]);
    });

    it('should save turn state', () => {
        repo.create(snapshot());

        repo.saveState(snapshot({
            turn: 2,
            combatantIds: ['char-1'],
            fleeing: { 'char-1': 1 },
            defeatedIds: ['mob-1']
        }));

        const found = repo.findById('handler-1');
        expect(found?.turn).toBe(2);
        expect(found?.fleeing).toEqual({ 'char-1': 1 });
        expect(found?.defeatedIds).toEqual(['mob-1']);
    });

    it('should list handlers', () => {
        repo.create(snapshot({ id: 'handler-1' }));
        repo.create(snapshot({ id: 'handler-2' }));

        expect(repo.list().map(record => record.id).sort()).toEqual(['handler-1', 'handler-2']);
    });

    describe('Combatant links', () => {
        beforeEach(() => {
            repo.create(snapshot({ id: 'handler-1' }));
            repo.create(snapshot({ id: 'handler-2' }));
        });

        it('should link and unlink a combatant', () => {
            repo.link('char-1', 'handler-1');
            expect(repo.getHandlerId('char-1')).toBe('handler-1');

            repo.unlink('char-1');
            expect(repo.getHandlerId('char-1')).toBeNull();
        });

        it('should keep one link per combatant', () => {
            repo.link('char-1', 'handler-1');
            repo.link('char-1', 'handler-2');

            expect(repo.getHandlerId('char-1')).toBe('handler-2');
            expect(repo.listLinks('handler-1')).toEqual([]);
            expect(repo.listLinks('handler-2').map(link => link.combatantId)).toEqual(['char-1']);
        });

        it('should refuse a link to a missing handler', () => {
            expect(() => repo.link('char-1', 'missing')).toThrow();
        });

        it('should drop links with their handler', () => {
            repo.link('char-1', 'handler-1');
            repo.link('mob-1', 'handler-1');

            expect(repo.delete('handler-1')).toBe(true);

            expect(repo.getHandlerId('char-1')).toBeNull();
            expect(repo.getHandlerId('mob-1')).toBeNull();
            expect(repo.delete('handler-1')).toBe(false);
        });
    });
});

describe('Storage Layer', () => {
    it('should enable foreign keys', () => {
        const db = initDB(':memory:');
        expect(db.pragma('foreign_keys', { simple: true })).toBe(1);
        db.close();
    });

    it('should run migrations more than once', () => {
        const db = initDB(':memory:');
        migrate(db);
        migrate(db);

        const tables = db.prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name").all();
        expect(tables).toEqual([{ name: 'combat_handlers' }, { name: 'combat_links' }]);
        db.close();
    });
});

describe('getDb', () => {
    afterEach(() => {
        closeDb();
    });

    it('should open one migrated in-memory database under test', () => {
        const db = getDb();

        expect(getDbPath()).toBe(':memory:');
        expect(getDb()).toBe(db);
        expect(() => new CombatHandlerRepository(db).list()).not.toThrow();
    });

    it('should refuse a new path once the database is open', () => {
        configureDbPath(':memory:');
        getDb();

        expect(() => configureDbPath('other.db')).toThrow(
            'Cannot configure database path after database has been initialized'
        );
    });

    it('should open a fresh database after closing', () => {
        const first = getDb();
        closeDb();

        expect(first.open).toBe(false);
        expect(getDb()).not.toBe(first);
    });
});
