import Database from 'better-sqlite3';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { checkDatabaseIntegrity, initDB } from '../../src/storage/db.js';
import { migrate } from '../../src/storage/migrations.js';

describe('Storage Layer', () => {
    let dir: string;
    let dbPath: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'combat-db-'));
        dbPath = path.join(dir, 'combat.db');
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    function tableNames(db: Database.Database): unknown[] {
        return db.prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name").all();
    }

    it('should open a file database in WAL mode', () => {
        const db = initDB(dbPath);

        expect(db.pragma('journal_mode', { simple: true })).toBe('wal');
        expect(db.pragma('foreign_keys', { simple: true })).toBe(1);
        expect(checkDatabaseIntegrity(db)).toEqual({ ok: true, errors: [] });
        db.close();
    });

    it('should replace a file that is not a database', () => {
        fs.writeFileSync(dbPath, 'definitely not sqlite '.repeat(400));

        const db = initDB(dbPath);
        migrate(db);

        expect(db.open).toBe(true);
        expect(tableNames(db)).toEqual([{ name: 'combat_handlers' }, { name: 'combat_links' }]);
        db.close();
    });

    it('should replace a database that fails the integrity check', () => {
        const seeded = new Database(dbPath);
        seeded.exec('CREATE TABLE filler(value TEXT)');
        const insert = seeded.prepare('INSERT INTO filler (value) VALUES (?)');
        for (let i = 0; i < 20; i++) {
            insert.run(`row-${i}`);
        }
        const pageSize = Number(seeded.pragma('page_size', { simple: true }));
        seeded.close();

        // the filler table's root is page 2; the header on page 1 stays intact
        const fd = fs.openSync(dbPath, 'r+');
        fs.writeSync(fd, Buffer.alloc(pageSize, 0xff), 0, pageSize, pageSize);
        fs.closeSync(fd);

        const db = initDB(dbPath);

        expect(tableNames(db)).toEqual([]);
        expect(checkDatabaseIntegrity(db)).toEqual({ ok: true, errors: [] });
        db.close();
    });

    it('should rethrow errors that are not corruption', () => {
        const missingDir = path.join(dir, 'missing', 'combat.db');

        expect(() => initDB(missingDir)).toThrow();
    });
});
