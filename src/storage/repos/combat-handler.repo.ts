import Database from 'better-sqlite3';
import {
    type CombatHandlerRecord,
    CombatHandlerRecordSchema,
    type CombatHandlerSnapshot,
    CombatHandlerSnapshotSchema,
    type CombatLink,
    CombatLinkSchema
} from '../../schema/combat-handler.js';
import type { CombatLinkStore } from '../../engine/combat/types.js';

/**
 * Persisted combat handlers and the combatant -> handler side table.
 */
export class CombatHandlerRepository implements CombatLinkStore {
    constructor(private db: Database.Database) { }

    create(snapshot: CombatHandlerSnapshot): void {
        const valid = CombatHandlerSnapshotSchema.parse(snapshot);
        const now = new Date().toISOString();
        const stmt = this.db.prepare(`
      INSERT INTO combat_handlers (id, turn, combatant_ids, fleeing, defeated_ids, status, created_at, updated_at)
      VALUES (@id, @turn, @combatantIds, @fleeing, @defeatedIds, @status, @createdAt, @updatedAt)
    `);
        stmt.run({
            id: valid.id,
            turn: valid.turn,
            combatantIds: JSON.stringify(valid.combatantIds),
            fleeing: JSON.stringify(valid.fleeing),
            defeatedIds: JSON.stringify(valid.defeatedIds),
            status: valid.status,
            createdAt: now,
            updatedAt: now
        });
    }

    findById(id: string): CombatHandlerRecord | null {
        const stmt = this.db.prepare('SELECT * FROM combat_handlers WHERE id = ?');
        const row = stmt.get(id) as CombatHandlerRow | undefined;
        return row ? this.rowToRecord(row) : null;
    }

    list(): CombatHandlerRecord[] {
        const stmt = this.db.prepare('SELECT * FROM combat_handlers ORDER BY created_at, id');
        const rows = stmt.all() as CombatHandlerRow[];
        return rows.map(row => this.rowToRecord(row));
    }

    saveState(snapshot: CombatHandlerSnapshot): void {
        const valid = CombatHandlerSnapshotSchema.parse(snapshot);
        const stmt = this.db.prepare(`
            UPDATE combat_handlers
            SET turn = ?, combatant_ids = ?, fleeing = ?, defeated_ids = ?, status = ?, updated_at = ?
            WHERE id = ?
        `);
        stmt.run(
            valid.turn,
            JSON.stringify(valid.combatantIds),
            JSON.stringify(valid.fleeing),
            JSON.stringify(valid.defeatedIds),
            valid.status,
            new Date().toISOString(),
            valid.id
        );
    }

    /**
     * Delete a handler; its combatant links go with it
     */
    delete(handlerId: string): boolean {
        const stmt = this.db.prepare('DELETE FROM combat_handlers WHERE id = ?');
        const result = stmt.run(handlerId);
        return result.changes > 0;
    }

    getHandlerId(combatantId: string): string | null {
        const stmt = this.db.prepare('SELECT handler_id FROM combat_links WHERE combatant_id = ?');
        const row = stmt.get(combatantId) as { handler_id: string } | undefined;
        return row?.handler_id ?? null;
    }

    link(combatantId: string, handlerId: string): void {
        const stmt = this.db.prepare(`
      INSERT INTO combat_links (combatant_id, handler_id, linked_at)
      VALUES (?, ?, ?)
      ON CONFLICT(combatant_id) DO UPDATE SET handler_id = excluded.handler_id, linked_at = excluded.linked_at
    `);
        stmt.run(combatantId, handlerId, new Date().toISOString());
    }

    unlink(combatantId: string): void {
        const stmt = this.db.prepare('DELETE FROM combat_links WHERE combatant_id = ?');
        stmt.run(combatantId);
    }

    listLinks(handlerId: string): CombatLink[] {
        const stmt = this.db.prepare('SELECT * FROM combat_links WHERE handler_id = ? ORDER BY linked_at, combatant_id');
        const rows = stmt.all(handlerId) as CombatLinkRow[];
        return rows.map(row => CombatLinkSchema.parse({
            combatantId: row.combatant_id,
            handlerId: row.handler_id,
            linkedAt: row.linked_at
        }));
    }

    private rowToRecord(row: CombatHandlerRow): CombatHandlerRecord {
        return CombatHandlerRecordSchema.parse({
            id: row.id,
            turn: row.turn,
            combatantIds: JSON.parse(row.combatant_ids),
            fleeing: JSON.parse(row.fleeing),
            defeatedIds: JSON.parse(row.defeated_ids),
            status: row.status,
            createdAt: row.created_at,
            updatedAt: row.updated_at
        });
    }
}

interface CombatHandlerRow {
    id: string;
    turn: number;
    combatant_ids: string;
    fleeing: string;
    defeated_ids: string;
    status: string;
    created_at: string;
    updated_at: string;
}

interface CombatLinkRow {
    combatant_id: string;
    handler_id: string;
    linked_at: string;
}
