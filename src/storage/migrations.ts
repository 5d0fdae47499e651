import Database from 'better-sqlite3';

export function migrate(db: Database.Database) {
  db.exec(`
    CREATE TABLE IF NOT EXISTS combat_handlers(
      id TEXT PRIMARY KEY,
      turn INTEGER NOT NULL DEFAULT 0,
      combatant_ids TEXT NOT NULL, -- JSON array of combatant ids
      fleeing TEXT NOT NULL, -- JSON object: combatant id -> turn the flee started
      defeated_ids TEXT NOT NULL, -- JSON array
      status TEXT NOT NULL CHECK(status IN ('active', 'ended')),
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS combat_links(
      combatant_id TEXT PRIMARY KEY,
      handler_id TEXT NOT NULL,
      linked_at TEXT NOT NULL,
      FOREIGN KEY(handler_id) REFERENCES combat_handlers(id) ON DELETE CASCADE
    );

    CREATE INDEX IF NOT EXISTS idx_combat_links_handler ON combat_links(handler_id);
  `);
}
