/**
 * Queue database schema and its one-shot upgrade from the legacy row shape.
 *
 * Version 1 is the legacy layout whose `tasks` table also carried `mode`
 * and `inbox_path`. Version 2 is the current layout. The upgrade runs once,
 * inside a single transaction, when the store opens the database.
 */

import type Database from "better-sqlite3";

export const SCHEMA_VERSION = 2;

/** Columns whose presence marks a `tasks` table as the legacy shape. */
export const LEGACY_TASK_COLUMNS = ["mode", "inbox_path"] as const;

function tasksTableSql(name: string): string {
  return `
    CREATE TABLE IF NOT EXISTS ${name} (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      chat_id INTEGER NOT NULL,
      user_id INTEGER NOT NULL,
      username TEXT NOT NULL DEFAULT '',
      text TEXT NOT NULL DEFAULT '',
      attachments_json TEXT NOT NULL DEFAULT '[]',
      status TEXT NOT NULL,
      created_at TEXT NOT NULL,
      started_at TEXT,
      finished_at TEXT,
      result_text TEXT,
      error_text TEXT
    )
  `;
}

const CURRENT_TASK_COLUMNS = [
  "id",
  "chat_id",
  "user_id",
  "username",
  "text",
  "attachments_json",
  "status",
  "created_at",
  "started_at",
  "finished_at",
  "result_text",
  "error_text",
] as const;

/** Legacy rows may hold NULL here. */
const NON_NULL_TEXT_COLUMNS: ReadonlySet<string> = new Set(["username", "text"]);

const META_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS meta (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  )
`;

const STATUS_INDEX_SQL = `CREATE INDEX IF NOT EXISTS idx_tasks_status_id ON tasks(status, id)`;

export type SchemaUpgrade = "current" | "created" | "migrated-legacy";

export function readSchemaVersion(db: Database.Database): number {
  const version: unknown = db.pragma("user_version", { simple: true });
  return typeof version === "number" ? version : 0;
}

export function taskColumns(db: Database.Database): string[] {
  return db
    .prepare<[], { name: string }>(`SELECT name FROM pragma_table_info('tasks')`)
    .all()
    .map((row) => row.name);
}

function tableExists(db: Database.Database, name: string): boolean {
  const row = db
    .prepare<[string], { name: string }>(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?`)
    .get(name);
  return row !== undefined;
}

/** Highest id ever handed out for `tasks`, including ids of deleted rows. */
function taskHighWaterMark(db: Database.Database): number {
  const maxRow = db.prepare<[], { max_id: number | null }>(`SELECT MAX(id) AS max_id FROM tasks`).get();
  let mark = maxRow?.max_id ?? 0;
  if (tableExists(db, "sqlite_sequence")) {
    const seqRow = db
      .prepare<[], { seq: number }>(`SELECT seq FROM sqlite_sequence WHERE name = 'tasks'`)
      .get();
    if (seqRow && seqRow.seq > mark) mark = seqRow.seq;
  }
  return mark;
}

/**
 * Copy a legacy `tasks` table into the current shape. Only columns present
 * in both shapes are carried over; ids and the AUTOINCREMENT counter are
 * preserved so new tasks never reuse an old id.
 */
function migrateLegacyTasks(db: Database.Database, legacyColumns: string[]): void {
  const shared = CURRENT_TASK_COLUMNS.filter((c) => legacyColumns.includes(c));
  const columnList = shared.join(", ");
  const selectList = shared
    .map((c) => (NON_NULL_TEXT_COLUMNS.has(c) ? `COALESCE(${c}, '') AS ${c}` : c))
    .join(", ");
  const highWater = taskHighWaterMark(db);

  db.exec(tasksTableSql("tasks_next"));
  db.exec(`INSERT INTO tasks_next (${columnList}) SELECT ${selectList} FROM tasks ORDER BY id`);
  db.exec(`DROP TABLE tasks`);
  db.exec(`ALTER TABLE tasks_next RENAME TO tasks`);

  const updated = db.prepare(`UPDATE sqlite_sequence SET seq = ? WHERE name = 'tasks'`).run(highWater);
  if (updated.changes === 0 && highWater > 0) {
    db.prepare(`INSERT INTO sqlite_sequence (name, seq) VALUES ('tasks', ?)`).run(highWater);
  }
}

/**
 * Bring the database to `SCHEMA_VERSION`. Idempotent.
 */
export function upgradeSchema(db: Database.Database): SchemaUpgrade {
  const run = db.transaction((): SchemaUpgrade => {
    const version = readSchemaVersion(db);
    let outcome: SchemaUpgrade = "current";

    if (version < SCHEMA_VERSION) {
      const columns = tableExists(db, "tasks") ? taskColumns(db) : [];
      const isLegacy = LEGACY_TASK_COLUMNS.some((c) => columns.includes(c));
      if (isLegacy) {
        migrateLegacyTasks(db, columns);
        outcome = "migrated-legacy";
      } else if (columns.length === 0) {
        outcome = "created";
      }
    }

    db.exec(tasksTableSql("tasks"));
    db.exec(META_TABLE_SQL);
    db.exec(STATUS_INDEX_SQL);
    db.pragma(`user_version = ${SCHEMA_VERSION}`);
    return outcome;
  });

  return run.immediate();
}
