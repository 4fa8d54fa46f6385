import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { TaskSnapshot } from "../pipeline/types.js";
import { TaskSnapshotSchema, parseOrThrow } from "../schemas.js";
import { TERMINAL_STATUSES, type TaskPersistence } from "./persistence.js";

type TaskRow = {
  id: string;
  snapshot: string;
};

/** Task records in a SQLite table, one JSON snapshot per row. */
export class SqliteTaskPersistence implements TaskPersistence {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS tasks (
        id          TEXT PRIMARY KEY,
        topic       TEXT NOT NULL,
        status      TEXT NOT NULL,
        snapshot    TEXT NOT NULL,
        created_at  INTEGER NOT NULL,
        updated_at  INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_tasks_created ON tasks(created_at DESC);
    `);
  }

  save(task: TaskSnapshot): void {
    this.db
      .prepare<[string, string, string, string, number, number]>(`
        INSERT OR REPLACE INTO tasks (id, topic, status, snapshot, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?)
      `)
      .run(task.id, task.topic, task.status, JSON.stringify(task), task.createdAt, task.updatedAt);
  }

  load(id: string): TaskSnapshot | undefined {
    const row = this.db.prepare<[string], TaskRow>("SELECT id, snapshot FROM tasks WHERE id = ?").get(id);
    return row ? rowToSnapshot(row) : undefined;
  }

  list(limit?: number): TaskSnapshot[] {
    // SQLite treats a negative LIMIT as no limit.
    const rows = this.db
      .prepare<[number], TaskRow>("SELECT id, snapshot FROM tasks ORDER BY created_at DESC LIMIT ?")
      .all(limit ?? -1);
    return rows.map(rowToSnapshot);
  }

  delete(id: string): boolean {
    const result = this.db.prepare<[string]>("DELETE FROM tasks WHERE id = ?").run(id);
    return result.changes > 0;
  }

  deleteOlderThan(timestamp: number): number {
    const [completed, failed] = TERMINAL_STATUSES;
    const result = this.db
      .prepare<[number, string, string]>("DELETE FROM tasks WHERE updated_at < ? AND status IN (?, ?)")
      .run(timestamp, completed, failed);
    return result.changes;
  }

  close(): void {
    this.db.close();
  }
}

function rowToSnapshot(row: TaskRow): TaskSnapshot {
  const raw: unknown = JSON.parse(row.snapshot);
  return parseOrThrow(TaskSnapshotSchema, raw, `Stored task ${row.id}`);
}
