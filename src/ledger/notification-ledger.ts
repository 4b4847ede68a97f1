import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import type { ItemType } from "../types/index.js";
import * as log from "../log.js";

interface NotificationRow {
  first_found_at: string;
  last_notified_at: string;
}

interface CommentRow {
  comment_index: number;
  last_commented_at: string;
}

export interface LastComment {
  lastCommentedAt: Date;
  commentIndex: number;
}

/**
 * Create the ledger tables. Safe to call on an existing database.
 */
export function initLedgerSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS notification_history (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      recipient_email TEXT NOT NULL,
      item_type TEXT NOT NULL CHECK(item_type IN ('branch', 'merge_request')),
      project_id TEXT NOT NULL,
      item_key TEXT NOT NULL,
      first_found_at TEXT NOT NULL,
      last_notified_at TEXT NOT NULL,
      UNIQUE(recipient_email, item_type, project_id, item_key)
    );
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_notification_item
    ON notification_history(item_type, project_id, item_key);
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS mr_comment_history (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      project_id TEXT NOT NULL,
      mr_iid INTEGER NOT NULL,
      comment_index INTEGER NOT NULL,
      last_commented_at TEXT NOT NULL,
      UNIQUE(project_id, mr_iid)
    );
  `);
}

function requireKeyPart(name: string, value: string): void {
  if (value.trim() === "") {
    throw new Error(`Ledger key component "${name}" must not be blank`);
  }
}

function toDate(value: string): Date | null {
  const d = new Date(value);
  return Number.isNaN(d.getTime()) ? null : d;
}

/**
 * Durable record of who was told about which stale item and when, plus the
 * reminder-comment rotation per request. Rows are never deleted.
 *
 * Every write is a single `INSERT … ON CONFLICT` statement, so concurrent
 * project tasks sharing one ledger cannot lose an update.
 */
export class NotificationLedger {
  private constructor(private readonly db: Database.Database) {
    initLedgerSchema(db);
  }

  static open(dbPath: string): NotificationLedger {
    const fullPath = resolve(dbPath);
    const dir = dirname(fullPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const db = new Database(fullPath);
    db.pragma("journal_mode = WAL");
    log.debug(`Opened notification ledger at ${fullPath}`);
    return new NotificationLedger(db);
  }

  static inMemory(): NotificationLedger {
    return new NotificationLedger(new Database(":memory:"));
  }

  lastNotifiedAt(recipient: string, type: ItemType, projectId: string, itemKey: string): Date | null {
    const row = this.getRow(recipient, type, projectId, itemKey);
    return row ? toDate(row.last_notified_at) : null;
  }

  firstFoundAt(recipient: string, type: ItemType, projectId: string, itemKey: string): Date | null {
    const row = this.getRow(recipient, type, projectId, itemKey);
    return row ? toDate(row.first_found_at) : null;
  }

  /**
   * Upsert: a new identity gets `first_found_at = last_notified_at = at`; an
   * existing one only moves `last_notified_at`. An `at` older than the
   * stored first sighting is clamped so first ≤ last always holds.
   */
  recordNotification(recipient: string, type: ItemType, projectId: string, itemKey: string, at: Date): void {
    requireKeyPart("recipient_email", recipient);
    requireKeyPart("project_id", projectId);
    requireKeyPart("item_key", itemKey);

    const stamp = at.toISOString();
    this.db
      .prepare<[string, string, string, string, string, string]>(`
        INSERT INTO notification_history
          (recipient_email, item_type, project_id, item_key, first_found_at, last_notified_at)
        VALUES (?, ?, ?, ?, ?, ?)
        ON CONFLICT(recipient_email, item_type, project_id, item_key) DO UPDATE SET
          last_notified_at = MAX(first_found_at, excluded.last_notified_at)
      `)
      .run(recipient, type, projectId, itemKey, stamp, stamp);
  }

  /** Oldest `first_found_at` for the item across every recipient. */
  earliestFirstFound(type: ItemType, projectId: string, itemKey: string): Date | null {
    requireKeyPart("project_id", projectId);
    requireKeyPart("item_key", itemKey);

    const row = this.db
      .prepare<[string, string, string], { earliest: string | null }>(`
        SELECT MIN(first_found_at) AS earliest
        FROM notification_history
        WHERE item_type = ? AND project_id = ? AND item_key = ?
      `)
      .get(type, projectId, itemKey);
    return row?.earliest ? toDate(row.earliest) : null;
  }

  recordComment(projectId: string, requestNumber: number, commentIndex: number, at: Date): void {
    requireKeyPart("project_id", projectId);

    this.db
      .prepare<[string, number, number, string]>(`
        INSERT INTO mr_comment_history (project_id, mr_iid, comment_index, last_commented_at)
        VALUES (?, ?, ?, ?)
        ON CONFLICT(project_id, mr_iid) DO UPDATE SET
          comment_index = excluded.comment_index,
          last_commented_at = excluded.last_commented_at
      `)
      .run(projectId, requestNumber, commentIndex, at.toISOString());
  }

  lastComment(projectId: string, requestNumber: number): LastComment | null {
    requireKeyPart("project_id", projectId);

    const row = this.db
      .prepare<[string, number], CommentRow>(`
        SELECT comment_index, last_commented_at
        FROM mr_comment_history
        WHERE project_id = ? AND mr_iid = ?
      `)
      .get(projectId, requestNumber);
    if (!row) return null;

    const lastCommentedAt = toDate(row.last_commented_at);
    if (!lastCommentedAt) return null;
    return { lastCommentedAt, commentIndex: row.comment_index };
  }

  close(): void {
    this.db.close();
  }

  private getRow(recipient: string, type: ItemType, projectId: string, itemKey: string): NotificationRow | undefined {
    requireKeyPart("recipient_email", recipient);
    requireKeyPart("project_id", projectId);
    requireKeyPart("item_key", itemKey);

    return this.db
      .prepare<[string, string, string, string], NotificationRow>(`
        SELECT first_found_at, last_notified_at
        FROM notification_history
        WHERE recipient_email = ? AND item_type = ? AND project_id = ? AND item_key = ?
      `)
      .get(recipient, type, projectId, itemKey);
  }
}
