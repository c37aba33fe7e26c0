/**
 * SentLog - SQLite-backed repeat guard
 *
 * Persists when each ticket was last answered in each channel so a restarted
 * bot does not repeat titles it sent a minute ago.
 */

import Database from 'better-sqlite3';
import type { RepeatGuard, SentKey } from './types';

export interface SentEntry {
  provider: string;
  target: string;
  ticketId: string;
  sentAt: number;
}

type KeyParams = [provider: string, target: string, ticketId: string];

export class SentLog implements RepeatGuard {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sent_tickets (
        provider TEXT NOT NULL,
        target TEXT NOT NULL,
        ticket_id TEXT NOT NULL,
        sent_at INTEGER NOT NULL,
        PRIMARY KEY (provider, target, ticket_id)
      );
      CREATE INDEX IF NOT EXISTS idx_sent_tickets_sent_at ON sent_tickets(sent_at);
    `);
  }

  wasSentSince(key: SentKey, sinceMs: number): boolean {
    const row = this.db
      .prepare<KeyParams, { sentAt: number }>(`
        SELECT sent_at AS sentAt FROM sent_tickets
        WHERE provider = ? AND target = ? AND ticket_id = ?
      `)
      .get(key.provider, key.target.toLowerCase(), key.ticketId);
    return row !== undefined && row.sentAt >= sinceMs;
  }

  record(key: SentKey, atMs: number): void {
    this.db
      .prepare<[...KeyParams, number]>(`
        INSERT INTO sent_tickets (provider, target, ticket_id, sent_at)
        VALUES (?, ?, ?, ?)
        ON CONFLICT(provider, target, ticket_id) DO UPDATE SET sent_at = excluded.sent_at
      `)
      .run(key.provider, key.target.toLowerCase(), key.ticketId, atMs);
  }

  forget(key: SentKey): void {
    this.db
      .prepare<KeyParams>('DELETE FROM sent_tickets WHERE provider = ? AND target = ? AND ticket_id = ?')
      .run(key.provider, key.target.toLowerCase(), key.ticketId);
  }

  prune(beforeMs: number): number {
    const result = this.db
      .prepare<[number]>('DELETE FROM sent_tickets WHERE sent_at < ?')
      .run(beforeMs);
    return result.changes;
  }

  /** Most recent replies first */
  recent(limit = 50): SentEntry[] {
    return this.db
      .prepare<[number], SentEntry>(`
        SELECT provider, target, ticket_id AS ticketId, sent_at AS sentAt
        FROM sent_tickets
        ORDER BY sent_at DESC
        LIMIT ?
      `)
      .all(limit);
  }

  close(): void {
    this.db.close();
  }
}
