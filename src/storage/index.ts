import Database from 'better-sqlite3';
import { join } from 'node:path';
import { existsSync, mkdirSync } from 'node:fs';
import { homedir } from 'node:os';

import {
  type AnalysisRecord,
  type ClarityStatus,
  type Verdict,
  AnalysisRecordSchema,
} from '../types/index.js';
import { generateId } from '../utils/id.js';
import { logger } from '../utils/logger.js';

/** Path that keeps the database in memory, used by tests */
export const IN_MEMORY = ':memory:';

export function getDefaultDbPath(): string {
  return join(homedir(), '.reqclarity', 'reqclarity.db');
}

/**
 * History entry for a verdict. Reasons are kept as their messages only.
 */
export function createAnalysisRecord(verdict: Verdict): AnalysisRecord {
  return {
    id: generateId('analysis'),
    text: verdict.text,
    status: verdict.status,
    severity: verdict.severity,
    tags: [...verdict.tags],
    reasons: verdict.reasons.map((r) => r.message),
    createdAt: new Date().toISOString(),
  };
}

/**
 * Storage layer for reqclarity
 *
 * Uses SQLite for persistence, stores JSON documents.
 */
export class Storage {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const path = dbPath ?? getDefaultDbPath();
    if (path !== IN_MEMORY) {
      this.ensureDirectory(path);
    }
    this.db = new Database(path);
    this.initialize();
  }

  private ensureDirectory(dbPath: string): void {
    const dir = join(dbPath, '..');
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  private initialize(): void {
    this.db.pragma('journal_mode = WAL');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS analyses (
        id TEXT PRIMARY KEY,
        status TEXT NOT NULL,
        data TEXT NOT NULL,
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_analyses_created ON analyses(created_at DESC);
    `);
  }

  private parseRecord(data: string, context: Record<string, unknown>): AnalysisRecord | null {
    const parsed = AnalysisRecordSchema.safeParse(JSON.parse(data));
    if (!parsed.success) {
      logger.error('Failed to validate analysis from database', parsed.error, context);
      return null;
    }
    return parsed.data;
  }

  // Analysis operations

  saveAnalysis(record: AnalysisRecord): void {
    const stmt = this.db.prepare(`
      INSERT OR REPLACE INTO analyses (id, status, data, created_at)
      VALUES (?, ?, ?, ?)
    `);
    stmt.run(record.id, record.status, JSON.stringify(record), record.createdAt);
  }

  /**
   * Save several analyses at once; none are kept if any insert fails.
   */
  saveAnalyses(records: readonly AnalysisRecord[]): void {
    this.transaction(() => {
      for (const record of records) {
        this.saveAnalysis(record);
      }
    });
  }

  getAnalysis(id: string): AnalysisRecord | undefined {
    const stmt = this.db.prepare<[string], { data: string }>('SELECT data FROM analyses WHERE id = ?');
    const row = stmt.get(id);
    if (!row) return undefined;

    return this.parseRecord(row.data, { id }) ?? undefined;
  }

  /**
   * Most recent analyses first. Insertion order breaks timestamp ties.
   */
  listRecent(limit: number): AnalysisRecord[] {
    const stmt = this.db.prepare<[number], { id: string; data: string }>(
      'SELECT id, data FROM analyses ORDER BY created_at DESC, rowid DESC LIMIT ?'
    );
    return stmt
      .all(limit)
      .map((row) => this.parseRecord(row.data, { id: row.id }))
      .filter((record): record is AnalysisRecord => record !== null);
  }

  countAnalyses(): number {
    const stmt = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM analyses');
    return stmt.get()?.count ?? 0;
  }

  countByStatus(): Record<ClarityStatus, number> {
    const stmt = this.db.prepare<[], { status: string; count: number }>(
      'SELECT status, COUNT(*) AS count FROM analyses GROUP BY status'
    );
    const counts: Record<ClarityStatus, number> = { Clear: 0, PartiallyClear: 0, Unclear: 0 };
    for (const row of stmt.all()) {
      if (row.status === 'Clear' || row.status === 'PartiallyClear' || row.status === 'Unclear') {
        counts[row.status] = row.count;
      }
    }
    return counts;
  }

  /**
   * Delete every recorded analysis, returning how many were removed.
   */
  clearAnalyses(): number {
    return this.db.prepare('DELETE FROM analyses').run().changes;
  }

  // Utility

  /**
   * Execute operations within a transaction.
   * If any operation fails, the entire transaction is rolled back.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    this.db.close();
  }
}
