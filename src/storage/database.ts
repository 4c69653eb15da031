import BetterSqlite3 from 'better-sqlite3'
import { isCrisisType } from '../assessment/types.js'
import type { CrisisEvent, CrisisType } from '../assessment/types.js'
import { isRiskCategory } from '../detection/lexicon.js'
import type { CrisisLog, CrisisStatistics } from './event-store.js'

interface CrisisEventRow {
  id: string
  session_id: string
  timestamp: string
  crisis_level: number
  crisis_type: string
  contributing_categories: string
  indicator_count: number
  escalated: number
  follow_up_needed: number
  message: string | null
}

export class Database implements CrisisLog {
  private db: BetterSqlite3.Database

  constructor(dbPath: string) {
    this.db = new BetterSqlite3(dbPath)
    this.db.pragma('journal_mode = WAL')
    this.createTables()
  }

  private createTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS crisis_events (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL UNIQUE,
        session_id TEXT NOT NULL,
        timestamp DATETIME NOT NULL,
        crisis_level INTEGER NOT NULL CHECK (crisis_level BETWEEN 0 AND 10),
        crisis_type TEXT NOT NULL,
        contributing_categories JSON NOT NULL,
        indicator_count INTEGER NOT NULL DEFAULT 0,
        escalated BOOLEAN NOT NULL DEFAULT FALSE,
        follow_up_needed BOOLEAN NOT NULL DEFAULT FALSE,
        message TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_crisis_events_session ON crisis_events (session_id, seq);
      CREATE INDEX IF NOT EXISTS idx_crisis_events_timestamp ON crisis_events (timestamp);
    `)
  }

  listTables(): string[] {
    const rows = this.db.prepare(
      "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%'"
    ).all() as { name: string }[]
    return rows.map(r => r.name)
  }

  // --- Crisis Events ---

  appendEvent(sessionId: string, event: CrisisEvent): void {
    this.db.prepare(`
      INSERT INTO crisis_events (id, session_id, timestamp, crisis_level, crisis_type, contributing_categories, indicator_count, escalated, follow_up_needed, message)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      event.id,
      sessionId,
      event.timestamp.toISOString(),
      event.crisisLevel,
      event.crisisType,
      JSON.stringify(event.contributingCategories),
      event.indicatorCount,
      event.escalated ? 1 : 0,
      event.followUpNeeded ? 1 : 0,
      event.message
    )
  }

  queryRecentEvents(sessionId: string, limit: number): CrisisEvent[] {
    if (limit <= 0) return []
    const rows = this.db.prepare(`
      SELECT * FROM crisis_events WHERE session_id = ? ORDER BY seq DESC LIMIT ?
    `).all(sessionId, limit) as CrisisEventRow[]
    return rows.reverse().map(row => this.deserializeEvent(row))
  }

  getCrisisStatistics(since: Date): CrisisStatistics {
    const totals = this.db.prepare(`
      SELECT COUNT(*) AS total,
             COALESCE(SUM(escalated), 0) AS escalated,
             COUNT(DISTINCT session_id) AS sessions,
             COALESCE(AVG(crisis_level), 0) AS average
      FROM crisis_events WHERE timestamp >= ?
    `).get(since.toISOString()) as { total: number; escalated: number; sessions: number; average: number }

    const byType = this.db.prepare(`
      SELECT crisis_type, COUNT(*) AS count FROM crisis_events
      WHERE timestamp >= ? GROUP BY crisis_type
    `).all(since.toISOString()) as { crisis_type: string; count: number }[]

    const crisisTypes: Partial<Record<CrisisType, number>> = {}
    for (const row of byType) {
      if (isCrisisType(row.crisis_type)) crisisTypes[row.crisis_type] = row.count
    }

    return {
      since,
      totalCrisisEvents: totals.total,
      escalatedEvents: totals.escalated,
      sessionCount: totals.sessions,
      averageCrisisLevel: totals.average,
      crisisTypes
    }
  }

  private deserializeEvent(row: CrisisEventRow): CrisisEvent {
    const categories: unknown = JSON.parse(row.contributing_categories)
    if (!isCrisisType(row.crisis_type)) {
      throw new Error(`Unknown crisis type in crisis_events row ${row.id}: ${row.crisis_type}`)
    }

    return {
      id: row.id,
      sessionId: row.session_id,
      timestamp: new Date(row.timestamp),
      crisisLevel: row.crisis_level,
      crisisType: row.crisis_type,
      contributingCategories: Array.isArray(categories)
        ? categories.filter((c): c is string => typeof c === 'string').filter(isRiskCategory)
        : [],
      indicatorCount: row.indicator_count,
      escalated: row.escalated === 1,
      followUpNeeded: row.follow_up_needed === 1,
      message: row.message
    }
  }

  // --- Lifecycle ---

  close(): void {
    this.db.close()
  }
}
