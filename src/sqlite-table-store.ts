/**
 * SQLite Table Store
 *
 * Persists generated Nowruz reference rows using better-sqlite3. A database is
 * bound to one calendar: the config's code and offsets are recorded on first
 * open and checked on every later open.
 */
import Database from 'better-sqlite3'
import type { NowruzRow } from './reference-table'
import { type CalendarConfig, DEFAULT_CALENDAR_CONFIG } from './config'
import { formatGregorianDate, parseGregorianDate } from './gregorian'
import { StorageError } from './errors'

export { StorageError } from './errors'

export type TableStore = {
  /** Insert or replace rows in one transaction; returns the number written */
  saveNowruzRows(rows: readonly NowruzRow[]): Promise<number>
  getNowruzRow(year: number): Promise<NowruzRow | null>
  /** Rows with start <= year <= end, ascending */
  getNowruzRows(startYear: number, endYear: number): Promise<NowruzRow[]>
  countRows(): Promise<number>
  close(): Promise<void>
}

// ============================================================================
// Schema DDL
// ============================================================================

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS calendar_meta (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS nowruz (
    year INTEGER PRIMARY KEY,
    is_leap INTEGER NOT NULL,
    cycle_position INTEGER NOT NULL CHECK (cycle_position BETWEEN 1 AND 33),
    days_in_year INTEGER NOT NULL CHECK (days_in_year IN (365, 366)),
    nowruz TEXT NOT NULL,
    solar_hijri_year INTEGER NOT NULL
  );
`

// ============================================================================
// Error Mapping
// ============================================================================

function mapError(e: unknown): never {
  if (e instanceof StorageError) throw e
  const message = e instanceof Error ? e.message : String(e)
  throw new StorageError(message)
}

function safe<T>(fn: () => T): T {
  try { return fn() }
  catch (e) { mapError(e) }
}

// ============================================================================
// SQL Row Types
// ============================================================================

type NowruzRecord = {
  year: number
  is_leap: number
  cycle_position: number
  days_in_year: number
  nowruz: string
  solar_hijri_year: number
}

type MetaRecord = {
  key: string
  value: string
}

type CountRecord = {
  n: number
}

function toRow(record: NowruzRecord): NowruzRow {
  return {
    year: record.year,
    isLeap: record.is_leap === 1,
    cyclePosition: record.cycle_position,
    daysInYear: record.days_in_year,
    nowruz: parseGregorianDate(record.nowruz),
    solarHijriYear: record.solar_hijri_year,
  }
}

function configFingerprint(config: CalendarConfig): Record<string, string> {
  return {
    code: config.code,
    gregorian_offset: String(config.gregorianOffset),
    solar_hijri_offset: String(config.solarHijriOffset),
    nowruz: `${config.nowruz.month}-${config.nowruz.day}`,
  }
}

// ============================================================================
// Factory
// ============================================================================

export async function createTableStore(
  path: string,
  config: CalendarConfig = DEFAULT_CALENDAR_CONFIG,
): Promise<TableStore> {
  const db = safe(() => new Database(path))
  safe(() => db.exec(SCHEMA_SQL))

  const expected = configFingerprint(config)
  const stored = safe(() => db.prepare<[], MetaRecord>('SELECT key, value FROM calendar_meta').all())
  if (stored.length === 0) {
    const insert = db.prepare<[string, string]>('INSERT INTO calendar_meta (key, value) VALUES (?, ?)')
    safe(() => db.transaction(() => {
      for (const [key, value] of Object.entries(expected)) insert.run(key, value)
    })())
  } else {
    for (const { key, value } of stored) {
      if (expected[key] !== value) {
        db.close()
        throw new StorageError(`Table store at '${path}' was created for a different calendar (${key}=${value})`)
      }
    }
  }

  const upsert = db.prepare<[number, number, number, number, string, number]>(
    'INSERT OR REPLACE INTO nowruz (year, is_leap, cycle_position, days_in_year, nowruz, solar_hijri_year) VALUES (?, ?, ?, ?, ?, ?)',
  )
  const saveAll = db.transaction((rows: readonly NowruzRow[]) => {
    for (const row of rows) {
      upsert.run(
        row.year,
        row.isLeap ? 1 : 0,
        row.cyclePosition,
        row.daysInYear,
        formatGregorianDate(row.nowruz),
        row.solarHijriYear,
      )
    }
    return rows.length
  })

  return {
    async saveNowruzRows(rows) {
      return safe(() => saveAll(rows))
    },

    async getNowruzRow(year) {
      const record = safe(() => db.prepare<[number], NowruzRecord>('SELECT * FROM nowruz WHERE year = ?').get(year))
      return record ? toRow(record) : null
    },

    async getNowruzRows(startYear, endYear) {
      const records = safe(() => db
        .prepare<[number, number], NowruzRecord>('SELECT * FROM nowruz WHERE year BETWEEN ? AND ? ORDER BY year')
        .all(startYear, endYear))
      return records.map(toRow)
    },

    async countRows() {
      const record = safe(() => db.prepare<[], CountRecord>('SELECT COUNT(*) AS n FROM nowruz').get())
      return record?.n ?? 0
    },

    async close() {
      db.close()
    },
  }
}
