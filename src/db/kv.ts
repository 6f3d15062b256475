import type Database from 'better-sqlite3';
import { bigintToDb, dbToBigint } from '../util/bigint.js';

export function getState(db: Database.Database, key: string): string | null {
  const row = db.prepare<[string], { value: string }>('SELECT value FROM ledger_state WHERE key = ?').get(key);
  return row?.value ?? null;
}

export function setState(db: Database.Database, key: string, value: string, now: number): void {
  db.prepare(`
    INSERT INTO ledger_state(key, value, updated_at)
    VALUES (?, ?, ?)
    ON CONFLICT(key) DO UPDATE SET value=excluded.value, updated_at=excluded.updated_at;
  `).run(key, value, now);
}

/** Writes `value` only when the key is absent. */
export function seedState(db: Database.Database, key: string, value: string, now: number): void {
  db.prepare('INSERT OR IGNORE INTO ledger_state(key, value, updated_at) VALUES (?, ?, ?)').run(key, value, now);
}

/** `fallback` only when the key is absent; a stored non-integer throws. */
export function getStateNum(db: Database.Database, key: string, fallback: number): number {
  const v = getState(db, key);
  if (v == null) return fallback;
  const n = /^-?\d+$/.test(v) ? Number(v) : NaN;
  if (!Number.isSafeInteger(n)) throw new Error(`Corrupt ledger_state ${key}: value=${v}`);
  return n;
}

export function getStateBigint(db: Database.Database, key: string, fallback: bigint): bigint {
  const v = getState(db, key);
  return v == null ? fallback : dbToBigint(v);
}

export function setStateBigint(db: Database.Database, key: string, value: bigint, now: number): void {
  setState(db, key, bigintToDb(value), now);
}
