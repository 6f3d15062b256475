import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import type { Logger } from '../log.js';
import { migrateLedgerDb } from './migrate.js';

export const MEMORY_DB = ':memory:';

function ensureDirExists(dirPath: string) {
  if (!fs.existsSync(dirPath)) fs.mkdirSync(dirPath, { recursive: true });
}

/** Opens (creating if needed) and migrates a ledger database. */
export function openLedgerDb(file: string, log: Logger): Database.Database {
  const isMemory = file === MEMORY_DB;
  const resolved = isMemory ? MEMORY_DB : path.resolve(file);
  if (!isMemory) ensureDirExists(path.dirname(resolved));
  const db = new Database(resolved, { fileMustExist: false });
  if (!isMemory) db.pragma('journal_mode = WAL');
  migrateLedgerDb(db, log);
  log.info({ path: resolved }, 'ledger_db_open');
  return db;
}

export function closeLedgerDb(db: Database.Database): void {
  if (db.open) db.close();
}
