import type Database from 'better-sqlite3';
import type { Logger } from '../log.js';

/** What a single mutating operation runs against: one db, one timestamp. */
export type OpContext = {
  db: Database.Database;
  now: number;
  log: Logger;
};
