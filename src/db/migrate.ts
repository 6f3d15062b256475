import type Database from 'better-sqlite3';
import type { Logger } from '../log.js';

export type Migration = { name: string; sql: string };

// Ordered; names are recorded in _migrations and never reused.
export const MIGRATIONS: readonly Migration[] = [
  {
    name: '001_profiles',
    sql: `
      CREATE TABLE IF NOT EXISTS borrower_profiles(
        borrower TEXT PRIMARY KEY,
        credit_score INTEGER NOT NULL,
        annual_income TEXT NOT NULL,
        total_debt TEXT NOT NULL,
        employment_years INTEGER NOT NULL,
        previous_defaults INTEGER NOT NULL,
        on_time_payments INTEGER NOT NULL,
        total_loans INTEGER NOT NULL,
        risk_category TEXT NOT NULL,
        last_updated INTEGER NOT NULL
      );`,
  },
  {
    name: '002_loans',
    sql: `
      CREATE TABLE IF NOT EXISTS loan_applications(
        id INTEGER PRIMARY KEY,
        borrower TEXT NOT NULL,
        amount TEXT NOT NULL,
        purpose TEXT NOT NULL,
        term_months INTEGER NOT NULL,
        risk_score INTEGER NOT NULL,
        interest_rate INTEGER NOT NULL,
        status TEXT NOT NULL,
        applied_at INTEGER NOT NULL,
        approved_at INTEGER NOT NULL DEFAULT 0
      );
      CREATE INDEX IF NOT EXISTS idx_loan_applications_borrower ON loan_applications(borrower);
      CREATE TABLE IF NOT EXISTS active_loans(
        id INTEGER PRIMARY KEY,
        borrower TEXT NOT NULL,
        principal_amount TEXT NOT NULL,
        outstanding_balance TEXT NOT NULL,
        interest_rate INTEGER NOT NULL,
        monthly_payment TEXT NOT NULL,
        payments_made INTEGER NOT NULL DEFAULT 0,
        payments_missed INTEGER NOT NULL DEFAULT 0,
        term_months INTEGER NOT NULL,
        disbursed_at INTEGER NOT NULL
      );`,
  },
  {
    name: '003_ledger_state',
    sql: `
      CREATE TABLE IF NOT EXISTS ledger_state(
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at INTEGER NOT NULL
      );
      CREATE TABLE IF NOT EXISTS ledger_audit(
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        actor TEXT NOT NULL,
        action TEXT NOT NULL,
        target TEXT NOT NULL,
        details TEXT,
        created_at INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_ledger_audit_target ON ledger_audit(target);`,
  },
];

export function migrateLedgerDb(db: Database.Database, log: Logger, migrations: readonly Migration[] = MIGRATIONS): string[] {
  db.exec('CREATE TABLE IF NOT EXISTS _migrations(name TEXT PRIMARY KEY, applied_at INTEGER NOT NULL);');
  const applied = new Set(
    db.prepare<[], { name: string }>('SELECT name FROM _migrations').all().map((r) => r.name),
  );
  const ran: string[] = [];
  for (const m of migrations) {
    if (applied.has(m.name)) continue;
    const apply = db.transaction(() => {
      db.exec(m.sql);
      db.prepare('INSERT INTO _migrations(name, applied_at) VALUES (?, ?)').run(m.name, Date.now());
    });
    apply();
    ran.push(m.name);
    log.info({ migration: m.name }, 'migration_applied');
  }
  return ran;
}
