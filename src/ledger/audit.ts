import type Database from 'better-sqlite3';
import { jsonStringifySafeBigint } from '../util/bigint.js';

export type AuditAction =
  | 'profile_registered'
  | 'application_submitted'
  | 'application_approved'
  | 'loan_disbursed'
  | 'payment_recorded'
  | 'payment_missed';

export type AuditEvent = {
  id: number;
  actor: string;
  action: AuditAction;
  target: string;
  details: unknown;
  createdAt: number;
};

type AuditRow = {
  id: number;
  actor: string;
  action: string;
  target: string;
  details: string | null;
  created_at: number;
};

const ACTIONS: readonly AuditAction[] = [
  'profile_registered',
  'application_submitted',
  'application_approved',
  'loan_disbursed',
  'payment_recorded',
  'payment_missed',
];

function isAuditAction(v: string): v is AuditAction {
  return ACTIONS.some((a) => a === v);
}

/**
 * Appends an audit line. Call inside the transaction of the mutation it
 * describes so both land or neither does.
 */
export function audit(db: Database.Database, actor: string, action: AuditAction, target: string | number, details: unknown, now: number): void {
  db.prepare('INSERT INTO ledger_audit(actor, action, target, details, created_at) VALUES (?,?,?,?,?)')
    .run(actor, action, String(target), details === undefined ? null : jsonStringifySafeBigint(details), now);
}

export function listAudit(db: Database.Database, target: string | number): AuditEvent[] {
  const rows = db.prepare<[string], AuditRow>('SELECT * FROM ledger_audit WHERE target = ? ORDER BY id ASC').all(String(target));
  return rows.map((r) => {
    if (!isAuditAction(r.action)) throw new Error(`Corrupt audit row ${r.id}: action=${r.action}`);
    const details: unknown = r.details == null ? null : JSON.parse(r.details);
    return { id: r.id, actor: r.actor, action: r.action, target: r.target, details, createdAt: r.created_at };
  });
}
