import type Database from 'better-sqlite3';
import { getStateBigint, getStateNum, seedState, setState, setStateBigint } from '../db/kv.js';

export type LedgerStats = {
  totalLoansIssued: number;
  totalAmountDisbursed: bigint;
  modelVersion: number;
};

const KEYS = {
  loansIssued: 'stats.total_loans_issued',
  amountDisbursed: 'stats.total_amount_disbursed',
  modelVersion: 'stats.model_version',
} as const;

/** Seeds the counters on a fresh store; existing values are left alone. */
export function initStats(db: Database.Database, modelVersion: number, now: number): void {
  seedState(db, KEYS.loansIssued, '0', now);
  seedState(db, KEYS.amountDisbursed, '0', now);
  seedState(db, KEYS.modelVersion, String(modelVersion), now);
}

export function getStats(db: Database.Database): LedgerStats {
  return {
    totalLoansIssued: getStateNum(db, KEYS.loansIssued, 0),
    totalAmountDisbursed: getStateBigint(db, KEYS.amountDisbursed, 0n),
    modelVersion: getStateNum(db, KEYS.modelVersion, 1),
  };
}

// Only disbursement writes here.
export function recordDisbursement(db: Database.Database, amount: bigint, now: number): LedgerStats {
  const current = getStats(db);
  const next: LedgerStats = {
    ...current,
    totalLoansIssued: current.totalLoansIssued + 1,
    totalAmountDisbursed: current.totalAmountDisbursed + amount,
  };
  setState(db, KEYS.loansIssued, String(next.totalLoansIssued), now);
  setStateBigint(db, KEYS.amountDisbursed, next.totalAmountDisbursed, now);
  return next;
}
