import type Database from 'better-sqlite3';
import { getStateNum, setState } from '../db/kv.js';
import { bigintToDb, dbToBigint } from '../util/bigint.js';
import { isApplicationStatus } from './stateMachine.js';
import type { ActiveLoan, ApplicationStatus, LoanApplication } from './types.js';

const LAST_ID_KEY = 'loans.last_application_id';

type ApplicationRow = {
  id: number;
  borrower: string;
  amount: string;
  purpose: string;
  term_months: number;
  risk_score: number;
  interest_rate: number;
  status: string;
  applied_at: number;
  approved_at: number;
};

type LoanRow = {
  id: number;
  borrower: string;
  principal_amount: string;
  outstanding_balance: string;
  interest_rate: number;
  monthly_payment: string;
  payments_made: number;
  payments_missed: number;
  term_months: number;
  disbursed_at: number;
};

function toApplication(row: ApplicationRow): LoanApplication {
  if (!isApplicationStatus(row.status)) throw new Error(`Corrupt application row ${row.id}: status=${row.status}`);
  return {
    id: row.id,
    borrower: row.borrower,
    amount: dbToBigint(row.amount),
    purpose: row.purpose,
    termMonths: row.term_months,
    riskScore: row.risk_score,
    interestRate: row.interest_rate,
    status: row.status,
    appliedAt: row.applied_at,
    approvedAt: row.approved_at,
  };
}

function toLoan(row: LoanRow): ActiveLoan {
  return {
    id: row.id,
    borrower: row.borrower,
    principalAmount: dbToBigint(row.principal_amount),
    outstandingBalance: dbToBigint(row.outstanding_balance),
    interestRate: row.interest_rate,
    monthlyPayment: dbToBigint(row.monthly_payment),
    paymentsMade: row.payments_made,
    paymentsMissed: row.payments_missed,
    termMonths: row.term_months,
    disbursedAt: row.disbursed_at,
  };
}

export function lastApplicationId(db: Database.Database): number {
  return getStateNum(db, LAST_ID_KEY, 0);
}

export function getApplication(db: Database.Database, id: number): LoanApplication | null {
  const row = db.prepare<[number], ApplicationRow>('SELECT * FROM loan_applications WHERE id = ?').get(id);
  return row ? toApplication(row) : null;
}

export function listBorrowerApplications(db: Database.Database, borrower: string): LoanApplication[] {
  const rows = db.prepare<[string], ApplicationRow>('SELECT * FROM loan_applications WHERE borrower = ? ORDER BY id ASC').all(borrower);
  return rows.map(toApplication);
}

export function getActiveLoan(db: Database.Database, id: number): ActiveLoan | null {
  const row = db.prepare<[number], LoanRow>('SELECT * FROM active_loans WHERE id = ?').get(id);
  return row ? toLoan(row) : null;
}

/** Inserts the application and advances the id counter to its id. */
export function insertApplication(db: Database.Database, app: LoanApplication): void {
  db.prepare(`
    INSERT INTO loan_applications(id, borrower, amount, purpose, term_months, risk_score, interest_rate, status, applied_at, approved_at)
    VALUES (?,?,?,?,?,?,?,?,?,?)
  `).run(app.id, app.borrower, bigintToDb(app.amount), app.purpose, app.termMonths, app.riskScore, app.interestRate, app.status, app.appliedAt, app.approvedAt);
  setState(db, LAST_ID_KEY, String(app.id), app.appliedAt);
}

export function updateApplicationStatus(db: Database.Database, id: number, status: ApplicationStatus, approvedAt?: number): void {
  if (approvedAt === undefined) {
    db.prepare('UPDATE loan_applications SET status = ? WHERE id = ?').run(status, id);
  } else {
    db.prepare('UPDATE loan_applications SET status = ?, approved_at = ? WHERE id = ?').run(status, approvedAt, id);
  }
}

export function insertLoan(db: Database.Database, loan: ActiveLoan): void {
  db.prepare(`
    INSERT INTO active_loans(id, borrower, principal_amount, outstanding_balance, interest_rate, monthly_payment,
      payments_made, payments_missed, term_months, disbursed_at)
    VALUES (?,?,?,?,?,?,?,?,?,?)
  `).run(
    loan.id,
    loan.borrower,
    bigintToDb(loan.principalAmount),
    bigintToDb(loan.outstandingBalance),
    loan.interestRate,
    bigintToDb(loan.monthlyPayment),
    loan.paymentsMade,
    loan.paymentsMissed,
    loan.termMonths,
    loan.disbursedAt,
  );
}

// Only the mutable columns; principal, rate and schedule are fixed at disbursement.
export function updateLoanRepayment(db: Database.Database, loan: ActiveLoan): void {
  db.prepare('UPDATE active_loans SET outstanding_balance = ?, payments_made = ?, payments_missed = ? WHERE id = ?')
    .run(bigintToDb(loan.outstandingBalance), loan.paymentsMade, loan.paymentsMissed, loan.id);
}
