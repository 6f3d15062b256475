import type Database from 'better-sqlite3';
import type { Caller } from '../auth/roles.js';
import { audit } from '../ledger/audit.js';
import type { OpContext } from '../ledger/context.js';
import { deriveRiskCategory, isRiskCategory } from '../scoring/bands.js';
import { bigintToDb, dbToBigint } from '../util/bigint.js';
import { fail, ok, type Result } from '../util/errors.js';
import { CREDIT_SCORE_MAX, CREDIT_SCORE_MIN, type BorrowerProfile, type ProfileInput } from './types.js';

type ProfileRow = {
  borrower: string;
  credit_score: number;
  annual_income: string;
  total_debt: string;
  employment_years: number;
  previous_defaults: number;
  on_time_payments: number;
  total_loans: number;
  risk_category: string;
  last_updated: number;
};

function toProfile(row: ProfileRow): BorrowerProfile {
  if (!isRiskCategory(row.risk_category)) {
    throw new Error(`Corrupt profile row for ${row.borrower}: risk_category=${row.risk_category}`);
  }
  return {
    borrower: row.borrower,
    creditScore: row.credit_score,
    annualIncome: dbToBigint(row.annual_income),
    totalDebt: dbToBigint(row.total_debt),
    employmentYears: row.employment_years,
    previousDefaults: row.previous_defaults,
    onTimePayments: row.on_time_payments,
    totalLoans: row.total_loans,
    riskCategory: row.risk_category,
    lastUpdated: row.last_updated,
  };
}

const isCount = (n: number) => Number.isSafeInteger(n) && n >= 0;

/** First violated constraint on a submitted profile, or null. */
export function validateProfileInput(input: ProfileInput): string | null {
  const { creditScore } = input;
  if (!Number.isInteger(creditScore) || creditScore < CREDIT_SCORE_MIN || creditScore > CREDIT_SCORE_MAX) {
    return `credit score must be an integer in [${CREDIT_SCORE_MIN}, ${CREDIT_SCORE_MAX}], got ${creditScore}`;
  }
  if (input.annualIncome < 0n) return 'annual income cannot be negative';
  if (input.totalDebt < 0n) return 'total debt cannot be negative';
  const counts = {
    employmentYears: input.employmentYears,
    previousDefaults: input.previousDefaults,
    onTimePayments: input.onTimePayments,
    totalLoans: input.totalLoans,
  };
  for (const [field, value] of Object.entries(counts)) {
    if (!isCount(value)) return `${field} must be a non-negative integer, got ${value}`;
  }
  return null;
}

export function getProfile(db: Database.Database, borrower: string): BorrowerProfile | null {
  const row = db.prepare<[string], ProfileRow>('SELECT * FROM borrower_profiles WHERE borrower = ?').get(borrower);
  return row ? toProfile(row) : null;
}

/** Insert or replace the borrower's own profile, re-deriving its category. */
export function upsertProfile(db: Database.Database, borrower: string, input: ProfileInput, now: number): Result<BorrowerProfile> {
  const problem = validateProfileInput(input);
  if (problem) return fail('InvalidParameters', problem);

  const profile: BorrowerProfile = {
    borrower,
    creditScore: input.creditScore,
    annualIncome: input.annualIncome,
    totalDebt: input.totalDebt,
    employmentYears: input.employmentYears,
    previousDefaults: input.previousDefaults,
    onTimePayments: input.onTimePayments,
    totalLoans: input.totalLoans,
    riskCategory: deriveRiskCategory(input.creditScore),
    lastUpdated: now,
  };
  db.prepare(`
    INSERT INTO borrower_profiles(borrower, credit_score, annual_income, total_debt, employment_years,
      previous_defaults, on_time_payments, total_loans, risk_category, last_updated)
    VALUES (?,?,?,?,?,?,?,?,?,?)
    ON CONFLICT(borrower) DO UPDATE SET
      credit_score=excluded.credit_score, annual_income=excluded.annual_income, total_debt=excluded.total_debt,
      employment_years=excluded.employment_years, previous_defaults=excluded.previous_defaults,
      on_time_payments=excluded.on_time_payments, total_loans=excluded.total_loans,
      risk_category=excluded.risk_category, last_updated=excluded.last_updated
  `).run(
    borrower,
    profile.creditScore,
    bigintToDb(profile.annualIncome),
    bigintToDb(profile.totalDebt),
    profile.employmentYears,
    profile.previousDefaults,
    profile.onTimePayments,
    profile.totalLoans,
    profile.riskCategory,
    profile.lastUpdated,
  );
  return ok(profile);
}

/** A caller writes only their own profile. */
export function registerProfile(ctx: OpContext, caller: Caller, input: ProfileInput): Result<BorrowerProfile> {
  const res = upsertProfile(ctx.db, caller.id, input, ctx.now);
  if (!res.ok) return res;
  const profile = res.value;
  audit(ctx.db, caller.id, 'profile_registered', caller.id, { creditScore: profile.creditScore, riskCategory: profile.riskCategory }, ctx.now);
  ctx.log.info({ borrower: caller.id, creditScore: profile.creditScore, riskCategory: profile.riskCategory }, 'profile_registered');
  return res;
}
