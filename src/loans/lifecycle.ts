import { isOwner, type Caller } from '../auth/roles.js';
import { audit } from '../ledger/audit.js';
import { recordDisbursement } from '../ledger/stats.js';
import type { OpContext } from '../ledger/context.js';
import { amortizedMonthlyPayment, saturatingSub } from '../math/fixedPoint.js';
import { getProfile } from '../profiles/store.js';
import { deriveInterestRate } from '../scoring/bands.js';
import { fail, ok, type Result } from '../util/errors.js';
import { canTransition, nextStatus } from './stateMachine.js';
import {
  getActiveLoan,
  getApplication,
  insertApplication,
  insertLoan,
  lastApplicationId,
  updateApplicationStatus,
  updateLoanRepayment,
} from './store.js';
import {
  APPLICATION_SCORE_FLOOR,
  PURPOSE_MAX_LENGTH,
  TERM_MONTHS_MAX,
  TERM_MONTHS_MIN,
  type ActiveLoan,
  type LoanApplication,
} from './types.js';

export type ApplyRequest = {
  amount: bigint;
  purpose: string;
  termMonths: number;
};

export function validatePurpose(purpose: string): string | null {
  if (purpose.length > PURPOSE_MAX_LENGTH) return `purpose is limited to ${PURPOSE_MAX_LENGTH} characters`;
  return null;
}

export function validateTerm(termMonths: number): string | null {
  if (!Number.isInteger(termMonths) || termMonths < TERM_MONTHS_MIN || termMonths > TERM_MONTHS_MAX) {
    return `term must be ${TERM_MONTHS_MIN}-${TERM_MONTHS_MAX} months, got ${termMonths}`;
  }
  return null;
}

/**
 * Opens a pending application priced off the borrower's stored credit score.
 * The id counter only moves when this succeeds.
 */
export function applyForLoan(ctx: OpContext, caller: Caller, req: ApplyRequest): Result<LoanApplication> {
  const { db, now } = ctx;
  const profile = getProfile(db, caller.id);
  if (!profile) return fail('NotFound', `no profile registered for ${caller.id}`);
  if (req.amount <= 0n) return fail('InvalidAmount', 'loan amount must be positive');
  const badParams = validatePurpose(req.purpose) ?? validateTerm(req.termMonths);
  if (badParams) return fail('InvalidParameters', badParams);
  if (profile.creditScore < APPLICATION_SCORE_FLOOR) {
    return fail('InsufficientScore', `credit score ${profile.creditScore} is below ${APPLICATION_SCORE_FLOOR}`);
  }

  const app: LoanApplication = {
    id: lastApplicationId(db) + 1,
    borrower: caller.id,
    amount: req.amount,
    purpose: req.purpose,
    termMonths: req.termMonths,
    riskScore: profile.creditScore,
    interestRate: deriveInterestRate(profile.creditScore),
    status: 'pending',
    appliedAt: now,
    approvedAt: 0,
  };
  insertApplication(db, app);
  audit(db, caller.id, 'application_submitted', app.id, { amount: app.amount, termMonths: app.termMonths, interestRate: app.interestRate }, now);
  ctx.log.info({ applicationId: app.id, borrower: app.borrower, amount: app.amount.toString(), interestRate: app.interestRate }, 'application_submitted');
  return ok(app);
}

export function approveApplication(ctx: OpContext, caller: Caller, id: number): Result<LoanApplication> {
  const { db, now } = ctx;
  if (!isOwner(caller)) return fail('Unauthorized', 'only the owner can approve applications');
  const app = getApplication(db, id);
  if (!app) return fail('NotFound', `application ${id} not found`);
  if (!canTransition(app.status, 'approve')) return fail('InvalidParameters', `application ${id} is ${app.status}, not pending`);

  const next: LoanApplication = { ...app, status: nextStatus('approve'), approvedAt: now };
  updateApplicationStatus(db, id, next.status, now);
  audit(db, caller.id, 'application_approved', id, null, now);
  ctx.log.info({ applicationId: id }, 'application_approved');
  return ok(next);
}

/**
 * Turns an approved application into an active loan. The application row is
 * kept as history; the loan shares its id.
 */
export function disburseLoan(ctx: OpContext, caller: Caller, id: number): Result<ActiveLoan> {
  const { db, now } = ctx;
  if (!isOwner(caller)) return fail('Unauthorized', 'only the owner can disburse loans');
  const app = getApplication(db, id);
  if (!app) return fail('NotFound', `application ${id} not found`);
  if (!canTransition(app.status, 'disburse')) return fail('InvalidParameters', `application ${id} is ${app.status}, not approved`);
  if (getActiveLoan(db, id)) return fail('AlreadyExists', `loan ${id} was already disbursed`);

  const loan: ActiveLoan = {
    id,
    borrower: app.borrower,
    principalAmount: app.amount,
    outstandingBalance: app.amount,
    interestRate: app.interestRate,
    monthlyPayment: amortizedMonthlyPayment(app.amount, app.interestRate, app.termMonths),
    paymentsMade: 0,
    paymentsMissed: 0,
    termMonths: app.termMonths,
    disbursedAt: now,
  };
  insertLoan(db, loan);
  updateApplicationStatus(db, id, nextStatus('disburse'));
  const stats = recordDisbursement(db, loan.principalAmount, now);
  audit(db, caller.id, 'loan_disbursed', id, { principal: loan.principalAmount, monthlyPayment: loan.monthlyPayment }, now);
  ctx.log.info({ loanId: id, borrower: loan.borrower, principal: loan.principalAmount.toString(), monthlyPayment: loan.monthlyPayment.toString(), totalLoansIssued: stats.totalLoansIssued }, 'loan_disbursed');
  return ok(loan);
}

/**
 * Any accepted payment counts as one payment made, whatever its size, and an
 * overpayment clamps the balance at zero with the excess dropped.
 */
export function recordPayment(ctx: OpContext, caller: Caller, id: number, paymentAmount: bigint): Result<ActiveLoan> {
  const { db, now } = ctx;
  const loan = getActiveLoan(db, id);
  if (!loan) return fail('NotFound', `loan ${id} not found`);
  if (loan.borrower !== caller.id) return fail('Unauthorized', `loan ${id} belongs to another borrower`);
  if (paymentAmount <= 0n) return fail('InvalidAmount', 'payment amount must be positive');
  if (loan.outstandingBalance === 0n) return fail('InvalidAmount', `loan ${id} is already repaid`);

  const next: ActiveLoan = {
    ...loan,
    outstandingBalance: saturatingSub(loan.outstandingBalance, paymentAmount),
    paymentsMade: loan.paymentsMade + 1,
  };
  updateLoanRepayment(db, next);
  audit(db, caller.id, 'payment_recorded', id, { amount: paymentAmount, balance: next.outstandingBalance }, now);
  ctx.log.info({ loanId: id, amount: paymentAmount.toString(), remaining: next.outstandingBalance.toString() }, 'loan_payment');
  if (next.outstandingBalance === 0n) ctx.log.info({ loanId: id, paymentsMade: next.paymentsMade }, 'loan_repaid');
  return ok(next);
}

export function recordMissedPayment(ctx: OpContext, caller: Caller, id: number): Result<ActiveLoan> {
  const { db, now } = ctx;
  if (!isOwner(caller)) return fail('Unauthorized', 'only the owner can mark missed payments');
  const loan = getActiveLoan(db, id);
  if (!loan) return fail('NotFound', `loan ${id} not found`);
  if (loan.outstandingBalance === 0n) return fail('InvalidAmount', `loan ${id} is already repaid`);

  const next: ActiveLoan = { ...loan, paymentsMissed: loan.paymentsMissed + 1 };
  updateLoanRepayment(db, next);
  audit(db, caller.id, 'payment_missed', id, { paymentsMissed: next.paymentsMissed }, now);
  ctx.log.warn({ loanId: id, paymentsMissed: next.paymentsMissed }, 'payment_missed');
  return ok(next);
}
