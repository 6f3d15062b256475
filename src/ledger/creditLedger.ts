import type Database from 'better-sqlite3';
import { ownerResolver, type Caller, type RoleResolver } from '../auth/roles.js';
import { DEFAULT_CONFIG } from '../config/index.js';
import { closeLedgerDb } from '../db/connection.js';
import * as lifecycle from '../loans/lifecycle.js';
import { loanState } from '../loans/stateMachine.js';
import * as loanStore from '../loans/store.js';
import type { ActiveLoan, LoanApplication, LoanState } from '../loans/types.js';
import { log as rootLog, withScope, type Logger } from '../log.js';
import * as profileStore from '../profiles/store.js';
import type { BorrowerProfile, ProfileInput } from '../profiles/types.js';
import { assessComprehensiveRisk, type RiskAssessment } from '../scoring/engine.js';
import { systemClock, type Clock } from '../util/clock.js';
import { LedgerError, fail, mapOk, normalizeError, ok, type Result } from '../util/errors.js';
import { listAudit, type AuditEvent } from './audit.js';
import type { OpContext } from './context.js';
import { getStats, initStats, type LedgerStats } from './stats.js';

export type CreditLedgerOptions = {
  db: Database.Database;
  /** Ignored when `resolveRole` is given. */
  ownerId?: string;
  resolveRole?: RoleResolver;
  clock?: Clock;
  modelVersion?: number;
  logger?: Logger;
};

export type BorrowerAssessment = RiskAssessment & {
  borrower: string;
  purpose: string;
  modelVersion: number;
};

/**
 * Entry points for callers that have already been authenticated. Every
 * mutation is one SQLite transaction: it either fully applies or returns an
 * error having written nothing.
 */
export class CreditLedger {
  private readonly db: Database.Database;
  private readonly clock: Clock;
  private readonly resolveRole: RoleResolver;
  private readonly log: Logger;

  constructor(opts: CreditLedgerOptions) {
    this.db = opts.db;
    this.clock = opts.clock ?? systemClock();
    this.resolveRole = opts.resolveRole ?? ownerResolver(opts.ownerId ?? DEFAULT_CONFIG.ownerId);
    this.log = withScope(opts.logger ?? rootLog, 'ledger');
    initStats(this.db, opts.modelVersion ?? DEFAULT_CONFIG.modelVersion, this.clock.now());
  }

  private callerFor(id: string): Caller {
    return { id, role: this.resolveRole(id) };
  }

  private mutate<T>(op: string, callerId: string, fn: (ctx: OpContext, caller: Caller) => Result<T>): Result<T> {
    const caller = this.callerFor(callerId);
    const ctx: OpContext = { db: this.db, now: this.clock.now(), log: this.log };
    const txn = this.db.transaction(() => {
      const res = fn(ctx, caller);
      // Throwing rolls the transaction back.
      if (!res.ok) throw res.error;
      return res.value;
    });
    try {
      return ok(txn());
    } catch (err) {
      if (err instanceof LedgerError) {
        this.log.warn({ op, caller: callerId, kind: err.kind, reason: err.message }, 'ledger_op_rejected');
        return { ok: false, error: err };
      }
      this.log.error({ op, caller: callerId, error: normalizeError(err) }, 'ledger_op_failed');
      throw err;
    }
  }

  registerProfile(callerId: string, input: ProfileInput): Result<BorrowerProfile> {
    return this.mutate('registerProfile', callerId, (ctx, caller) => profileStore.registerProfile(ctx, caller, input));
  }

  /** Returns the new application id. */
  apply(callerId: string, amount: bigint, purpose: string, termMonths: number): Result<number> {
    return this.mutate('apply', callerId, (ctx, caller) =>
      mapOk(lifecycle.applyForLoan(ctx, caller, { amount, purpose, termMonths }), (app) => app.id));
  }

  approve(callerId: string, id: number): Result<LoanApplication> {
    return this.mutate('approve', callerId, (ctx, caller) => lifecycle.approveApplication(ctx, caller, id));
  }

  disburse(callerId: string, id: number): Result<ActiveLoan> {
    return this.mutate('disburse', callerId, (ctx, caller) => lifecycle.disburseLoan(ctx, caller, id));
  }

  /** Returns the outstanding balance after the payment. */
  recordPayment(callerId: string, id: number, amount: bigint): Result<bigint> {
    return this.mutate('recordPayment', callerId, (ctx, caller) =>
      mapOk(lifecycle.recordPayment(ctx, caller, id, amount), (loan) => loan.outstandingBalance));
  }

  recordMissedPayment(callerId: string, id: number): Result<ActiveLoan> {
    return this.mutate('recordMissedPayment', callerId, (ctx, caller) => lifecycle.recordMissedPayment(ctx, caller, id));
  }

  getProfile(identity: string): BorrowerProfile | null {
    return profileStore.getProfile(this.db, identity);
  }

  getApplication(id: number): LoanApplication | null {
    return loanStore.getApplication(this.db, id);
  }

  listApplications(borrower: string): LoanApplication[] {
    return loanStore.listBorrowerApplications(this.db, borrower);
  }

  getActiveLoan(id: number): ActiveLoan | null {
    return loanStore.getActiveLoan(this.db, id);
  }

  getLoanState(id: number): LoanState | null {
    const app = loanStore.getApplication(this.db, id);
    if (!app) return null;
    return loanState(app, loanStore.getActiveLoan(this.db, id));
  }

  getStats(): LedgerStats {
    return getStats(this.db);
  }

  getAuditTrail(target: string | number): AuditEvent[] {
    return listAudit(this.db, target);
  }

  /** Full multi-factor evaluation. Never writes. */
  assessComprehensiveRisk(identity: string, requestedAmount: bigint, purpose: string): Result<BorrowerAssessment> {
    const profile = profileStore.getProfile(this.db, identity);
    if (!profile) return fail('NotFound', `no profile registered for ${identity}`);
    if (requestedAmount <= 0n) return fail('InvalidAmount', 'requested amount must be positive');
    const badPurpose = lifecycle.validatePurpose(purpose);
    if (badPurpose) return fail('InvalidParameters', badPurpose);
    const assessment = assessComprehensiveRisk(profile, requestedAmount);
    return ok({ ...assessment, borrower: identity, purpose, modelVersion: getStats(this.db).modelVersion });
  }

  close(): void {
    closeLedgerDb(this.db);
  }
}
