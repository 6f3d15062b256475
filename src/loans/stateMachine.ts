import type { ActiveLoan, ApplicationStatus, LoanApplication, LoanState } from './types.js';

export type LifecycleAction = 'approve' | 'disburse';

type Transition = { from: ApplicationStatus; to: ApplicationStatus };

// Forward-only. Anything not listed here is illegal.
export const TRANSITIONS: Record<LifecycleAction, Transition> = {
  approve: { from: 'pending', to: 'approved' },
  disburse: { from: 'approved', to: 'disbursed' },
};

const STATUSES: readonly ApplicationStatus[] = ['pending', 'approved', 'disbursed'];

export function isApplicationStatus(v: string): v is ApplicationStatus {
  return STATUSES.some((s) => s === v);
}

export function canTransition(status: ApplicationStatus, action: LifecycleAction): boolean {
  return TRANSITIONS[action].from === status;
}

export function nextStatus(action: LifecycleAction): ApplicationStatus {
  return TRANSITIONS[action].to;
}

export function loanState(app: LoanApplication, loan: ActiveLoan | null): LoanState {
  if (app.status !== 'disbursed') return app.status;
  if (!loan) throw new Error(`Application ${app.id} is disbursed but has no loan`);
  return loan.outstandingBalance > 0n ? 'repaying' : 'repaid';
}
