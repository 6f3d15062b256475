import { canTransition, loanState, nextStatus } from '../stateMachine.js';
import type { ActiveLoan, LoanApplication } from '../types.js';

const app = (status: LoanApplication['status']): LoanApplication => ({
  id: 1, borrower: 'alice', amount: 1_000n, purpose: 'car', termMonths: 12, riskScore: 720,
  interestRate: 300, status, appliedAt: 1, approvedAt: status === 'pending' ? 0 : 2,
});

const loan = (outstandingBalance: bigint): ActiveLoan => ({
  id: 1, borrower: 'alice', principalAmount: 1_000n, outstandingBalance, interestRate: 300,
  monthlyPayment: 85n, paymentsMade: 0, paymentsMissed: 0, termMonths: 12, disbursedAt: 3,
});

describe('lifecycle state machine', () => {
  test('only forward transitions are legal', () => {
    expect(canTransition('pending', 'approve')).toBe(true);
    expect(canTransition('approved', 'approve')).toBe(false);
    expect(canTransition('disbursed', 'approve')).toBe(false);
    expect(canTransition('approved', 'disburse')).toBe(true);
    expect(canTransition('pending', 'disburse')).toBe(false);
    expect(canTransition('disbursed', 'disburse')).toBe(false);
    expect(nextStatus('approve')).toBe('approved');
    expect(nextStatus('disburse')).toBe('disbursed');
  });

  test('repayment phase comes from the balance', () => {
    expect(loanState(app('pending'), null)).toBe('pending');
    expect(loanState(app('approved'), null)).toBe('approved');
    expect(loanState(app('disbursed'), loan(400n))).toBe('repaying');
    expect(loanState(app('disbursed'), loan(0n))).toBe('repaid');
  });

  test('a disbursed application without its loan is corrupt', () => {
    expect(() => loanState(app('disbursed'), null)).toThrow('Application 1 is disbursed but has no loan');
  });
});
