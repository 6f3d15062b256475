export type ApplicationStatus = 'pending' | 'approved' | 'disbursed';

/** Status plus the repayment phase, which is derived from the loan balance. */
export type LoanState = 'pending' | 'approved' | 'repaying' | 'repaid';

export const TERM_MONTHS_MIN = 6;
export const TERM_MONTHS_MAX = 360;
export const PURPOSE_MAX_LENGTH = 100;
export const APPLICATION_SCORE_FLOOR = 500;

export type LoanApplication = {
  id: number;
  borrower: string;
  amount: bigint;
  purpose: string;
  termMonths: number;
  riskScore: number;
  interestRate: number; // bps
  status: ApplicationStatus;
  appliedAt: number;
  approvedAt: number; // 0 until approved
};

export type ActiveLoan = {
  id: number; // same id as the originating application
  borrower: string;
  principalAmount: bigint;
  outstandingBalance: bigint;
  interestRate: number; // bps
  monthlyPayment: bigint;
  paymentsMade: number;
  paymentsMissed: number;
  termMonths: number;
  disbursedAt: number;
};
