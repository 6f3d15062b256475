import type { RiskCategory } from '../scoring/bands.js';

export const CREDIT_SCORE_MIN = 300;
export const CREDIT_SCORE_MAX = 850;

export type BorrowerProfile = {
  borrower: string;
  creditScore: number;
  annualIncome: bigint;
  totalDebt: bigint;
  employmentYears: number;
  previousDefaults: number;
  onTimePayments: number;
  totalLoans: number;
  riskCategory: RiskCategory;
  lastUpdated: number;
};

/** What a borrower submits; the category and stamp are derived. */
export type ProfileInput = Omit<BorrowerProfile, 'borrower' | 'riskCategory' | 'lastUpdated'>;
