import { CREDIT_SCORE_MAX, CREDIT_SCORE_MIN, type BorrowerProfile } from '../profiles/types.js';
import { BPS_SCALE, idiv, percentOf, ratioBasisPoints } from '../math/fixedPoint.js';
import { bandFor, type RiskCategory } from './bands.js';

// Integer weights, summing to 100.
export const SCORE_WEIGHTS = {
  credit: 35,
  debtToIncome: 25,
  paymentHistory: 20,
  employment: 10,
  defaults: 10,
} as const;

const DTI_CUTOFF_BPS = 5_000n;
const LTI_DISCOUNT_THRESHOLD_PCT = 50n;
const LTI_DISCOUNT_PER_MILLE = 950;
const FINAL_SCORE_FLOOR = 500;
const FINAL_SCORE_SPAN = 350;
const MAX_LOAN_INCOME_PCT = 40n;
const NEUTRAL_HISTORY_SCORE = 50;

export type SubScores = {
  normalizedCredit: number;
  dtiScore: number;
  paymentHistoryScore: number;
  employmentScore: number;
  defaultScore: number;
};

export type RiskAssessment = {
  requestedAmount: bigint;
  components: SubScores;
  debtToIncomeBps: bigint;
  loanToIncomePct: bigint;
  compositeScore: number;
  adjustedScore: number;
  finalRiskScore: number;
  riskCategory: RiskCategory;
  recommendedInterestRate: number;
  maxRecommendedAmount: bigint;
  approvalRecommendation: boolean;
};

/** Linear rescale of [300, 850] onto [0, 100]. */
export function normalizeCreditScore(creditScore: number): number {
  return idiv((creditScore - CREDIT_SCORE_MIN) * 100, CREDIT_SCORE_MAX - CREDIT_SCORE_MIN);
}

export function debtToIncomeBps(totalDebt: bigint, annualIncome: bigint): bigint {
  return ratioBasisPoints(totalDebt, annualIncome, BPS_SCALE);
}

/** 100 at no debt, falling 1 point per 0.5% DTI, 0 from 50% on. */
export function dtiScore(totalDebt: bigint, annualIncome: bigint): number {
  const dti = debtToIncomeBps(totalDebt, annualIncome);
  if (dti >= DTI_CUTOFF_BPS) return 0;
  return 100 - Number(dti / 50n);
}

/**
 * Share of loans paid on time, as a percentage. No loan history at all is
 * neutral (50), not the worst case. Counts are not cross-checked, so more
 * on-time payments than loans scores above 100.
 */
export function paymentHistoryScore(onTimePayments: number, totalLoans: number): number {
  if (totalLoans === 0) return NEUTRAL_HISTORY_SCORE;
  return Number(ratioBasisPoints(BigInt(onTimePayments), BigInt(totalLoans), 100n));
}

export function employmentScore(employmentYears: number): number {
  return Math.min(employmentYears * 10, 100);
}

export function defaultScore(previousDefaults: number): number {
  if (previousDefaults === 0) return 100;
  if (previousDefaults <= 2) return 50;
  return 0;
}

export function subScores(profile: BorrowerProfile): SubScores {
  return {
    normalizedCredit: normalizeCreditScore(profile.creditScore),
    dtiScore: dtiScore(profile.totalDebt, profile.annualIncome),
    paymentHistoryScore: paymentHistoryScore(profile.onTimePayments, profile.totalLoans),
    employmentScore: employmentScore(profile.employmentYears),
    defaultScore: defaultScore(profile.previousDefaults),
  };
}

export function compositeScore(s: SubScores): number {
  const weighted =
    s.normalizedCredit * SCORE_WEIGHTS.credit +
    s.dtiScore * SCORE_WEIGHTS.debtToIncome +
    s.paymentHistoryScore * SCORE_WEIGHTS.paymentHistory +
    s.employmentScore * SCORE_WEIGHTS.employment +
    s.defaultScore * SCORE_WEIGHTS.defaults;
  return idiv(weighted, 100);
}

/**
 * Requested amount as a percent of income. Zero income takes the same
 * worst-case convention as DTI, so it always counts as over the threshold.
 */
export function loanToIncomePct(requestedAmount: bigint, annualIncome: bigint): bigint {
  return ratioBasisPoints(requestedAmount, annualIncome, 100n);
}

/** 5% off the composite when the request is more than half a year's income. */
export function applyLoanToIncomeAdjustment(composite: number, ltiPct: bigint): number {
  if (ltiPct > LTI_DISCOUNT_THRESHOLD_PCT) return idiv(composite * LTI_DISCOUNT_PER_MILLE, 1000);
  return composite;
}

/** Maps a 0–100 composite onto 500–850. */
export function toRiskScore(adjustedComposite: number): number {
  return FINAL_SCORE_FLOOR + idiv(adjustedComposite * FINAL_SCORE_SPAN, 100);
}

export function assessComprehensiveRisk(profile: BorrowerProfile, requestedAmount: bigint): RiskAssessment {
  const components = subScores(profile);
  const composite = compositeScore(components);
  const lti = loanToIncomePct(requestedAmount, profile.annualIncome);
  const adjusted = applyLoanToIncomeAdjustment(composite, lti);
  const finalRiskScore = toRiskScore(adjusted);
  const band = bandFor(finalRiskScore);
  return {
    requestedAmount,
    components,
    debtToIncomeBps: debtToIncomeBps(profile.totalDebt, profile.annualIncome),
    loanToIncomePct: lti,
    compositeScore: composite,
    adjustedScore: adjusted,
    finalRiskScore,
    riskCategory: band.category,
    recommendedInterestRate: band.rateBps,
    maxRecommendedAmount: percentOf(profile.annualIncome, MAX_LOAN_INCOME_PCT),
    approvalRecommendation: finalRiskScore >= FINAL_SCORE_FLOOR,
  };
}
