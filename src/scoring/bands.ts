export type RiskCategory = 'low' | 'medium' | 'high' | 'very-high';

export type RiskBand = {
  category: RiskCategory;
  minScore: number;
  rateBps: number;
};

// Highest threshold first. Thresholds are inclusive.
export const RISK_BANDS: readonly RiskBand[] = [
  { category: 'low', minScore: 700, rateBps: 300 },
  { category: 'medium', minScore: 600, rateBps: 800 },
  { category: 'high', minScore: 500, rateBps: 1500 },
  { category: 'very-high', minScore: -Infinity, rateBps: 2000 },
];

export const RISK_CATEGORIES: readonly RiskCategory[] = RISK_BANDS.map((b) => b.category);

/**
 * Band for a score. Used for both the raw credit score on a profile and the
 * blended score of a full assessment.
 */
export function bandFor(score: number): RiskBand {
  for (const band of RISK_BANDS) {
    if (score >= band.minScore) return band;
  }
  return RISK_BANDS[RISK_BANDS.length - 1];
}

export function deriveRiskCategory(score: number): RiskCategory {
  return bandFor(score).category;
}

export function deriveInterestRate(score: number): number {
  return bandFor(score).rateBps;
}

export function isRiskCategory(v: string): v is RiskCategory {
  return RISK_CATEGORIES.some((c) => c === v);
}
