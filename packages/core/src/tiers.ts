/**
 * Maximum compliance score (1.0000 in fixed-point, four decimals)
 */
export const MAX_SCORE = 10_000;

/**
 * Tier configuration
 */
export interface TierConfig {
  tier: number;
  label: string;
  minScore: number; // inclusive
  maxScore: number; // inclusive
}

/**
 * Fixed tier policy: non-overlapping, covers [0, MAX_SCORE].
 * Tier 1 is the strongest compliance band.
 */
export const TIERS: readonly TierConfig[] = [
  { tier: 1, label: "Critical", minScore: 9_500, maxScore: MAX_SCORE },
  { tier: 2, label: "High", minScore: 8_500, maxScore: 9_499 },
  { tier: 3, label: "Standard", minScore: 7_000, maxScore: 8_499 },
  { tier: 4, label: "Basic", minScore: 5_000, maxScore: 6_999 },
  { tier: 5, label: "Minimal", minScore: 0, maxScore: 4_999 },
];

export const MIN_TIER = 1;
export const MAX_TIER = TIERS.length;

/**
 * Get tier by tier number (1-5)
 * @returns TierConfig or undefined if not found
 */
export function getTierByNumber(tierNumber: number): TierConfig | undefined {
  return TIERS.find((t) => t.tier === tierNumber);
}

/**
 * Closed score interval bound to a tier, as `[min, max]`.
 * Unknown tiers map to `[0, 0]`; validation rejects them before this matters.
 */
export function tierBounds(tierNumber: number): [number, number] {
  const config = getTierByNumber(tierNumber);
  return config ? [config.minScore, config.maxScore] : [0, 0];
}

/**
 * Get the tier containing a score
 * @returns TierConfig, or undefined when the score is outside [0, MAX_SCORE]
 */
export function tierForScore(score: number): TierConfig | undefined {
  return TIERS.find((t) => score >= t.minScore && score <= t.maxScore);
}

/**
 * Format a fixed-point score as a percentage (e.g. 8500 -> "85.00%")
 */
export function formatScore(score: number): string {
  return `${(score / 100).toFixed(2)}%`;
}
