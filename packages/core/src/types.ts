/**
 * Circuit names double as the statement-kind tag carried by artifacts and
 * as the directory names inside the build directory.
 */
export const CIRCUITS = {
  threshold: "compliance_threshold",
  range: "range_proof",
  tier: "tier_membership",
} as const;

export type CircuitKind = (typeof CIRCUITS)[keyof typeof CIRCUITS];

export const CIRCUIT_KINDS: readonly CircuitKind[] = [
  CIRCUITS.threshold,
  CIRCUITS.range,
  CIRCUITS.tier,
];

export function isCircuitKind(value: string): value is CircuitKind {
  return CIRCUIT_KINDS.some((kind) => kind === value);
}

/**
 * Input for a compliance threshold proof.
 * Proves: score >= threshold
 */
export interface ThresholdInput {
  /** Minimum required score (0-10000, public) */
  threshold: number;
  /** Hash of entity identifier as a decimal field element (public) */
  entityHash: string;
  /** Actual compliance score (private) */
  score: number;
  /** Random salt for the commitment, decimal (private) */
  salt: string;
}

/**
 * Input for a compliance range proof.
 * Proves: minScore <= score <= maxScore
 */
export interface RangeInput {
  /** Minimum of range, inclusive (public) */
  minScore: number;
  /** Maximum of range, inclusive (public) */
  maxScore: number;
  entityHash: string;
  score: number;
  salt: string;
}

/**
 * Input for a tier membership proof.
 * Proves: score lies in the interval of the target tier
 */
export interface TierInput {
  /** Target tier, 1-5 (public) */
  targetTier: number;
  entityHash: string;
  score: number;
  salt: string;
}

/** Statement input type for each circuit kind */
export interface StatementInputs {
  compliance_threshold: ThresholdInput;
  range_proof: RangeInput;
  tier_membership: TierInput;
}

export type StatementInput = StatementInputs[CircuitKind];

/**
 * Witness toolchain input: signal name -> one or more values, in the
 * circuit's declaration order.
 */
export type SignalMap = Map<string, bigint[]>;

/** Signal map rendered the way snarkjs takes it */
export type CircuitSignals = Record<string, string | string[]>;
