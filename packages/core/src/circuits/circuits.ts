import type { CommitmentHasher } from "../commitment.js";
import { fieldFromDecimal } from "../field.js";
import { MAX_SCORE } from "../tiers.js";
import {
  CIRCUITS,
  type CircuitKind,
  type RangeInput,
  type StatementInputs,
  type ThresholdInput,
  type TierInput,
} from "../types.js";
import { ConstraintSystem, LinearCombination, toLc } from "./constraint-system.js";
import { RANGE_BITS, allocCommitment, enforceNonNegative, selectTierBounds } from "./gadgets.js";

/**
 * One statement's arithmetic circuit, holding its own copy of the witness.
 * Built per proof request; `synthesize` is a pure function of that witness.
 */
export interface ComplianceCircuit {
  readonly kind: CircuitKind;
  synthesize(cs: ConstraintSystem): void;
}

interface CommitmentWitness {
  readonly entityHash: bigint;
  readonly score: bigint;
  readonly salt: bigint;
}

export interface ThresholdAssignment extends CommitmentWitness {
  readonly threshold: bigint;
}

export interface RangeAssignment extends CommitmentWitness {
  readonly minScore: bigint;
  readonly maxScore: bigint;
}

export interface TierAssignment extends CommitmentWitness {
  readonly targetTier: bigint;
}

function commitmentWitness(input: { entityHash: string; score: number; salt: string }): CommitmentWitness {
  return {
    entityHash: fieldFromDecimal(input.entityHash),
    score: BigInt(input.score),
    salt: fieldFromDecimal(input.salt),
  };
}

/**
 * Proves: threshold <= score <= MAX_SCORE
 *
 * Public: threshold, entityHash, commitment
 */
export class ThresholdCircuit implements ComplianceCircuit {
  readonly kind = CIRCUITS.threshold;
  private readonly assignment: ThresholdAssignment;

  constructor(assignment: ThresholdAssignment, private readonly hasher: CommitmentHasher) {
    this.assignment = Object.freeze({ ...assignment });
  }

  static fromInput(input: ThresholdInput, hasher: CommitmentHasher): ThresholdCircuit {
    return new ThresholdCircuit(
      { threshold: BigInt(input.threshold), ...commitmentWitness(input) },
      hasher,
    );
  }

  synthesize(cs: ConstraintSystem): void {
    const a = this.assignment;
    const threshold = cs.allocInput("threshold", a.threshold);
    const entityHash = cs.allocInput("entityHash", a.entityHash);
    const score = cs.allocWitness("score", a.score);
    const salt = cs.allocWitness("salt", a.salt);

    enforceNonNegative(cs, toLc(score).sub(threshold), RANGE_BITS, "score_minus_threshold");
    enforceNonNegative(cs, LinearCombination.constant(MAX_SCORE).sub(score), RANGE_BITS, "max_minus_score");

    allocCommitment(cs, this.hasher, score, salt, entityHash);
  }
}

/**
 * Proves: minScore <= score <= maxScore (and minScore <= maxScore)
 *
 * Public: minScore, maxScore, entityHash, commitment
 */
export class RangeCircuit implements ComplianceCircuit {
  readonly kind = CIRCUITS.range;
  private readonly assignment: RangeAssignment;

  constructor(assignment: RangeAssignment, private readonly hasher: CommitmentHasher) {
    this.assignment = Object.freeze({ ...assignment });
  }

  static fromInput(input: RangeInput, hasher: CommitmentHasher): RangeCircuit {
    return new RangeCircuit(
      {
        minScore: BigInt(input.minScore),
        maxScore: BigInt(input.maxScore),
        ...commitmentWitness(input),
      },
      hasher,
    );
  }

  synthesize(cs: ConstraintSystem): void {
    const a = this.assignment;
    const minScore = cs.allocInput("minScore", a.minScore);
    const maxScore = cs.allocInput("maxScore", a.maxScore);
    const entityHash = cs.allocInput("entityHash", a.entityHash);
    const score = cs.allocWitness("score", a.score);
    const salt = cs.allocWitness("salt", a.salt);

    enforceNonNegative(cs, toLc(maxScore).sub(minScore), RANGE_BITS, "max_minus_min");
    enforceNonNegative(cs, toLc(score).sub(minScore), RANGE_BITS, "score_minus_min");
    enforceNonNegative(cs, toLc(maxScore).sub(score), RANGE_BITS, "max_minus_score");

    allocCommitment(cs, this.hasher, score, salt, entityHash);
  }
}

/**
 * Proves: score lies in the interval of targetTier, selected in-circuit
 *
 * Public: targetTier, entityHash, commitment
 */
export class TierCircuit implements ComplianceCircuit {
  readonly kind = CIRCUITS.tier;
  private readonly assignment: TierAssignment;

  constructor(assignment: TierAssignment, private readonly hasher: CommitmentHasher) {
    this.assignment = Object.freeze({ ...assignment });
  }

  static fromInput(input: TierInput, hasher: CommitmentHasher): TierCircuit {
    return new TierCircuit(
      { targetTier: BigInt(input.targetTier), ...commitmentWitness(input) },
      hasher,
    );
  }

  synthesize(cs: ConstraintSystem): void {
    const a = this.assignment;
    const targetTier = cs.allocInput("targetTier", a.targetTier);
    const entityHash = cs.allocInput("entityHash", a.entityHash);
    const score = cs.allocWitness("score", a.score);
    const salt = cs.allocWitness("salt", a.salt);

    const bounds = selectTierBounds(cs, targetTier);
    enforceNonNegative(cs, toLc(score).sub(bounds.min), RANGE_BITS, "score_minus_tier_min");
    enforceNonNegative(cs, bounds.max.sub(score), RANGE_BITS, "tier_max_minus_score");

    allocCommitment(cs, this.hasher, score, salt, entityHash);
  }
}

// ──────────────────────────────────────────────────────────
// Construction and synthesis
// ──────────────────────────────────────────────────────────

type CircuitFactory<T> = (input: T, hasher: CommitmentHasher) => ComplianceCircuit;

const FACTORIES: { [K in CircuitKind]: CircuitFactory<StatementInputs[K]> } = {
  [CIRCUITS.threshold]: ThresholdCircuit.fromInput,
  [CIRCUITS.range]: RangeCircuit.fromInput,
  [CIRCUITS.tier]: TierCircuit.fromInput,
};

/** Build a fresh circuit for one statement (does not validate the input) */
export function buildCircuit<K extends CircuitKind>(
  kind: K,
  input: StatementInputs[K],
  hasher: CommitmentHasher,
): ComplianceCircuit {
  const factory: CircuitFactory<StatementInputs[K]> = FACTORIES[kind];
  return factory(input, hasher);
}

/** Synthesize a circuit into a new constraint system */
export function synthesizeCircuit(circuit: ComplianceCircuit): ConstraintSystem {
  const cs = new ConstraintSystem();
  circuit.synthesize(cs);
  return cs;
}
