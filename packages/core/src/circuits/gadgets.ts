import type { CommitmentHasher } from "../commitment.js";
import { SynthesisError } from "../errors.js";
import { SCALAR_FIELD } from "../field.js";
import { MAX_TIER, TIERS } from "../tiers.js";
import {
  type ConstraintSystem,
  LinearCombination,
  ONE,
  type Operand,
  type Variable,
  toLc,
} from "./constraint-system.js";

/** 2^14 = 16384 > MAX_SCORE, enough for any score difference */
export const RANGE_BITS = 14;

/** Field element rendered as a signed integer when it sits in the upper half */
function signed(value: bigint): string {
  return value > SCALAR_FIELD / 2n ? `-${SCALAR_FIELD - value}` : value.toString();
}

// ──────────────────────────────────────────────────────────
// Bounded non-negativity
// ──────────────────────────────────────────────────────────

/**
 * Prove `0 <= value < 2^bits` by bit decomposition.
 *
 * Allocates `bits` boolean witnesses b_i with b_i * (b_i - 1) = 0 and
 * enforces value = sum(b_i * 2^i). A difference that went negative wraps to
 * a huge field element, which has no such decomposition.
 *
 * @returns The allocated bit variables, least significant first
 */
export function enforceNonNegative(
  cs: ConstraintSystem,
  value: Operand,
  bits: number,
  label: string,
): Variable[] {
  if (!Number.isInteger(bits) || bits < 1 || bits > 252) {
    throw new SynthesisError(`${label}: bit width ${bits} outside 1-252`);
  }

  const v = cs.evaluate(value);
  if (v >= 1n << BigInt(bits)) {
    throw new SynthesisError(`${label}: ${signed(v)} is not representable in ${bits} bits`);
  }

  const bitVars: Variable[] = [];
  let packed = LinearCombination.zero();
  for (let i = 0; i < bits; i++) {
    const bit = cs.allocWitness(`${label}.bit${i}`, (v >> BigInt(i)) & 1n);
    cs.enforce(bit, toLc(bit).sub(ONE), LinearCombination.zero(), `${label}.bit${i}.boolean`);
    packed = packed.add(LinearCombination.from(bit, 1n << BigInt(i)));
    bitVars.push(bit);
  }
  cs.enforce(packed, ONE, value, `${label}.packing`);

  return bitVars;
}

// ──────────────────────────────────────────────────────────
// Tier selector
// ──────────────────────────────────────────────────────────

export interface SelectedTierBounds {
  /** One boolean indicator per tier, tier 1 first */
  indicators: Variable[];
  /** sum(is_i * TIER_MIN_i) */
  min: LinearCombination;
  /** sum(is_i * TIER_MAX_i) */
  max: LinearCombination;
}

/**
 * Choose the tier interval with witness indicators instead of branching.
 *
 * Constraints: each is_i boolean, sum(is_i) = 1, targetTier = sum(i * is_i).
 * The bounds are linear combinations of the indicators with the tier table
 * as constant coefficients, so they cost no extra constraints.
 */
export function selectTierBounds(
  cs: ConstraintSystem,
  targetTier: Operand,
  label = "tier",
): SelectedTierBounds {
  const tierValue = cs.evaluate(targetTier);
  if (tierValue < 1n || tierValue > BigInt(MAX_TIER)) {
    throw new SynthesisError(`${label}: target tier ${signed(tierValue)} has no indicator`);
  }

  const indicators: Variable[] = [];
  let count = LinearCombination.zero();
  let weighted = LinearCombination.zero();
  let min = LinearCombination.zero();
  let max = LinearCombination.zero();

  for (const config of TIERS) {
    const is = cs.allocWitness(
      `${label}.is_tier_${config.tier}`,
      BigInt(config.tier) === tierValue ? 1n : 0n,
    );
    cs.enforce(is, toLc(is).sub(ONE), LinearCombination.zero(), `${label}.is_tier_${config.tier}.boolean`);

    count = count.add(is);
    weighted = weighted.add(LinearCombination.from(is, config.tier));
    min = min.add(LinearCombination.from(is, config.minScore));
    max = max.add(LinearCombination.from(is, config.maxScore));
    indicators.push(is);
  }

  cs.enforce(count, ONE, ONE, `${label}.one_hot`);
  cs.enforce(weighted, ONE, targetTier, `${label}.selects_target`);

  return { indicators, min, max };
}

// ──────────────────────────────────────────────────────────
// Commitment output
// ──────────────────────────────────────────────────────────

/**
 * Expose Poseidon(score, salt, entityHash) as the next public input.
 * Call after every other public input so the commitment lands last.
 */
export function allocCommitment(
  cs: ConstraintSystem,
  hasher: CommitmentHasher,
  score: Operand,
  salt: Operand,
  entityHash: Operand,
): Variable {
  const inputs = [score, salt, entityHash];
  const commitment = cs.allocInput("commitment", hasher.hash(inputs.map((x) => cs.evaluate(x))));
  cs.enforceHash(inputs, commitment, (values) => hasher.hash(values), "commitment");
  return commitment;
}
