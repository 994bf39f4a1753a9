import {
  InvalidInputError,
  InvalidTierError,
  ScoreOutOfRangeError,
  ThresholdNotMetError,
} from "./errors.js";
import { isFieldDecimal, parseUnsignedOrZero } from "./field.js";
import { MAX_SCORE, MAX_TIER, MIN_TIER, tierBounds } from "./tiers.js";
import {
  CIRCUITS,
  type CircuitKind,
  type CircuitSignals,
  type RangeInput,
  type SignalMap,
  type StatementInputs,
  type ThresholdInput,
  type TierInput,
} from "./types.js";

// ──────────────────────────────────────────────────────────
// Validation
// ──────────────────────────────────────────────────────────

function requireUnsigned(field: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidInputError(field, String(value), "an unsigned integer");
  }
}

function requireFieldDecimal(field: string, value: string): void {
  if (!isFieldDecimal(value)) {
    throw new InvalidInputError(field, value, "a decimal field element");
  }
}

function requireCommitmentFields(input: { entityHash: string; salt: string }): void {
  requireFieldDecimal("entity_hash", input.entityHash);
  requireFieldDecimal("salt", input.salt);
}

/**
 * Check a threshold statement.
 * Order: score bound, threshold bound, score >= threshold.
 */
export function validateThresholdInput(input: ThresholdInput): void {
  requireUnsigned("score", input.score);
  requireUnsigned("threshold", input.threshold);

  if (input.score > MAX_SCORE) {
    throw new ScoreOutOfRangeError(input.score, MAX_SCORE);
  }
  if (input.threshold > MAX_SCORE) {
    throw new InvalidInputError("threshold", String(input.threshold), `0-${MAX_SCORE}`);
  }
  if (input.score < input.threshold) {
    throw new ThresholdNotMetError(input.score, input.threshold);
  }
  requireCommitmentFields(input);
}

/**
 * Check a range statement.
 * Order: score bound, min <= max, min <= score <= max, max bound.
 */
export function validateRangeInput(input: RangeInput): void {
  requireUnsigned("score", input.score);
  requireUnsigned("min_score", input.minScore);
  requireUnsigned("max_score", input.maxScore);

  if (input.score > MAX_SCORE) {
    throw new ScoreOutOfRangeError(input.score, MAX_SCORE);
  }
  if (input.minScore > input.maxScore) {
    throw new InvalidInputError(
      "min_score",
      String(input.minScore),
      `<= max_score (${input.maxScore})`,
    );
  }
  if (input.score < input.minScore || input.score > input.maxScore) {
    throw new InvalidInputError(
      "score",
      String(input.score),
      `[${input.minScore}, ${input.maxScore}]`,
    );
  }
  if (input.maxScore > MAX_SCORE) {
    throw new InvalidInputError("max_score", String(input.maxScore), `0-${MAX_SCORE}`);
  }
  requireCommitmentFields(input);
}

/**
 * Check a tier statement.
 * Order: tier number, score bound, score inside the tier interval.
 */
export function validateTierInput(input: TierInput): void {
  if (
    !Number.isInteger(input.targetTier) ||
    input.targetTier < MIN_TIER ||
    input.targetTier > MAX_TIER
  ) {
    throw new InvalidTierError(input.targetTier);
  }
  requireUnsigned("score", input.score);
  if (input.score > MAX_SCORE) {
    throw new ScoreOutOfRangeError(input.score, MAX_SCORE);
  }

  const [min, max] = tierBounds(input.targetTier);
  if (input.score < min || input.score > max) {
    throw new InvalidInputError(
      "score",
      String(input.score),
      `tier ${input.targetTier} range [${min}, ${max}]`,
    );
  }
  requireCommitmentFields(input);
}

// ──────────────────────────────────────────────────────────
// Toolchain signal maps
// ──────────────────────────────────────────────────────────

export function thresholdSignals(input: ThresholdInput): SignalMap {
  return new Map([
    ["threshold", [BigInt(input.threshold)]],
    ["entityHash", [parseUnsignedOrZero(input.entityHash)]],
    ["score", [BigInt(input.score)]],
    ["salt", [parseUnsignedOrZero(input.salt)]],
  ]);
}

export function rangeSignals(input: RangeInput): SignalMap {
  return new Map([
    ["minScore", [BigInt(input.minScore)]],
    ["maxScore", [BigInt(input.maxScore)]],
    ["entityHash", [parseUnsignedOrZero(input.entityHash)]],
    ["score", [BigInt(input.score)]],
    ["salt", [parseUnsignedOrZero(input.salt)]],
  ]);
}

export function tierSignals(input: TierInput): SignalMap {
  return new Map([
    ["targetTier", [BigInt(input.targetTier)]],
    ["entityHash", [parseUnsignedOrZero(input.entityHash)]],
    ["score", [BigInt(input.score)]],
    ["salt", [parseUnsignedOrZero(input.salt)]],
  ]);
}

/** Render a signal map as snarkjs input (single values unwrapped) */
export function toSnarkjsSignals(signals: SignalMap): CircuitSignals {
  const out: CircuitSignals = {};
  for (const [name, values] of signals) {
    out[name] = values.length === 1 ? values[0].toString() : values.map((v) => v.toString());
  }
  return out;
}

// ──────────────────────────────────────────────────────────
// Per-kind dispatch
// ──────────────────────────────────────────────────────────

interface StatementRules<T> {
  validate(input: T): void;
  signals(input: T): SignalMap;
}

const RULES: { [K in CircuitKind]: StatementRules<StatementInputs[K]> } = {
  [CIRCUITS.threshold]: { validate: validateThresholdInput, signals: thresholdSignals },
  [CIRCUITS.range]: { validate: validateRangeInput, signals: rangeSignals },
  [CIRCUITS.tier]: { validate: validateTierInput, signals: tierSignals },
};

function rulesFor<K extends CircuitKind>(kind: K): StatementRules<StatementInputs[K]> {
  return RULES[kind];
}

export function validateStatement<K extends CircuitKind>(kind: K, input: StatementInputs[K]): void {
  rulesFor(kind).validate(input);
}

export function toSignalMap<K extends CircuitKind>(kind: K, input: StatementInputs[K]): SignalMap {
  return rulesFor(kind).signals(input);
}
