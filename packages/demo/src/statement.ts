import {
  CIRCUITS,
  InvalidInputError,
  type CircuitKind,
  type StatementInputs,
} from "@compliance-zk/core";

/** A statement kind paired with its matching input */
export type StatementRequest = {
  [K in CircuitKind]: { kind: K; input: StatementInputs[K] };
}[CircuitKind];

export const USAGE = `Usage:
  compliance-zk-demo threshold <entityId> <score> <threshold>
  compliance-zk-demo range     <entityId> <score> <minScore> <maxScore>
  compliance-zk-demo tier      <entityId> <score> <targetTier>`;

function integerArg(name: string, value: string | undefined): number {
  if (value === undefined || !/^[0-9]+$/.test(value)) {
    throw new InvalidInputError(name, value ?? "(missing)", "an unsigned integer argument");
  }
  return Number(value);
}

/**
 * Turn `<kind> <score> <params...>` (entity id already removed) into a
 * statement request. Range checks are left to the prover.
 */
export function parseStatement(
  args: readonly string[],
  entityHash: string,
  salt: string,
): StatementRequest {
  const [kind, scoreArg, ...params] = args;
  const score = integerArg("score", scoreArg);

  switch (kind) {
    case "threshold":
      return {
        kind: CIRCUITS.threshold,
        input: { threshold: integerArg("threshold", params[0]), entityHash, score, salt },
      };
    case "range":
      return {
        kind: CIRCUITS.range,
        input: {
          minScore: integerArg("minScore", params[0]),
          maxScore: integerArg("maxScore", params[1]),
          entityHash,
          score,
          salt,
        },
      };
    case "tier":
      return {
        kind: CIRCUITS.tier,
        input: { targetTier: integerArg("targetTier", params[0]), entityHash, score, salt },
      };
    default:
      throw new InvalidInputError("statement", kind ?? "(missing)", "threshold, range or tier");
  }
}
