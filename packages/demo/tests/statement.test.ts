import { expect } from "chai";
import { CIRCUITS, InvalidInputError } from "@compliance-zk/core";
import { parseStatement } from "../src/statement.js";

const ENTITY_HASH = "42";
const SALT = "7";

function inputError(fn: () => unknown): InvalidInputError {
  try {
    fn();
  } catch (error) {
    if (error instanceof InvalidInputError) return error;
    throw error;
  }
  throw new Error("expected an InvalidInputError");
}

describe("parseStatement", () => {
  it("builds a threshold statement", () => {
    expect(parseStatement(["threshold", "8500", "8000"], ENTITY_HASH, SALT)).to.deep.equal({
      kind: CIRCUITS.threshold,
      input: { threshold: 8_000, entityHash: ENTITY_HASH, score: 8_500, salt: SALT },
    });
  });

  it("builds a range statement", () => {
    expect(parseStatement(["range", "6000", "5000", "7000"], ENTITY_HASH, SALT)).to.deep.equal({
      kind: CIRCUITS.range,
      input: { minScore: 5_000, maxScore: 7_000, entityHash: ENTITY_HASH, score: 6_000, salt: SALT },
    });
  });

  it("builds a tier statement", () => {
    expect(parseStatement(["tier", "7999", "3"], ENTITY_HASH, SALT)).to.deep.equal({
      kind: CIRCUITS.tier,
      input: { targetTier: 3, entityHash: ENTITY_HASH, score: 7_999, salt: SALT },
    });
  });

  it("leaves range checks to the prover", () => {
    const request = parseStatement(["threshold", "99999", "0"], ENTITY_HASH, SALT);
    expect(request.input.score).to.equal(99_999);
  });

  // ---------------------------------------------------------------------------
  // Bad arguments
  // ---------------------------------------------------------------------------

  it("rejects non-numeric scores", () => {
    const error = inputError(() => parseStatement(["threshold", "-1", "0"], ENTITY_HASH, SALT));
    expect(error.details).to.deep.equal({
      field: "score",
      value: "-1",
      expected: "an unsigned integer argument",
    });
  });

  it("reports a missing parameter", () => {
    const error = inputError(() => parseStatement(["range", "6000", "5000"], ENTITY_HASH, SALT));
    expect(error.message).to.equal(
      "Invalid input: maxScore = (missing) (expected an unsigned integer argument)",
    );
  });

  it("rejects unknown statement kinds", () => {
    const error = inputError(() => parseStatement(["median", "6000"], ENTITY_HASH, SALT));
    expect(error.details.field).to.equal("statement");
    expect(error.details.expected).to.equal("threshold, range or tier");
  });
});
