import { expect } from "chai";
import * as fc from "fast-check";
import {
  InvalidInputError,
  InvalidTierError,
  ProverError,
  ScoreOutOfRangeError,
  ThresholdNotMetError,
} from "../src/errors.js";
import {
  rangeSignals,
  thresholdSignals,
  tierSignals,
  toSignalMap,
  toSnarkjsSignals,
  validateRangeInput,
  validateStatement,
  validateThresholdInput,
  validateTierInput,
} from "../src/inputs.js";
import { TIERS, formatScore, getTierByNumber, tierBounds, tierForScore } from "../src/tiers.js";
import { CIRCUITS, type RangeInput, type ThresholdInput, type TierInput } from "../src/types.js";
import { ENTITY_HASH, SALT } from "./helpers.js";

function thrown(fn: () => void): ProverError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ProverError) return error;
    throw error;
  }
  throw new Error("expected a ProverError");
}

const threshold = (t: number, score: number): ThresholdInput => ({
  threshold: t,
  entityHash: ENTITY_HASH,
  score,
  salt: SALT,
});

const range = (minScore: number, maxScore: number, score: number): RangeInput => ({
  minScore,
  maxScore,
  entityHash: ENTITY_HASH,
  score,
  salt: SALT,
});

const tier = (targetTier: number, score: number): TierInput => ({
  targetTier,
  entityHash: ENTITY_HASH,
  score,
  salt: SALT,
});

describe("statement inputs", () => {
  // ---------------------------------------------------------------------------
  // Threshold
  // ---------------------------------------------------------------------------

  describe("threshold", () => {
    it("accepts every threshold <= score <= 10000", () => {
      fc.assert(
        fc.property(fc.integer({ min: 0, max: 10_000 }), fc.integer({ min: 0, max: 10_000 }), (a, b) => {
          validateThresholdInput(threshold(Math.min(a, b), Math.max(a, b)));
        }),
      );
    });

    it("rejects every score below the threshold", () => {
      fc.assert(
        fc.property(fc.integer({ min: 1, max: 10_000 }), fc.integer({ min: 0, max: 9_999 }), (t, s) => {
          fc.pre(s < t);
          const error = thrown(() => validateThresholdInput(threshold(t, s)));
          expect(error).to.be.instanceOf(ThresholdNotMetError);
          expect(error.code).to.equal("THRESHOLD_NOT_MET");
        }),
      );
    });

    it("checks the score bound first", () => {
      const error = thrown(() => validateThresholdInput(threshold(10_002, 10_001)));
      expect(error).to.be.instanceOf(ScoreOutOfRangeError);
      expect(error.details).to.deep.equal({ field: "score", value: "10001", expected: "0-10000" });
    });

    it("rejects a threshold above the maximum score", () => {
      const error = thrown(() => validateThresholdInput(threshold(10_001, 10_000)));
      expect(error).to.be.instanceOf(InvalidInputError);
      expect(error.details.field).to.equal("threshold");
    });

    it("rejects negative and fractional numbers", () => {
      expect(thrown(() => validateThresholdInput(threshold(0, -1))).details.field).to.equal("score");
      expect(thrown(() => validateThresholdInput(threshold(0.5, 10))).details.field).to.equal("threshold");
    });

    it("rejects entity hashes and salts that are not field elements", () => {
      const badHash = thrown(() => validateThresholdInput({ ...threshold(1, 2), entityHash: "0xabc" }));
      expect(badHash).to.be.instanceOf(InvalidInputError);
      expect(badHash.details).to.deep.equal({
        field: "entity_hash",
        value: "0xabc",
        expected: "a decimal field element",
      });

      const tooBig = "21888242871839275222246405745257275088548364400416034343698204186575808495617";
      expect(thrown(() => validateThresholdInput({ ...threshold(1, 2), salt: tooBig })).details.field).to.equal(
        "salt",
      );
    });
  });

  // ---------------------------------------------------------------------------
  // Range
  // ---------------------------------------------------------------------------

  describe("range", () => {
    it("accepts every min <= score <= max <= 10000", () => {
      const sorted = fc
        .tuple(fc.integer({ min: 0, max: 10_000 }), fc.integer({ min: 0, max: 10_000 }), fc.integer({ min: 0, max: 10_000 }))
        .map((xs) => [...xs].sort((x, y) => x - y));
      fc.assert(
        fc.property(sorted, ([min, score, max]) => {
          validateRangeInput(range(min, max, score));
        }),
      );
    });

    it("rejects every score outside [min, max] with InvalidInput(score)", () => {
      fc.assert(
        fc.property(
          fc.integer({ min: 0, max: 10_000 }),
          fc.integer({ min: 0, max: 10_000 }),
          fc.integer({ min: 0, max: 10_000 }),
          (a, b, score) => {
            const [min, max] = a <= b ? [a, b] : [b, a];
            fc.pre(score < min || score > max);
            const error = thrown(() => validateRangeInput(range(min, max, score)));
            expect(error).to.be.instanceOf(InvalidInputError);
            expect(error.details.field).to.equal("score");
            expect(error.details.expected).to.equal(`[${min}, ${max}]`);
          },
        ),
      );
    });

    it("rejects min > max before looking at the score", () => {
      const error = thrown(() => validateRangeInput(range(6_000, 5_000, 9_000)));
      expect(error.details.field).to.equal("min_score");
    });

    it("checks the score bound first", () => {
      expect(thrown(() => validateRangeInput(range(0, 20_000, 10_001)))).to.be.instanceOf(ScoreOutOfRangeError);
    });

    it("rejects a maximum above 10000", () => {
      const error = thrown(() => validateRangeInput(range(0, 10_001, 5_000)));
      expect(error).to.be.instanceOf(InvalidInputError);
      expect(error.details.field).to.equal("max_score");
    });
  });

  // ---------------------------------------------------------------------------
  // Tier
  // ---------------------------------------------------------------------------

  describe("tier", () => {
    it("uses the fixed tier table", () => {
      expect([1, 2, 3, 4, 5].map(tierBounds)).to.deep.equal([
        [9_500, 10_000],
        [8_500, 9_499],
        [7_000, 8_499],
        [5_000, 6_999],
        [0, 4_999],
      ]);
      expect(tierBounds(6)).to.deep.equal([0, 0]);
      expect(TIERS.map((t) => t.label)).to.deep.equal(["Critical", "High", "Standard", "Basic", "Minimal"]);
    });

    it("accepts a score for its own tier and rejects it for every other", () => {
      fc.assert(
        fc.property(fc.integer({ min: 0, max: 10_000 }), (score) => {
          const own = tierForScore(score);
          expect(own).to.not.equal(undefined);
          for (const { tier: t } of TIERS) {
            if (t === own?.tier) {
              validateTierInput(tier(t, score));
            } else {
              const error = thrown(() => validateTierInput(tier(t, score)));
              expect(error).to.be.instanceOf(InvalidInputError);
              expect(error.details.field).to.equal("score");
            }
          }
        }),
      );
    });

    it("rejects 6999 for tier 3 with the tier interval as the expectation", () => {
      const error = thrown(() => validateTierInput(tier(3, 6_999)));
      expect(error.details).to.deep.equal({
        field: "score",
        value: "6999",
        expected: "tier 3 range [7000, 8499]",
      });
    });

    it("accepts the tier 3 upper edge", () => {
      validateTierInput(tier(3, 8_499));
      validateTierInput(tier(3, 7_999));
    });

    it("rejects tier numbers outside 1-5 before anything else", () => {
      for (const t of [0, 6, 2.5, -1]) {
        const error = thrown(() => validateTierInput(tier(t, 99_999)));
        expect(error, String(t)).to.be.instanceOf(InvalidTierError);
        expect(error.code).to.equal("INVALID_TIER");
      }
    });

    it("looks up tiers by number and by score", () => {
      expect(getTierByNumber(2)?.label).to.equal("High");
      expect(getTierByNumber(9)).to.equal(undefined);
      expect(tierForScore(10_000)?.tier).to.equal(1);
      expect(tierForScore(0)?.tier).to.equal(5);
      expect(tierForScore(10_001)).to.equal(undefined);
      expect(formatScore(8_500)).to.equal("85.00%");
    });
  });

  // ---------------------------------------------------------------------------
  // Signal maps
  // ---------------------------------------------------------------------------

  describe("signal maps", () => {
    it("lists signals in the toolchain's order", () => {
      expect([...thresholdSignals(threshold(8_000, 8_500)).keys()]).to.deep.equal([
        "threshold",
        "entityHash",
        "score",
        "salt",
      ]);
      expect([...rangeSignals(range(1, 2, 1)).keys()]).to.deep.equal([
        "minScore",
        "maxScore",
        "entityHash",
        "score",
        "salt",
      ]);
      expect([...tierSignals(tier(3, 7_999)).keys()]).to.deep.equal([
        "targetTier",
        "entityHash",
        "score",
        "salt",
      ]);
    });

    it("renders decimal strings for snarkjs", () => {
      expect(toSnarkjsSignals(toSignalMap(CIRCUITS.threshold, threshold(8_000, 8_500)))).to.deep.equal({
        threshold: "8000",
        entityHash: ENTITY_HASH,
        score: "8500",
        salt: SALT,
      });
      expect(toSnarkjsSignals(new Map([["path", [1n, 2n]]]))).to.deep.equal({ path: ["1", "2"] });
    });

    it("keeps the zero fallback for unparsable hashes", () => {
      const signals = thresholdSignals({ ...threshold(1, 2), entityHash: "oops", salt: "" });
      expect(signals.get("entityHash")).to.deep.equal([0n]);
      expect(signals.get("salt")).to.deep.equal([0n]);
    });

    it("dispatches validation by statement kind", () => {
      validateStatement(CIRCUITS.range, range(10, 20, 15));
      expect(thrown(() => validateStatement(CIRCUITS.tier, tier(3, 6_999))).details.field).to.equal("score");
    });
  });
});
