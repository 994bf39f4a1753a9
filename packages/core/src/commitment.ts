import { buildPoseidon } from "circomlibjs";
import { CryptographicError, errorMessage } from "./errors.js";
import { SCALAR_FIELD } from "./field.js";

// ──────────────────────────────────────────────────────────
// circomlibjs Poseidon (types come from circomlibjs.d.ts)
// ──────────────────────────────────────────────────────────

type PoseidonFn = Awaited<ReturnType<typeof buildPoseidon>>;

/** circomlib's Poseidon accepts between 1 and 16 inputs */
export const MAX_HASH_INPUTS = 16;

// ──────────────────────────────────────────────────────────
// Commitment hasher
// ──────────────────────────────────────────────────────────

/**
 * Poseidon hasher compatible with circomlib circuits.
 *
 * Same prime field, round constants and MDS matrix as `poseidon.circom`, so
 * a commitment computed here equals the one the compiled circuit outputs.
 * Instances are immutable once built; build one per prover/verifier or share
 * it freely.
 *
 * Commitment = Poseidon(score, salt, entityHash)
 */
export class CommitmentHasher {
  private constructor(private readonly poseidon: PoseidonFn) {}

  /** Compile the Poseidon wasm module (tens of milliseconds) */
  static async create(): Promise<CommitmentHasher> {
    try {
      return new CommitmentHasher(await buildPoseidon());
    } catch (error) {
      throw new CryptographicError(`Poseidon initialisation failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Order-sensitive hash of field elements.
   * Inputs must already be canonical (0 <= x < field order).
   */
  hash(inputs: readonly bigint[]): bigint {
    if (inputs.length === 0 || inputs.length > MAX_HASH_INPUTS) {
      throw new CryptographicError(
        `Poseidon takes 1-${MAX_HASH_INPUTS} inputs, got ${inputs.length}`,
      );
    }
    for (const input of inputs) {
      if (input < 0n || input >= SCALAR_FIELD) {
        throw new CryptographicError(`Hash input ${input} is not a canonical field element`);
      }
    }

    try {
      return this.poseidon.F.toObject(this.poseidon([...inputs]));
    } catch (error) {
      throw new CryptographicError(`Poseidon hash failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /** Score commitment binding score, salt and entity */
  commitment(score: bigint | number, salt: bigint, entityHash: bigint): bigint {
    return this.hash([BigInt(score), salt, entityHash]);
  }
}
