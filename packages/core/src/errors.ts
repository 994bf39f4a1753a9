/**
 * Error taxonomy shared by the prover, verifier and codecs.
 *
 * Every error carries a stable `code` and structured `details` so callers can
 * act on the failure (offending field, expected bound, file path) without
 * parsing the message.
 */

export type ProverErrorCode =
  | "CIRCUIT_NOT_FOUND"
  | "INVALID_INPUT"
  | "SCORE_OUT_OF_RANGE"
  | "THRESHOLD_NOT_MET"
  | "INVALID_TIER"
  | "WITNESS_ERROR"
  | "SETUP_ERROR"
  | "PROOF_GENERATION_FAILED"
  | "VERIFICATION_FAILED"
  | "INVALID_PROOF_FORMAT"
  | "SERIALIZATION_ERROR"
  | "IO_ERROR"
  | "CRYPTOGRAPHIC_ERROR"
  | "SYNTHESIS_ERROR";

export interface ErrorDetails {
  field?: string;
  value?: string;
  expected?: string;
  path?: string;
  reason?: string;
}

export class ProverError extends Error {
  constructor(
    public readonly code: ProverErrorCode,
    message: string,
    public readonly details: ErrorDetails = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ProverError";
  }
}

/** Missing compiled circuit artifact or key file */
export class CircuitNotFoundError extends ProverError {
  constructor(path: string) {
    super("CIRCUIT_NOT_FOUND", `Circuit file not found: ${path}`, { path });
    this.name = "CircuitNotFoundError";
  }
}

export class InvalidInputError extends ProverError {
  constructor(field: string, value: string, expected: string) {
    super(
      "INVALID_INPUT",
      `Invalid input: ${field} = ${value} (expected ${expected})`,
      { field, value, expected },
    );
    this.name = "InvalidInputError";
  }
}

export class ScoreOutOfRangeError extends ProverError {
  constructor(public readonly score: number, maxScore: number) {
    super(
      "SCORE_OUT_OF_RANGE",
      `Score ${score} out of valid range [0, ${maxScore}]`,
      { field: "score", value: String(score), expected: `0-${maxScore}` },
    );
    this.name = "ScoreOutOfRangeError";
  }
}

export class ThresholdNotMetError extends ProverError {
  constructor(
    public readonly score: number,
    public readonly threshold: number,
  ) {
    super(
      "THRESHOLD_NOT_MET",
      `Score ${score} does not meet threshold ${threshold}`,
      { field: "score", value: String(score), expected: `>= ${threshold}` },
    );
    this.name = "ThresholdNotMetError";
  }
}

export class InvalidTierError extends ProverError {
  constructor(public readonly tier: number) {
    super("INVALID_TIER", `Invalid tier ${tier}, must be 1-5`, {
      field: "targetTier",
      value: String(tier),
      expected: "1-5",
    });
    this.name = "InvalidTierError";
  }
}

export class WitnessError extends ProverError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super("WITNESS_ERROR", `Witness calculation error: ${reason}`, { reason }, options);
    this.name = "WitnessError";
  }
}

/** Proving key present but unusable for the circuit */
export class SetupError extends ProverError {
  constructor(reason: string, options?: { cause?: unknown; path?: string }) {
    super("SETUP_ERROR", `Setup error: ${reason}`, { reason, path: options?.path }, options);
    this.name = "SetupError";
  }
}

export class ProofGenerationError extends ProverError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super("PROOF_GENERATION_FAILED", `Proof generation failed: ${reason}`, { reason }, options);
    this.name = "ProofGenerationError";
  }
}

/** Cryptographic or library fault during verification (not a rejected proof) */
export class VerificationError extends ProverError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super("VERIFICATION_FAILED", `Proof verification failed: ${reason}`, { reason }, options);
    this.name = "VerificationError";
  }
}

export class InvalidProofFormatError extends ProverError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super("INVALID_PROOF_FORMAT", `Invalid proof format: ${reason}`, { reason }, options);
    this.name = "InvalidProofFormatError";
  }
}

export class SerializationError extends ProverError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super("SERIALIZATION_ERROR", `Serialization error: ${reason}`, { reason }, options);
    this.name = "SerializationError";
  }
}

export class IoError extends ProverError {
  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super("IO_ERROR", `IO error at ${path}: ${reason}`, { path, reason }, options);
    this.name = "IoError";
  }
}

export class CryptographicError extends ProverError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super("CRYPTOGRAPHIC_ERROR", `Cryptographic error: ${reason}`, { reason }, options);
    this.name = "CryptographicError";
  }
}

/** A gadget was handed a value its constraints cannot represent */
export class SynthesisError extends ProverError {
  constructor(reason: string) {
    super("SYNTHESIS_ERROR", `Circuit synthesis failed: ${reason}`, { reason });
    this.name = "SynthesisError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
