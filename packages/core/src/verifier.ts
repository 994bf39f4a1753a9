import { SnarkjsBackend, type Groth16Backend } from "./backend.js";
import { InvalidProofFormatError, VerificationError, errorMessage } from "./errors.js";
import { SCALAR_FIELD } from "./field.js";
import { KeyCache, circuitPaths, loadVerificationKey } from "./key-store.js";
import { consoleLogger, type Logger } from "./logger.js";
import { Proof, type ProofArtifact } from "./proof.js";
import type { VerificationKeyJson } from "./schemas.js";
import { CIRCUITS, type CircuitKind } from "./types.js";

export interface VerifierOptions {
  /** Directory holding one sub-directory per compiled circuit */
  buildDir: string;
  backend?: Groth16Backend;
  logger?: Logger;
}

/**
 * Compliance proof verifier.
 *
 * A forged or inconsistent proof resolves to `false`. Errors are reserved
 * for a proof shaped for another statement (wrong kind or public input
 * count), an unreadable key or a backend fault.
 */
export class ComplianceVerifier {
  private readonly buildDir: string;
  private readonly backend: Groth16Backend;
  private readonly logger: Logger;
  private readonly keys: KeyCache<VerificationKeyJson>;

  constructor(options: VerifierOptions) {
    this.buildDir = options.buildDir;
    this.backend = options.backend ?? new SnarkjsBackend();
    this.logger = options.logger ?? consoleLogger;
    this.keys = new KeyCache((kind) => this.loadKey(kind));
  }

  verifyThreshold(artifact: ProofArtifact): Promise<boolean> {
    return this.verify(CIRCUITS.threshold, artifact);
  }

  verifyRange(artifact: ProofArtifact): Promise<boolean> {
    return this.verify(CIRCUITS.range, artifact);
  }

  verifyTier(artifact: ProofArtifact): Promise<boolean> {
    return this.verify(CIRCUITS.tier, artifact);
  }

  /**
   * Verify an artifact for the expected statement kind
   * @throws InvalidProofFormatError when the artifact was made for another kind
   *   or carries the wrong number of public inputs
   */
  async verify(kind: CircuitKind, artifact: ProofArtifact): Promise<boolean> {
    if (artifact.kind !== kind) {
      throw new InvalidProofFormatError(`expected a ${kind} proof, got ${artifact.kind}`);
    }
    return this.check(kind, artifact.proof, artifact.publicInputs);
  }

  /**
   * Verify wire bytes against explicit public inputs (commitment last)
   * @param proofBytes - 128-byte compressed proof
   */
  async verifyRaw(kind: CircuitKind, proofBytes: Uint8Array, publicInputs: readonly bigint[]): Promise<boolean> {
    const proof = Proof.fromBytes(proofBytes);
    publicInputs.forEach((value, i) => {
      if (value < 0n || value >= SCALAR_FIELD) {
        throw new InvalidProofFormatError(`public input ${i} is not a canonical field element`);
      }
    });
    return this.check(kind, proof, publicInputs);
  }

  /**
   * Verify several artifacts of one kind
   * @returns One result per artifact, in order
   */
  async verifyBatch(kind: CircuitKind, artifacts: readonly ProofArtifact[]): Promise<boolean[]> {
    return Promise.all(artifacts.map((artifact) => this.verify(kind, artifact)));
  }

  /** Drop cached verification keys for one kind, or all */
  resetKeys(kind?: CircuitKind): void {
    this.keys.reset(kind);
  }

  private async check(kind: CircuitKind, proof: Proof, publicInputs: readonly bigint[]): Promise<boolean> {
    const vkey = await this.keys.get(kind);

    if (publicInputs.length !== vkey.nPublic) {
      throw new InvalidProofFormatError(
        `${kind} takes ${vkey.nPublic} public inputs, got ${publicInputs.length}`,
      );
    }

    let valid: boolean;
    try {
      valid = await this.backend.verify(
        vkey,
        publicInputs.map((v) => v.toString()),
        proof.toJson(),
      );
    } catch (error) {
      throw new VerificationError(errorMessage(error), { cause: error });
    }

    if (valid) {
      this.logger.info(`✓ ${kind} proof verified`);
    } else {
      this.logger.warn(`✗ ${kind} proof rejected`);
    }
    return valid;
  }

  private async loadKey(kind: CircuitKind): Promise<VerificationKeyJson> {
    const { verificationKey } = circuitPaths(this.buildDir, kind);
    const vkey = await loadVerificationKey(verificationKey);
    this.logger.debug(`  Loaded ${kind} verification key (${vkey.nPublic} public inputs)`);
    return vkey;
  }
}
