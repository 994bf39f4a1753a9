import { SnarkjsBackend, type Groth16Backend } from "./backend.js";
import { buildCircuit, synthesizeCircuit } from "./circuits/circuits.js";
import type { ConstraintSystem } from "./circuits/constraint-system.js";
import { CommitmentHasher } from "./commitment.js";
import {
  InvalidProofFormatError,
  ProofGenerationError,
  SetupError,
  WitnessError,
  errorMessage,
} from "./errors.js";
import { toSignalMap, toSnarkjsSignals, validateStatement } from "./inputs.js";
import { KeyCache, circuitPaths, readArtifact } from "./key-store.js";
import { consoleLogger, type Logger } from "./logger.js";
import { Proof, ProofArtifact } from "./proof.js";
import {
  CIRCUITS,
  type CircuitKind,
  type RangeInput,
  type StatementInputs,
  type ThresholdInput,
  type TierInput,
} from "./types.js";

export interface ProverOptions {
  /** Directory holding one sub-directory per compiled circuit */
  buildDir: string;
  backend?: Groth16Backend;
  /** Shared Poseidon instance; built on first use when omitted */
  hasher?: CommitmentHasher;
  logger?: Logger;
}

interface ProvingMaterial {
  wasm: Uint8Array;
  zkey: Uint8Array;
  provingKeyPath: string;
  /** Public inputs the proving key was set up for */
  nPublic: number;
}

/**
 * Compliance statement prover.
 *
 * Checks the statement natively before handing it to the Groth16 backend,
 * so a bad input fails fast with a typed error instead of a witness
 * calculator assertion. Circuit wasm and proving keys are read once per
 * kind and kept for the prover's lifetime.
 */
export class ComplianceProver {
  private readonly buildDir: string;
  private readonly backend: Groth16Backend;
  private readonly logger: Logger;
  private readonly material: KeyCache<ProvingMaterial>;
  private hasher?: Promise<CommitmentHasher>;

  constructor(options: ProverOptions) {
    this.buildDir = options.buildDir;
    this.backend = options.backend ?? new SnarkjsBackend();
    this.logger = options.logger ?? consoleLogger;
    if (options.hasher) this.hasher = Promise.resolve(options.hasher);
    this.material = new KeyCache((kind) => this.loadMaterial(kind));
  }

  /** Prove threshold <= score <= 10000 */
  proveThreshold(input: ThresholdInput): Promise<ProofArtifact> {
    return this.prove(CIRCUITS.threshold, input);
  }

  /** Prove minScore <= score <= maxScore */
  proveRange(input: RangeInput): Promise<ProofArtifact> {
    return this.prove(CIRCUITS.range, input);
  }

  /** Prove the score falls inside targetTier */
  proveTier(input: TierInput): Promise<ProofArtifact> {
    return this.prove(CIRCUITS.tier, input);
  }

  /**
   * Generate a proof for any statement kind.
   *
   * @returns Artifact whose public inputs are the circuit's declared public
   *   inputs followed by the commitment
   */
  async prove<K extends CircuitKind>(kind: K, input: StatementInputs[K]): Promise<ProofArtifact> {
    validateStatement(kind, input);

    this.logger.info(`Generating ${kind} proof for entity ${input.entityHash.slice(0, 10)}...`);
    const cs = await this.synthesize(kind, input);
    const expected = cs.publicInputs();
    this.logger.debug(
      `  ${kind}: ${cs.numConstraints} constraints, ${cs.numHashGates} hash gate(s), ${cs.numWitnessVariables} witness variables`,
    );

    const { wasm, zkey, provingKeyPath, nPublic } = await this.material.get(kind);
    if (nPublic !== expected.length) {
      throw new SetupError(
        `proving key ${provingKeyPath} takes ${nPublic} public inputs, ${kind} has ${expected.length}`,
        { path: provingKeyPath },
      );
    }
    const signals = toSnarkjsSignals(toSignalMap(kind, input));

    const started = Date.now();
    let witness: Uint8Array;
    try {
      witness = await this.backend.calculateWitness(signals, wasm);
    } catch (error) {
      this.logger.error(`✗ ${kind} witness calculation failed:`, errorMessage(error));
      throw new WitnessError(errorMessage(error), { cause: error });
    }

    let proof: Proof;
    let publicSignals: readonly string[];
    try {
      const result = await this.backend.prove(zkey, witness);
      proof = Proof.fromJson(result.proof);
      publicSignals = result.publicSignals;
    } catch (error) {
      this.logger.error(`✗ ${kind} proof generation failed:`, errorMessage(error));
      throw error instanceof InvalidProofFormatError
        ? new ProofGenerationError(`backend returned a malformed proof: ${error.message}`, { cause: error })
        : new ProofGenerationError(errorMessage(error), { cause: error });
    }
    const provingTimeMs = Date.now() - started;

    checkPublicSignals(publicSignals, expected);

    this.logger.info(`✓ ${kind} proof generated in ${provingTimeMs} ms`);
    return new ProofArtifact(proof, expected, kind, {
      provingTimeMs,
      generatedAt: new Date().toISOString(),
    });
  }

  /** Drop cached wasm and proving keys for one kind, or all */
  resetKeys(kind?: CircuitKind): void {
    this.material.reset(kind);
  }

  private async synthesize<K extends CircuitKind>(
    kind: K,
    input: StatementInputs[K],
  ): Promise<ConstraintSystem> {
    const hasher = await this.commitmentHasher();
    let cs: ConstraintSystem;
    try {
      cs = synthesizeCircuit(buildCircuit(kind, input, hasher));
    } catch (error) {
      throw new WitnessError(errorMessage(error), { cause: error });
    }
    const unsatisfied = cs.whichIsUnsatisfied();
    if (unsatisfied !== undefined) {
      throw new WitnessError(`constraint "${unsatisfied}" is not satisfied`);
    }
    return cs;
  }

  private commitmentHasher(): Promise<CommitmentHasher> {
    if (!this.hasher) {
      const pending: Promise<CommitmentHasher> = CommitmentHasher.create().catch((error: unknown) => {
        if (this.hasher === pending) this.hasher = undefined;
        throw error;
      });
      this.hasher = pending;
    }
    return this.hasher;
  }

  private async loadMaterial(kind: CircuitKind): Promise<ProvingMaterial> {
    const paths = circuitPaths(this.buildDir, kind);
    const started = Date.now();
    const wasm = await readArtifact(paths.wasm);
    const zkey = await readArtifact(paths.provingKey);

    let nPublic: number;
    try {
      nPublic = (await this.backend.provingKeyInfo(zkey)).nPublic;
    } catch (error) {
      throw new SetupError(`unreadable proving key ${paths.provingKey}: ${errorMessage(error)}`, {
        cause: error,
        path: paths.provingKey,
      });
    }

    this.logger.debug(
      `  Loaded ${kind} wasm (${wasm.length} B) and proving key (${zkey.length} B, ${nPublic} public inputs) in ${Date.now() - started} ms`,
    );
    return { wasm, zkey, provingKeyPath: paths.provingKey, nPublic };
  }
}

function checkPublicSignals(actual: readonly string[], expected: readonly bigint[]): void {
  if (actual.length !== expected.length) {
    throw new WitnessError(
      `backend produced ${actual.length} public signals, circuit declares ${expected.length}`,
    );
  }
  actual.forEach((signal, i) => {
    if (!/^[0-9]+$/.test(signal) || BigInt(signal) !== expected[i]) {
      throw new WitnessError(`public signal ${i} is ${signal}, expected ${expected[i]}`);
    }
  });
}

/**
 * Race a proving call against a deadline. The underlying work is not
 * interrupted; its result is simply no longer awaited.
 */
export async function withDeadline<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ProofGenerationError(`deadline of ${ms} ms exceeded`)), ms);
  });
  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
