import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import type { Groth16Backend, ProveResult } from "../src/backend.js";
import { buildCircuit, synthesizeCircuit } from "../src/circuits/circuits.js";
import type { CommitmentHasher } from "../src/commitment.js";
import { G1_GENERATOR, G2_GENERATOR, g1Negate } from "../src/curve.js";
import { circuitPaths } from "../src/key-store.js";
import { Proof } from "../src/proof.js";
import type { ProofJson, ProvingKeyInfo, VerificationKeyJson } from "../src/schemas.js";
import { CIRCUITS, type CircuitKind, type CircuitSignals } from "../src/types.js";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

export const ENTITY_HASH = "123456789";
export const SALT = "987654321";

/** Public inputs per circuit, commitment included */
export const PUBLIC_INPUT_COUNT: Record<CircuitKind, number> = {
  [CIRCUITS.threshold]: 3,
  [CIRCUITS.range]: 4,
  [CIRCUITS.tier]: 3,
};

/** (G1, G2, -G1): a well-formed proof that proves nothing */
export const ISSUED_PROOF = Proof.fromPoints(G1_GENERATOR, G2_GENERATOR, g1Negate(G1_GENERATOR));

/** Same shape, different c: never issued by the stand-in backend */
export const FORGED_PROOF = Proof.fromPoints(G1_GENERATOR, G2_GENERATOR, G1_GENERATOR);

export function fakeVerificationKey(nPublic: number): VerificationKeyJson {
  const g1 = ["1", "2", "1"];
  const g2 = [
    ["1", "0"],
    ["1", "0"],
    ["1", "0"],
  ];
  return {
    protocol: "groth16",
    curve: "bn128",
    nPublic,
    vk_alpha_1: g1,
    vk_beta_2: g2,
    vk_gamma_2: g2,
    vk_delta_2: g2,
    vk_alphabeta_12: [g2, g2],
    IC: Array.from({ length: nPublic + 1 }, () => g1),
  };
}

/** Stand-in zkey understood by `FakeGroth16Backend.provingKeyInfo` */
export function fakeProvingKey(nPublic: number): Buffer {
  return Buffer.from(`zkey:${nPublic}`);
}

/**
 * Temp build directory with placeholder wasm, zkey and verification key
 * files for the given circuits.
 */
export async function createBuildDir(
  kinds: readonly CircuitKind[] = [CIRCUITS.threshold, CIRCUITS.range, CIRCUITS.tier],
): Promise<string> {
  const buildDir = await fs.mkdtemp(path.join(os.tmpdir(), "compliance-zk-"));
  for (const kind of kinds) {
    const paths = circuitPaths(buildDir, kind);
    await fs.mkdir(path.dirname(paths.wasm), { recursive: true });
    await fs.writeFile(paths.wasm, Buffer.from([0x00, 0x61, 0x73, 0x6d]));
    await fs.writeFile(paths.provingKey, fakeProvingKey(PUBLIC_INPUT_COUNT[kind]));
    await fs.writeFile(
      paths.verificationKey,
      JSON.stringify(fakeVerificationKey(PUBLIC_INPUT_COUNT[kind])),
    );
  }
  return buildDir;
}

export async function removeBuildDir(buildDir: string): Promise<void> {
  await fs.rm(buildDir, { recursive: true, force: true });
}

/** Await a promise that must reject, returning the rejection */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected the promise to reject");
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ---------------------------------------------------------------------------
// In-process Groth16 stand-in
// ---------------------------------------------------------------------------

function signal(signals: CircuitSignals, name: string): string {
  const value = signals[name];
  if (typeof value !== "string") {
    throw new Error(`Missing signal ${name}`);
  }
  return value;
}

function synthesizeFromSignals(signals: CircuitSignals, hasher: CommitmentHasher) {
  const entityHash = signal(signals, "entityHash");
  const score = Number(signal(signals, "score"));
  const salt = signal(signals, "salt");
  if ("targetTier" in signals) {
    const targetTier = Number(signal(signals, "targetTier"));
    return synthesizeCircuit(buildCircuit(CIRCUITS.tier, { targetTier, entityHash, score, salt }, hasher));
  }
  if ("minScore" in signals) {
    const minScore = Number(signal(signals, "minScore"));
    const maxScore = Number(signal(signals, "maxScore"));
    return synthesizeCircuit(
      buildCircuit(CIRCUITS.range, { minScore, maxScore, entityHash, score, salt }, hasher),
    );
  }
  const threshold = Number(signal(signals, "threshold"));
  return synthesizeCircuit(buildCircuit(CIRCUITS.threshold, { threshold, entityHash, score, salt }, hasher));
}

/**
 * Groth16 backend that runs the native circuit instead of a witness
 * calculator and "verifies" by remembering what it issued.
 */
export class FakeGroth16Backend implements Groth16Backend {
  witnessCalls = 0;
  proveCalls = 0;
  verifyCalls = 0;
  proveDelayMs = 0;
  witnessError?: Error;
  proveError?: Error;
  verifyError?: Error;
  /** Applied to public signals before they are returned from prove */
  rewriteSignals?: (signals: string[]) => string[];
  /** Returned from prove in place of the issued proof */
  proofOverride?: unknown;

  private readonly issued = new Set<string>();
  private readonly witnesses = new Map<Uint8Array, string[]>();

  constructor(private readonly hasher: CommitmentHasher) {}

  async calculateWitness(signals: CircuitSignals, _wasm: Uint8Array): Promise<Uint8Array> {
    this.witnessCalls++;
    if (this.witnessError) throw this.witnessError;

    const cs = synthesizeFromSignals(signals, this.hasher);
    if (!cs.isSatisfied()) {
      throw new Error(`Assert Failed. Error in template at ${cs.whichIsUnsatisfied()}`);
    }
    const witness = new Uint8Array(cs.numWitnessVariables);
    this.witnesses.set(witness, cs.publicInputs().map((v) => v.toString()));
    return witness;
  }

  async prove(_zkey: Uint8Array, witness: Uint8Array): Promise<ProveResult> {
    this.proveCalls++;
    if (this.proveDelayMs > 0) await delay(this.proveDelayMs);
    if (this.proveError) throw this.proveError;

    const publicSignals = this.witnesses.get(witness);
    if (!publicSignals) throw new Error("unknown witness");

    const proof = ISSUED_PROOF.toJson();
    this.issued.add(FakeGroth16Backend.key(proof, publicSignals));
    return {
      proof: this.proofOverride ?? proof,
      publicSignals: this.rewriteSignals ? this.rewriteSignals(publicSignals) : publicSignals,
    };
  }

  async provingKeyInfo(zkey: Uint8Array): Promise<ProvingKeyInfo> {
    const match = /^zkey:(\d+)$/.exec(Buffer.from(zkey).toString("utf8"));
    if (!match) throw new Error("zkey: Invalid File format");
    return { protocol: "groth16", nPublic: Number(match[1]) };
  }

  async verify(_vkey: VerificationKeyJson, publicSignals: readonly string[], proof: ProofJson): Promise<boolean> {
    this.verifyCalls++;
    if (this.verifyError) throw this.verifyError;
    return this.issued.has(FakeGroth16Backend.key(proof, publicSignals));
  }

  private static key(proof: ProofJson, publicSignals: readonly string[]): string {
    return JSON.stringify([proof, publicSignals]);
  }
}
