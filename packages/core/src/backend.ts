import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { groth16, wtns, zKey } from "snarkjs";
import {
  type ProofJson,
  type ProvingKeyInfo,
  type VerificationKeyJson,
  describeIssues,
  provingKeyInfoSchema,
} from "./schemas.js";
import type { CircuitSignals } from "./types.js";

export interface ProveResult {
  /** snarkjs-shaped proof object; checked by the caller */
  proof: unknown;
  publicSignals: readonly string[];
}

/**
 * The Groth16 engine behind the prover and verifier. Witness calculation
 * and proving are separate steps so their failures can be told apart.
 */
export interface Groth16Backend {
  /** Run the compiled witness calculator; rejects when a circuit assertion fails */
  calculateWitness(signals: CircuitSignals, wasm: Uint8Array): Promise<Uint8Array>;
  prove(zkey: Uint8Array, witness: Uint8Array): Promise<ProveResult>;
  /** Read the header of a proving key; rejects when it is not a Groth16 zkey */
  provingKeyInfo(zkey: Uint8Array): Promise<ProvingKeyInfo>;
  verify(vkey: VerificationKeyJson, publicSignals: readonly string[], proof: ProofJson): Promise<boolean>;
}

/** snarkjs in-process backend */
export class SnarkjsBackend implements Groth16Backend {
  async calculateWitness(signals: CircuitSignals, wasm: Uint8Array): Promise<Uint8Array> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "compliance-wtns-"));
    try {
      const wtnsPath = path.join(dir, "witness.wtns");
      await wtns.calculate(signals, wasm, wtnsPath);
      return new Uint8Array(await fs.readFile(wtnsPath));
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }

  async prove(zkey: Uint8Array, witness: Uint8Array): Promise<ProveResult> {
    const { proof, publicSignals } = await groth16.prove(zkey, witness);
    return { proof, publicSignals: publicSignals.map(String) };
  }

  async provingKeyInfo(zkey: Uint8Array): Promise<ProvingKeyInfo> {
    const parsed = provingKeyInfoSchema.safeParse(await zKey.exportVerificationKey(zkey));
    if (!parsed.success) {
      throw new Error(`unexpected embedded verification key: ${describeIssues(parsed.error)}`);
    }
    return parsed.data;
  }

  async verify(vkey: VerificationKeyJson, publicSignals: readonly string[], proof: ProofJson): Promise<boolean> {
    return groth16.verify(vkey, [...publicSignals], proof);
  }
}
