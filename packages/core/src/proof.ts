import { Interface } from "ethers";
import {
  G1_COMPRESSED_BYTES,
  G2_COMPRESSED_BYTES,
  type G1Affine,
  type G2Affine,
  compressG1,
  compressG2,
  decompressG1,
  decompressG2,
  fq2Equals,
  isOnG1,
  isOnG2,
} from "./curve.js";
import { InvalidProofFormatError, SerializationError, errorMessage } from "./errors.js";
import { SCALAR_FIELD } from "./field.js";
import {
  type ProofArtifactJson,
  type ProofJson,
  type ProofMetadata,
  describeIssues,
  proofArtifactJsonSchema,
  proofJsonSchema,
} from "./schemas.js";
import type { CircuitKind } from "./types.js";

// ──────────────────────────────────────────────────────────
// Groth16 proof
// ──────────────────────────────────────────────────────────

/**
 * Groth16 proof over BN254: a, c ∈ G1 and b ∈ G2.
 *
 * Binary form is `a ‖ b ‖ c` in compressed encoding (32 + 64 + 32 bytes).
 */
export class Proof {
  static readonly BYTE_LENGTH = 2 * G1_COMPRESSED_BYTES + G2_COMPRESSED_BYTES;

  private constructor(
    readonly a: G1Affine,
    readonly b: G2Affine,
    readonly c: G1Affine,
  ) {}

  /** Build from affine points, checking curve and subgroup membership */
  static fromPoints(a: G1Affine, b: G2Affine, c: G1Affine): Proof {
    if (!isOnG1(a)) throw new InvalidProofFormatError("proof.a is not a G1 point");
    if (!isOnG2(b)) throw new InvalidProofFormatError("proof.b is not a G2 point");
    if (!isOnG1(c)) throw new InvalidProofFormatError("proof.c is not a G1 point");
    return new Proof(
      Object.freeze({ ...a }),
      Object.freeze({ x: Object.freeze({ ...b.x }), y: Object.freeze({ ...b.y }) }),
      Object.freeze({ ...c }),
    );
  }

  toBytes(): Uint8Array {
    const out = new Uint8Array(Proof.BYTE_LENGTH);
    out.set(compressG1(this.a), 0);
    out.set(compressG2(this.b), G1_COMPRESSED_BYTES);
    out.set(compressG1(this.c), G1_COMPRESSED_BYTES + G2_COMPRESSED_BYTES);
    return out;
  }

  static fromBytes(bytes: Uint8Array): Proof {
    if (bytes.length !== Proof.BYTE_LENGTH) {
      throw new InvalidProofFormatError(
        `expected ${Proof.BYTE_LENGTH} bytes, got ${bytes.length}`,
      );
    }
    const bStart = G1_COMPRESSED_BYTES;
    const cStart = G1_COMPRESSED_BYTES + G2_COMPRESSED_BYTES;
    return new Proof(
      decompressG1(bytes.subarray(0, bStart), "proof.a"),
      decompressG2(bytes.subarray(bStart, cStart), "proof.b"),
      decompressG1(bytes.subarray(cStart), "proof.c"),
    );
  }

  /** Lowercase hex of the binary form, no prefix */
  toHex(): string {
    return Buffer.from(this.toBytes()).toString("hex");
  }

  /** Accepts an optional `0x` prefix */
  static fromHex(hex: string): Proof {
    const body = hex.startsWith("0x") ? hex.slice(2) : hex;
    if (!/^[0-9a-fA-F]*$/.test(body) || body.length % 2 !== 0) {
      throw new InvalidProofFormatError("proof hex must be an even number of hex digits");
    }
    return Proof.fromBytes(new Uint8Array(Buffer.from(body, "hex")));
  }

  /** snarkjs proof object (projective padding included) */
  toJson(): ProofJson {
    const { a, b, c } = this;
    return {
      pi_a: [a.x.toString(), a.y.toString(), "1"],
      pi_b: [
        [b.x.c0.toString(), b.x.c1.toString()],
        [b.y.c0.toString(), b.y.c1.toString()],
        ["1", "0"],
      ],
      pi_c: [c.x.toString(), c.y.toString(), "1"],
      protocol: "groth16",
      curve: "bn128",
    };
  }

  static fromJson(value: unknown): Proof {
    const parsed = proofJsonSchema.safeParse(value);
    if (!parsed.success) {
      throw new InvalidProofFormatError(describeIssues(parsed.error));
    }
    const { pi_a, pi_b, pi_c } = parsed.data;
    return Proof.fromPoints(
      { x: BigInt(pi_a[0]), y: BigInt(pi_a[1]) },
      {
        x: { c0: BigInt(pi_b[0][0]), c1: BigInt(pi_b[0][1]) },
        y: { c0: BigInt(pi_b[1][0]), c1: BigInt(pi_b[1][1]) },
      },
      { x: BigInt(pi_c[0]), y: BigInt(pi_c[1]) },
    );
  }

  equals(other: Proof): boolean {
    return (
      this.a.x === other.a.x &&
      this.a.y === other.a.y &&
      fq2Equals(this.b.x, other.b.x) &&
      fq2Equals(this.b.y, other.b.y) &&
      this.c.x === other.c.x &&
      this.c.y === other.c.y
    );
  }
}

// ──────────────────────────────────────────────────────────
// Proof artifact
// ──────────────────────────────────────────────────────────

/** Arguments of a snarkjs-exported Solidity verifier's `verifyProof` */
export interface SolidityCalldata {
  a: [string, string];
  /** Each pair is (c1, c0): reversed against the JSON form */
  b: [[string, string], [string, string]];
  c: [string, string];
  inputs: string[];
}

function toUint256Hex(value: string): string {
  return `0x${BigInt(value).toString(16).padStart(64, "0")}`;
}

/**
 * A proof together with its ordered public inputs and the statement kind it
 * was produced for. The commitment is always the last public input.
 */
export class ProofArtifact {
  readonly publicInputs: readonly bigint[];

  constructor(
    readonly proof: Proof,
    publicInputs: readonly bigint[],
    readonly kind: CircuitKind,
    readonly metadata?: ProofMetadata,
  ) {
    if (publicInputs.length === 0) {
      throw new InvalidProofFormatError("artifact has no public inputs");
    }
    publicInputs.forEach((value, i) => {
      if (value < 0n || value >= SCALAR_FIELD) {
        throw new InvalidProofFormatError(`public input ${i} is not a canonical field element`);
      }
    });
    this.publicInputs = Object.freeze([...publicInputs]);
  }

  get commitment(): bigint {
    return this.publicInputs[this.publicInputs.length - 1];
  }

  /** Public inputs as the decimal strings snarkjs expects */
  publicSignals(): string[] {
    return this.publicInputs.map((v) => v.toString());
  }

  /** Same proof, inputs and kind; metadata is ignored */
  equals(other: ProofArtifact): boolean {
    return (
      this.kind === other.kind &&
      this.proof.equals(other.proof) &&
      this.publicInputs.length === other.publicInputs.length &&
      this.publicInputs.every((v, i) => v === other.publicInputs[i])
    );
  }

  toJson(): ProofArtifactJson {
    const json: ProofArtifactJson = {
      proof: this.proof.toJson(),
      publicInputs: this.publicSignals(),
      circuit: this.kind,
    };
    if (this.metadata) json.metadata = { ...this.metadata };
    return json;
  }

  static fromJson(value: unknown): ProofArtifact {
    const parsed = proofArtifactJsonSchema.safeParse(value);
    if (!parsed.success) {
      throw new InvalidProofFormatError(describeIssues(parsed.error));
    }
    const { proof, publicInputs, circuit, metadata } = parsed.data;
    return new ProofArtifact(Proof.fromJson(proof), publicInputs.map(BigInt), circuit, metadata);
  }

  serialize(): string {
    return JSON.stringify(this.toJson(), null, 2);
  }

  static deserialize(text: string): ProofArtifact {
    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (error) {
      throw new SerializationError(`artifact is not valid JSON: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    return ProofArtifact.fromJson(value);
  }

  /**
   * Arguments for an on-chain verifier. The b coordinates are written
   * (c1, c0), the order the EVM pairing precompile reads them in.
   */
  toCalldata(): SolidityCalldata {
    const { pi_a, pi_b, pi_c } = this.proof.toJson();
    return {
      a: [pi_a[0], pi_a[1]],
      b: [
        [pi_b[0][1], pi_b[0][0]],
        [pi_b[1][1], pi_b[1][0]],
      ],
      c: [pi_c[0], pi_c[1]],
      inputs: this.publicSignals(),
    };
  }

  /** Human-readable `verifyProof(...)` call with 32-byte hex words */
  formatSolidityCall(): string {
    const { a, b, c, inputs } = this.toCalldata();
    const list = (values: string[]) => `[${values.map((v) => `"${toUint256Hex(v)}"`).join(",")}]`;
    return `verifyProof(${list(a)},[${b.map(list).join(",")}],${list(c)},${list(inputs)})`;
  }

  /** ABI-encoded call data for `verifyProof(uint256[2],uint256[2][2],uint256[2],uint256[N])` */
  encodeVerifierCalldata(): string {
    const { a, b, c, inputs } = this.toCalldata();
    return verifierInterface(inputs.length).encodeFunctionData("verifyProof", [a, b, c, inputs]);
  }
}

/** Interface of the generated Groth16 verifier contract for N public inputs */
export function verifierInterface(publicInputCount: number): Interface {
  return new Interface([
    `function verifyProof(uint256[2] _pA, uint256[2][2] _pB, uint256[2] _pC, uint256[${publicInputCount}] _pubSignals) view returns (bool)`,
  ]);
}
