import * as fs from "fs/promises";
import * as path from "path";
import { CircuitNotFoundError, IoError, VerificationError, errorMessage } from "./errors.js";
import { type VerificationKeyJson, describeIssues, verificationKeySchema } from "./schemas.js";
import type { CircuitKind } from "./types.js";

// ──────────────────────────────────────────────────────────
// Build directory layout
// ──────────────────────────────────────────────────────────

export interface CircuitPaths {
  dir: string;
  wasm: string;
  r1cs: string;
  provingKey: string;
  verificationKey: string;
}

/**
 * Artifact locations for one circuit:
 *
 *   {buildDir}/{name}/{name}_js/{name}.wasm
 *   {buildDir}/{name}/{name}.r1cs
 *   {buildDir}/{name}/proving_key.zkey
 *   {buildDir}/{name}/verification_key.json
 *
 * The compiled circuit must declare the commitment as its last public
 * input, not as a `signal output`: snarkjs lists outputs before public
 * inputs in `publicSignals`, which would put the commitment first.
 */
export function circuitPaths(buildDir: string, kind: CircuitKind): CircuitPaths {
  const dir = path.join(buildDir, kind);
  return {
    dir,
    wasm: path.join(dir, `${kind}_js`, `${kind}.wasm`),
    r1cs: path.join(dir, `${kind}.r1cs`),
    provingKey: path.join(dir, "proving_key.zkey"),
    verificationKey: path.join(dir, "verification_key.json"),
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function readFailure(filePath: string, error: unknown): Error {
  return isMissingFile(error)
    ? new CircuitNotFoundError(filePath)
    : new IoError(filePath, errorMessage(error), { cause: error });
}

/** Read a binary artifact (wasm, zkey) */
export async function readArtifact(filePath: string): Promise<Uint8Array> {
  try {
    return new Uint8Array(await fs.readFile(filePath));
  } catch (error) {
    throw readFailure(filePath, error);
  }
}

/** Read and check a snarkjs `verification_key.json` */
export async function loadVerificationKey(filePath: string): Promise<VerificationKeyJson> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw readFailure(filePath, error);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new VerificationError(`${filePath} is not valid JSON: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const parsed = verificationKeySchema.safeParse(raw);
  if (!parsed.success) {
    throw new VerificationError(`malformed verification key ${filePath}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

// ──────────────────────────────────────────────────────────
// Per-kind key cache
// ──────────────────────────────────────────────────────────

/**
 * Lazily loaded, per-circuit key cache.
 *
 * The first `get` for a kind starts the load and stores its promise, so
 * concurrent callers share one load. A rejected load is dropped again and
 * the next `get` retries.
 */
export class KeyCache<T> {
  private readonly entries = new Map<CircuitKind, Promise<T>>();

  constructor(private readonly load: (kind: CircuitKind) => Promise<T>) {}

  get(kind: CircuitKind): Promise<T> {
    const cached = this.entries.get(kind);
    if (cached) return cached;

    const pending: Promise<T> = this.load(kind).catch((error: unknown) => {
      if (this.entries.get(kind) === pending) this.entries.delete(kind);
      throw error;
    });
    this.entries.set(kind, pending);
    return pending;
  }

  has(kind: CircuitKind): boolean {
    return this.entries.has(kind);
  }

  /** Forget one kind, or every kind */
  reset(kind?: CircuitKind): void {
    if (kind === undefined) {
      this.entries.clear();
    } else {
      this.entries.delete(kind);
    }
  }

  get size(): number {
    return this.entries.size;
  }
}
