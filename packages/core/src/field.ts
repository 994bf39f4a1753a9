import { bn254 } from "@noble/curves/bn254";
import { mod as reduce } from "@noble/curves/abstract/modular";
import { createHash, randomBytes } from "crypto";
import { CryptographicError } from "./errors.js";

/** BN254 scalar field order (circuit signals live here) */
export const SCALAR_FIELD = bn254.fields.Fr.ORDER;

/** BN254 base field modulus (curve point coordinates live here) */
export const BASE_FIELD = bn254.fields.Fp.ORDER;

const DECIMAL = /^[0-9]+$/;

/** Reduce into [0, m) */
export function mod(a: bigint, m: bigint = SCALAR_FIELD): bigint {
  return reduce(a, m);
}

// ──────────────────────────────────────────────────────────
// Decimal <-> field element
// ──────────────────────────────────────────────────────────

export function isFieldDecimal(value: string): boolean {
  return DECIMAL.test(value) && BigInt(value) < SCALAR_FIELD;
}

/**
 * Parse a canonical decimal string into a scalar field element.
 * Values at or above the field order are rejected rather than reduced.
 */
export function fieldFromDecimal(value: string): bigint {
  if (!DECIMAL.test(value)) {
    throw new CryptographicError(`Invalid number: "${value}" is not an unsigned decimal`);
  }
  const n = BigInt(value);
  if (n >= SCALAR_FIELD) {
    throw new CryptographicError(`Invalid number: ${value} exceeds the scalar field`);
  }
  return n;
}

export function fieldToDecimal(value: bigint): string {
  return mod(value).toString(10);
}

/**
 * Toolchain signal parsing: unparsable strings become zero.
 * Validation rejects such strings before any proof is attempted, so this
 * fallback only shows when callers build signal maps themselves.
 */
export function parseUnsignedOrZero(value: string): bigint {
  return DECIMAL.test(value) ? BigInt(value) : 0n;
}

// ──────────────────────────────────────────────────────────
// Entity hashing and salts
// ──────────────────────────────────────────────────────────

/**
 * Hash an entity identifier (e.g. an LEI) to a field element.
 * SHA-256 of the UTF-8 id, read big-endian, reduced mod the scalar field.
 */
export function hashEntityId(entityId: string): string {
  const digest = createHash("sha256").update(entityId, "utf8").digest("hex");
  return mod(BigInt("0x" + digest)).toString(10);
}

/** Random salt as a decimal field element (31 bytes keeps it below the order) */
export function generateSalt(): string {
  return BigInt("0x" + randomBytes(31).toString("hex")).toString(10);
}
