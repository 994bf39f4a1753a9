import { bn254 } from "@noble/curves/bn254";
import { InvalidProofFormatError } from "./errors.js";
import { SCALAR_FIELD } from "./field.js";

/**
 * BN254 (alt_bn128) point encoding and membership checks for proof points.
 * Field and group arithmetic comes from @noble/curves.
 *
 * G1: y² = x³ + 3 over Fq
 * G2: y² = x³ + 3/(9+i) over Fq2 = Fq[i]/(i² + 1)
 *
 * Compressed encoding: x little-endian, flags in the top two bits of the
 * last byte (0x80 y is the larger root, 0x40 infinity).
 */

export interface G1Affine {
  readonly x: bigint;
  readonly y: bigint;
}

/** c0 + c1·i */
export interface Fq2 {
  readonly c0: bigint;
  readonly c1: bigint;
}

export interface G2Affine {
  readonly x: Fq2;
  readonly y: Fq2;
}

export const FQ_BYTES = 32;
export const G1_COMPRESSED_BYTES = FQ_BYTES;
export const G2_COMPRESSED_BYTES = 2 * FQ_BYTES;

const FLAG_Y_NEGATIVE = 0x80;
const FLAG_INFINITY = 0x40;
const FLAG_MASK = FLAG_Y_NEGATIVE | FLAG_INFINITY;

const { Fp, Fp2 } = bn254.fields;
const G1 = bn254.G1.ProjectivePoint;
const G2 = bn254.G2.ProjectivePoint;

const G1_B = 3n;
/** 3 / (9 + i) */
const G2_B: Fq2 = Fp2.div({ c0: 3n, c1: 0n }, { c0: 9n, c1: 1n });

export const G1_GENERATOR: G1Affine = G1.BASE.toAffine();
export const G2_GENERATOR: G2Affine = G2.BASE.toAffine();

interface SqrtField<T> {
  sqrt(value: T): T;
  sqr(value: T): T;
  eql(a: T, b: T): boolean;
}

/** Library square root, or undefined for a non-residue */
function sqrtOf<T>(field: SqrtField<T>, value: T): T | undefined {
  let root: T;
  try {
    root = field.sqrt(value);
  } catch {
    return undefined;
  }
  return field.eql(field.sqr(root), value) ? root : undefined;
}

// ──────────────────────────────────────────────────────────
// Sign of y
// ──────────────────────────────────────────────────────────

function fqIsNegative(y: bigint): boolean {
  return y > Fp.neg(y);
}

/** Lexicographic `y > -y`, comparing c1 before c0 */
function fq2IsNegative(y: Fq2): boolean {
  const neg = Fp2.neg(y);
  if (y.c1 !== neg.c1) return y.c1 > neg.c1;
  return y.c0 > neg.c0;
}

export function fq2Equals(a: Fq2, b: Fq2): boolean {
  return Fp2.eql(a, b);
}

// ──────────────────────────────────────────────────────────
// Curve checks
// ──────────────────────────────────────────────────────────

function g1Rhs(x: bigint): bigint {
  return Fp.add(Fp.mul(Fp.sqr(x), x), G1_B);
}

function g2Rhs(x: Fq2): Fq2 {
  return Fp2.add(Fp2.mul(Fp2.sqr(x), x), G2_B);
}

function isCanonicalFq2(a: Fq2): boolean {
  return Fp.isValid(a.c0) && Fp.isValid(a.c1);
}

export function isOnG1(p: G1Affine): boolean {
  return Fp.isValid(p.x) && Fp.isValid(p.y) && Fp.eql(Fp.sqr(p.y), g1Rhs(p.x));
}

export function isOnG2Curve(p: G2Affine): boolean {
  return isCanonicalFq2(p.x) && isCanonicalFq2(p.y) && Fp2.eql(Fp2.sqr(p.y), g2Rhs(p.x));
}

/**
 * On the twist and in the order-r subgroup. The twist has a large cofactor,
 * so being on the curve alone is not enough. r·P = O is checked as
 * (r - 1)·P = -P, keeping the scalar below the group order.
 */
export function isOnG2(p: G2Affine): boolean {
  if (!isOnG2Curve(p)) return false;
  const point = G2.fromAffine(p);
  return point.multiplyUnsafe(SCALAR_FIELD - 1n).equals(point.negate());
}

export function g1Negate(p: G1Affine): G1Affine {
  return { x: p.x, y: Fp.neg(p.y) };
}

export function g2Negate(p: G2Affine): G2Affine {
  return { x: p.x, y: Fp2.neg(p.y) };
}

// ──────────────────────────────────────────────────────────
// Compressed encoding
// ──────────────────────────────────────────────────────────

function writeFqLe(out: Uint8Array, offset: number, value: bigint): void {
  let v = value;
  for (let i = 0; i < FQ_BYTES; i++) {
    out[offset + i] = Number(v & 0xffn);
    v >>= 8n;
  }
}

function readFqLe(bytes: Uint8Array, offset: number, clearFlags: boolean): bigint {
  let v = 0n;
  for (let i = FQ_BYTES - 1; i >= 0; i--) {
    let byte = bytes[offset + i];
    if (clearFlags && i === FQ_BYTES - 1) byte &= ~FLAG_MASK & 0xff;
    v = (v << 8n) | BigInt(byte);
  }
  return v;
}

function readFlags(bytes: Uint8Array, what: string): boolean {
  const flags = bytes[bytes.length - 1] & FLAG_MASK;
  if (flags & FLAG_INFINITY) {
    throw new InvalidProofFormatError(`${what} is the point at infinity`);
  }
  return (flags & FLAG_Y_NEGATIVE) !== 0;
}

export function compressG1(p: G1Affine): Uint8Array {
  const out = new Uint8Array(G1_COMPRESSED_BYTES);
  writeFqLe(out, 0, p.x);
  if (fqIsNegative(p.y)) out[FQ_BYTES - 1] |= FLAG_Y_NEGATIVE;
  return out;
}

export function decompressG1(bytes: Uint8Array, what = "G1 point"): G1Affine {
  if (bytes.length !== G1_COMPRESSED_BYTES) {
    throw new InvalidProofFormatError(
      `${what} needs ${G1_COMPRESSED_BYTES} bytes, got ${bytes.length}`,
    );
  }
  const negative = readFlags(bytes, what);
  const x = readFqLe(bytes, 0, true);
  if (!Fp.isValid(x)) {
    throw new InvalidProofFormatError(`${what} x-coordinate is not below the base field modulus`);
  }
  const y = sqrtOf(Fp, g1Rhs(x));
  if (y === undefined) {
    throw new InvalidProofFormatError(`${what} is not on the curve`);
  }
  return { x, y: fqIsNegative(y) === negative ? y : Fp.neg(y) };
}

export function compressG2(p: G2Affine): Uint8Array {
  const out = new Uint8Array(G2_COMPRESSED_BYTES);
  writeFqLe(out, 0, p.x.c0);
  writeFqLe(out, FQ_BYTES, p.x.c1);
  if (fq2IsNegative(p.y)) out[G2_COMPRESSED_BYTES - 1] |= FLAG_Y_NEGATIVE;
  return out;
}

export function decompressG2(bytes: Uint8Array, what = "G2 point"): G2Affine {
  if (bytes.length !== G2_COMPRESSED_BYTES) {
    throw new InvalidProofFormatError(
      `${what} needs ${G2_COMPRESSED_BYTES} bytes, got ${bytes.length}`,
    );
  }
  const negative = readFlags(bytes, what);
  const x: Fq2 = { c0: readFqLe(bytes, 0, false), c1: readFqLe(bytes, FQ_BYTES, true) };
  if (!isCanonicalFq2(x)) {
    throw new InvalidProofFormatError(`${what} x-coordinate is not below the base field modulus`);
  }
  const y = sqrtOf(Fp2, g2Rhs(x));
  if (y === undefined) {
    throw new InvalidProofFormatError(`${what} is not on the curve`);
  }
  const point: G2Affine = { x, y: fq2IsNegative(y) === negative ? y : Fp2.neg(y) };
  if (!isOnG2(point)) {
    throw new InvalidProofFormatError(`${what} is not in the prime-order subgroup`);
  }
  return point;
}
