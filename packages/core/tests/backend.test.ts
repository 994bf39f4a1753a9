import { expect } from "chai";
import * as fs from "fs/promises";
import { fileURLToPath } from "url";
import { SnarkjsBackend } from "../src/backend.js";
import { loadVerificationKey } from "../src/key-store.js";
import { Proof } from "../src/proof.js";
import { rejectionOf } from "./helpers.js";

// Key, proof and public signals over BN254 whose discrete logs were chosen
// so that e(A, B) = e(alpha, beta) · e(vk_x, gamma) · e(C, delta) holds.
const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/groth16/${name}`, import.meta.url));

async function readJson(name: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(fixture(name), "utf-8"));
}

async function readPublicSignals(): Promise<string[]> {
  const raw = await readJson("public.json");
  if (!Array.isArray(raw)) throw new Error("public.json must hold an array");
  return raw.map(String);
}

describe("SnarkjsBackend", () => {
  const backend = new SnarkjsBackend();

  // ---------------------------------------------------------------------------
  // Verification against snarkjs
  // ---------------------------------------------------------------------------

  it("keeps the snarkjs proof JSON exactly", async () => {
    const raw = await readJson("proof.json");
    expect(Proof.fromJson(raw).toJson()).to.deep.equal(raw);
  });

  it("accepts a valid proof", async () => {
    const vkey = await loadVerificationKey(fixture("verification_key.json"));
    const proof = Proof.fromJson(await readJson("proof.json"));
    expect(await backend.verify(vkey, await readPublicSignals(), proof.toJson())).to.be.true;
  });

  it("returns false when a public input changes", async () => {
    const vkey = await loadVerificationKey(fixture("verification_key.json"));
    const proof = Proof.fromJson(await readJson("proof.json"));
    const [threshold, ...rest] = await readPublicSignals();
    const altered = [String(BigInt(threshold) + 1n), ...rest];
    expect(await backend.verify(vkey, altered, proof.toJson())).to.be.false;
  });

  it("returns false for a different well-formed proof", async () => {
    const vkey = await loadVerificationKey(fixture("verification_key.json"));
    const proof = Proof.fromJson(await readJson("proof.json"));
    const swapped = Proof.fromPoints(proof.c, proof.b, proof.a);
    expect(await backend.verify(vkey, await readPublicSignals(), swapped.toJson())).to.be.false;
  });

  // ---------------------------------------------------------------------------
  // Unusable artifacts
  // ---------------------------------------------------------------------------

  it("rejects bytes that are not a proving key", async () => {
    expect(await rejectionOf(backend.provingKeyInfo(Buffer.from("not a zkey file")))).to.be.instanceOf(Error);
  });

  it("rejects bytes that are not a witness calculator", async () => {
    const error = await rejectionOf(backend.calculateWitness({ score: "1" }, Buffer.from("not wasm")));
    expect(error).to.be.instanceOf(Error);
  });
});
