/**
 * Validation schemas for the JSON the core reads: snarkjs proofs, proof
 * artifacts and Groth16 verification keys.
 */

import { z } from "zod";
import { CIRCUITS } from "./types.js";

const decimal = z.string().regex(/^[0-9]+$/, "must be a decimal integer string");

const g1Json = z.tuple([decimal, decimal, z.literal("1")]);

export const proofJsonSchema = z.object({
  pi_a: g1Json,
  pi_b: z.tuple([
    z.tuple([decimal, decimal]),
    z.tuple([decimal, decimal]),
    z.tuple([z.literal("1"), z.literal("0")]),
  ]),
  pi_c: g1Json,
  protocol: z.literal("groth16"),
  curve: z.literal("bn128"),
});

export type ProofJson = z.infer<typeof proofJsonSchema>;

export const proofMetadataSchema = z.object({
  provingTimeMs: z.number().nonnegative(),
  generatedAt: z.string().datetime(),
});

export type ProofMetadata = z.infer<typeof proofMetadataSchema>;

export const proofArtifactJsonSchema = z.object({
  proof: proofJsonSchema,
  publicInputs: z.array(decimal).min(1, "at least the commitment is required"),
  circuit: z.enum([CIRCUITS.threshold, CIRCUITS.range, CIRCUITS.tier]),
  metadata: proofMetadataSchema.optional(),
});

export type ProofArtifactJson = z.infer<typeof proofArtifactJsonSchema>;

const vkG1 = z.array(decimal).length(3);
const vkG2 = z.array(z.array(decimal).length(2)).length(3);

export const verificationKeySchema = z
  .object({
    protocol: z.literal("groth16"),
    curve: z.literal("bn128"),
    nPublic: z.number().int().nonnegative(),
    vk_alpha_1: vkG1,
    vk_beta_2: vkG2,
    vk_gamma_2: vkG2,
    vk_delta_2: vkG2,
    /** Precomputed e(alpha, beta); snarkjs verifies from alpha and beta directly */
    vk_alphabeta_12: z.array(z.array(z.array(decimal))).optional(),
    IC: z.array(vkG1),
  })
  .refine((vk) => vk.IC.length === vk.nPublic + 1, {
    message: "IC must hold nPublic + 1 points",
    path: ["IC"],
  });

export type VerificationKeyJson = z.infer<typeof verificationKeySchema>;

/** The part of a proving key's embedded verification key the prover checks */
export const provingKeyInfoSchema = z.object({
  protocol: z.literal("groth16"),
  nPublic: z.number().int().nonnegative(),
});

export type ProvingKeyInfo = z.infer<typeof provingKeyInfoSchema>;

/** One line per issue: `pi_b.2.0: Invalid literal value, expected "1"` */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}
