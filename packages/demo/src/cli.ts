#!/usr/bin/env node

import "dotenv/config";
import {
  ComplianceProver,
  ComplianceVerifier,
  ProverError,
  createConsoleLogger,
  formatScore,
  generateSalt,
  hashEntityId,
  loadConfig,
  tierForScore,
} from "@compliance-zk/core";
import { USAGE, parseStatement } from "./statement.js";

/**
 * CLI demo: prove one compliance statement and verify it
 */
async function main() {
  console.log("========================================");
  console.log("Compliance ZK - Score Statement Proofs");
  console.log("========================================\n");

  const [kind, entityId, ...rest] = process.argv.slice(2);
  if (!kind || !entityId) {
    console.log(USAGE);
    process.exit(1);
  }

  // Step 1: Load configuration (.env is read by dotenv above)
  const config = loadConfig();
  const logger = createConsoleLogger({ debug: config.debug });
  console.log(`Build directory: ${config.buildDir}\n`);

  // Step 2: Build the statement
  const entityHash = hashEntityId(entityId);
  const salt = generateSalt();
  const request = parseStatement([kind, ...rest], entityHash, salt);

  const tier = tierForScore(request.input.score);
  console.log(`Entity: ${entityId}`);
  console.log(`Entity hash: ${entityHash.slice(0, 16)}...`);
  console.log(
    `Private score: ${formatScore(request.input.score)}${tier ? ` (Tier ${tier.tier}, ${tier.label})` : ""}\n`,
  );

  // Step 3: Generate the proof
  console.log("Generating zero-knowledge proof...");
  const prover = new ComplianceProver({ buildDir: config.buildDir, logger });
  const artifact = await prover.prove(request.kind, request.input);

  console.log(`✅ Proof generated (${artifact.metadata?.provingTimeMs ?? 0} ms)`);
  console.log(`   Commitment: ${artifact.commitment.toString().slice(0, 16)}...`);
  console.log(`   Public inputs: ${artifact.publicInputs.length}\n`);

  // Step 4: Verify it
  console.log("Verifying proof...");
  const verifier = new ComplianceVerifier({ buildDir: config.buildDir, logger });
  const valid = await verifier.verify(request.kind, artifact);
  if (!valid) {
    console.log("❌ Proof is INVALID");
    process.exit(1);
  }
  console.log("✅ Proof is VALID\n");

  // Step 5: Encodings
  console.log("Compressed proof (hex):");
  console.log(`  ${artifact.proof.toHex()}\n`);
  console.log("Artifact JSON:");
  console.log(artifact.serialize());
  console.log("\nSolidity verifier call:");
  console.log(`  ${artifact.formatSolidityCall()}\n`);
  console.log("ABI-encoded call data:");
  console.log(`  ${artifact.encodeVerifierCalldata()}\n`);

  console.log("The verifier now knows the statement holds, but NOT:");
  console.log("  - The exact score");
  console.log("  - The salt behind the commitment\n");

  // snarkjs keeps its curve worker threads alive
  process.exit(0);
}

main().catch((error: unknown) => {
  if (error instanceof ProverError) {
    console.error(`✗ ${error.code}: ${error.message}`);
    if (error.details.path) {
      console.error("\nCompile the circuits and run the trusted setup first, so that");
      console.error(`  ${error.details.path}`);
      console.error("exists.");
    }
  } else {
    console.error("✗ Demo failed:", error);
  }
  process.exit(1);
});
