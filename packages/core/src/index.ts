// Export core functionality
export { ComplianceProver, withDeadline, type ProverOptions } from './prover.js';
export { ComplianceVerifier, type VerifierOptions } from './verifier.js';
export { CommitmentHasher, MAX_HASH_INPUTS } from './commitment.js';
export { SnarkjsBackend, type Groth16Backend, type ProveResult } from './backend.js';
export { Proof, ProofArtifact, verifierInterface, type SolidityCalldata } from './proof.js';
export {
  KeyCache,
  circuitPaths,
  loadVerificationKey,
  readArtifact,
  type CircuitPaths,
} from './key-store.js';
export {
  toSignalMap,
  toSnarkjsSignals,
  validateRangeInput,
  validateStatement,
  validateThresholdInput,
  validateTierInput,
  rangeSignals,
  thresholdSignals,
  tierSignals,
} from './inputs.js';
export {
  MAX_SCORE,
  MAX_TIER,
  MIN_TIER,
  TIERS,
  formatScore,
  getTierByNumber,
  tierBounds,
  tierForScore,
  type TierConfig,
} from './tiers.js';
export {
  BASE_FIELD,
  SCALAR_FIELD,
  fieldFromDecimal,
  fieldToDecimal,
  generateSalt,
  hashEntityId,
  isFieldDecimal,
  parseUnsignedOrZero,
} from './field.js';
export {
  G1_GENERATOR,
  G2_GENERATOR,
  compressG1,
  compressG2,
  decompressG1,
  decompressG2,
  isOnG1,
  isOnG2,
  type Fq2,
  type G1Affine,
  type G2Affine,
} from './curve.js';
export * from './circuits/index.js';
export * from './errors.js';
export { consoleLogger, createConsoleLogger, silentLogger, type Logger } from './logger.js';
export { DEFAULT_BUILD_DIR, loadConfig, type ZkConfig } from './config.js';

// Export types
export {
  CIRCUITS,
  CIRCUIT_KINDS,
  isCircuitKind,
  type CircuitKind,
  type CircuitSignals,
  type RangeInput,
  type SignalMap,
  type StatementInput,
  type StatementInputs,
  type ThresholdInput,
  type TierInput,
} from './types.js';
export type {
  ProofArtifactJson,
  ProofJson,
  ProofMetadata,
  ProvingKeyInfo,
  VerificationKeyJson,
} from './schemas.js';
