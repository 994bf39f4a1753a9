export {
  ConstraintSystem,
  LinearCombination,
  ONE,
  toLc,
  type ConstraintSystemShape,
  type HashFunction,
  type HashGate,
  type Operand,
  type R1csConstraint,
  type Term,
  type Variable,
  type VariableKind,
} from "./constraint-system.js";
export {
  RANGE_BITS,
  allocCommitment,
  enforceNonNegative,
  selectTierBounds,
  type SelectedTierBounds,
} from "./gadgets.js";
export {
  RangeCircuit,
  ThresholdCircuit,
  TierCircuit,
  buildCircuit,
  synthesizeCircuit,
  type ComplianceCircuit,
  type RangeAssignment,
  type ThresholdAssignment,
  type TierAssignment,
} from "./circuits.js";
