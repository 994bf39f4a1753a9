import { SynthesisError } from "../errors.js";
import { mod } from "../field.js";

// ──────────────────────────────────────────────────────────
// Variables and linear combinations
// ──────────────────────────────────────────────────────────

export type VariableKind = "one" | "instance" | "witness";

export interface Variable {
  readonly kind: VariableKind;
  readonly index: number;
}

/** The constant-one wire every R1CS carries */
export const ONE: Variable = freezeVariable("one", 0);

function freezeVariable(kind: VariableKind, index: number): Variable {
  const variable: Variable = { kind, index };
  return Object.freeze(variable);
}

export interface Term {
  readonly variable: Variable;
  readonly coeff: bigint;
}

const KIND_ORDER: Record<VariableKind, number> = { one: 0, instance: 1, witness: 2 };

function variableKey(v: Variable): string {
  return v.kind === "one" ? "1" : `${v.kind === "instance" ? "x" : "w"}${v.index}`;
}

/**
 * Immutable sum of `coeff * variable` terms over the scalar field.
 * Terms are merged per variable, zero terms dropped, and kept sorted so two
 * equal combinations always have identical term lists.
 */
export class LinearCombination {
  private constructor(readonly terms: readonly Term[]) {}

  static zero(): LinearCombination {
    return new LinearCombination([]);
  }

  static constant(value: bigint | number): LinearCombination {
    return LinearCombination.of([{ variable: ONE, coeff: BigInt(value) }]);
  }

  static from(variable: Variable, coeff: bigint | number = 1n): LinearCombination {
    return LinearCombination.of([{ variable, coeff: BigInt(coeff) }]);
  }

  static sum(items: readonly Operand[]): LinearCombination {
    return items.reduce<LinearCombination>((acc, item) => acc.add(item), LinearCombination.zero());
  }

  private static of(terms: readonly Term[]): LinearCombination {
    const merged = new Map<string, Term>();
    for (const term of terms) {
      const key = variableKey(term.variable);
      const prev = merged.get(key);
      const coeff = mod((prev?.coeff ?? 0n) + term.coeff);
      merged.set(key, { variable: term.variable, coeff });
    }
    const normalized = [...merged.values()]
      .filter((t) => t.coeff !== 0n)
      .sort(
        (x, y) =>
          KIND_ORDER[x.variable.kind] - KIND_ORDER[y.variable.kind] ||
          x.variable.index - y.variable.index,
      );
    return new LinearCombination(normalized);
  }

  add(other: Operand): LinearCombination {
    return LinearCombination.of([...this.terms, ...toLc(other).terms]);
  }

  sub(other: Operand): LinearCombination {
    return this.add(toLc(other).scale(-1n));
  }

  scale(k: bigint | number): LinearCombination {
    const factor = BigInt(k);
    return LinearCombination.of(this.terms.map((t) => ({ variable: t.variable, coeff: t.coeff * factor })));
  }

  /** Terms as `[key, coeff]` pairs, e.g. `["w3", 1n]` */
  describe(): [string, bigint][] {
    return this.terms.map((t) => [variableKey(t.variable), t.coeff]);
  }
}

export type Operand = LinearCombination | Variable;

export function toLc(operand: Operand): LinearCombination {
  return operand instanceof LinearCombination ? operand : LinearCombination.from(operand);
}

// ──────────────────────────────────────────────────────────
// Constraint system
// ──────────────────────────────────────────────────────────

/** <a, z> * <b, z> = <c, z> */
export interface R1csConstraint {
  readonly label: string;
  readonly a: LinearCombination;
  readonly b: LinearCombination;
  readonly c: LinearCombination;
}

export type HashFunction = (inputs: readonly bigint[]) => bigint;

/**
 * `output = H(inputs)`, checked natively with the commitment hasher. The
 * compiled circuit expands the same gate into Poseidon's arithmetic rounds.
 */
export interface HashGate {
  readonly label: string;
  readonly inputs: readonly LinearCombination[];
  readonly output: LinearCombination;
  readonly hash: HashFunction;
}

/** Structure of a system without its assignment */
export interface ConstraintSystemShape {
  instance: string[];
  witness: string[];
  constraints: { label: string; a: [string, bigint][]; b: [string, bigint][]; c: [string, bigint][] }[];
  hashGates: { label: string; inputs: [string, bigint][][]; output: [string, bigint][] }[];
}

interface Allocation {
  name: string;
  value: bigint;
}

/**
 * Rank-1 constraint system over the BN254 scalar field with separate public
 * (instance) and private (witness) assignments.
 */
export class ConstraintSystem {
  private readonly instance: Allocation[] = [];
  private readonly witness: Allocation[] = [];
  private readonly constraints: R1csConstraint[] = [];
  private readonly hashGates: HashGate[] = [];

  allocInput(name: string, value: bigint): Variable {
    this.instance.push({ name, value: mod(value) });
    return freezeVariable("instance", this.instance.length - 1);
  }

  allocWitness(name: string, value: bigint): Variable {
    this.witness.push({ name, value: mod(value) });
    return freezeVariable("witness", this.witness.length - 1);
  }

  enforce(a: Operand, b: Operand, c: Operand, label: string): void {
    this.constraints.push({ label, a: toLc(a), b: toLc(b), c: toLc(c) });
  }

  enforceHash(inputs: readonly Operand[], output: Operand, hash: HashFunction, label: string): void {
    this.hashGates.push({ label, inputs: inputs.map(toLc), output: toLc(output), hash });
  }

  value(variable: Variable): bigint {
    switch (variable.kind) {
      case "one":
        return 1n;
      case "instance":
        return this.slot(this.instance, variable).value;
      case "witness":
        return this.slot(this.witness, variable).value;
    }
  }

  evaluate(operand: Operand): bigint {
    let acc = 0n;
    for (const term of toLc(operand).terms) {
      acc += term.coeff * this.value(term.variable);
    }
    return mod(acc);
  }

  /** Label of the first violated constraint or gate, if any */
  whichIsUnsatisfied(): string | undefined {
    for (const { label, a, b, c } of this.constraints) {
      if (mod(this.evaluate(a) * this.evaluate(b)) !== this.evaluate(c)) {
        return label;
      }
    }
    for (const gate of this.hashGates) {
      const expected = gate.hash(gate.inputs.map((lc) => this.evaluate(lc)));
      if (expected !== this.evaluate(gate.output)) {
        return gate.label;
      }
    }
    return undefined;
  }

  isSatisfied(): boolean {
    return this.whichIsUnsatisfied() === undefined;
  }

  /** Public assignment in allocation order (the proof's public inputs) */
  publicInputs(): bigint[] {
    return this.instance.map((a) => a.value);
  }

  /** Look up a variable by allocation name, witnesses first */
  variable(name: string): Variable | undefined {
    const w = this.witness.findIndex((a) => a.name === name);
    if (w >= 0) return freezeVariable("witness", w);
    const x = this.instance.findIndex((a) => a.name === name);
    if (x >= 0) return freezeVariable("instance", x);
    return undefined;
  }

  /**
   * Copy of this system with one assigned value replaced. Constraints are
   * shared; used to check that a tampered witness is rejected.
   */
  withAssignment(variable: Variable, value: bigint): ConstraintSystem {
    if (variable.kind === "one") {
      throw new SynthesisError("the constant-one wire cannot be reassigned");
    }
    const copy = new ConstraintSystem();
    copy.instance.push(...this.instance.map((a) => ({ ...a })));
    copy.witness.push(...this.witness.map((a) => ({ ...a })));
    copy.constraints.push(...this.constraints);
    copy.hashGates.push(...this.hashGates);
    copy.slot(variable.kind === "instance" ? copy.instance : copy.witness, variable).value = mod(value);
    return copy;
  }

  get numConstraints(): number {
    return this.constraints.length;
  }

  get numHashGates(): number {
    return this.hashGates.length;
  }

  get numInstanceVariables(): number {
    return this.instance.length;
  }

  get numWitnessVariables(): number {
    return this.witness.length;
  }

  shape(): ConstraintSystemShape {
    return {
      instance: this.instance.map((a) => a.name),
      witness: this.witness.map((a) => a.name),
      constraints: this.constraints.map(({ label, a, b, c }) => ({
        label,
        a: a.describe(),
        b: b.describe(),
        c: c.describe(),
      })),
      hashGates: this.hashGates.map(({ label, inputs, output }) => ({
        label,
        inputs: inputs.map((lc) => lc.describe()),
        output: output.describe(),
      })),
    };
  }

  private slot(list: Allocation[], variable: Variable): Allocation {
    const slot = list[variable.index];
    if (!slot) {
      throw new SynthesisError(`unknown ${variable.kind} variable #${variable.index}`);
    }
    return slot;
  }
}
