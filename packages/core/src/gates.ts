/**
 * Gate Definitions
 *
 * Gates are immutable values discriminated by `type`. Standard gates are
 * plain data; extension gates are objects that describe themselves by a
 * constructor name plus keyword parameters and render their own
 * instruction text.
 */

// ============================================================================
// Gate Type Definitions
// ============================================================================

/**
 * Single-qubit rotation gate types. The gate is the Pauli (or Hadamard)
 * operator raised to `exponent`, so `x` with exponent 0.5 is a 90° X turn.
 */
export type RotationGateType = 'x' | 'y' | 'z' | 'h';

/**
 * Two-qubit controlled gate types
 */
export type ControlledGateType = 'cz' | 'cnot';

/**
 * Annotation kinds carried through circuits without physical effect
 */
export type AnnotationKind = 'detector' | 'observable' | 'shift_coords';

// ============================================================================
// Gate Definitions
// ============================================================================

/**
 * Single-qubit rotation
 */
export interface RotationGate {
  readonly type: RotationGateType;
  readonly exponent: number;
}

/**
 * Two-qubit controlled gate
 */
export interface ControlledGate {
  readonly type: ControlledGateType;
  readonly exponent: number;
}

/**
 * Measurement over one or more qubits
 */
export interface MeasurementGate {
  readonly type: 'measure';
  readonly key: string;
  readonly numQubits: number;
}

/**
 * Symmetric depolarizing noise channel
 */
export interface DepolarizingChannel {
  readonly type: 'depolarize';
  readonly p: number;
  readonly numQubits: number;
}

/**
 * Single-qubit Pauli noise channel with independent X, Y, Z rates
 */
export interface AsymmetricDepolarizingChannel {
  readonly type: 'asymmetric_depolarize';
  readonly px: number;
  readonly py: number;
  readonly pz: number;
}

/**
 * Error-correction bookkeeping annotation (detectors, observables,
 * coordinate shifts)
 */
export interface AnnotationGate {
  readonly type: 'annotation';
  readonly kind: AnnotationKind;
  readonly numQubits: number;
  readonly args: readonly number[];
}

/**
 * Parameter value of an extension gate
 */
export type ExtensionParamValue = number | string;

/**
 * Gate defined outside the standard set.
 *
 * An extension gate is fully determined by its constructor `name` and its
 * keyword `params`; two extension gates are equal when both match. The
 * gate renders its own instruction text through `emit`.
 */
export interface ExtensionGate {
  readonly type: 'extension';
  readonly name: string;
  readonly numQubits: number;
  /**
   * Keyword parameters in constructor order
   */
  params(): Readonly<Record<string, ExtensionParamValue>>;
  /**
   * Short label for circuit diagrams
   */
  label(): string;
  /**
   * Render instruction text for the given target resource names.
   * May span several lines; must not end with a newline.
   */
  emit(targets: readonly string[]): string;
}

/**
 * Gates with a fixed data representation
 */
export type StandardGate =
  | RotationGate
  | ControlledGate
  | MeasurementGate
  | DepolarizingChannel
  | AsymmetricDepolarizingChannel
  | AnnotationGate;

/**
 * Union type for all gates
 */
export type Gate = StandardGate | ExtensionGate;

/**
 * All gate type tags
 */
export type GateType = Gate['type'];

// ============================================================================
// Constants and Factories
// ============================================================================

export const X: RotationGate = { type: 'x', exponent: 1 };
export const Y: RotationGate = { type: 'y', exponent: 1 };
export const Z: RotationGate = { type: 'z', exponent: 1 };
export const H: RotationGate = { type: 'h', exponent: 1 };
export const CZ: ControlledGate = { type: 'cz', exponent: 1 };
export const CNOT: ControlledGate = { type: 'cnot', exponent: 1 };

/**
 * Raise a rotation or controlled gate to a power
 *
 * @example
 * ```typescript
 * const x90 = pow(X, 0.5);   // X**0.5
 * const ym90 = pow(Y, -0.5); // Y**-0.5
 * ```
 */
export function pow<G extends RotationGate | ControlledGate>(gate: G, exponent: number): G {
  return { ...gate, exponent: gate.exponent * exponent };
}

/**
 * Create a measurement gate
 */
export function measurement(key: string, numQubits: number = 1): MeasurementGate {
  if (numQubits < 1) {
    throw new Error('Measurement must act on at least one qubit');
  }
  return { type: 'measure', key, numQubits };
}

/**
 * Create a symmetric depolarizing channel
 */
export function depolarize(p: number, numQubits: number = 1): DepolarizingChannel {
  if (p < 0 || p > 1) {
    throw new Error(`Depolarizing probability ${p} out of range [0, 1]`);
  }
  return { type: 'depolarize', p, numQubits };
}

/**
 * Create an asymmetric depolarizing channel
 */
export function asymmetricDepolarize(
  px: number,
  py: number,
  pz: number
): AsymmetricDepolarizingChannel {
  if (px < 0 || py < 0 || pz < 0 || px + py + pz > 1) {
    throw new Error(`Invalid Pauli error rates (${px}, ${py}, ${pz})`);
  }
  return { type: 'asymmetric_depolarize', px, py, pz };
}

/**
 * Create an annotation gate
 */
export function annotation(
  kind: AnnotationKind,
  numQubits: number = 0,
  args: readonly number[] = []
): AnnotationGate {
  return { type: 'annotation', kind, numQubits, args: [...args] };
}

// ============================================================================
// Queries
// ============================================================================

/**
 * Number of qubits a gate acts on. Annotations report their declared
 * width, which may be zero.
 */
export function gateNumQubits(gate: Gate): number {
  switch (gate.type) {
    case 'x':
    case 'y':
    case 'z':
    case 'h':
    case 'asymmetric_depolarize':
      return 1;
    case 'cz':
    case 'cnot':
      return 2;
    case 'measure':
    case 'depolarize':
    case 'annotation':
    case 'extension':
      return gate.numQubits;
  }
}

/**
 * Structural gate equality. Exponents are compared after
 * {@link canonicalExponent}.
 */
export function gatesEqual(a: Gate, b: Gate): boolean {
  switch (a.type) {
    case 'x':
    case 'y':
    case 'z':
    case 'h':
    case 'cz':
    case 'cnot':
      return (
        isPowGate(b) &&
        b.type === a.type &&
        canonicalExponent(b.exponent) === canonicalExponent(a.exponent)
      );
    case 'measure':
      return b.type === 'measure' && b.key === a.key && b.numQubits === a.numQubits;
    case 'depolarize':
      return b.type === 'depolarize' && b.p === a.p && b.numQubits === a.numQubits;
    case 'asymmetric_depolarize':
      return (
        b.type === 'asymmetric_depolarize' &&
        b.px === a.px &&
        b.py === a.py &&
        b.pz === a.pz
      );
    case 'annotation':
      return (
        b.type === 'annotation' &&
        b.kind === a.kind &&
        b.numQubits === a.numQubits &&
        b.args.length === a.args.length &&
        b.args.every((v, i) => v === a.args[i])
      );
    case 'extension':
      return b.type === 'extension' && b.name === a.name && paramsEqual(a.params(), b.params());
  }
}

/**
 * Exponent folded into (-1, 1]. Every gate with an exponent has period 2,
 * so `X**-1` is `X` and `X**1.5` is `X**-0.5`.
 */
export function canonicalExponent(exponent: number): number {
  return exponent - 2 * Math.ceil((exponent - 1) / 2) || 0;
}

/**
 * Check whether a gate carries an exponent
 */
export function isPowGate(gate: Gate): gate is RotationGate | ControlledGate {
  switch (gate.type) {
    case 'x':
    case 'y':
    case 'z':
    case 'h':
    case 'cz':
    case 'cnot':
      return true;
    default:
      return false;
  }
}

function paramsEqual(
  a: Readonly<Record<string, ExtensionParamValue>>,
  b: Readonly<Record<string, ExtensionParamValue>>
): boolean {
  const keysA = Object.keys(a);
  const keysB = Object.keys(b);
  return keysA.length === keysB.length && keysA.every((k) => k in b && a[k] === b[k]);
}

/**
 * Diagram label of a gate on one of its qubits
 *
 * @param position Index of the qubit within the operation
 */
export function gateLabel(gate: Gate, position: number = 0): string {
  switch (gate.type) {
    case 'x':
    case 'y':
    case 'z':
    case 'h': {
      const base = gate.type.toUpperCase();
      return gate.exponent === 1 ? base : `${base}^${gate.exponent}`;
    }
    case 'cz': {
      const suffix = gate.exponent === 1 ? '' : `^${gate.exponent}`;
      return `@${position === 0 ? '' : suffix}`;
    }
    case 'cnot':
      if (position === 0) return '@';
      return gate.exponent === 1 ? 'X' : `X^${gate.exponent}`;
    case 'measure':
      return position === 0 ? `M('${gate.key}')` : 'M';
    case 'depolarize':
      return `D(${gate.p})`;
    case 'asymmetric_depolarize':
      return `A(${gate.px},${gate.py},${gate.pz})`;
    case 'annotation':
      return gate.kind.toUpperCase();
    case 'extension':
      return gate.label();
  }
}
