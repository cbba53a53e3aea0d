/**
 * @qcis-bridge/circuit-core
 *
 * Moment-structured quantum circuit IR: qubits, gates, operations,
 * moments and circuits, with JSON serialization and text diagrams.
 *
 * @example
 * ```typescript
 * import { Circuit, CZ, Y, gridRect, measure, on, pow } from '@qcis-bridge/circuit-core';
 *
 * const [q0, q1] = gridRect(1, 2);
 * const circuit = new Circuit()
 *   .appendMoment(on(pow(Y, 0.5), q0), on(pow(Y, -0.5), q1))
 *   .appendMoment(on(CZ, q0, q1))
 *   .appendMoment(measure([q0, q1]));
 *
 * console.log(circuit.toTextDiagram());
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Qubits
// ============================================================================

export {
  gridQubit,
  gridRect,
  lineQubit,
  namedQubit,
  qubitKey,
  qubitsEqual,
  compareQubits,
  sortQubits,
} from './qubit';
export type { Qubit, GridQubit, LineQubit, NamedQubit } from './qubit';

// ============================================================================
// Gates
// ============================================================================

export {
  X,
  Y,
  Z,
  H,
  CZ,
  CNOT,
  pow,
  measurement,
  depolarize,
  asymmetricDepolarize,
  annotation,
  gateNumQubits,
  gatesEqual,
  canonicalExponent,
  gateLabel,
  isPowGate,
} from './gates';
export type {
  Gate,
  GateType,
  StandardGate,
  RotationGate,
  RotationGateType,
  ControlledGate,
  ControlledGateType,
  MeasurementGate,
  DepolarizingChannel,
  AsymmetricDepolarizingChannel,
  AnnotationGate,
  AnnotationKind,
  ExtensionGate,
  ExtensionParamValue,
} from './gates';

// ============================================================================
// Operations, Moments and Circuits
// ============================================================================

export {
  on,
  measure,
  subcircuit,
  operationQubits,
  operationsEqual,
  mapOperationQubits,
  describeOperation,
} from './operation';
export type { Operation, GateOperation, CircuitOperation } from './operation';

export { Moment } from './moment';

export { Circuit } from './circuit';
export type {
  CircuitStats,
  CircuitJSON,
  OperationJSON,
  GateJSON,
  ExtensionGateJSON,
  ExtensionResolver,
} from './circuit';

export { renderTextDiagram } from './diagram';
export type { TextDiagramOptions } from './diagram';

// ============================================================================
// Version Info
// ============================================================================

export const VERSION = '0.1.0';
