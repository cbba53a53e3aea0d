/**
 * Operations
 *
 * An operation is either a gate applied to an ordered list of qubits, or a
 * sub-circuit applied a number of times. Nothing else can appear inside a
 * moment.
 */

import type { Circuit } from './circuit';
import { type Gate, gateNumQubits, gatesEqual, isPowGate, measurement } from './gates';
import { type Qubit, qubitKey, qubitsEqual } from './qubit';

/**
 * Gate applied to qubits
 */
export interface GateOperation {
  readonly kind: 'gate';
  readonly gate: Gate;
  readonly qubits: readonly Qubit[];
}

/**
 * Sub-circuit repeated `repetitions` times
 */
export interface CircuitOperation {
  readonly kind: 'circuit';
  readonly circuit: Circuit;
  readonly repetitions: number;
}

/**
 * Union type for all operations
 */
export type Operation = GateOperation | CircuitOperation;

/**
 * Apply a gate to qubits
 *
 * @example
 * ```typescript
 * const op = on(pow(Y, 0.5), gridQubit(0, 1));
 * ```
 */
export function on(gate: Gate, ...qubits: Qubit[]): GateOperation {
  const expected = gateNumQubits(gate);
  if (qubits.length !== expected) {
    throw new Error(
      `Gate ${gate.type} acts on ${expected} qubit(s) but got ${qubits.length}`
    );
  }
  validateAllDifferent(qubits);
  return { kind: 'gate', gate, qubits: [...qubits] };
}

/**
 * Measure qubits together. The key defaults to the comma-joined qubit keys.
 */
export function measure(qubits: readonly Qubit[], key?: string): GateOperation {
  const k = key ?? qubits.map(qubitKey).join(',');
  return on(measurement(k, qubits.length), ...qubits);
}

/**
 * Wrap a circuit as a repeated sub-circuit operation
 */
export function subcircuit(circuit: Circuit, repetitions: number = 1): CircuitOperation {
  if (!Number.isInteger(repetitions) || repetitions < 1) {
    throw new Error('Repetitions must be a positive integer');
  }
  return { kind: 'circuit', circuit, repetitions };
}

/**
 * Qubits touched by an operation
 */
export function operationQubits(op: Operation): readonly Qubit[] {
  return op.kind === 'gate' ? op.qubits : op.circuit.allQubits();
}

/**
 * Structural operation equality. Gate qubits are compared in order.
 */
export function operationsEqual(a: Operation, b: Operation): boolean {
  if (a.kind === 'gate') {
    return (
      b.kind === 'gate' &&
      gatesEqual(a.gate, b.gate) &&
      a.qubits.length === b.qubits.length &&
      a.qubits.every((q, i) => qubitsEqual(q, b.qubits[i]))
    );
  }
  return b.kind === 'circuit' && a.repetitions === b.repetitions && a.circuit.equals(b.circuit);
}

/**
 * Rebuild an operation with every qubit passed through `fn`
 */
export function mapOperationQubits(op: Operation, fn: (qubit: Qubit) => Qubit): Operation {
  if (op.kind === 'gate') {
    return { kind: 'gate', gate: op.gate, qubits: op.qubits.map(fn) };
  }
  return { kind: 'circuit', circuit: op.circuit.transformQubits(fn), repetitions: op.repetitions };
}

/**
 * Human-readable operation summary used in error messages
 */
export function describeOperation(op: Operation): string {
  if (op.kind === 'circuit') {
    return `CircuitOperation(${op.circuit.moments.length} moments, repetitions=${op.repetitions})`;
  }
  const gate = op.gate.type === 'extension' ? op.gate.name : op.gate.type;
  const exponent = isPowGate(op.gate) && op.gate.exponent !== 1 ? `**${op.gate.exponent}` : '';
  return `${gate}${exponent}(${op.qubits.map(qubitKey).join(', ')})`;
}

function validateAllDifferent(qubits: readonly Qubit[]): void {
  const unique = new Set(qubits.map(qubitKey));
  if (unique.size !== qubits.length) {
    throw new Error('All qubits must be different');
  }
}
