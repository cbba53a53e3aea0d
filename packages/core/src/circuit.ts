/**
 * Circuit
 *
 * An ordered sequence of moments. Circuits are built with a fluent API and
 * then treated as values: transformations return new circuits.
 */

import {
  type ExtensionGate,
  type ExtensionParamValue,
  type Gate,
  type StandardGate,
  gateNumQubits,
} from './gates';
import { Moment } from './moment';
import { type Operation, on, operationQubits, subcircuit } from './operation';
import { type Qubit, qubitKey, sortQubits } from './qubit';
import { renderTextDiagram, type TextDiagramOptions } from './diagram';

// ============================================================================
// Circuit Statistics
// ============================================================================

/**
 * Statistics about a circuit
 */
export interface CircuitStats {
  numQubits: number;
  depth: number;
  totalOperations: number;
  singleQubitGates: number;
  twoQubitGates: number;
  measurements: number;
  subcircuits: number;
  gateBreakdown: Record<string, number>;
}

// ============================================================================
// Serialization Types
// ============================================================================

/**
 * JSON form of an extension gate
 */
export interface ExtensionGateJSON {
  type: 'extension';
  name: string;
  numQubits: number;
  params: Record<string, ExtensionParamValue>;
}

export type GateJSON = StandardGate | ExtensionGateJSON;

export type OperationJSON =
  | { kind: 'gate'; gate: GateJSON; qubits: Qubit[] }
  | { kind: 'circuit'; circuit: CircuitJSON; repetitions: number };

export interface CircuitJSON {
  name?: string;
  moments: OperationJSON[][];
}

/**
 * Rebuild an extension gate from its JSON form. Returns undefined for
 * names it does not know.
 */
export type ExtensionResolver = (json: ExtensionGateJSON) => ExtensionGate | undefined;

// ============================================================================
// Circuit Class
// ============================================================================

/**
 * Quantum Circuit
 *
 * @example
 * ```typescript
 * const [q0, q1] = gridRect(1, 2);
 * const bell = new Circuit()
 *   .appendMoment(on(pow(Y, 0.5), q0), on(pow(Y, -0.5), q1))
 *   .appendMoment(on(CZ, q0, q1))
 *   .appendMoment(on(pow(Y, 0.5), q1))
 *   .appendMoment(measure([q0, q1]));
 * ```
 */
export class Circuit {
  private _moments: Moment[];
  private _name?: string;

  /**
   * Create a new circuit
   * @param moments Initial moments, given as moments or operation lists
   * @param name Optional name for the circuit
   */
  constructor(moments: Iterable<Moment | Iterable<Operation>> = [], name?: string) {
    this._moments = [...moments].map((m) => (m instanceof Moment ? m : new Moment(m)));
    this._name = name;
  }

  // =========================================================================
  // Properties
  // =========================================================================

  /**
   * Circuit name
   */
  get name(): string | undefined {
    return this._name;
  }

  /**
   * All moments in order
   */
  get moments(): readonly Moment[] {
    return this._moments;
  }

  /**
   * Number of moments
   */
  get length(): number {
    return this._moments.length;
  }

  [Symbol.iterator](): Iterator<Moment> {
    return this._moments[Symbol.iterator]();
  }

  /**
   * All operations, moment by moment
   */
  get operations(): Operation[] {
    return this._moments.flatMap((m) => [...m.operations]);
  }

  /**
   * Every qubit the circuit touches, sorted
   */
  allQubits(): Qubit[] {
    const seen = new Map<string, Qubit>();
    for (const moment of this._moments) {
      for (const q of moment.qubits) {
        seen.set(qubitKey(q), q);
      }
    }
    return sortQubits(seen.values());
  }

  // =========================================================================
  // Building
  // =========================================================================

  /**
   * Append operations, each placed in the earliest moment after the last
   * moment that touches any of its qubits. A new moment is opened when no
   * such moment exists.
   */
  append(...operations: Operation[]): this {
    for (const op of operations) {
      const qubits = operationQubits(op);
      let last = -1;
      for (let i = this._moments.length - 1; i >= 0; i--) {
        if (this._moments[i].operatesOn(qubits)) {
          last = i;
          break;
        }
      }
      const target = last + 1;
      if (target < this._moments.length) {
        this._moments[target] = this._moments[target].with(op);
      } else {
        this._moments.push(new Moment([op]));
      }
    }
    return this;
  }

  /**
   * Append a whole moment
   */
  appendMoment(...operations: Operation[]): this {
    this._moments.push(new Moment(operations));
    return this;
  }

  /**
   * Append all moments of another circuit, keeping their boundaries
   */
  concat(other: Circuit): this {
    this._moments.push(...other._moments);
    return this;
  }

  /**
   * New circuit with every qubit passed through `fn`
   */
  transformQubits(fn: (qubit: Qubit) => Qubit): Circuit {
    return new Circuit(
      this._moments.map((m) => m.transformQubits(fn)),
      this._name
    );
  }

  /**
   * Moment-by-moment equality. Names are not compared.
   */
  equals(other: Circuit): boolean {
    return (
      other._moments.length === this._moments.length &&
      this._moments.every((m, i) => m.equals(other._moments[i]))
    );
  }

  // =========================================================================
  // Statistics
  // =========================================================================

  /**
   * Get circuit statistics
   */
  getStats(): CircuitStats {
    const gateBreakdown: Record<string, number> = {};
    let singleQubitGates = 0;
    let twoQubitGates = 0;
    let measurements = 0;
    let subcircuits = 0;

    for (const op of this.operations) {
      if (op.kind === 'circuit') {
        subcircuits++;
        continue;
      }
      const type = op.gate.type === 'extension' ? op.gate.name : op.gate.type;
      gateBreakdown[type] = (gateBreakdown[type] || 0) + 1;

      if (op.gate.type === 'measure') {
        measurements++;
      } else if (gateNumQubits(op.gate) === 1) {
        singleQubitGates++;
      } else if (gateNumQubits(op.gate) === 2) {
        twoQubitGates++;
      }
    }

    return {
      numQubits: this.allQubits().length,
      depth: this._moments.filter((m) => !m.isEmpty).length,
      totalOperations: this.operations.length,
      singleQubitGates,
      twoQubitGates,
      measurements,
      subcircuits,
      gateBreakdown,
    };
  }

  // =========================================================================
  // Serialization
  // =========================================================================

  /**
   * Convert circuit to JSON
   */
  toJSON(): CircuitJSON {
    return {
      name: this._name,
      moments: this._moments.map((m) => m.operations.map(operationToJSON)),
    };
  }

  /**
   * Create circuit from JSON
   *
   * @param resolver Rebuilds extension gates; required when the JSON
   *   contains any
   * @throws Error if an operation fails the checks of `on` or `subcircuit`
   */
  static fromJSON(json: CircuitJSON, resolver?: ExtensionResolver): Circuit {
    return new Circuit(
      json.moments.map((ops) => ops.map((op) => operationFromJSON(op, resolver))),
      json.name
    );
  }

  /**
   * Render a plain-text diagram, one row per qubit
   */
  toTextDiagram(options?: TextDiagramOptions): string {
    return renderTextDiagram(this, options);
  }
}

// ============================================================================
// Serialization Helpers
// ============================================================================

function gateToJSON(gate: Gate): GateJSON {
  if (gate.type === 'extension') {
    return {
      type: 'extension',
      name: gate.name,
      numQubits: gate.numQubits,
      params: { ...gate.params() },
    };
  }
  return gate;
}

function operationToJSON(op: Operation): OperationJSON {
  if (op.kind === 'circuit') {
    return { kind: 'circuit', circuit: op.circuit.toJSON(), repetitions: op.repetitions };
  }
  return { kind: 'gate', gate: gateToJSON(op.gate), qubits: [...op.qubits] };
}

function operationFromJSON(json: OperationJSON, resolver?: ExtensionResolver): Operation {
  if (json.kind === 'circuit') {
    return subcircuit(Circuit.fromJSON(json.circuit, resolver), json.repetitions);
  }
  let gate: Gate;
  if (json.gate.type === 'extension') {
    const resolved = resolver?.(json.gate);
    if (!resolved) {
      throw new Error(`Cannot resolve extension gate '${json.gate.name}' from JSON`);
    }
    gate = resolved;
  } else {
    gate = json.gate;
  }
  return on(gate, ...json.qubits);
}
