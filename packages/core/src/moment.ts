/**
 * Moment
 *
 * A set of operations scheduled in the same time step. Operations in a
 * moment never share a qubit.
 */

import {
  type Operation,
  mapOperationQubits,
  operationQubits,
  operationsEqual,
} from './operation';
import { type Qubit, qubitKey } from './qubit';

export class Moment {
  private readonly _operations: readonly Operation[];
  private readonly _qubitKeys: ReadonlySet<string>;

  /**
   * @throws Error if two operations act on the same qubit
   */
  constructor(operations: Iterable<Operation> = []) {
    const ops = [...operations];
    const keys = new Set<string>();
    for (const op of ops) {
      for (const q of operationQubits(op)) {
        const key = qubitKey(q);
        if (keys.has(key)) {
          throw new Error(`Overlapping operations on qubit ${key} in the same moment`);
        }
        keys.add(key);
      }
    }
    this._operations = ops;
    this._qubitKeys = keys;
  }

  get operations(): readonly Operation[] {
    return this._operations;
  }

  get length(): number {
    return this._operations.length;
  }

  get isEmpty(): boolean {
    return this._operations.length === 0;
  }

  [Symbol.iterator](): Iterator<Operation> {
    return this._operations[Symbol.iterator]();
  }

  /**
   * Qubits touched by any operation in this moment
   */
  get qubits(): Qubit[] {
    return this._operations.flatMap((op) => [...operationQubits(op)]);
  }

  /**
   * Check whether any operation touches one of the given qubits
   */
  operatesOn(qubits: readonly Qubit[]): boolean {
    return qubits.some((q) => this._qubitKeys.has(qubitKey(q)));
  }

  /**
   * New moment with an extra operation
   *
   * @throws Error if the operation overlaps an existing one
   */
  with(op: Operation): Moment {
    return new Moment([...this._operations, op]);
  }

  /**
   * New moment with every qubit passed through `fn`
   */
  transformQubits(fn: (qubit: Qubit) => Qubit): Moment {
    return new Moment(this._operations.map((op) => mapOperationQubits(op, fn)));
  }

  /**
   * Order-insensitive equality
   */
  equals(other: Moment): boolean {
    if (other.length !== this.length) {
      return false;
    }
    const unmatched = [...other._operations];
    for (const op of this._operations) {
      const idx = unmatched.findIndex((o) => operationsEqual(op, o));
      if (idx < 0) {
        return false;
      }
      unmatched.splice(idx, 1);
    }
    return true;
  }
}
