/**
 * Gate Table
 *
 * Static bijection between QCIS opcodes and the gates they stand for.
 * Measurement is keyed by gate type alone: the measurement key and width
 * do not influence the opcode.
 */

import {
  type ControlledGate,
  type Gate,
  type RotationGate,
  CZ,
  X,
  Y,
  gatesEqual,
  isPowGate,
  pow,
} from '@qcis-bridge/circuit-core';
import { UnknownGateError, UnknownOpcodeError } from './errors';

/**
 * Opcodes with a table entry
 */
export type Opcode = 'X' | 'Y' | 'X2P' | 'X2M' | 'Y2P' | 'Y2M' | 'CZ' | 'M';

/**
 * What an opcode stands for
 */
export type GateKind =
  | { readonly kind: 'unitary'; readonly gate: RotationGate | ControlledGate }
  | { readonly kind: 'measurement' };

const UNITARY_TABLE: ReadonlyArray<readonly [Exclude<Opcode, 'M'>, RotationGate | ControlledGate]> = [
  ['X', X],
  ['Y', Y],
  ['X2P', pow(X, 0.5)],
  ['X2M', pow(X, -0.5)],
  ['Y2P', pow(Y, 0.5)],
  ['Y2M', pow(Y, -0.5)],
  ['CZ', CZ],
];

const OPCODE_TO_KIND: ReadonlyMap<string, GateKind> = new Map<string, GateKind>([
  ...UNITARY_TABLE.map(([opcode, gate]): [string, GateKind] => [opcode, { kind: 'unitary', gate }]),
  ['M', { kind: 'measurement' }],
]);

/**
 * All supported opcodes
 */
export const OPCODES: readonly Opcode[] = [...UNITARY_TABLE.map(([opcode]) => opcode), 'M'];

/**
 * Check whether a string is a supported opcode
 */
export function isOpcode(value: string): value is Opcode {
  return OPCODE_TO_KIND.has(value);
}

/**
 * Look up the opcode of a gate, or undefined when the table has none
 */
export function findOpcode(gate: Gate): Opcode | undefined {
  if (gate.type === 'measure') {
    return 'M';
  }
  if (!isPowGate(gate)) {
    return undefined;
  }
  const entry = UNITARY_TABLE.find(([, g]) => gatesEqual(g, gate));
  return entry?.[0];
}

/**
 * Opcode of a gate
 *
 * @throws UnknownGateError if the gate is not in the table
 */
export function toOpcode(gate: Gate): Opcode {
  const opcode = findOpcode(gate);
  if (opcode === undefined) {
    const name = gate.type === 'extension' ? gate.name : gate.type;
    const exponent = isPowGate(gate) ? `**${gate.exponent}` : '';
    throw new UnknownGateError(`${name}${exponent}`);
  }
  return opcode;
}

/**
 * Gate kind of an opcode
 *
 * @throws UnknownOpcodeError if the opcode is not in the table
 */
export function toGateKind(opcode: string): GateKind {
  const kind = OPCODE_TO_KIND.get(opcode);
  if (!kind) {
    throw new UnknownOpcodeError(opcode);
  }
  return kind;
}
