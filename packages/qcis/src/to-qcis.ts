/**
 * Circuit → QCIS
 *
 * Walks a circuit moment by moment and writes one instruction per line.
 * Every moment that produced output is closed by a barrier over all
 * blockable resources, unless the moment already ended with barriers of
 * its own (from a sub-circuit or an extension gate).
 */

import {
  type Circuit,
  type Gate,
  type GateOperation,
  type GateType,
  type Moment,
  type Operation,
  type Qubit,
  describeOperation,
  gatesEqual,
  operationsEqual,
  qubitKey,
} from '@qcis-bridge/circuit-core';
import { wrapContext } from './context';
import { MissingCouplerError, UnconvertibleOperationError, UnmappedQubitError } from './errors';
import { findOpcode } from './gate-table';

// ============================================================================
// Types
// ============================================================================

/**
 * Maps a qubit to its QCIS name, e.g. `Q01`
 */
export type QubitNamer = (qubit: Qubit) => string | undefined;

/**
 * Coupler name → the two qubit names it couples
 */
export type CouplerMap = Readonly<Record<string, readonly [string, string]>>;

/**
 * Something to skip during conversion: a gate type (matches every gate of
 * that type), a gate value, or an operation value
 */
export type IgnoreRule = GateType | Gate | Operation;

export interface ToQcisOptions {
  /**
   * Couplers used to address two-qubit gates.
   * Required when the circuit contains CZ gates.
   */
  couplers?: CouplerMap;

  /**
   * Additional gates or operations to skip silently.
   * Always merged with {@link DEFAULT_IGNORED}.
   */
  ignored?: Iterable<IgnoreRule>;
}

/**
 * Noise channels and annotations are skipped by default
 */
export const DEFAULT_IGNORED: readonly IgnoreRule[] = [
  'depolarize',
  'asymmetric_depolarize',
  'annotation',
];

// ============================================================================
// Conversion
// ============================================================================

/**
 * Convert a circuit to QCIS text
 *
 * @param circuit Circuit to convert
 * @param nameOf Maps each qubit to its QCIS name
 * @param blockable All resources named by each barrier
 * @param options Couplers and ignore rules
 *
 * @example
 * ```typescript
 * const [q1, q2] = gridRect(1, 2);
 * const names = new Map([[qubitKey(q1), 'Q01'], [qubitKey(q2), 'Q02']]);
 * const qcis = toQcis(
 *   new Circuit()
 *     .appendMoment(on(pow(Y, 0.5), q1), on(pow(Y, -0.5), q2))
 *     .appendMoment(on(CZ, q1, q2)),
 *   (q) => names.get(qubitKey(q)),
 *   ['Q01', 'Q02', 'R01'],
 *   { couplers: { G0201: ['Q01', 'Q02'] } }
 * );
 * // Y2P Q01
 * // Y2M Q02
 * // B Q01 Q02 R01
 * // CZ G0201
 * // B Q01 Q02 R01
 * ```
 */
export function toQcis(
  circuit: Circuit,
  nameOf: QubitNamer,
  blockable: Iterable<string>,
  options: ToQcisOptions = {}
): string {
  const writer = new QcisWriter({
    nameOf,
    blockable: [...blockable],
    couplers: indexCouplers(options.couplers),
    ignored: [...DEFAULT_IGNORED, ...(options.ignored ?? [])],
  });
  writer.writeCircuit(circuit);
  return writer.output;
}

const BARRIER_PATTERN = /^B(\s|$)/;

/**
 * Check whether a line is a barrier instruction
 */
export function isBarrier(line: string): boolean {
  return BARRIER_PATTERN.test(line);
}

function pairKey(a: string, b: string): string {
  return a < b ? `${a} ${b}` : `${b} ${a}`;
}

function indexCouplers(couplers: CouplerMap | undefined): ReadonlyMap<string, string> | undefined {
  if (couplers === undefined) {
    return undefined;
  }
  const index = new Map<string, string>();
  for (const [coupler, [a, b]] of Object.entries(couplers)) {
    index.set(pairKey(a, b), coupler);
  }
  return index;
}

function isIgnored(op: GateOperation, rules: readonly IgnoreRule[]): boolean {
  return rules.some((rule) => {
    if (typeof rule === 'string') {
      return op.gate.type === rule;
    }
    if ('type' in rule) {
      return gatesEqual(op.gate, rule);
    }
    return operationsEqual(op, rule);
  });
}

interface WriterConfig {
  nameOf: QubitNamer;
  blockable: readonly string[];
  couplers: ReadonlyMap<string, string> | undefined;
  ignored: readonly IgnoreRule[];
}

/**
 * Line buffer for one conversion. Sub-circuits get a writer of their own.
 */
class QcisWriter {
  private readonly config: WriterConfig;
  private readonly lines: string[] = [];
  private barriers = 0;

  constructor(config: WriterConfig) {
    this.config = config;
  }

  get output(): string {
    return this.lines.join('\n') + '\n';
  }

  writeCircuit(circuit: Circuit): void {
    for (const moment of circuit.moments) {
      this.writeMoment(moment);
    }
  }

  private writeMoment(moment: Moment): void {
    const linesBefore = this.lines.length;
    const barriersBefore = this.barriers;

    for (const op of moment.operations) {
      this.writeOperation(op);
    }

    if (this.barriers === barriersBefore && this.lines.length !== linesBefore) {
      this.push(`B ${this.config.blockable.join(' ')}`.trimEnd());
    }
  }

  private writeOperation(op: Operation): void {
    if (op.kind === 'circuit') {
      const child = new QcisWriter(this.config);
      child.writeCircuit(op.circuit);
      for (let i = 0; i < op.repetitions; i++) {
        for (const line of child.lines) {
          this.push(line);
        }
      }
      return;
    }

    const gate = op.gate;
    if (gate.type === 'extension') {
      this.pushText(wrapContext(gate, this.targets(op)));
      return;
    }

    const opcode = findOpcode(gate);
    if (opcode !== undefined) {
      this.push(`${opcode} ${this.targets(op).join(' ')}`);
      return;
    }

    if (isIgnored(op, this.config.ignored)) {
      return;
    }

    throw new UnconvertibleOperationError(describeOperation(op));
  }

  private targets(op: GateOperation): string[] {
    const names = op.qubits.map((q) => {
      const name = this.config.nameOf(q);
      if (name === undefined) {
        throw new UnmappedQubitError(qubitKey(q));
      }
      return name;
    });

    if (op.gate.type !== 'cz' || names.length !== 2) {
      return names;
    }
    const [a, b] = names;
    const coupler = this.config.couplers?.get(pairKey(a, b));
    if (coupler === undefined) {
      throw new MissingCouplerError(`for qubit pair (${a}, ${b})`);
    }
    return [coupler];
  }

  private pushText(text: string): void {
    for (const line of text.split('\n')) {
      if (line !== '') {
        this.push(line);
      }
    }
  }

  private push(line: string): void {
    this.lines.push(line);
    if (isBarrier(line)) {
      this.barriers++;
    }
  }
}
