/**
 * QCIS → Circuit
 *
 * Reads QCIS text line by line. Instructions between two barriers form
 * one time step; extension gates are rebuilt from their context blocks
 * through an extension registry. Qubits are parsed as named placeholders
 * and only mapped to the caller's qubits once the whole text is read.
 */

import {
  Circuit,
  type Operation,
  type Qubit,
  measure,
  namedQubit,
  on,
} from '@qcis-bridge/circuit-core';
import {
  CONTEXT_END,
  CONTEXT_START,
  GATE_PREFIX,
  TARGETS_PREFIX,
  parseTargets,
} from './context';
import {
  MalformedContextError,
  MissingCouplerError,
  NotYetSupportedError,
  UnmappedQubitError,
  UnrecognizedInstructionError,
} from './errors';
import { DEFAULT_EXTENSIONS, type ExtensionRegistry, buildExtension } from './extensions';
import { type GateKind, isOpcode, toGateKind } from './gate-table';
import { type CouplerMap, isBarrier } from './to-qcis';

// ============================================================================
// Types
// ============================================================================

/**
 * Maps a QCIS qubit name back to a qubit
 */
export type QubitResolver = (name: string) => Qubit | undefined;

/**
 * Where warnings go
 */
export type Logger = Pick<Console, 'warn'>;

export interface FromQcisOptions {
  /**
   * Couplers used by two-qubit instructions.
   * Required when the text contains coupler-addressed instructions.
   */
  couplers?: CouplerMap;

  /**
   * Lines starting with any of these prefixes are skipped
   */
  ignoredInstructions?: Iterable<string>;

  /**
   * Extension gates that context blocks may name.
   * Default: {@link DEFAULT_EXTENSIONS}
   */
  extensions?: ExtensionRegistry;

  /**
   * Default: console
   */
  logger?: Logger;
}

const MEASURE_PATTERN = /^M((?:\s+Q\d+)+)$/;
const QUBIT_PATTERN = /^([A-Z][A-Z0-9]*)\s+(Q\d+)$/;
const COUPLER_PATTERN = /^([A-Z][A-Z0-9]*)\s+(G\d+)$/;
const IDLE_PATTERN = /^I\s+Q\d+\s+\d+$/;

// ============================================================================
// Conversion
// ============================================================================

/**
 * Convert QCIS text to a circuit
 *
 * @param qcis QCIS text
 * @param qubitOf Maps each QCIS qubit name to a qubit
 * @param options Couplers, ignored prefixes, extension registry, logger
 *
 * @example
 * ```typescript
 * const [q1, q2] = gridRect(1, 2);
 * const circuit = fromQcis(
 *   'X2P Q01\nX2M Q02\nB Q01 Q02 R01\nCZ G0201\nB Q01 Q02 R01\n',
 *   (name) => ({ Q01: q1, Q02: q2 })[name],
 *   { couplers: { G0201: ['Q01', 'Q02'] } }
 * );
 * ```
 */
export function fromQcis(qcis: string, qubitOf: QubitResolver, options: FromQcisOptions = {}): Circuit {
  const reader = new QcisReader(qcis, {
    couplers: options.couplers ?? {},
    ignoredInstructions: [...(options.ignoredInstructions ?? [])],
    extensions: options.extensions ?? DEFAULT_EXTENSIONS,
    logger: options.logger ?? console,
  });
  return bindQubits(reader.read(), qubitOf);
}

/**
 * Replace every named placeholder with the caller's qubit
 */
function bindQubits(circuit: Circuit, qubitOf: QubitResolver): Circuit {
  const mapping = new Map<string, Qubit>();
  for (const placeholder of circuit.allQubits()) {
    if (placeholder.kind !== 'named') continue;
    const qubit = qubitOf(placeholder.name);
    if (qubit === undefined) {
      throw new UnmappedQubitError(placeholder.name);
    }
    mapping.set(placeholder.name, qubit);
  }
  return circuit.transformQubits((q) => (q.kind === 'named' ? mapping.get(q.name) ?? q : q));
}

interface ReaderConfig {
  couplers: CouplerMap;
  ignoredInstructions: readonly string[];
  extensions: ExtensionRegistry;
  logger: Logger;
}

/**
 * Single-use reader over one QCIS text
 */
class QcisReader {
  private readonly config: ReaderConfig;
  private readonly lines: string[];
  private cursor = 0;
  private readonly circuit = new Circuit();
  private step = new Circuit();
  private endedWithBarrier = false;

  constructor(qcis: string, config: ReaderConfig) {
    this.config = config;
    this.lines = qcis
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line !== '');
  }

  read(): Circuit {
    while (this.cursor < this.lines.length) {
      this.readLine(this.nextLine());
    }
    if (!this.endedWithBarrier) {
      this.commitStep();
    }
    return this.circuit;
  }

  private nextLine(): string {
    return this.lines[this.cursor++];
  }

  private readLine(line: string): void {
    if (this.config.ignoredInstructions.some((prefix) => line.startsWith(prefix))) {
      return;
    }
    if (line === CONTEXT_START) {
      this.step.append(this.readContext());
      this.endedWithBarrier = false;
      return;
    }
    if (line.startsWith('#')) {
      return;
    }
    if (isBarrier(line)) {
      this.commitStep();
      this.endedWithBarrier = true;
      return;
    }
    this.step.append(this.parseInstruction(line));
    this.endedWithBarrier = false;
  }

  private commitStep(): void {
    if (this.step.length === 0) {
      this.circuit.appendMoment();
    } else {
      this.circuit.concat(this.step);
    }
    this.step = new Circuit();
  }

  private parseInstruction(line: string): Operation {
    let match = MEASURE_PATTERN.exec(line);
    if (match) {
      const names = match[1].trim().split(/\s+/);
      if (new Set(names).size !== names.length) {
        throw new UnrecognizedInstructionError(line, 'qubit measured twice');
      }
      return measure(names.map(namedQubit), names.join(','));
    }

    match = QUBIT_PATTERN.exec(line);
    if (match) {
      const [, opcode, qubit] = match;
      const kind = this.gateKind(line, opcode);
      if (kind.kind !== 'unitary' || kind.gate.type === 'cz' || kind.gate.type === 'cnot') {
        throw new UnrecognizedInstructionError(line, `${opcode} does not act on a single qubit`);
      }
      return on(kind.gate, namedQubit(qubit));
    }

    match = COUPLER_PATTERN.exec(line);
    if (match) {
      const [, opcode, coupler] = match;
      const kind = this.gateKind(line, opcode);
      if (kind.kind !== 'unitary' || (kind.gate.type !== 'cz' && kind.gate.type !== 'cnot')) {
        throw new UnrecognizedInstructionError(line, `${opcode} does not act on a coupler`);
      }
      const pair = Object.prototype.hasOwnProperty.call(this.config.couplers, coupler)
        ? this.config.couplers[coupler]
        : undefined;
      if (pair === undefined) {
        throw new MissingCouplerError(`map for ${coupler}`);
      }
      return on(kind.gate, namedQubit(pair[0]), namedQubit(pair[1]));
    }

    if (IDLE_PATTERN.test(line)) {
      throw new NotYetSupportedError(line);
    }
    throw new UnrecognizedInstructionError(line);
  }

  private gateKind(line: string, opcode: string): GateKind {
    if (!isOpcode(opcode)) {
      throw new UnrecognizedInstructionError(line, `unknown opcode ${opcode}`);
    }
    return toGateKind(opcode);
  }

  /**
   * Consume lines up to the end marker and rebuild the extension gate
   */
  private readContext(): Operation {
    let descriptor: string | undefined;
    let targets: string[] = [];
    const body: string[] = [];

    for (;;) {
      if (this.cursor >= this.lines.length) {
        throw new MalformedContextError(`missing '${CONTEXT_END}'`);
      }
      const line = this.nextLine();
      if (line === CONTEXT_END) {
        break;
      }
      if (line.startsWith(GATE_PREFIX)) {
        descriptor = line.slice(GATE_PREFIX.length).trim();
      } else if (line.startsWith(TARGETS_PREFIX)) {
        targets = parseTargets(line.slice(TARGETS_PREFIX.length));
      } else if (!line.startsWith('#')) {
        body.push(line);
      }
    }

    if (descriptor === undefined) {
      throw new MalformedContextError(`no '${GATE_PREFIX.trim()}' line`);
    }
    const gate = buildExtension(descriptor, this.config.extensions);
    if (targets.length !== gate.numQubits) {
      throw new MalformedContextError(
        `${gate.name} acts on ${gate.numQubits} qubit(s) but ${targets.length} target(s) are listed`
      );
    }

    const expected = gate.emit(targets).split('\n').filter((line) => line.trim() !== '');
    if (expected.length !== body.length || expected.some((line, i) => line.trim() !== body[i])) {
      this.config.logger.warn(
        `Instructions in the context block of ${descriptor} differ from what the gate emits; ` +
          'the block is rebuilt from its descriptor.'
      );
    }

    return on(gate, ...targets.map(namedQubit));
  }
}
