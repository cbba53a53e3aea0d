/**
 * Dynamical Decoupling
 *
 * Single-qubit extension gates that fill a fixed time window with evenly
 * spaced pi pulses. Each gate renders as
 *
 * ```text
 * I q t
 * P1 q
 * I q 2t
 * P2 q
 * ...
 * Pn q
 * I q t
 * ```
 *
 * where `t` is the idle time before the first and after the last pulse.
 */

import {
  type ExtensionGate,
  type Gate,
  type RotationGate,
  gatesEqual,
} from '@qcis-bridge/circuit-core';
import type { DescriptorArgs } from './descriptor';
import { describeGate } from './context';
import {
  DurationExceededError,
  InvalidDurationError,
  InvalidPulseAxisError,
  InvalidPulseCountError,
  TargetCountError,
} from './errors';
import { toGateKind, toOpcode } from './gate-table';

export type PulseAxis = 'X' | 'Y';

export const DEFAULT_PI_PULSE_NS = 50;

export function isPulseAxis(value: string): value is PulseAxis {
  return value === 'X' || value === 'Y';
}

/**
 * Validate a pulse train before any idle time is computed. The train is
 * `pairs` groups of `pulsesPerPair` pulses.
 *
 * @throws InvalidPulseAxisError if the axis is not X or Y
 * @throws InvalidPulseCountError if `pairs` is not a positive integer
 * @throws InvalidDurationError if either duration is negative or not finite
 * @throws DurationExceededError if the pulses alone fill the window
 */
export function validatePulses(
  axis: string,
  pairs: number,
  pulsesPerPair: number,
  totalDurationNs: number,
  pulseDurationNs: number
): asserts axis is PulseAxis {
  if (!isPulseAxis(axis)) {
    throw new InvalidPulseAxisError(axis);
  }
  if (!Number.isInteger(pairs) || pairs < 1) {
    throw new InvalidPulseCountError(pairs, 'pulse pairs');
  }
  for (const [name, ns] of [
    ['total duration', totalDurationNs],
    ['pulse duration', pulseDurationNs],
  ] as const) {
    if (!Number.isFinite(ns) || ns < 0) {
      throw new InvalidDurationError(name, ns);
    }
  }
  const count = pairs * pulsesPerPair;
  if (count * pulseDurationNs >= totalDurationNs) {
    throw new DurationExceededError(count, pulseDurationNs, totalDurationNs);
  }
}

/**
 * Idle time before the first and after the last pulse.
 *
 * The window is split into whole-nanosecond slots per pulse; the slack
 * of a slot is floored and then halved, so the result may end in .5.
 */
export function idleAroundPulsesNs(
  count: number,
  totalDurationNs: number,
  pulseDurationNs: number
): number {
  const perPulseNs = Math.floor(totalDurationNs / count);
  return Math.floor(perPulseNs - pulseDurationNs) / 2;
}

function pulseGate(axis: PulseAxis): RotationGate {
  const kind = toGateKind(axis);
  if (kind.kind !== 'unitary') {
    throw new InvalidPulseAxisError(axis);
  }
  const gate = kind.gate;
  if (gate.type === 'cz' || gate.type === 'cnot') {
    throw new InvalidPulseAxisError(axis);
  }
  return gate;
}

/**
 * Dynamical decoupling gate base class
 */
export abstract class DynamicalDecoupling implements ExtensionGate {
  readonly type: 'extension' = 'extension';
  readonly numQubits = 1;
  abstract readonly name: string;

  /**
   * Axes of the pi pulses, in order
   */
  abstract get pulseSequence(): readonly PulseAxis[];

  /**
   * Idle time before the first and after the last pulse, in ns
   */
  abstract get idleNs(): number;

  abstract params(): Readonly<Record<string, number | string>>;

  abstract label(): string;

  /**
   * Pi pulses as gates
   */
  get pulseGates(): RotationGate[] {
    return this.pulseSequence.map(pulseGate);
  }

  /**
   * Constructor-call string that rebuilds this gate
   */
  descriptor(): string {
    return describeGate(this);
  }

  equals(other: Gate): boolean {
    return gatesEqual(this, other);
  }

  emit(targets: readonly string[]): string {
    if (targets.length !== 1) {
      throw new TargetCountError(this.name, this.numQubits, targets.length);
    }
    const qubit = targets[0];
    const idle = (ns: number): string => `I ${qubit} ${Math.trunc(ns)}`;

    const edge = idle(this.idleNs);
    const pulses = this.pulseGates.map((gate) => `${toOpcode(gate)} ${qubit}`);
    return [edge, pulses.join(`\n${idle(2 * this.idleNs)}\n`), edge].join('\n');
  }
}

// ============================================================================
// Variants
// ============================================================================

/**
 * Carr-Purcell-Meiboom-Gill sequence: 2n pulses about one axis.
 *
 * q0: --X--X--X--X--
 */
export class CPMG extends DynamicalDecoupling {
  static readonly PARAMS = [
    'num_pi_pair',
    'total_duration_ns',
    'single_pi_gate_duration_ns',
    'pi_gate',
  ] as const;

  readonly name = 'CPMG';
  readonly numPiPair: number;
  readonly totalDurationNs: number;
  readonly singlePiGateDurationNs: number;
  readonly piGate: PulseAxis;
  private readonly _idleNs: number;

  /**
   * @param numPiPair Number of pulse pairs
   * @param totalDurationNs Length of the whole sequence
   * @param singlePiGateDurationNs Length of one pi pulse
   * @param piGate Pulse axis, 'X' or 'Y'
   */
  constructor(
    numPiPair: number,
    totalDurationNs: number,
    singlePiGateDurationNs: number = DEFAULT_PI_PULSE_NS,
    piGate: string = 'X'
  ) {
    super();
    validatePulses(piGate, numPiPair, 2, totalDurationNs, singlePiGateDurationNs);
    this.numPiPair = numPiPair;
    this.totalDurationNs = totalDurationNs;
    this.singlePiGateDurationNs = singlePiGateDurationNs;
    this.piGate = piGate;
    this._idleNs = idleAroundPulsesNs(2 * numPiPair, totalDurationNs, singlePiGateDurationNs);
  }

  static fromArgs(args: DescriptorArgs): CPMG {
    args.expectOnly(CPMG.PARAMS);
    return new CPMG(
      args.number('num_pi_pair', 0),
      args.number('total_duration_ns', 1),
      args.number('single_pi_gate_duration_ns', 2, DEFAULT_PI_PULSE_NS),
      args.string('pi_gate', 3, 'X')
    );
  }

  get pulseSequence(): PulseAxis[] {
    return new Array<PulseAxis>(2 * this.numPiPair).fill(this.piGate);
  }

  get idleNs(): number {
    return this._idleNs;
  }

  params(): Record<string, number | string> {
    return {
      num_pi_pair: this.numPiPair,
      total_duration_ns: this.totalDurationNs,
      single_pi_gate_duration_ns: this.singlePiGateDurationNs,
      pi_gate: this.piGate,
    };
  }

  label(): string {
    return `DD([${this.piGate}]*${2 * this.numPiPair})`;
  }
}

/**
 * Alternating X and Y pulses.
 *
 * q0: --X--Y--X--Y--
 */
export class XY extends DynamicalDecoupling {
  static readonly PARAMS = ['num_xy_pair', 'total_duration_ns', 'single_pi_gate_duration_ns'] as const;

  readonly name = 'XY';
  readonly numXyPair: number;
  readonly totalDurationNs: number;
  readonly singlePiGateDurationNs: number;
  private readonly _idleNs: number;

  constructor(
    numXyPair: number,
    totalDurationNs: number,
    singlePiGateDurationNs: number = DEFAULT_PI_PULSE_NS
  ) {
    super();
    validatePulses('X', numXyPair, 2, totalDurationNs, singlePiGateDurationNs);
    this.numXyPair = numXyPair;
    this.totalDurationNs = totalDurationNs;
    this.singlePiGateDurationNs = singlePiGateDurationNs;
    this._idleNs = idleAroundPulsesNs(2 * numXyPair, totalDurationNs, singlePiGateDurationNs);
  }

  static fromArgs(args: DescriptorArgs): XY {
    args.expectOnly(XY.PARAMS);
    return new XY(
      args.number('num_xy_pair', 0),
      args.number('total_duration_ns', 1),
      args.number('single_pi_gate_duration_ns', 2, DEFAULT_PI_PULSE_NS)
    );
  }

  get pulseSequence(): PulseAxis[] {
    const sequence: PulseAxis[] = [];
    for (let i = 0; i < this.numXyPair; i++) {
      sequence.push('X', 'Y');
    }
    return sequence;
  }

  get idleNs(): number {
    return this._idleNs;
  }

  params(): Record<string, number | string> {
    return {
      num_xy_pair: this.numXyPair,
      total_duration_ns: this.totalDurationNs,
      single_pi_gate_duration_ns: this.singlePiGateDurationNs,
    };
  }

  label(): string {
    return `DD([X--Y]*${this.numXyPair})`;
  }
}

/**
 * XY pairs followed by the same number of YX pairs.
 *
 * q0: --X--Y--X--Y--Y--X--Y--X--
 */
export class XYYX extends DynamicalDecoupling {
  static readonly PARAMS = ['num_xyyx_pair', 'total_duration_ns', 'single_pi_gate_duration_ns'] as const;

  readonly name = 'XYYX';
  readonly numXyyxPair: number;
  readonly totalDurationNs: number;
  readonly singlePiGateDurationNs: number;
  private readonly _idleNs: number;

  constructor(
    numXyyxPair: number,
    totalDurationNs: number,
    singlePiGateDurationNs: number = DEFAULT_PI_PULSE_NS
  ) {
    super();
    validatePulses('X', numXyyxPair, 4, totalDurationNs, singlePiGateDurationNs);
    this.numXyyxPair = numXyyxPair;
    this.totalDurationNs = totalDurationNs;
    this.singlePiGateDurationNs = singlePiGateDurationNs;
    this._idleNs = idleAroundPulsesNs(4 * numXyyxPair, totalDurationNs, singlePiGateDurationNs);
  }

  static fromArgs(args: DescriptorArgs): XYYX {
    args.expectOnly(XYYX.PARAMS);
    return new XYYX(
      args.number('num_xyyx_pair', 0),
      args.number('total_duration_ns', 1),
      args.number('single_pi_gate_duration_ns', 2, DEFAULT_PI_PULSE_NS)
    );
  }

  get pulseSequence(): PulseAxis[] {
    const xy: PulseAxis[] = [];
    const yx: PulseAxis[] = [];
    for (let i = 0; i < this.numXyyxPair; i++) {
      xy.push('X', 'Y');
      yx.push('Y', 'X');
    }
    return [...xy, ...yx];
  }

  get idleNs(): number {
    return this._idleNs;
  }

  params(): Record<string, number | string> {
    return {
      num_xyyx_pair: this.numXyyxPair,
      total_duration_ns: this.totalDurationNs,
      single_pi_gate_duration_ns: this.singlePiGateDurationNs,
    };
  }

  label(): string {
    return `DD([X--Y...Y--X]*${this.numXyyxPair})`;
  }
}
