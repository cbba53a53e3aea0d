/**
 * @qcis-bridge/qcis
 *
 * Lossless translation between QCIS instruction text and the circuit IR
 * of `@qcis-bridge/circuit-core`, plus dynamical decoupling gates that
 * render their own pulse timing.
 *
 * @example
 * ```typescript
 * import { Circuit, gridQubit, on, qubitKey } from '@qcis-bridge/circuit-core';
 * import { CPMG, fromQcis, toQcis } from '@qcis-bridge/qcis';
 *
 * const q = gridQubit(0, 0);
 * const circuit = new Circuit().appendMoment(on(new CPMG(2, 1000), q));
 * const qcis = toQcis(circuit, () => 'Q00', ['Q00']);
 * const back = fromQcis(qcis, () => q);
 * back.equals(circuit); // true
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Translators
// ============================================================================

export { toQcis, isBarrier, DEFAULT_IGNORED } from './to-qcis';
export type { ToQcisOptions, QubitNamer, CouplerMap, IgnoreRule } from './to-qcis';

export { fromQcis } from './from-qcis';
export type { FromQcisOptions, QubitResolver, Logger } from './from-qcis';

// ============================================================================
// Gate Table
// ============================================================================

export { OPCODES, isOpcode, findOpcode, toOpcode, toGateKind } from './gate-table';
export type { Opcode, GateKind } from './gate-table';

// ============================================================================
// Extension Gates
// ============================================================================

export {
  DynamicalDecoupling,
  CPMG,
  XY,
  XYYX,
  DEFAULT_PI_PULSE_NS,
  isPulseAxis,
  validatePulses,
  idleAroundPulsesNs,
} from './dynamical-decoupling';
export type { PulseAxis } from './dynamical-decoupling';

export {
  CONTEXT_START,
  CONTEXT_END,
  describeGate,
  formatTargets,
  parseTargets,
  wrapContext,
} from './context';

export { DescriptorArgs, formatDescriptor, parseDescriptor } from './descriptor';
export type { Descriptor } from './descriptor';

export {
  DEFAULT_EXTENSIONS,
  buildExtension,
  extensionResolver,
  resolveExtensionJSON,
} from './extensions';
export type { ExtensionFactory, ExtensionRegistry } from './extensions';

// ============================================================================
// Errors
// ============================================================================

export {
  QcisError,
  UnknownGateError,
  UnknownOpcodeError,
  MissingCouplerError,
  UnknownExtensionError,
  UnmappedQubitError,
  TargetCountError,
  UnconvertibleOperationError,
  UnrecognizedInstructionError,
  NotYetSupportedError,
  MalformedContextError,
  MalformedDescriptorError,
  InvalidPulseAxisError,
  InvalidPulseCountError,
  InvalidDurationError,
  DurationExceededError,
} from './errors';
export type { QcisErrorCode } from './errors';

// ============================================================================
// Version Info
// ============================================================================

export const VERSION = '0.1.0';
