/**
 * Error types raised by the translators and timing generators.
 *
 * Every error carries a stable `code` so callers can branch without
 * matching on messages.
 */

export type QcisErrorCode =
  | 'UNKNOWN_GATE'
  | 'UNKNOWN_OPCODE'
  | 'MISSING_COUPLER'
  | 'UNCONVERTIBLE_OPERATION'
  | 'UNRECOGNIZED_INSTRUCTION'
  | 'UNKNOWN_EXTENSION'
  | 'MALFORMED_CONTEXT'
  | 'MALFORMED_DESCRIPTOR'
  | 'NOT_YET_SUPPORTED'
  | 'UNMAPPED_QUBIT'
  | 'TARGET_COUNT'
  | 'INVALID_PULSE_AXIS'
  | 'INVALID_PULSE_COUNT'
  | 'INVALID_DURATION'
  | 'DURATION_EXCEEDED';

export class QcisError extends Error {
  readonly code: QcisErrorCode;

  constructor(code: QcisErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

const REMEDIES =
  'Add it to the gate table, give it a custom conversion (an extension gate), ' +
  'or add it to the ignore set.';

// ============================================================================
// Gate table
// ============================================================================

export class UnknownGateError extends QcisError {
  constructor(gate: string) {
    super('UNKNOWN_GATE', `Gate ${gate} has no QCIS opcode.`);
  }
}

export class UnknownOpcodeError extends QcisError {
  constructor(opcode: string) {
    super('UNKNOWN_OPCODE', `QCIS opcode ${opcode} has no gate.`);
  }
}

// ============================================================================
// Configuration
// ============================================================================

export class MissingCouplerError extends QcisError {
  constructor(detail: string) {
    super('MISSING_COUPLER', `Coupler ${detail} not provided.`);
  }
}

export class UnknownExtensionError extends QcisError {
  constructor(name: string) {
    super('UNKNOWN_EXTENSION', `Extension gate ${name} is not registered.`);
  }
}

export class UnmappedQubitError extends QcisError {
  constructor(qubit: string) {
    super('UNMAPPED_QUBIT', `Qubit ${qubit} has no mapping.`);
  }
}

export class TargetCountError extends QcisError {
  constructor(gate: string, expected: number, got: number) {
    super('TARGET_COUNT', `${gate} acts on ${expected} target(s), got ${got}.`);
  }
}

// ============================================================================
// Unsupported input
// ============================================================================

export class UnconvertibleOperationError extends QcisError {
  constructor(operation: string) {
    super('UNCONVERTIBLE_OPERATION', `Cannot convert operation ${operation} to QCIS. ${REMEDIES}`);
  }
}

export class UnrecognizedInstructionError extends QcisError {
  constructor(line: string, reason?: string) {
    super(
      'UNRECOGNIZED_INSTRUCTION',
      `Cannot translate QCIS instruction '${line}'${reason ? ` (${reason})` : ''}. ` +
        'Add the opcode to the gate table or its prefix to the ignored instructions.'
    );
  }
}

export class NotYetSupportedError extends QcisError {
  constructor(line: string) {
    super('NOT_YET_SUPPORTED', `QCIS instruction '${line}' is not supported outside a context block.`);
  }
}

export class MalformedContextError extends QcisError {
  constructor(reason: string) {
    super('MALFORMED_CONTEXT', `Malformed context block: ${reason}.`);
  }
}

export class MalformedDescriptorError extends QcisError {
  constructor(descriptor: string, reason: string) {
    super('MALFORMED_DESCRIPTOR', `Cannot parse gate descriptor '${descriptor}': ${reason}.`);
  }
}

// ============================================================================
// Timing validation
// ============================================================================

export class InvalidPulseAxisError extends QcisError {
  constructor(axis: string) {
    super('INVALID_PULSE_AXIS', `Pi pulse ${axis} is not supported for dynamical decoupling.`);
  }
}

export class InvalidPulseCountError extends QcisError {
  constructor(count: number, unit: string = 'pi pulses') {
    super('INVALID_PULSE_COUNT', `Number of ${unit} must be a positive integer, got ${count}.`);
  }
}

export class InvalidDurationError extends QcisError {
  constructor(name: string, ns: number) {
    super('INVALID_DURATION', `The ${name} must be a finite, non-negative number of ns, got ${ns}.`);
  }
}

export class DurationExceededError extends QcisError {
  constructor(pulses: number, pulseNs: number, totalNs: number) {
    super(
      'DURATION_EXCEEDED',
      `${pulses} pulses of ${pulseNs}ns do not fit in the total duration of ${totalNs}ns.`
    );
  }
}
