/**
 * Context blocks
 *
 * Extension gates are written between a start and an end marker, preceded
 * by two metadata comments that allow the gate to be rebuilt:
 *
 * ```text
 * # CIRQ_CONTEXT_START
 * # Gate: CPMG(num_pi_pair=2, total_duration_ns=1000, single_pi_gate_duration_ns=50, pi_gate='X')
 * # Targets: ['Q00']
 * I Q00 100
 * X Q00
 * ...
 * # CIRQ_CONTEXT_END
 * ```
 */

import type { ExtensionGate } from '@qcis-bridge/circuit-core';
import { formatDescriptor } from './descriptor';

export const CONTEXT_START = '# CIRQ_CONTEXT_START';
export const CONTEXT_END = '# CIRQ_CONTEXT_END';
export const GATE_PREFIX = '# Gate: ';
export const TARGETS_PREFIX = '# Targets: ';

/**
 * Descriptor string of an extension gate
 */
export function describeGate(gate: ExtensionGate): string {
  return formatDescriptor(gate.name, gate.params());
}

/**
 * Render a target list as a quoted list, e.g. `['Q01', 'Q02']`
 */
export function formatTargets(targets: readonly string[]): string {
  return `[${targets.map((t) => `'${t}'`).join(', ')}]`;
}

/**
 * Extract quoted names from a target list
 */
export function parseTargets(text: string): string[] {
  return [...text.matchAll(/'([^']*)'|"([^"]*)"/g)].map((m) => m[1] ?? m[2]);
}

/**
 * Emit an extension gate on resolved targets, wrapped in a context block
 */
export function wrapContext(gate: ExtensionGate, targets: readonly string[]): string {
  return [
    CONTEXT_START,
    `${GATE_PREFIX}${describeGate(gate)}`,
    `${TARGETS_PREFIX}${formatTargets(targets)}`,
    gate.emit(targets),
    CONTEXT_END,
  ].join('\n');
}
