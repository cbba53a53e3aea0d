/**
 * Plain-text circuit diagrams
 *
 * One row per qubit, one column per non-empty moment.
 */

import type { Circuit } from './circuit';
import { gateLabel } from './gates';
import { qubitKey } from './qubit';

export interface TextDiagramOptions {
  /**
   * Draw wires with box-drawing characters (default: true)
   */
  useUnicode?: boolean;
}

const DEFAULT_OPTIONS: Required<TextDiagramOptions> = {
  useUnicode: true,
};

/**
 * Render a circuit as text
 *
 * @example
 * ```text
 * q(0): ───X^0.5───@───
 * q(1): ───────────@───
 * ```
 */
export function renderTextDiagram(circuit: Circuit, options?: TextDiagramOptions): string {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const wire = opts.useUnicode ? '─' : '-';
  const qubits = circuit.allQubits();
  if (qubits.length === 0) {
    return '';
  }

  const rowKeys = qubits.map(qubitKey);
  const columns: Map<string, string>[] = [];

  for (const moment of circuit.moments) {
    if (moment.isEmpty) continue;
    const cells = new Map<string, string>();
    for (const op of moment.operations) {
      if (op.kind === 'gate') {
        op.qubits.forEach((q, i) => cells.set(qubitKey(q), gateLabel(op.gate, i)));
      } else {
        const reps = op.repetitions > 1 ? `x${op.repetitions}` : '';
        const label = `[${op.circuit.name ?? 'circuit'}]${reps}`;
        for (const q of op.circuit.allQubits()) {
          cells.set(qubitKey(q), label);
        }
      }
    }
    columns.push(cells);
  }

  const labelWidth = Math.max(...rowKeys.map((k) => k.length));
  const spacer = wire.repeat(3);

  return rowKeys
    .map((key) => {
      const parts = columns.map((cells) => {
        const width = Math.max(...[...cells.values()].map((c) => c.length));
        return (cells.get(key) ?? '').padEnd(width, wire);
      });
      return `${`${key}:`.padEnd(labelWidth + 1)} ${spacer}${parts.join(spacer)}${spacer}`;
    })
    .join('\n');
}
