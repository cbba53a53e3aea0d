/**
 * Tests for text diagrams
 */

import { describe, it, expect } from 'vitest';
import { Circuit } from '../circuit';
import { CZ, X, type ExtensionGate, pow } from '../gates';
import { measure, on, subcircuit } from '../operation';
import { lineQubit } from '../qubit';

const q0 = lineQubit(0);
const q1 = lineQubit(1);

describe('Text Diagram', () => {
  it('draws one row per qubit and one column per moment', () => {
    const circuit = new Circuit().appendMoment(on(pow(X, 0.5), q0)).appendMoment(on(CZ, q0, q1));
    expect(circuit.toTextDiagram({ useUnicode: false })).toBe(
      ['q(0): ---X^0.5---@---', `q(1): ${'-'.repeat(11)}@---`].join('\n')
    );
  });

  it('uses box-drawing wires by default', () => {
    const circuit = new Circuit([[on(X, q0)]]);
    expect(circuit.toTextDiagram()).toBe('q(0): ───X───');
  });

  it('skips empty moments', () => {
    const circuit = new Circuit([[], [on(X, q0)], []]);
    expect(circuit.toTextDiagram({ useUnicode: false })).toBe('q(0): ---X---');
  });

  it('labels measurements and sub-circuits', () => {
    const inner = new Circuit([[on(X, q1)]], 'inner');
    const circuit = new Circuit([[measure([q0], 'm'), subcircuit(inner, 3)]]);
    expect(circuit.toTextDiagram({ useUnicode: false })).toBe(
      ["q(0): ---M('m')------", 'q(1): ---[inner]x3---'].join('\n')
    );
  });

  it('uses the label of extension gates', () => {
    const gate: ExtensionGate = {
      type: 'extension',
      name: 'Wait',
      numQubits: 1,
      params: () => ({}),
      label: () => 'WAIT',
      emit: () => '',
    };
    expect(new Circuit([[on(gate, q0)]]).toTextDiagram({ useUnicode: false })).toBe('q(0): ---WAIT---');
  });

  it('returns an empty string for a circuit without qubits', () => {
    expect(new Circuit().toTextDiagram()).toBe('');
  });
});
