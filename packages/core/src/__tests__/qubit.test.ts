/**
 * Tests for qubit identifiers
 */

import { describe, it, expect } from 'vitest';
import {
  compareQubits,
  gridQubit,
  gridRect,
  lineQubit,
  namedQubit,
  qubitKey,
  qubitsEqual,
  sortQubits,
} from '../qubit';

describe('Qubit Keys', () => {
  it('formats each variant', () => {
    expect(qubitKey(gridQubit(0, 1))).toBe('q(0, 1)');
    expect(qubitKey(lineQubit(3))).toBe('q(3)');
    expect(qubitKey(namedQubit('Q01'))).toBe('Q01');
  });

  it('compares by kind as well as key', () => {
    expect(qubitsEqual(gridQubit(2, 3), gridQubit(2, 3))).toBe(true);
    expect(qubitsEqual(gridQubit(2, 3), gridQubit(3, 2))).toBe(false);
    expect(qubitsEqual(namedQubit('q(1)'), lineQubit(1))).toBe(false);
  });
});

describe('Grid Rectangles', () => {
  it('builds qubits row by row', () => {
    expect(gridRect(2, 2)).toEqual([
      gridQubit(0, 0),
      gridQubit(0, 1),
      gridQubit(1, 0),
      gridQubit(1, 1),
    ]);
  });

  it('returns nothing for an empty rectangle', () => {
    expect(gridRect(0, 3)).toEqual([]);
  });
});

describe('Qubit Ordering', () => {
  it('orders line, then grid, then named qubits', () => {
    const sorted = sortQubits([
      namedQubit('a'),
      gridQubit(1, 0),
      lineQubit(2),
      gridQubit(0, 1),
      lineQubit(0),
    ]);
    expect(sorted.map(qubitKey)).toEqual(['q(0)', 'q(2)', 'q(0, 1)', 'q(1, 0)', 'a']);
  });

  it('does not mutate its input', () => {
    const input = [lineQubit(1), lineQubit(0)];
    sortQubits(input);
    expect(input).toEqual([lineQubit(1), lineQubit(0)]);
  });

  it('orders named qubits by name', () => {
    expect(compareQubits(namedQubit('Q02'), namedQubit('Q01'))).toBeGreaterThan(0);
    expect(compareQubits(namedQubit('Q01'), namedQubit('Q01'))).toBe(0);
  });
});
