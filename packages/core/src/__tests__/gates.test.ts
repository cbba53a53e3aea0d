/**
 * Tests for gate definitions
 */

import { describe, it, expect } from 'vitest';
import {
  CNOT,
  CZ,
  H,
  X,
  Y,
  annotation,
  asymmetricDepolarize,
  canonicalExponent,
  depolarize,
  gateLabel,
  gateNumQubits,
  gatesEqual,
  isPowGate,
  measurement,
  pow,
} from '../gates';

describe('Gate Powers', () => {
  it('multiplies exponents', () => {
    expect(pow(X, 0.5)).toEqual({ type: 'x', exponent: 0.5 });
    expect(pow(pow(X, 0.5), -1)).toEqual({ type: 'x', exponent: -0.5 });
  });

  it('leaves the base gate untouched', () => {
    pow(Y, 0.5);
    expect(Y.exponent).toBe(1);
  });
});

describe('Gate Factories', () => {
  it('creates measurement gates', () => {
    expect(measurement('m', 2)).toEqual({ type: 'measure', key: 'm', numQubits: 2 });
    expect(() => measurement('m', 0)).toThrow('Measurement must act on at least one qubit');
  });

  it('validates depolarizing probability', () => {
    expect(depolarize(0.01).p).toBe(0.01);
    expect(() => depolarize(1.5)).toThrow('Depolarizing probability 1.5 out of range [0, 1]');
  });

  it('validates asymmetric error rates', () => {
    expect(asymmetricDepolarize(0.1, 0.2, 0.3).pz).toBe(0.3);
    expect(() => asymmetricDepolarize(0.5, 0.5, 0.5)).toThrow('Invalid Pauli error rates (0.5, 0.5, 0.5)');
  });

  it('copies annotation arguments', () => {
    const args = [1, 2];
    const gate = annotation('shift_coords', 0, args);
    args.push(3);
    expect(gate.args).toEqual([1, 2]);
  });
});

describe('Gate Queries', () => {
  it('reports qubit counts', () => {
    expect(gateNumQubits(H)).toBe(1);
    expect(gateNumQubits(CZ)).toBe(2);
    expect(gateNumQubits(measurement('m', 3))).toBe(3);
    expect(gateNumQubits(annotation('detector'))).toBe(0);
    expect(gateNumQubits(asymmetricDepolarize(0, 0, 0))).toBe(1);
  });

  it('compares gates structurally', () => {
    expect(gatesEqual(pow(X, 0.5), pow(X, 0.5))).toBe(true);
    expect(gatesEqual(pow(X, 0.5), pow(X, -0.5))).toBe(false);
    expect(gatesEqual(X, Y)).toBe(false);
    expect(gatesEqual(CZ, CNOT)).toBe(false);
    expect(gatesEqual(measurement('a'), measurement('a'))).toBe(true);
    expect(gatesEqual(measurement('a'), measurement('b'))).toBe(false);
    expect(gatesEqual(annotation('detector', 0, [1]), annotation('detector', 0, [1]))).toBe(true);
    expect(gatesEqual(annotation('detector', 0, [1]), annotation('observable', 0, [1]))).toBe(false);
  });

  it('compares exponents modulo the gate period', () => {
    expect(gatesEqual(pow(X, -1), X)).toBe(true);
    expect(gatesEqual(pow(X, 1.5), pow(X, -0.5))).toBe(true);
    expect(gatesEqual(pow(CZ, 3), CZ)).toBe(true);
    expect(gatesEqual(pow(X, 2), pow(X, 0))).toBe(true);
    expect(gatesEqual(pow(X, 1.5), pow(X, 0.5))).toBe(false);
  });

  it('folds exponents into (-1, 1]', () => {
    expect(canonicalExponent(1)).toBe(1);
    expect(canonicalExponent(-1)).toBe(1);
    expect(canonicalExponent(1.5)).toBe(-0.5);
    expect(canonicalExponent(-1.5)).toBe(0.5);
    expect(canonicalExponent(0.25)).toBe(0.25);
    expect(canonicalExponent(-2)).toBe(0);
  });

  it('recognizes gates with exponents', () => {
    expect(isPowGate(CNOT)).toBe(true);
    expect(isPowGate(measurement('m'))).toBe(false);
  });
});

describe('Gate Labels', () => {
  it('labels rotations with their exponent', () => {
    expect(gateLabel(X)).toBe('X');
    expect(gateLabel(pow(Y, -0.5))).toBe('Y^-0.5');
  });

  it('labels controlled gates per position', () => {
    expect(gateLabel(CZ, 0)).toBe('@');
    expect(gateLabel(CZ, 1)).toBe('@');
    expect(gateLabel(CNOT, 0)).toBe('@');
    expect(gateLabel(CNOT, 1)).toBe('X');
  });

  it('labels measurement, noise and annotations', () => {
    expect(gateLabel(measurement('m', 2), 0)).toBe("M('m')");
    expect(gateLabel(measurement('m', 2), 1)).toBe('M');
    expect(gateLabel(depolarize(0.01))).toBe('D(0.01)');
    expect(gateLabel(asymmetricDepolarize(0.1, 0.2, 0.3))).toBe('A(0.1,0.2,0.3)');
    expect(gateLabel(annotation('detector'))).toBe('DETECTOR');
  });
});
