/**
 * Tests for operations, moments and the Circuit class
 */

import { describe, it, expect } from 'vitest';
import { Circuit, type CircuitJSON } from '../circuit';
import { CNOT, CZ, X, Y, type ExtensionGate, depolarize, pow } from '../gates';
import { Moment } from '../moment';
import { describeOperation, measure, on, operationsEqual, subcircuit } from '../operation';
import { gridQubit, gridRect, lineQubit, qubitKey } from '../qubit';

const [q0, q1, q2] = gridRect(1, 3);

function bellCircuit(): Circuit {
  return new Circuit()
    .appendMoment(on(pow(Y, 0.5), q0), on(pow(Y, -0.5), q1))
    .appendMoment(on(CZ, q0, q1))
    .appendMoment(on(pow(Y, 0.5), q1))
    .appendMoment(measure([q0, q1]));
}

const idleGate: ExtensionGate = {
  type: 'extension',
  name: 'Idle',
  numQubits: 1,
  params: () => ({ ns: 20 }),
  label: () => 'IDLE',
  emit: (targets) => `I ${targets[0]} 20`,
};

describe('Operations', () => {
  it('checks gate arity', () => {
    expect(() => on(CZ, q0)).toThrow('Gate cz acts on 2 qubit(s) but got 1');
    expect(() => on(X, q0, q1)).toThrow('Gate x acts on 1 qubit(s) but got 2');
  });

  it('requires distinct qubits', () => {
    expect(() => on(CZ, q0, q0)).toThrow('All qubits must be different');
  });

  it('keys measurements by their qubits by default', () => {
    const op = measure([q0, q1]);
    expect(op.gate).toEqual({ type: 'measure', key: 'q(0, 0),q(0, 1)', numQubits: 2 });
    expect(measure([q0], 'result').gate).toEqual({ type: 'measure', key: 'result', numQubits: 1 });
  });

  it('compares qubits in order', () => {
    expect(operationsEqual(on(CZ, q0, q1), on(CZ, q0, q1))).toBe(true);
    expect(operationsEqual(on(CZ, q0, q1), on(CZ, q1, q0))).toBe(false);
  });

  it('rejects non-positive repetitions', () => {
    expect(() => subcircuit(bellCircuit(), 0)).toThrow('Repetitions must be a positive integer');
    expect(() => subcircuit(bellCircuit(), 1.5)).toThrow('Repetitions must be a positive integer');
  });

  it('describes operations', () => {
    expect(describeOperation(on(CNOT, gridQubit(0, 1), gridQubit(0, 2)))).toBe('cnot(q(0, 1), q(0, 2))');
    expect(describeOperation(on(pow(X, 0.5), q0))).toBe('x**0.5(q(0, 0))');
    expect(describeOperation(on(idleGate, q0))).toBe('Idle(q(0, 0))');
    expect(describeOperation(subcircuit(bellCircuit(), 3))).toBe('CircuitOperation(4 moments, repetitions=3)');
  });
});

describe('Moments', () => {
  it('rejects overlapping operations', () => {
    expect(() => new Moment([on(X, q0), on(Y, q0)])).toThrow(
      'Overlapping operations on qubit q(0, 0) in the same moment'
    );
    expect(() => new Moment([on(X, q0)]).with(on(CZ, q1, q0))).toThrow(
      'Overlapping operations on qubit q(0, 0) in the same moment'
    );
  });

  it('counts sub-circuit qubits as occupied', () => {
    const inner = new Circuit([[on(X, q0)]]);
    expect(() => new Moment([subcircuit(inner), on(Y, q0)])).toThrow();
  });

  it('compares without regard to order', () => {
    const a = new Moment([on(X, q0), on(Y, q1)]);
    const b = new Moment([on(Y, q1), on(X, q0)]);
    expect(a.equals(b)).toBe(true);
    expect(a.equals(new Moment([on(X, q0)]))).toBe(false);
  });

  it('reports the qubits it operates on', () => {
    const moment = new Moment([on(CZ, q0, q1)]);
    expect(moment.operatesOn([q2])).toBe(false);
    expect(moment.operatesOn([q2, q1])).toBe(true);
    expect(new Moment().isEmpty).toBe(true);
  });
});

describe('Circuit Building', () => {
  it('places appended operations in the earliest free moment', () => {
    const circuit = new Circuit().append(on(X, q0), on(X, q1), on(CZ, q0, q1), on(X, q2));
    expect(circuit.length).toBe(2);
    expect(circuit.moments[0].length).toBe(3);
    expect(circuit.moments[1].equals(new Moment([on(CZ, q0, q1)]))).toBe(true);
  });

  it('never moves an operation before a moment on its qubits', () => {
    const circuit = new Circuit().appendMoment().appendMoment(on(X, q0)).append(on(Y, q1));
    expect(circuit.moments[0].equals(new Moment([on(Y, q1)]))).toBe(true);
    circuit.append(on(Y, q0));
    expect(circuit.length).toBe(3);
  });

  it('keeps moment boundaries on concat', () => {
    const circuit = new Circuit([[on(X, q0)]]).concat(new Circuit([[], [on(Y, q1)]]));
    expect(circuit.length).toBe(3);
    expect(circuit.moments[1].isEmpty).toBe(true);
  });

  it('lists every qubit once, sorted', () => {
    const circuit = new Circuit([[on(X, q2)], [on(CZ, q1, q0)]]);
    expect(circuit.allQubits().map(qubitKey)).toEqual(['q(0, 0)', 'q(0, 1)', 'q(0, 2)']);
  });

  it('maps qubits into a new circuit', () => {
    const circuit = bellCircuit();
    const mapped = circuit.transformQubits((q) => (q.kind === 'grid' ? lineQubit(q.col) : q));
    expect(mapped.allQubits()).toEqual([lineQubit(0), lineQubit(1)]);
    expect(circuit.allQubits()).toEqual([q0, q1]);
  });

  it('compares moment by moment', () => {
    expect(bellCircuit().equals(bellCircuit())).toBe(true);
    expect(new Circuit([[on(X, q0)]]).equals(new Circuit([[], [on(X, q0)]]))).toBe(false);
  });
});

describe('Circuit Statistics', () => {
  it('computes Bell circuit stats', () => {
    expect(bellCircuit().getStats()).toEqual({
      numQubits: 2,
      depth: 4,
      totalOperations: 5,
      singleQubitGates: 3,
      twoQubitGates: 1,
      measurements: 1,
      subcircuits: 0,
      gateBreakdown: { y: 3, cz: 1, measure: 1 },
    });
  });

  it('skips empty moments in depth and names extension gates', () => {
    const stats = new Circuit([[], [on(idleGate, q0), subcircuit(new Circuit([[on(X, q1)]]), 2)]]).getStats();
    expect(stats.depth).toBe(1);
    expect(stats.subcircuits).toBe(1);
    expect(stats.gateBreakdown).toEqual({ Idle: 1 });
  });
});

describe('Circuit Serialization', () => {
  it('round-trips standard gates through JSON', () => {
    const circuit = new Circuit(
      [[on(depolarize(0.01), q2)], [subcircuit(bellCircuit(), 2)]],
      'noisy'
    );
    const json: CircuitJSON = JSON.parse(JSON.stringify(circuit.toJSON()));
    const restored = Circuit.fromJSON(json);
    expect(restored.name).toBe('noisy');
    expect(restored.equals(circuit)).toBe(true);
  });

  it('writes extension gates by name and parameters', () => {
    const json = new Circuit([[on(idleGate, q0)]]).toJSON();
    expect(json.moments[0][0]).toEqual({
      kind: 'gate',
      gate: { type: 'extension', name: 'Idle', numQubits: 1, params: { ns: 20 } },
      qubits: [q0],
    });
  });

  it('checks operations read from JSON', () => {
    const json = new Circuit([[subcircuit(new Circuit([[on(X, q0)]]), 2)], [on(CZ, q0, q1)]]).toJSON();
    const [[repeated], [cz]] = json.moments;
    if (repeated.kind !== 'circuit' || cz.kind !== 'gate') {
      throw new Error('unexpected operation kinds');
    }
    const zeroRepetitions: CircuitJSON = { moments: [[{ ...repeated, repetitions: 0 }]] };
    expect(() => Circuit.fromJSON(zeroRepetitions)).toThrow('Repetitions must be a positive integer');
    const sameQubit: CircuitJSON = { moments: [[{ ...cz, qubits: [q0, q0] }]] };
    expect(() => Circuit.fromJSON(sameQubit)).toThrow('All qubits must be different');
    const missingQubit: CircuitJSON = { moments: [[{ ...cz, qubits: [q0] }]] };
    expect(() => Circuit.fromJSON(missingQubit)).toThrow('Gate cz acts on 2 qubit(s) but got 1');
  });

  it('needs a resolver for extension gates', () => {
    const json = new Circuit([[on(idleGate, q0)]]).toJSON();
    expect(() => Circuit.fromJSON(json)).toThrow("Cannot resolve extension gate 'Idle' from JSON");
    const restored = Circuit.fromJSON(json, (gate) => (gate.name === 'Idle' ? idleGate : undefined));
    expect(restored.operations).toEqual([on(idleGate, q0)]);
  });
});
