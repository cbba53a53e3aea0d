/**
 * Tests for the extension registry and JSON loading
 */

import { describe, it, expect } from 'vitest';
import { Circuit, type CircuitJSON, X, gridRect, on } from '@qcis-bridge/circuit-core';
import { CPMG, XY, XYYX } from '../dynamical-decoupling';
import { MalformedDescriptorError, UnknownExtensionError } from '../errors';
import { buildExtension, extensionResolver, resolveExtensionJSON } from '../extensions';

const [q0, q1] = gridRect(1, 2);

describe('buildExtension', () => {
  it('rebuilds each built-in gate from its own descriptor', () => {
    for (const gate of [new CPMG(2, 1000, 40, 'Y'), new XY(3, 2000), new XYYX(1, 500, 25)]) {
      const rebuilt = buildExtension(gate.descriptor());
      expect(rebuilt.name).toBe(gate.name);
      expect(gate.equals(rebuilt)).toBe(true);
    }
  });

  it('accepts positional arguments', () => {
    expect(new XYYX(1, 500).equals(buildExtension('XYYX(1, 500)'))).toBe(true);
  });

  it('rejects unexpected arguments', () => {
    expect(() => buildExtension('CPMG(2, 1000, foo=1)')).toThrow(MalformedDescriptorError);
    expect(() => buildExtension('CPMG(2, 1000, foo=1)')).toThrow('unexpected argument foo');
    expect(() => buildExtension("XY(num_xy_pair='2', total_duration_ns=1000)")).toThrow(
      'argument num_xy_pair must be a number'
    );
  });

  it('only builds registered names', () => {
    expect(() => buildExtension('toString()')).toThrow(UnknownExtensionError);
    expect(() => buildExtension('CPMG(2, 1000)', {})).toThrow('Extension gate CPMG is not registered.');
  });
});

describe('JSON', () => {
  it('restores built-in gates', () => {
    const circuit = new Circuit([[on(new CPMG(2, 1000), q0), on(X, q1)], [on(new XY(1, 400), q1)]]);
    const json: CircuitJSON = JSON.parse(JSON.stringify(circuit.toJSON()));
    expect(Circuit.fromJSON(json, resolveExtensionJSON).equals(circuit)).toBe(true);
  });

  it('leaves unregistered gates unresolved', () => {
    const json = new Circuit([[on(new CPMG(2, 1000), q0)]]).toJSON();
    expect(() => Circuit.fromJSON(json, extensionResolver({}))).toThrow(
      "Cannot resolve extension gate 'CPMG' from JSON"
    );
  });
});
