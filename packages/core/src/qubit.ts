/**
 * Qubit identifiers.
 *
 * Qubits are plain immutable values. Every variant has a stable string
 * key, so qubits can be used as map keys and compared cheaply.
 */

/**
 * Qubit on a 2D grid, addressed by row and column
 */
export interface GridQubit {
  readonly kind: 'grid';
  readonly row: number;
  readonly col: number;
}

/**
 * Qubit on a line, addressed by index
 */
export interface LineQubit {
  readonly kind: 'line';
  readonly index: number;
}

/**
 * Qubit addressed by an arbitrary name
 */
export interface NamedQubit {
  readonly kind: 'named';
  readonly name: string;
}

/**
 * Union of all qubit variants
 */
export type Qubit = GridQubit | LineQubit | NamedQubit;

/**
 * Create a grid qubit
 */
export function gridQubit(row: number, col: number): GridQubit {
  return { kind: 'grid', row, col };
}

/**
 * Create a rectangle of grid qubits, row by row
 */
export function gridRect(rows: number, cols: number): GridQubit[] {
  const qubits: GridQubit[] = [];
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      qubits.push(gridQubit(r, c));
    }
  }
  return qubits;
}

/**
 * Create a line qubit
 */
export function lineQubit(index: number): LineQubit {
  return { kind: 'line', index };
}

/**
 * Create a named qubit
 */
export function namedQubit(name: string): NamedQubit {
  return { kind: 'named', name };
}

/**
 * Stable string key, also used as the qubit's display label
 *
 * @example
 * ```typescript
 * qubitKey(gridQubit(0, 1)); // 'q(0, 1)'
 * qubitKey(lineQubit(3));    // 'q(3)'
 * qubitKey(namedQubit('Q01')); // 'Q01'
 * ```
 */
export function qubitKey(qubit: Qubit): string {
  switch (qubit.kind) {
    case 'grid':
      return `q(${qubit.row}, ${qubit.col})`;
    case 'line':
      return `q(${qubit.index})`;
    case 'named':
      return qubit.name;
  }
}

/**
 * Check two qubits for equality
 */
export function qubitsEqual(a: Qubit, b: Qubit): boolean {
  return qubitKey(a) === qubitKey(b) && a.kind === b.kind;
}

const KIND_ORDER: Record<Qubit['kind'], number> = {
  line: 0,
  grid: 1,
  named: 2,
};

/**
 * Total order over qubits: line, then grid, then named qubits
 */
export function compareQubits(a: Qubit, b: Qubit): number {
  if (a.kind !== b.kind) {
    return KIND_ORDER[a.kind] - KIND_ORDER[b.kind];
  }
  if (a.kind === 'line' && b.kind === 'line') {
    return a.index - b.index;
  }
  if (a.kind === 'grid' && b.kind === 'grid') {
    return a.row - b.row || a.col - b.col;
  }
  const ka = qubitKey(a);
  const kb = qubitKey(b);
  return ka < kb ? -1 : ka > kb ? 1 : 0;
}

/**
 * Sort qubits by {@link compareQubits} without mutating the input
 */
export function sortQubits(qubits: Iterable<Qubit>): Qubit[] {
  return [...qubits].sort(compareQubits);
}
