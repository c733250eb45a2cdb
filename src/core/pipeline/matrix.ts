import type { ScalarValue } from "./expressions";

export type MatrixCombo = Record<string, ScalarValue>;

export interface MatrixSpec {
  axes: Record<string, ScalarValue[]>;
  include: MatrixCombo[];
  exclude: MatrixCombo[];
}

export const EMPTY_MATRIX: MatrixSpec = { axes: {}, include: [], exclude: [] };

/**
 * Cartesian product of the axes in declaration order, minus combinations
 * matching an `exclude` entry, plus the `include` entries.
 */
export function expandMatrix(matrix: MatrixSpec = EMPTY_MATRIX): MatrixCombo[] {
  const keys = Object.keys(matrix.axes);
  let combos: MatrixCombo[] = keys.length ? [{}] : [];
  for (const key of keys) {
    const next: MatrixCombo[] = [];
    for (const combo of combos) {
      for (const value of matrix.axes[key]) next.push({ ...combo, [key]: value });
    }
    combos = next;
  }
  combos = combos.filter(
    (combo) => !matrix.exclude.some((ex) => matches(combo, ex)),
  );
  for (const inc of matrix.include) {
    const axisPart: MatrixCombo = {};
    const extra: MatrixCombo = {};
    for (const [k, v] of Object.entries(inc)) {
      if (k in matrix.axes) axisPart[k] = v;
      else extra[k] = v;
    }
    // an include that adds keys extends the combinations it matches
    const targets =
      Object.keys(axisPart).length && Object.keys(extra).length
        ? combos.filter((combo) => matches(combo, axisPart))
        : [];
    if (targets.length) {
      for (const combo of targets) Object.assign(combo, extra);
    } else if (!combos.some((combo) => sameCombo(combo, inc))) {
      combos.push({ ...inc });
    }
  }
  return keys.length || matrix.include.length ? combos : [{}];
}

export function matches(combo: MatrixCombo, partial: MatrixCombo): boolean {
  return Object.entries(partial).every(([k, v]) => combo[k] === v);
}

function sameCombo(a: MatrixCombo, b: MatrixCombo): boolean {
  return (
    Object.keys(a).length === Object.keys(b).length && matches(a, b)
  );
}

/** Label used in job names: values in key order, e.g. `3.8, ubuntu`. */
export function describeCombo(combo: MatrixCombo): string {
  return Object.values(combo).map(String).join(", ");
}
