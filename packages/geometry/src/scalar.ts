export const FLOAT_LIMIT = 0.000001;

export function nearlyEqual(a: number, b: number, epsilon = FLOAT_LIMIT): boolean {
  return Math.abs(a - b) < epsilon;
}

/** Shortest decimal that rounds back to the same 32-bit float. */
export function formatFloat32(value: number): string {
  if (!Number.isFinite(value)) return String(value);
  for (let precision = 1; precision <= 9; precision++) {
    const candidate = Number(value.toPrecision(precision));
    if (Math.fround(candidate) === value) return String(candidate);
  }
  return String(value);
}
