import { formatFloat32, nearlyEqual } from "./scalar.js";

export interface Vector {
  readonly x: number;
  readonly y: number;
}

// Plain frozen { x, y } values with 32-bit float components.
export const Vector = {
  of: (x: number, y: number): Vector => Object.freeze({ x: Math.fround(x), y: Math.fround(y) }),

  // Integer inputs: fractional parts are dropped before conversion.
  ofInt: (x: number, y: number): Vector => Vector.of(Math.trunc(x), Math.trunc(y)),

  zero: (): Vector => Vector.of(0, 0),

  xAxis: (): Vector => Vector.of(1, 0),

  yAxis: (): Vector => Vector.of(0, 1),

  one: (): Vector => Vector.of(1, 1),

  negate: (v: Vector): Vector => Vector.of(-v.x, -v.y),

  add: (a: Vector, b: Vector): Vector => Vector.of(a.x + b.x, a.y + b.y),

  sub: (a: Vector, b: Vector): Vector => Vector.add(a, Vector.negate(b)),

  scale: (v: Vector, s: number): Vector => Vector.of(v.x * s, v.y * s),

  divide: (v: Vector, s: number): Vector => Vector.of(v.x / s, v.y / s),

  // Component-wise (Hadamard) product
  times: (a: Vector, b: Vector): Vector => Vector.of(a.x * b.x, a.y * b.y),

  dot: (a: Vector, b: Vector): number => a.x * b.x + a.y * b.y,

  cross: (a: Vector, b: Vector): number => a.x * b.y - a.y * b.x, // 2D Cross Product (Scalar)

  lengthSquared: (v: Vector): number => v.x * v.x + v.y * v.y,

  length: (v: Vector): number => Math.sqrt(Vector.lengthSquared(v)),

  // No zero-length guard: the zero vector normalizes to (NaN, NaN).
  normalized: (v: Vector): Vector => Vector.divide(v, Vector.length(v)),

  xComponent: (v: Vector): Vector => Vector.of(v.x, 0),

  yComponent: (v: Vector): Vector => Vector.of(0, v.y),

  reciprocal: (v: Vector): Vector => Vector.of(1 / v.x, 1 / v.y),

  /**
   * Clamps each component into `[min, max]` as `min(max, max(min, value))`.
   * With crossed bounds on an axis the upper bound wins.
   */
  clamp: (v: Vector, min: Vector, max: Vector): Vector =>
    Vector.of(Math.min(max.x, Math.max(min.x, v.x)), Math.min(max.y, Math.max(min.y, v.y))),

  /**
   * Approximate equality: each component must differ by strictly less than
   * `FLOAT_LIMIT` (1e-6). Not transitive for values near the tolerance.
   */
  equals: (a: Vector, b: Vector): boolean => nearlyEqual(a.x, b.x) && nearlyEqual(a.y, b.y),

  format: (v: Vector): string => `<${formatFloat32(v.x)}, ${formatFloat32(v.y)}>`,
};
