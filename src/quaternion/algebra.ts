/**
 * Quaternion algebra: arithmetic, the Hamilton product, inverse and norms.
 *
 * All functions are pure and return new values.
 */

import { EPSILON } from "@/config/quaternionConfig";
import { RotationDebugLogger } from "@/debug/RotationDebugLogger";
import { InvalidOperandError } from "@/errors";
import { Transform } from "@/math/Transform";
import { Vec3 } from "@/math/Vec3";
import type { OperandKind, RigidTransform, Vector3 } from "@/types";
import { Quaternion } from "./Quaternion";

/** Anything the polymorphic operators accept on either side */
export type Operand = Quaternion | number | Vector3 | RigidTransform;

/**
 * Classify a value for operator dispatch.
 */
export function operandKind(value: unknown): OperandKind {
  if (value instanceof Quaternion) return "Quaternion";
  if (typeof value === "number") return "number";
  if (Vec3.isVector3(value)) return "Vector3";
  if (Transform.isRigidTransform(value)) return "RigidTransform";
  return "unknown";
}

// =============================================================================
// ARITHMETIC
// =============================================================================

export function add(q0: Quaternion, q1: Quaternion): Quaternion {
  return new Quaternion(q0.x + q1.x, q0.y + q1.y, q0.z + q1.z, q0.w + q1.w);
}

export function sub(q0: Quaternion, q1: Quaternion): Quaternion {
  return new Quaternion(q0.x - q1.x, q0.y - q1.y, q0.z - q1.z, q0.w - q1.w);
}

function scale(q: Quaternion, s: number): Quaternion {
  return new Quaternion(q.x * s, q.y * s, q.z * s, q.w * s);
}

/**
 * Hamilton product q0 * q1. Not commutative.
 */
function hamilton(q0: Quaternion, q1: Quaternion): Quaternion {
  return new Quaternion(
    q0.w * q1.x + q0.x * q1.w + q0.y * q1.z - q0.z * q1.y,
    q0.w * q1.y - q0.x * q1.z + q0.y * q1.w + q0.z * q1.x,
    q0.w * q1.z + q0.x * q1.y - q0.y * q1.x + q0.z * q1.w,
    q0.w * q1.w - q0.x * q1.x - q0.y * q1.y - q0.z * q1.z
  );
}

/**
 * Rotate a vector: q v q* with q normalized and v embedded as a pure
 * imaginary quaternion.
 */
function rotateVector(q: Quaternion, v: Vector3): Vector3 {
  const unit = q.unit;
  const rotated = hamilton(hamilton(unit, new Quaternion(v.x, v.y, v.z, 0)), conjugate(unit));
  return Vec3.create(rotated.x, rotated.y, rotated.z);
}

function transformOf(q: Quaternion, position: Vector3): RigidTransform {
  const unit = q.unit;
  return Transform.fromQuaternionComponents(position, unit.x, unit.y, unit.z, unit.w);
}

/**
 * Polymorphic multiplication.
 *
 * - Quaternion * Quaternion: Hamilton product (order matters)
 * - number * Quaternion, Quaternion * number: scales every component
 * - Quaternion * Vector3: rotates the vector (quaternion is normalized first)
 * - Quaternion * RigidTransform: the quaternion's transform composed with it
 * - Vector3 * Quaternion: transform at that position with the quaternion's rotation
 *
 * Any other pair throws InvalidOperandError.
 */
export function mul(a: Quaternion, b: Quaternion): Quaternion;
export function mul(a: number, b: Quaternion): Quaternion;
export function mul(a: Quaternion, b: number): Quaternion;
export function mul(a: Quaternion, b: Vector3): Vector3;
export function mul(a: Quaternion, b: RigidTransform): RigidTransform;
export function mul(a: Vector3, b: Quaternion): RigidTransform;
export function mul(a: Operand, b: Operand): Quaternion | Vector3 | RigidTransform;
export function mul(a: unknown, b: unknown): Quaternion | Vector3 | RigidTransform {
  if (a instanceof Quaternion) {
    if (b instanceof Quaternion) return hamilton(a, b);
    if (typeof b === "number") return scale(a, b);
    if (Vec3.isVector3(b)) return rotateVector(a, b);
    if (Transform.isRigidTransform(b)) return Transform.multiply(transformOf(a, Vec3.zero()), b);
  } else if (b instanceof Quaternion) {
    if (typeof a === "number") return scale(b, a);
    if (Vec3.isVector3(a)) return transformOf(b, a);
  }
  throw new InvalidOperandError("multiply", operandKind(a), operandKind(b));
}

/**
 * Polymorphic division.
 *
 * - Quaternion / number: divides every component
 * - number / Quaternion: divides the number by each component
 * - Quaternion / Quaternion: q0 * inverse(q1)
 *
 * Any other pair throws InvalidOperandError.
 */
export function div(a: Quaternion, b: number): Quaternion;
export function div(a: number, b: Quaternion): Quaternion;
export function div(a: Quaternion, b: Quaternion): Quaternion;
export function div(a: Operand, b: Operand): Quaternion;
export function div(a: unknown, b: unknown): Quaternion {
  if (a instanceof Quaternion) {
    if (typeof b === "number") return new Quaternion(a.x / b, a.y / b, a.z / b, a.w / b);
    if (b instanceof Quaternion) return hamilton(a, inverse(b));
  } else if (typeof a === "number" && b instanceof Quaternion) {
    return new Quaternion(a / b.x, a / b.y, a / b.z, a / b.w);
  }
  throw new InvalidOperandError("divide", operandKind(a), operandKind(b));
}

/**
 * Negates all four components. Same rotation as `q` (double cover).
 */
export function negate(q: Quaternion): Quaternion {
  return new Quaternion(-q.x, -q.y, -q.z, -q.w);
}

/**
 * Raise to a real power via the polar form: magnitude^n, angle * n.
 * `q ^ 0.5` halves the rotation angle, `q ^ 2` doubles it.
 */
export function pow(q: Quaternion, n: number): Quaternion {
  const { x, y, z, w } = q;
  const im = x * x + y * y + z * z;
  const magnitude = Math.sqrt(w * w + im);
  const imMagnitude = Math.sqrt(im);
  const resultMagnitude = magnitude ** n;

  if (imMagnitude <= EPSILON * magnitude) {
    RotationDebugLogger.logFallback("pow_real_only", "pow", q.components(), `n=${n}`);
    return new Quaternion(0, 0, 0, resultMagnitude);
  }

  const angle = n * Math.atan2(imMagnitude, w);
  const s = (resultMagnitude * Math.sin(angle)) / imMagnitude;
  return new Quaternion(x * s, y * s, z * s, resultMagnitude * Math.cos(angle));
}

// =============================================================================
// CONJUGATE / INVERSE
// =============================================================================

export function conjugate(q: Quaternion): Quaternion {
  return new Quaternion(-q.x, -q.y, -q.z, q.w);
}

/**
 * conjugate(q) / lengthSquared(q). The zero quaternion yields non-finite
 * components; callers must not invert it.
 */
export function inverse(q: Quaternion): Quaternion {
  const lengthSq = lengthSquared(q);
  return new Quaternion(-q.x / lengthSq, -q.y / lengthSq, -q.z / lengthSq, q.w / lengthSq);
}

export function dot(q0: Quaternion, q1: Quaternion): number {
  return q0.x * q1.x + q0.y * q1.y + q0.z * q1.z + q0.w * q1.w;
}

// =============================================================================
// NORMS
// =============================================================================

export function length(q: Quaternion): number {
  return q.magnitude;
}

export function lengthSquared(q: Quaternion): number {
  return q.x * q.x + q.y * q.y + q.z * q.z + q.w * q.w;
}

/**
 * Length computed after scaling by the largest absolute component, so large
 * components do not overflow when squared.
 */
export function hypot(q: Quaternion): number {
  const maxComponent = Math.max(Math.abs(q.x), Math.abs(q.y), Math.abs(q.z), Math.abs(q.w));
  if (maxComponent > 0) {
    const x = q.x / maxComponent;
    const y = q.y / maxComponent;
    const z = q.z / maxComponent;
    const w = q.w / maxComponent;
    return Math.sqrt(x * x + y * y + z * z + w * w) * maxComponent;
  }
  return 0;
}

/**
 * Unit-length copy. The zero quaternion normalizes to the identity.
 */
export function normalize(q: Quaternion): Quaternion {
  return q.unit;
}

export function isUnit(q: Quaternion, epsilon = EPSILON): boolean {
  return Math.abs(1 - length(q)) < epsilon;
}

export function isNaN(q: Quaternion): boolean {
  // biome-ignore lint/suspicious/noSelfCompare: NaN is the only value not equal to itself
  return q.x !== q.x || q.y !== q.y || q.z !== q.z || q.w !== q.w;
}

// =============================================================================
// COMPARISON
// =============================================================================

export function equals(q0: Quaternion, q1: Quaternion): boolean {
  return q0.equals(q1);
}

// Ordering compares length only. It has no rotational meaning.

export function lessThan(q0: Quaternion, q1: Quaternion): boolean {
  return length(q0) < length(q1);
}

export function lessThanOrEqual(q0: Quaternion, q1: Quaternion): boolean {
  return length(q0) <= length(q1);
}

export function greaterThan(q0: Quaternion, q1: Quaternion): boolean {
  return length(q0) > length(q1);
}

export function greaterThanOrEqual(q0: Quaternion, q1: Quaternion): boolean {
  return length(q0) >= length(q1);
}
