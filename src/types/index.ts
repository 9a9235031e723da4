/**
 * Core type definitions for the rotation library
 */

// =============================================================================
// VECTOR TYPES
// =============================================================================

/** 3D Vector representation (immutable) */
export interface Vector3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/**
 * Rigid transform: a position plus an orthonormal rotation basis.
 * The basis is stored as matrix columns (right, up, back).
 */
export interface RigidTransform {
  readonly position: Vector3;
  readonly right: Vector3;
  readonly up: Vector3;
  readonly back: Vector3;
}

// =============================================================================
// ROTATION TYPES
// =============================================================================

/** Euler rotation order tag. Letters name the axes in application order. */
export type RotationOrder = "XYZ" | "XZY" | "YXZ" | "YZX" | "ZXY" | "ZYX";

/** All supported rotation orders */
export const ROTATION_ORDERS: readonly RotationOrder[] = [
  "XYZ",
  "XZY",
  "YXZ",
  "YZX",
  "ZXY",
  "ZYX",
];

/** Euler angles in radians, one per axis */
export interface EulerAngles {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/** Axis-angle decomposition of a rotation */
export interface AxisAngle {
  readonly axis: Vector3;
  readonly angle: number; // Radians
}

/**
 * Row-major 3x3 rotation matrix:
 * m00, m01, m02, m10, m11, m12, m20, m21, m22
 */
// biome-ignore format: matrix rows
export type Matrix3 = readonly [
  number, number, number,
  number, number, number,
  number, number, number,
];

/** Rotation matrix as its three columns */
export interface MatrixVectors {
  readonly right: Vector3; // (m00, m10, m20)
  readonly up: Vector3; // (m01, m11, m21)
  readonly back: Vector3; // (m02, m12, m22)
}

// =============================================================================
// OPERAND TYPES
// =============================================================================

/** Kinds of value the polymorphic operators distinguish */
export type OperandKind =
  | "Quaternion"
  | "number"
  | "Vector3"
  | "RigidTransform"
  | "unknown";
