/**
 * Constructors: axis-angle, rotation matrices, look-at, Euler angles.
 *
 * Every constructor here except `fromAxisAngleFast` and `fromVector`
 * returns a unit quaternion.
 */

import { DEFAULT_QUATERNION_OPTIONS, EPSILON } from "@/config/quaternionConfig";
import { RotationDebugLogger } from "@/debug/RotationDebugLogger";
import { Transform } from "@/math/Transform";
import { Vec3 } from "@/math/Vec3";
import type { RigidTransform, RotationOrder, Vector3 } from "@/types";
import { Quaternion } from "./Quaternion";

/** Orthonormal basis as matrix columns */
type Basis = readonly [right: Vector3, up: Vector3, back: Vector3];

// =============================================================================
// MATRIX EXTRACTION (shared)
// =============================================================================

/**
 * Gram-Schmidt style orthonormalization. Parallel inputs fall back to the
 * Y axis, then the X axis. The back column is flipped to agree with `back`.
 */
function orthonormalize(right: Vector3, up: Vector3, back: Vector3): Basis {
  const xBasis = Vec3.safeUnit(right, Vec3.X_AXIS);
  const upUnit = Vec3.safeUnit(up, Vec3.Y_AXIS);

  let zBasis = Vec3.cross(xBasis, upUnit);
  if (Vec3.length(zBasis) > EPSILON) {
    zBasis = Vec3.normalize(zBasis);
  } else {
    RotationDebugLogger.logFallback("basis_fallback", "orthonormalize", [
      xBasis.x,
      xBasis.y,
      xBasis.z,
    ]);
    zBasis = Vec3.cross(xBasis, Vec3.Y_AXIS);
    zBasis = Vec3.length(zBasis) > EPSILON ? Vec3.normalize(zBasis) : Vec3.X_AXIS;
  }

  const yBasis = Vec3.normalize(Vec3.cross(zBasis, xBasis));
  if (Vec3.dot(zBasis, back) < 0) {
    zBasis = Vec3.negate(zBasis);
  }
  return [xBasis, yBasis, zBasis];
}

/**
 * Trace-based extraction from an orthonormal basis. The four branches pick
 * the largest diagonal term so the divisor stays away from zero near 180°.
 */
function fromOrthonormalizedMatrix(right: Vector3, up: Vector3, back: Vector3): Quaternion {
  const { x: m00, y: m10, z: m20 } = right;
  const { x: m01, y: m11, z: m21 } = up;
  const { x: m02, y: m12, z: m22 } = back;

  const trace = m00 + m11 + m22;

  if (trace > 0) {
    const s = Math.sqrt(trace + 1) * 2;
    return new Quaternion((m21 - m12) / s, (m02 - m20) / s, (m10 - m01) / s, 0.25 * s);
  }
  if (m00 > m11 && m00 > m22) {
    const s = Math.sqrt(1 + m00 - m11 - m22) * 2;
    return new Quaternion(0.25 * s, (m01 + m10) / s, (m02 + m20) / s, (m21 - m12) / s);
  }
  if (m11 > m22) {
    const s = Math.sqrt(1 + m11 - m00 - m22) * 2;
    return new Quaternion((m01 + m10) / s, 0.25 * s, (m12 + m21) / s, (m02 - m20) / s);
  }
  const s = Math.sqrt(1 + m22 - m00 - m11) * 2;
  return new Quaternion((m02 + m20) / s, (m12 + m21) / s, 0.25 * s, (m10 - m01) / s);
}

// =============================================================================
// AXIS-ANGLE / VECTOR
// =============================================================================

/**
 * Rotation of `angle` radians about `axis`. The axis is normalized; a zero
 * axis is treated as the X axis.
 */
export function fromAxisAngle(axis: Vector3, angle: number): Quaternion {
  return fromAxisAngleFast(Vec3.safeUnit(axis, Vec3.X_AXIS), angle);
}

/**
 * Same as `fromAxisAngle` but assumes `axis` is already unit length.
 */
export function fromAxisAngleFast(axis: Vector3, angle: number): Quaternion {
  const halfAngle = angle / 2;
  const s = Math.sin(halfAngle);
  return new Quaternion(s * axis.x, s * axis.y, s * axis.z, Math.cos(halfAngle));
}

/**
 * Pure imaginary quaternion (v.x, v.y, v.z, 0).
 */
export function fromVector(v: Vector3): Quaternion {
  return new Quaternion(v.x, v.y, v.z, 0);
}

// =============================================================================
// MATRIX / TRANSFORM / LOOK-AT
// =============================================================================

/**
 * From the three columns of a rotation matrix.
 * @param right - (m00, m10, m20)
 * @param up - (m01, m11, m21)
 * @param back - (m02, m12, m22); defaults to right × up
 */
export function fromMatrix(right: Vector3, up: Vector3, back?: Vector3): Quaternion {
  const rightUnit = Vec3.normalize(right);
  const upUnit = Vec3.normalize(up);
  const backUnit = back ? Vec3.normalize(back) : Vec3.normalize(Vec3.cross(right, up));
  return fromOrthonormalizedMatrix(...orthonormalize(rightUnit, upUnit, backUnit));
}

/**
 * Rotation part of a rigid transform (position is ignored).
 */
export function fromTransform(transform: RigidTransform): Quaternion {
  const back = Vec3.negate(Transform.lookVector(transform));
  return fromOrthonormalizedMatrix(...orthonormalize(transform.right, transform.up, back));
}

/**
 * Rotation looking from `from` towards `target`, keeping `up` as close to the
 * local up direction as possible. Forward is -Z, as in `Transform.lookVector`.
 *
 * When the look direction is parallel to `up`, the X axis is used to build
 * the basis instead; when it is also parallel to X, the Z axis is used.
 */
export function lookAt(from: Vector3, target: Vector3, up: Vector3 = Vec3.Y_AXIS): Quaternion {
  const look = Vec3.safeUnit(Vec3.subtract(target, from), Vec3.Z_AXIS);
  const upUnit = Vec3.safeUnit(up, Vec3.Y_AXIS);

  const right = Vec3.cross(look, upUnit);
  if (Vec3.length(right) > EPSILON) {
    const rightUnit = Vec3.normalize(right);
    const upVector = Vec3.normalize(Vec3.cross(rightUnit, look));
    return fromOrthonormalizedMatrix(rightUnit, upVector, Vec3.negate(look));
  }

  RotationDebugLogger.logFallback("basis_fallback", "lookAt", [look.x, look.y, look.z]);

  const select = Vec3.cross(look, Vec3.X_AXIS);
  if (Vec3.length(select) > EPSILON) {
    const rightUnit = Vec3.normalize(select);
    const upVector = Vec3.normalize(Vec3.cross(rightUnit, look));
    return fromOrthonormalizedMatrix(rightUnit, upVector, Vec3.negate(look));
  }

  const zCrossLook = Vec3.cross(Vec3.Z_AXIS, look);
  const upVector = Vec3.scale(zCrossLook, Vec3.dot(zCrossLook, Vec3.Y_AXIS));
  const rightVector = Vec3.cross(look, upVector);
  return fromOrthonormalizedMatrix(rightVector, upVector, Vec3.negate(look));
}

// =============================================================================
// EULER ANGLES
// =============================================================================

interface HalfAngleTerms {
  readonly zCos: number;
  readonly zSin: number;
  readonly xSinyCos: number;
  readonly xCosySin: number;
  readonly xCosyCos: number;
  readonly xSinySin: number;
}

function halfAngleTerms(rx: number, ry: number, rz: number): HalfAngleTerms {
  const xCos = Math.cos(rx / 2);
  const xSin = Math.sin(rx / 2);
  const yCos = Math.cos(ry / 2);
  const ySin = Math.sin(ry / 2);
  return {
    zCos: Math.cos(rz / 2),
    zSin: Math.sin(rz / 2),
    xSinyCos: xSin * yCos,
    xCosySin: xCos * ySin,
    xCosyCos: xCos * yCos,
    xSinySin: xSin * ySin,
  };
}

/**
 * Angles in radians, composed as Rx * Ry * Rz (Z applied first).
 */
export function fromEulerAnglesXYZ(rx: number, ry: number, rz: number): Quaternion {
  const t = halfAngleTerms(rx, ry, rz);
  return new Quaternion(
    t.xSinyCos * t.zCos + t.xCosySin * t.zSin,
    t.xCosySin * t.zCos - t.xSinyCos * t.zSin,
    t.xCosyCos * t.zSin + t.xSinySin * t.zCos,
    t.xCosyCos * t.zCos - t.xSinySin * t.zSin
  );
}

/**
 * Angles in radians, composed as Rx * Rz * Ry (Y applied first).
 */
export function fromEulerAnglesXZY(rx: number, ry: number, rz: number): Quaternion {
  const t = halfAngleTerms(rx, ry, rz);
  return new Quaternion(
    t.xSinyCos * t.zCos - t.xCosySin * t.zSin,
    t.xCosySin * t.zCos - t.xSinyCos * t.zSin,
    t.xCosyCos * t.zSin + t.xSinySin * t.zCos,
    t.xCosyCos * t.zCos + t.xSinySin * t.zSin
  );
}

/**
 * Angles in radians, composed as Ry * Rx * Rz (Z applied first).
 */
export function fromEulerAnglesYXZ(rx: number, ry: number, rz: number): Quaternion {
  const t = halfAngleTerms(rx, ry, rz);
  return new Quaternion(
    t.xSinyCos * t.zCos + t.xCosySin * t.zSin,
    t.xCosySin * t.zCos - t.xSinyCos * t.zSin,
    t.xCosyCos * t.zSin - t.xSinySin * t.zCos,
    t.xCosyCos * t.zCos + t.xSinySin * t.zSin
  );
}

/**
 * Angles in radians, composed as Ry * Rz * Rx (X applied first).
 */
export function fromEulerAnglesYZX(rx: number, ry: number, rz: number): Quaternion {
  const t = halfAngleTerms(rx, ry, rz);
  return new Quaternion(
    t.xSinyCos * t.zCos + t.xCosySin * t.zSin,
    t.xCosySin * t.zCos + t.xSinyCos * t.zSin,
    t.xCosyCos * t.zSin - t.xSinySin * t.zCos,
    t.xCosyCos * t.zCos - t.xSinySin * t.zSin
  );
}

/**
 * Angles in radians, composed as Rz * Rx * Ry (Y applied first).
 */
export function fromEulerAnglesZXY(rx: number, ry: number, rz: number): Quaternion {
  const t = halfAngleTerms(rx, ry, rz);
  return new Quaternion(
    t.xSinyCos * t.zCos - t.xCosySin * t.zSin,
    t.xCosySin * t.zCos + t.xSinyCos * t.zSin,
    t.xCosyCos * t.zSin + t.xSinySin * t.zCos,
    t.xCosyCos * t.zCos - t.xSinySin * t.zSin
  );
}

/**
 * Angles in radians, composed as Rz * Ry * Rx (X applied first).
 */
export function fromEulerAnglesZYX(rx: number, ry: number, rz: number): Quaternion {
  const t = halfAngleTerms(rx, ry, rz);
  return new Quaternion(
    t.xSinyCos * t.zCos - t.xCosySin * t.zSin,
    t.xCosySin * t.zCos + t.xSinyCos * t.zSin,
    t.xCosyCos * t.zSin - t.xSinySin * t.zCos,
    t.xCosyCos * t.zCos + t.xSinySin * t.zSin
  );
}

const FROM_EULER_ANGLES: Record<
  RotationOrder,
  (rx: number, ry: number, rz: number) => Quaternion
> = {
  XYZ: fromEulerAnglesXYZ,
  XZY: fromEulerAnglesXZY,
  YXZ: fromEulerAnglesYXZ,
  YZX: fromEulerAnglesYZX,
  ZXY: fromEulerAnglesZXY,
  ZYX: fromEulerAnglesZYX,
};

/**
 * Angles in radians composed in the given order (default "XYZ").
 */
export function fromEulerAngles(
  rx: number,
  ry: number,
  rz: number,
  order: RotationOrder = DEFAULT_QUATERNION_OPTIONS.defaultRotationOrder
): Quaternion {
  return FROM_EULER_ANGLES[order](rx, ry, rz);
}

/** Alias of `fromEulerAnglesXYZ` */
export const angles = fromEulerAnglesXYZ;

/** Alias of `fromEulerAnglesYXZ` */
export const fromOrientation = fromEulerAnglesYXZ;
