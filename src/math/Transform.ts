import type { RigidTransform, Vector3 } from "@/types";
import { Vec3 } from "./Vec3";

/**
 * Transform - Pure utility functions for rigid transforms
 * (position + orthonormal rotation basis). All functions return new transforms.
 */
export const Transform = {
  /**
   * Transform with no translation and no rotation
   */
  identity(): RigidTransform {
    return {
      position: Vec3.zero(),
      right: Vec3.X_AXIS,
      up: Vec3.Y_AXIS,
      back: Vec3.Z_AXIS,
    };
  },

  /**
   * Create a transform from a position and its basis columns
   */
  create(position: Vector3, right: Vector3, up: Vector3, back: Vector3): RigidTransform {
    return { position, right, up, back };
  },

  /**
   * Create a transform from a position and the components of a unit quaternion
   * (x, y, z imaginary, w real). The quaternion is assumed normalized.
   */
  fromQuaternionComponents(
    position: Vector3,
    qx: number,
    qy: number,
    qz: number,
    qw: number
  ): RigidTransform {
    const xx = qx * qx;
    const yy = qy * qy;
    const zz = qz * qz;
    const xy = qx * qy;
    const xz = qx * qz;
    const yz = qy * qz;
    const wx = qw * qx;
    const wy = qw * qy;
    const wz = qw * qz;

    return {
      position,
      right: { x: 1 - 2 * (yy + zz), y: 2 * (xy + wz), z: 2 * (xz - wy) },
      up: { x: 2 * (xy - wz), y: 1 - 2 * (xx + zz), z: 2 * (yz + wx) },
      back: { x: 2 * (xz + wy), y: 2 * (yz - wx), z: 1 - 2 * (xx + yy) },
    };
  },

  /**
   * Forward direction (the negated back column)
   */
  lookVector(transform: RigidTransform): Vector3 {
    return Vec3.negate(transform.back);
  },

  /**
   * Rotate a direction by the transform's basis (translation ignored)
   */
  rotate(transform: RigidTransform, v: Vector3): Vector3 {
    return Vec3.add(
      Vec3.add(Vec3.scale(transform.right, v.x), Vec3.scale(transform.up, v.y)),
      Vec3.scale(transform.back, v.z)
    );
  },

  /**
   * Map a point from the transform's local space to world space
   */
  pointToWorld(transform: RigidTransform, point: Vector3): Vector3 {
    return Vec3.add(transform.position, Transform.rotate(transform, point));
  },

  /**
   * Compose two transforms: the result applies `b` first, then `a`
   */
  multiply(a: RigidTransform, b: RigidTransform): RigidTransform {
    return {
      position: Transform.pointToWorld(a, b.position),
      right: Transform.rotate(a, b.right),
      up: Transform.rotate(a, b.up),
      back: Transform.rotate(a, b.back),
    };
  },

  /**
   * Structural check used by the operand dispatch
   */
  isRigidTransform(value: unknown): value is RigidTransform {
    if (typeof value !== "object" || value === null) return false;
    return (
      "position" in value &&
      "right" in value &&
      "up" in value &&
      "back" in value &&
      Vec3.isVector3(value.position) &&
      Vec3.isVector3(value.right) &&
      Vec3.isVector3(value.up) &&
      Vec3.isVector3(value.back)
    );
  },
};
