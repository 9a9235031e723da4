/**
 * Interpolation along great-circle arcs of the unit hypersphere, plus
 * constant-rate integration.
 *
 * Shortest-path policy: when the endpoints have a negative dot product the
 * start is negated, so the arc never exceeds 180°.
 * Coincident endpoints (dot >= 1) fall back to linear interpolation followed
 * by normalization, since sin(theta0) would be zero.
 */

import { EPSILON } from "@/config/quaternionConfig";
import { RotationDebugLogger } from "@/debug/RotationDebugLogger";
import { Vec3 } from "@/math/Vec3";
import type { Vector3 } from "@/types";
import { add, dot, mul, negate, normalize, sub } from "./algebra";
import { fromAxisAngle, fromVector } from "./construction";
import { distanceSym } from "./geodesic";
import { Quaternion } from "./Quaternion";

/** Interpolator returned by `slerpFunction` */
export type SlerpFunction = (alpha: number) => Quaternion;

/**
 * Spherical linear interpolation. `alpha` may be any real number; values
 * outside [0, 1] extrapolate along the same great circle.
 * Both inputs are normalized.
 */
export function slerp(q0: Quaternion, q1: Quaternion, alpha: number): Quaternion {
  return slerpFunction(q0, q1)(alpha);
}

/**
 * Slerp from the identity to `q1` without building the identity operand.
 */
export function identitySlerp(q1: Quaternion, alpha: number): Quaternion {
  const target = normalize(q1);
  // Real part of the start: +1 (identity) or -1 (its double)
  let start = 1;
  let cosTheta0 = target.w;

  if (cosTheta0 < 0) {
    start = -1;
    cosTheta0 = -cosTheta0;
  }

  if (cosTheta0 >= 1) {
    RotationDebugLogger.logFallback("slerp_linear", "identitySlerp", target.components());
    return normalize(
      new Quaternion(
        target.x * alpha,
        target.y * alpha,
        target.z * alpha,
        (target.w - start) * alpha + start
      )
    );
  }

  const theta0 = Math.acos(cosTheta0);
  const sinTheta0 = Math.sin(theta0);
  const theta = theta0 * alpha;
  const sinTheta = Math.sin(theta);

  const s0 = Math.cos(theta) - (cosTheta0 * sinTheta) / sinTheta0;
  const s1 = sinTheta / sinTheta0;
  return normalize(
    new Quaternion(target.x * s1, target.y * s1, target.z * s1, start * s0 + target.w * s1)
  );
}

/**
 * Build a reusable slerp between fixed endpoints, precomputing theta0 and
 * sin(theta0). `slerpFunction(q0, q1)(alpha)` equals `slerp(q0, q1, alpha)`.
 */
export function slerpFunction(q0: Quaternion, q1: Quaternion): SlerpFunction {
  let from = normalize(q0);
  const to = normalize(q1);
  let cosTheta0 = dot(from, to);

  if (cosTheta0 < 0) {
    from = negate(from);
    cosTheta0 = -cosTheta0;
  }

  if (cosTheta0 >= 1) {
    RotationDebugLogger.logFallback("slerp_linear", "slerp", q0.components());
    const delta = sub(to, from);
    return (alpha) => normalize(add(from, mul(delta, alpha)));
  }

  const theta0 = Math.acos(cosTheta0);
  const sinTheta0 = Math.sin(theta0);

  return (alpha) => {
    const theta = theta0 * alpha;
    const sinTheta = Math.sin(theta);
    const s0 = Math.cos(theta) - (cosTheta0 * sinTheta) / sinTheta0;
    const s1 = sinTheta / sinTheta0;
    return normalize(add(mul(s0, from), mul(s1, to)));
  };
}

/**
 * `n` evenly spaced rotations strictly between q0 and q1, at
 * alpha = k / (n + 1) for k = 1..n. With `includeEndpoints`, q0 is prepended
 * and q1 appended (length n + 2).
 */
export function intermediates(
  q0: Quaternion,
  q1: Quaternion,
  n: number,
  includeEndpoints = false
): Quaternion[] {
  const stepSize = 1 / (n + 1);
  const interpolate = slerpFunction(q0, q1);
  const steps: Quaternion[] = includeEndpoints ? [q0] : [];

  for (let i = 1; i <= n; i++) {
    steps.push(interpolate(stepSize * i));
  }

  if (includeEndpoints) {
    steps.push(q1);
  }
  return steps;
}

/**
 * Instantaneous derivative of `q` rotating at `rate` (radians per unit time
 * about the x, y and z axes): 0.5 * q * rate.
 */
export function derivative(q: Quaternion, rate: Vector3): Quaternion {
  return mul(mul(0.5, q), fromVector(rate));
}

/**
 * Advance `q` by `timestep`, assuming `rate` is constant over the interval.
 * Closed form; smaller steps track a changing rate more closely.
 */
export function integrate(q: Quaternion, rate: Vector3, timestep: number): Quaternion {
  const start = normalize(q);
  const rotationVector = Vec3.scale(rate, timestep);
  const rotationMagnitude = Vec3.length(rotationVector);

  if (rotationMagnitude > 0) {
    const axis = Vec3.divide(rotationVector, rotationMagnitude);
    return normalize(mul(start, fromAxisAngle(axis, rotationMagnitude)));
  }
  return start;
}

/**
 * True if the symmetrized geodesic distance is below `epsilon`.
 */
export function approxEq(q0: Quaternion, q1: Quaternion, epsilon = EPSILON): boolean {
  return distanceSym(q0, q1) < epsilon;
}
