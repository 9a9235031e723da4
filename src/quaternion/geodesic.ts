/**
 * Exponential/logarithmic maps and geodesic distances on the rotation manifold.
 *
 * Distances, in increasing cost of symmetrization:
 * - distanceAbs: Euclidean, sign-aware, no trigonometry
 * - distance: intrinsic geodesic, range [0, 2π] for unit inputs
 * - distanceSym: symmetrized geodesic, range [0, π] (double cover resolved)
 * - distanceChord: chord length of the shortest arc
 */

import { RotationDebugLogger } from "@/debug/RotationDebugLogger";
import { add, dot, inverse, length, mul, negate, pow, sub } from "./algebra";
import { Quaternion } from "./Quaternion";

/**
 * Quaternion exponential.
 */
export function exp(q: Quaternion): Quaternion {
  const { x, y, z, w } = q;
  const m = Math.exp(w);
  const vv = x * x + y * y + z * z;

  if (vv > 0) {
    const v = Math.sqrt(vv);
    const s = (m * Math.sin(v)) / v;
    return new Quaternion(x * s, y * s, z * s, m * Math.cos(v));
  }
  return new Quaternion(0, 0, 0, m);
}

/**
 * Quaternion logarithm. The logarithm of zero is (0, 0, 0, -Infinity).
 */
export function log(q: Quaternion): Quaternion {
  const { x, y, z, w } = q;
  const vv = x * x + y * y + z * z;
  const mm = w * w + vv;

  if (mm > 0) {
    if (vv > 0) {
      const m = Math.sqrt(mm);
      const s = Math.acos(w / m) / Math.sqrt(vv);
      return new Quaternion(x * s, y * s, z * s, Math.log(m));
    }
    return new Quaternion(0, 0, 0, Math.log(mm) / 2);
  }

  RotationDebugLogger.logFallback("log_zero", "log", q.components());
  return new Quaternion(0, 0, 0, Number.NEGATIVE_INFINITY);
}

/**
 * Exponential map anchored at `base`: base * exp(tangent).
 */
export function expMap(base: Quaternion, tangent: Quaternion): Quaternion {
  return mul(base, exp(tangent));
}

/**
 * Symmetrized exponential map: base^0.5 * exp(tangent) * base^0.5.
 */
export function expMapSym(base: Quaternion, tangent: Quaternion): Quaternion {
  const sqrtBase = pow(base, 0.5);
  return mul(mul(sqrtBase, exp(tangent)), sqrtBase);
}

/**
 * Logarithmic map anchored at `base`: log(inverse(base) * arg).
 */
export function logMap(base: Quaternion, arg: Quaternion): Quaternion {
  return log(mul(inverse(base), arg));
}

/**
 * Symmetrized logarithmic map: log(base^-0.5 * arg * base^-0.5).
 */
export function logMapSym(base: Quaternion, arg: Quaternion): Quaternion {
  const invSqrtBase = pow(base, -0.5);
  return log(mul(mul(invSqrtBase, arg), invSqrtBase));
}

/**
 * Relative log q0 * inverse(q1), an angular-velocity style difference.
 * No sign resolution.
 */
export function logInv(q0: Quaternion, q1: Quaternion): Quaternion {
  return log(mul(q0, inverse(q1)));
}

/**
 * Minimal rotation from q0 to q1 under double cover:
 * q0 * difference(q0, q1) equals q1 or -q1.
 * Use q0 * inverse(q1) when the sign must be preserved.
 */
export function difference(q0: Quaternion, q1: Quaternion): Quaternion {
  const from = dot(q0, q1) < 0 ? negate(q0) : q0;
  return mul(inverse(from), q1);
}

export function distance(q0: Quaternion, q1: Quaternion): number {
  return length(logMap(q0, q1)) * 2;
}

export function distanceSym(q0: Quaternion, q1: Quaternion): number {
  return length(log(difference(q0, q1))) * 2;
}

export function distanceChord(q0: Quaternion, q1: Quaternion): number {
  return Math.sin(distanceSym(q0, q1) / 2) * 2;
}

export function distanceAbs(q0: Quaternion, q1: Quaternion): number {
  const dMinus = length(sub(q0, q1));
  const dPlus = length(add(q0, q1));
  return dMinus < dPlus ? dMinus : dPlus;
}
