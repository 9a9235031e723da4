/**
 * Quaternion module - value type plus the full operation set.
 *
 * `Quat` gathers every operation under one namespace:
 *   Quat.slerp(a, b, 0.5), Quat.mul(q, vector), Quat.toEulerAngles(q, "ZYX")
 * The free `toString(q)` is `Quat.format(q)` there.
 */

import * as algebra from "./algebra";
import * as construction from "./construction";
import * as conversions from "./conversions";
import * as geodesic from "./geodesic";
import * as interpolation from "./interpolation";
import { Quaternion } from "./Quaternion";
import { QuaternionRandom, randomQuaternion } from "./random";

export { Quaternion, type QuaternionComponents } from "./Quaternion";
export { QuaternionRandom, randomQuaternion } from "./random";

export * from "./algebra";
export * from "./construction";
export * from "./conversions";
export * from "./geodesic";
export * from "./interpolation";

// `toString` would shadow Object.prototype.toString on the namespace object
const { toString: format, ...conversionOps } = conversions;

export const Quat = {
  identity: Quaternion.identity,
  zero: Quaternion.zero,

  create(x?: number, y?: number, z?: number, w?: number): Quaternion {
    return new Quaternion(x, y, z, w);
  },

  ...algebra,
  ...geodesic,
  ...interpolation,
  ...conversionOps,
  format,
  ...construction,

  QuaternionRandom,
  randomQuaternion,
};
