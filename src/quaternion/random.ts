/**
 * Seeded random unit quaternions.
 *
 * The generator owns its own mulberry32 stream; nothing else in the library
 * reads or advances it.
 */

import { DEFAULT_QUATERNION_OPTIONS } from "@/config/quaternionConfig";
import { Quaternion } from "./Quaternion";

const TAU = 2 * Math.PI;

export class QuaternionRandom {
  private state: number;

  constructor(readonly seed: number = DEFAULT_QUATERNION_OPTIONS.defaultSeed) {
    this.state = seed | 0;
  }

  /**
   * Next float in [0, 1) (mulberry32).
   */
  nextFloat(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /**
   * Next uniformly distributed unit quaternion (Shoemake's subgroup algorithm).
   */
  next(): Quaternion {
    const u = this.nextFloat();
    const v = this.nextFloat();
    const w = this.nextFloat();

    const sqrtU = Math.sqrt(u);
    const sqrtOneMinusU = Math.sqrt(1 - u);
    const tpv = TAU * v;
    const tpw = TAU * w;

    return new Quaternion(
      sqrtOneMinusU * Math.sin(tpv),
      sqrtOneMinusU * Math.cos(tpv),
      sqrtU * Math.sin(tpw),
      sqrtU * Math.cos(tpw)
    );
  }
}

/**
 * Function form: each call returns the next random unit quaternion from a
 * generator seeded with `seed`.
 */
export function randomQuaternion(
  seed: number = DEFAULT_QUATERNION_OPTIONS.defaultSeed
): () => Quaternion {
  const generator = new QuaternionRandom(seed);
  return () => generator.next();
}
