import { DEFAULT_QUATERNION_OPTIONS, EPSILON } from "@/config/quaternionConfig";
import { fromEulerAngles, fromEulerAnglesXYZ } from "@/quaternion/construction";
import { toEulerAngles, toEulerAnglesXYZ } from "@/quaternion/conversions";
import { QuaternionRandom } from "@/quaternion/random";
import { describe, expect, it } from "vitest";

describe("quaternionConfig", () => {
  it("should expose the default options", () => {
    expect(DEFAULT_QUATERNION_OPTIONS).toEqual({
      gimbalThresholdXYZ: 0.499999,
      defaultRotationOrder: "XYZ",
      defaultSeed: 1,
    });
    expect(EPSILON).toBe(1e-6);
  });

  it("should freeze the defaults", () => {
    expect(Object.isFrozen(DEFAULT_QUATERNION_OPTIONS)).toBe(true);
  });

  it("should drive the default rotation order", () => {
    const q = fromEulerAngles(0.1, 0.2, 0.3);
    expect(q.components()).toEqual(fromEulerAnglesXYZ(0.1, 0.2, 0.3).components());
    expect(toEulerAngles(q)).toEqual(toEulerAnglesXYZ(q));
  });

  it("should drive the default random seed", () => {
    expect(new QuaternionRandom().seed).toBe(DEFAULT_QUATERNION_OPTIONS.defaultSeed);
  });
});
