import { Vec3 } from "@/math/Vec3";
import { Quaternion } from "@/quaternion/Quaternion";
import { inverse, length, mul, negate, normalize, pow } from "@/quaternion/algebra";
import { fromAxisAngle, fromEulerAngles, fromMatrix } from "@/quaternion/construction";
import { toAxisAngle, toEulerAngles, toMatrix, toMatrixVectors } from "@/quaternion/conversions";
import { distanceSym } from "@/quaternion/geodesic";
import { slerp } from "@/quaternion/interpolation";
import { QuaternionRandom } from "@/quaternion/random";
import { ROTATION_ORDERS } from "@/types";
import {
  expectQuaternionClose,
  expectSameRotation,
  expectVectorClose,
  sampleUnitQuaternions,
} from "@test/helpers/quaternionHelpers";
import { describe, expect, it } from "vitest";

const SAMPLES = sampleUnitQuaternions(25, 2024);

describe("rotation properties", () => {
  it("should invert unit quaternions", () => {
    for (const q of SAMPLES) {
      expectQuaternionClose(mul(q, inverse(q)), Quaternion.identity, 12);
      expectQuaternionClose(inverse(inverse(q)), q, 12);
    }
  });

  it("should normalize every non-zero quaternion to unit length", () => {
    for (const q of SAMPLES) {
      expect(length(normalize(mul(q, 37.5)))).toBeCloseTo(1, 12);
    }
    expect(normalize(Quaternion.zero)).toBe(Quaternion.identity);
  });

  it("should give q and -q the same matrix and symmetrized distances", () => {
    const [third] = sampleUnitQuaternions(1, 77);
    for (const q of SAMPLES) {
      expect(toMatrix(negate(q))).toEqual(toMatrix(q));
      expect(distanceSym(negate(q), third)).toBeCloseTo(distanceSym(q, third), 10);
    }
  });

  it("should hit slerp endpoints up to sign", () => {
    for (let i = 0; i + 1 < SAMPLES.length; i += 2) {
      const q0 = SAMPLES[i];
      const q1 = SAMPLES[i + 1];
      expectSameRotation(slerp(q0, q1, 0), q0, 10);
      expectSameRotation(slerp(q0, q1, 1), q1, 10);
    }
  });

  it("should keep slerp between equal endpoints constant", () => {
    for (const q of SAMPLES.slice(0, 5)) {
      for (const alpha of [-1, 0, 0.25, 0.5, 2]) {
        expectSameRotation(slerp(q, q, alpha), q, 7);
      }
    }
  });

  it("should round-trip axis and angle", () => {
    const random = new QuaternionRandom(5);
    for (const theta of [-3, -1.2, -0.4, 0.3, 1.7, 3.1]) {
      const axis = Vec3.normalize(
        Vec3.create(random.nextFloat() - 0.5, random.nextFloat() - 0.5, random.nextFloat() - 0.5)
      );
      const result = toAxisAngle(fromAxisAngle(axis, theta));

      expect(result.angle).toBeCloseTo(Math.abs(theta), 5);
      expectVectorClose(result.axis, Vec3.scale(axis, Math.sign(theta)), 5);
    }
  });

  it.each(ROTATION_ORDERS)("should round-trip %s Euler angles away from gimbal lock", (order) => {
    const random = new QuaternionRandom(13);
    for (let i = 0; i < 10; i++) {
      const rx = 2 * random.nextFloat() - 1;
      const ry = 2 * random.nextFloat() - 1;
      const rz = 2 * random.nextFloat() - 1;
      const result = toEulerAngles(fromEulerAngles(rx, ry, rz, order), order);

      expect(result.x).toBeCloseTo(rx, 10);
      expect(result.y).toBeCloseTo(ry, 10);
      expect(result.z).toBeCloseTo(rz, 10);
    }
  });

  it("should round-trip through matrix columns", () => {
    for (const q of SAMPLES) {
      const { right, up, back } = toMatrixVectors(q);
      expectSameRotation(fromMatrix(right, up, back), q, 10);
    }
  });

  it("should rotate X to -Z by a quarter turn about Y", () => {
    const q = fromAxisAngle(Vec3.create(0, 1, 0), Math.PI / 2);
    expectVectorClose(mul(q, Vec3.X_AXIS), Vec3.create(0, 0, -1), 12);
  });

  it("should satisfy the power identities", () => {
    for (const q of SAMPLES) {
      expectQuaternionClose(pow(q, 1), q, 12);
      expectQuaternionClose(pow(q, 0), Quaternion.identity, 12);
    }
  });
});
