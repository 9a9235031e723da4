import { Vec3 } from "@/math/Vec3";
import { Quaternion } from "@/quaternion/Quaternion";
import { fromAxisAngle, fromEulerAngles } from "@/quaternion/construction";
import {
  getComponents,
  imaginary,
  real,
  toAxisAngle,
  toEulerAngles,
  toEulerAnglesXYZ,
  toEulerAnglesYXZ,
  toMatrix,
  toMatrixVectors,
  toOrientation,
  toString,
  toTransform,
  vector,
} from "@/quaternion/conversions";
import { ROTATION_ORDERS, type EulerAngles, type RotationOrder } from "@/types";
import { expectVectorClose } from "@test/helpers/quaternionHelpers";
import { describe, expect, it } from "vitest";

function expectAnglesClose(actual: EulerAngles, expected: EulerAngles, digits = 10): void {
  expect(actual.x).toBeCloseTo(expected.x, digits);
  expect(actual.y).toBeCloseTo(expected.y, digits);
  expect(actual.z).toBeCloseTo(expected.z, digits);
}

const QUARTER_TURN_Z = fromAxisAngle(Vec3.Z_AXIS, Math.PI / 2);

describe("conversions", () => {
  describe("toAxisAngle", () => {
    it("should recover axis and angle", () => {
      const { axis, angle } = toAxisAngle(fromAxisAngle(Vec3.create(0, 2, 0), 1.2));
      expectVectorClose(axis, Vec3.Y_AXIS, 10);
      expect(angle).toBeCloseTo(1.2, 10);
    });

    it("should report angles above π for quaternions with negative real part", () => {
      const { axis, angle } = toAxisAngle(fromAxisAngle(Vec3.X_AXIS, 1.5 * Math.PI));
      expectVectorClose(axis, Vec3.X_AXIS, 10);
      expect(angle).toBeCloseTo(1.5 * Math.PI, 10);
    });

    it("should return a zero axis for the identity", () => {
      expect(toAxisAngle(Quaternion.identity)).toEqual({ axis: { x: 0, y: 0, z: 0 }, angle: 0 });
    });

    it("should return the raw imaginary part for tiny angles", () => {
      const { axis, angle } = toAxisAngle(fromAxisAngle(Vec3.Z_AXIS, 1e-7));
      expect(axis.x).toBe(0);
      expect(axis.y).toBe(0);
      expect(axis.z).toBeCloseTo(5e-8, 12);
      expect(angle).toBeCloseTo(1e-7, 7);
    });
  });

  describe("toMatrix", () => {
    it("should return the identity matrix for the identity", () => {
      expect(toMatrix(Quaternion.identity)).toEqual([1, 0, 0, 0, 1, 0, 0, 0, 1]);
    });

    it("should return a row-major rotation matrix", () => {
      const expected = [0, -1, 0, 1, 0, 0, 0, 0, 1];
      toMatrix(QUARTER_TURN_Z).forEach((value, i) => {
        expect(value).toBeCloseTo(expected[i], 12);
      });
    });

    it("should normalize first", () => {
      const scaled = new Quaternion(0, 0, 0, 3);
      expect(toMatrix(scaled)).toEqual([1, 0, 0, 0, 1, 0, 0, 0, 1]);
    });
  });

  describe("toMatrixVectors", () => {
    it("should return the matrix columns", () => {
      const { right, up, back } = toMatrixVectors(QUARTER_TURN_Z);
      expectVectorClose(right, Vec3.create(0, 1, 0), 12);
      expectVectorClose(up, Vec3.create(-1, 0, 0), 12);
      expectVectorClose(back, Vec3.create(0, 0, 1), 12);
    });
  });

  describe("toTransform", () => {
    it("should place the rotation at the given position", () => {
      const position = Vec3.create(1, 2, 3);
      const transform = toTransform(QUARTER_TURN_Z, position);
      expect(transform.position).toBe(position);
      expectVectorClose(transform.right, Vec3.create(0, 1, 0), 12);
      expectVectorClose(transform.up, Vec3.create(-1, 0, 0), 12);
    });

    it("should default to the origin", () => {
      expect(toTransform(Quaternion.identity).position).toEqual({ x: 0, y: 0, z: 0 });
    });
  });

  describe("toEulerAngles", () => {
    const angles: EulerAngles = { x: 0.3, y: -0.4, z: 0.5 };

    it.each(ROTATION_ORDERS)("should round-trip %s angles", (order) => {
      const q = fromEulerAngles(angles.x, angles.y, angles.z, order);
      expectAnglesClose(toEulerAngles(q, order), angles);
    });

    const gimbalCases: Array<[RotationOrder, EulerAngles]> = [
      ["XYZ", { x: 0.3, y: Math.PI / 2, z: 0 }],
      ["XZY", { x: 0.3, y: 0, z: Math.PI / 2 }],
      ["YXZ", { x: Math.PI / 2, y: 0.3, z: 0 }],
      ["YZX", { x: 0, y: 0.3, z: Math.PI / 2 }],
      ["ZXY", { x: Math.PI / 2, y: 0, z: 0.3 }],
      ["ZYX", { x: 0, y: Math.PI / 2, z: 0.3 }],
    ];

    it.each(gimbalCases)("should resolve %s gimbal lock onto one free angle", (order, expected) => {
      const q = fromEulerAngles(expected.x, expected.y, expected.z, order);
      expectAnglesClose(toEulerAngles(q, order), expected);
    });

    it("should resolve negative gimbal lock", () => {
      const q = fromEulerAngles(0.3, -Math.PI / 2, 0, "XYZ");
      expectAnglesClose(toEulerAnglesXYZ(q), { x: 0.3, y: -Math.PI / 2, z: 0 });
    });

    it("should default to XYZ", () => {
      const q = fromEulerAngles(0.1, 0.2, 0.3);
      expect(toEulerAngles(q)).toEqual(toEulerAnglesXYZ(q));
    });

    it("should alias toOrientation to YXZ", () => {
      expect(toOrientation).toBe(toEulerAnglesYXZ);
    });
  });

  describe("projections", () => {
    const q = new Quaternion(1, 2, 3, 4);

    it("should split into vector, real and imaginary parts", () => {
      expect(vector(q)).toEqual({ x: 1, y: 2, z: 3 });
      expect(real(q).components()).toEqual([0, 0, 0, 4]);
      expect(imaginary(q).components()).toEqual([1, 2, 3, 0]);
    });

    it("should return the components in x, y, z, w order", () => {
      expect(getComponents(q)).toEqual([1, 2, 3, 4]);
    });

    it("should format like the instance method", () => {
      expect(toString(q)).toBe("1, 2, 3, 4");
      expect(toString(new Quaternion(0.125, 0, 0, 1), 2)).toBe("0.13, 0.00, 0.00, 1.00");
    });
  });
});
