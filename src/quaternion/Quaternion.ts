/**
 * Quaternion: immutable rotation value
 *
 * Quaternions represent rotations in 3D space with 4 numbers (a rotation
 * matrix needs 9) and do not suffer from gimbal lock the way Euler angles do.
 * Once you have converted from Euler angles it is best to stay in quaternion
 * form.
 *
 * Double cover: q and -q encode the same rotation.
 *
 * Key properties:
 * - Immutable: components are fixed at construction, every operation returns
 *   a new instance. Assigning a component throws ImmutableWriteError.
 * - Not normalized on construction: a quaternion may have any length.
 *   Operations that need a unit quaternion normalize internally.
 * - `unit` and `magnitude` are computed once on first access and cached
 *   outside the frozen instance.
 */

import { RotationDebugLogger } from "@/debug/RotationDebugLogger";
import { ImmutableWriteError } from "@/errors";

/** Components in x, y, z, w order */
export type QuaternionComponents = readonly [x: number, y: number, z: number, w: number];

interface DerivedValues {
  unit?: Quaternion;
  magnitude?: number;
}

// Write-once memo cells, keyed by instance so the instance itself stays frozen
const derived = new WeakMap<Quaternion, DerivedValues>();

function derivedValues(q: Quaternion): DerivedValues {
  let values = derived.get(q);
  if (!values) {
    values = {};
    derived.set(q, values);
  }
  return values;
}

/**
 * Euclidean length of the four components. Falls back to scaling by the
 * largest component when the plain sum of squares overflows or underflows.
 */
function componentLength(x: number, y: number, z: number, w: number): number {
  const sumSq = x * x + y * y + z * z + w * w;
  if (sumSq > 0 && sumSq < Number.POSITIVE_INFINITY) {
    return Math.sqrt(sumSq);
  }

  const largest = Math.max(Math.abs(x), Math.abs(y), Math.abs(z), Math.abs(w));
  if (largest === 0 || largest === Number.POSITIVE_INFINITY) {
    return largest;
  }
  const sx = x / largest;
  const sy = y / largest;
  const sz = z / largest;
  const sw = w / largest;
  return Math.sqrt(sx * sx + sy * sy + sz * sz + sw * sw) * largest;
}

function formatComponent(value: number, decimalPlaces?: number): string {
  if (decimalPlaces === undefined) {
    return String(value);
  }
  return value.toFixed(Math.min(100, Math.max(0, Math.floor(decimalPlaces))));
}

export class Quaternion {
  /** No rotation. Shared frozen instance. */
  static readonly identity: Quaternion = new Quaternion(0, 0, 0, 1);

  /** Zero magnitude; not a valid rotation. Shared frozen instance. */
  static readonly zero: Quaternion = new Quaternion(0, 0, 0, 0);

  private readonly _components: QuaternionComponents;

  /**
   * @param x - Imaginary i component, defaults to 0
   * @param y - Imaginary j component, defaults to 0
   * @param z - Imaginary k component, defaults to 0
   * @param w - Real component, defaults to 1
   */
  constructor(x = 0, y = 0, z = 0, w = 1) {
    this._components = Object.freeze([x, y, z, w] as const);
    Object.freeze(this);
  }

  get x(): number {
    return this._components[0];
  }

  set x(_value: never) {
    throw new ImmutableWriteError("x");
  }

  get y(): number {
    return this._components[1];
  }

  set y(_value: never) {
    throw new ImmutableWriteError("y");
  }

  get z(): number {
    return this._components[2];
  }

  set z(_value: never) {
    throw new ImmutableWriteError("z");
  }

  get w(): number {
    return this._components[3];
  }

  set w(_value: never) {
    throw new ImmutableWriteError("w");
  }

  /**
   * Length of the quaternion. Cached.
   */
  get magnitude(): number {
    const values = derivedValues(this);
    if (values.magnitude === undefined) {
      const [x, y, z, w] = this._components;
      values.magnitude = componentLength(x, y, z, w);
    }
    return values.magnitude;
  }

  set magnitude(_value: never) {
    throw new ImmutableWriteError("magnitude");
  }

  /**
   * Quaternion with unit length. Cached.
   * The zero quaternion has no direction, so its unit form is the identity.
   */
  get unit(): Quaternion {
    const values = derivedValues(this);
    if (values.unit === undefined) {
      const length = this.magnitude;
      if (length > 0) {
        const [x, y, z, w] = this._components;
        values.unit = new Quaternion(x / length, y / length, z / length, w / length);
      } else {
        RotationDebugLogger.logFallback("normalize_zero", "normalize", this._components);
        values.unit = Quaternion.identity;
      }
    }
    return values.unit;
  }

  set unit(_value: never) {
    throw new ImmutableWriteError("unit");
  }

  /**
   * Components in x, y, z, w order.
   */
  components(): QuaternionComponents {
    return this._components;
  }

  /**
   * Exact component-wise equality. Use `approxEq` to compare rotations.
   */
  equals(other: Quaternion): boolean {
    return (
      this.x === other.x && this.y === other.y && this.z === other.z && this.w === other.w
    );
  }

  /**
   * Components joined by ", ". When `decimalPlaces` is given each component
   * is rounded to that many places.
   */
  toString(decimalPlaces?: number): string {
    return this._components.map((c) => formatComponent(c, decimalPlaces)).join(", ");
  }
}

// identity and zero are shared; they must not be reassigned at runtime.
Object.freeze(Quaternion);
