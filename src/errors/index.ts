import type { OperandKind } from "@/types";

/**
 * Base class for programmer errors raised by the library.
 */
export class QuaternionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * An operator was given a pair of operand kinds outside its domain.
 */
export class InvalidOperandError extends QuaternionError {
  constructor(
    readonly operation: "multiply" | "divide",
    readonly leftKind: OperandKind,
    readonly rightKind: OperandKind
  ) {
    super(
      operation === "multiply"
        ? `Cannot multiply ${leftKind} with ${rightKind}`
        : `Cannot divide ${leftKind} by ${rightKind}`
    );
  }
}

/**
 * A component of a quaternion was assigned after construction.
 */
export class ImmutableWriteError extends QuaternionError {
  constructor(readonly property: string) {
    super(`${property} cannot be assigned to`);
  }
}
