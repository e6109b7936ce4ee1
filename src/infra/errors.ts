/**
 * Version Tree Errors
 *
 * Every failing core operation throws exactly one of these. Callers branch on
 * `instanceof` or on the `kind` discriminator.
 *
 * @example
 * ```typescript
 * try {
 *   store.rollback("notes.txt");
 * } catch (error) {
 *   if (error instanceof StateError) {
 *     console.error("Already at the root:", error.message);
 *   }
 * }
 * ```
 */

export type VtreeErrorKind = "validation" | "not_found" | "conflict" | "state" | "range";

/**
 * Base class for all version tree errors
 */
export class VtreeError extends Error {
  readonly kind: VtreeErrorKind;

  constructor(kind: VtreeErrorKind, message: string) {
    super(message);
    this.name = "VtreeError";
    this.kind = kind;
  }
}

/**
 * Malformed input: empty filename, bad number, wrong argument count,
 * unknown command, invalid configuration
 */
export class ValidationError extends VtreeError {
  constructor(message: string) {
    super("validation", message);
    this.name = "ValidationError";
  }
}

/**
 * Filename is not registered
 */
export class NotFoundError extends VtreeError {
  constructor(message: string) {
    super("not_found", message);
    this.name = "NotFoundError";
  }
}

/**
 * Filename already registered, or the active version is already a snapshot
 */
export class ConflictError extends VtreeError {
  constructor(message: string) {
    super("conflict", message);
    this.name = "ConflictError";
  }
}

/**
 * Operation is not possible in the current tree state (no parent to roll back to)
 */
export class StateError extends VtreeError {
  constructor(message: string) {
    super("state", message);
    this.name = "StateError";
  }
}

/**
 * Version id or requested count outside the allowed range.
 * Not named RangeError so the built-in stays reachable.
 */
export class OutOfRangeError extends VtreeError {
  constructor(message: string) {
    super("range", message);
    this.name = "OutOfRangeError";
  }
}

export function isVtreeError(error: unknown): error is VtreeError {
  return error instanceof VtreeError;
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
