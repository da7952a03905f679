// packages/sigcheck-runtime/errors.ts
// Chained mismatch errors and value formatting for messages

import { inspect } from "node:util";

/**
 * Single-line representation of a runtime value for mismatch messages.
 */
export function formatValue(value: unknown): string {
  return inspect(value, {
    depth: 2,
    breakLength: Infinity,
    maxArrayLength: 10,
    maxStringLength: 80,
  });
}

/**
 * Name of a value's runtime type: `null`, `Array`, the `typeof` tag for
 * other primitives and functions, or the constructor name for objects.
 */
export function runtimeTypeName(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "Array";
  if (typeof value !== "object") return typeof value;

  const proto: object | null = Object.getPrototypeOf(value);
  if (proto === null) return "Object";
  const ctor: unknown = proto.constructor;
  return typeof ctor === "function" && ctor.name ? ctor.name : "Object";
}

/**
 * Validation mismatch. Each layer carries one line of context and points
 * at the layer below through `cause`; the innermost layer states the
 * concrete mismatch.
 *
 * @example
 * ```ts
 * try {
 *   registry.get(t.list(t.integer)).test([1, 2, "x"]);
 * } catch (err) {
 *   if (err instanceof TypeCheckError) console.log(err.trace);
 *   // Element #2 has incompatible type.
 *   // Expect: "integer". Actual "string('x')".
 * }
 * ```
 */
export class TypeCheckError extends TypeError {
  declare readonly cause?: TypeCheckError;

  constructor(message: string, cause?: TypeCheckError) {
    super(message, cause ? { cause } : undefined);
    this.name = "TypeCheckError";
  }

  /**
   * Leaf error for a value whose runtime type is not the expected one.
   */
  static mismatch(expected: string, value: unknown): TypeCheckError {
    return new TypeCheckError(
      `Expect: "${expected}". Actual "${runtimeTypeName(value)}(${
        formatValue(value)
      })".`,
    );
  }

  /**
   * New outer layer with `context` as its message and this error as cause.
   */
  wrap(context: string): TypeCheckError {
    return new TypeCheckError(context, this);
  }

  /** Messages from the outermost layer down to the leaf. */
  get chain(): string[] {
    const messages: string[] = [];
    let current: TypeCheckError | undefined = this;
    while (current) {
      messages.push(current.message);
      current = current.cause;
    }
    return messages;
  }

  get trace(): string {
    return this.chain.join("\n");
  }

  get leaf(): TypeCheckError {
    let current: TypeCheckError = this;
    while (current.cause) current = current.cause;
    return current;
  }
}

/**
 * Raised while binding a signature whose parameters or return must all be
 * annotated but are not.
 */
export class AnnotationError extends TypeError {
  constructor(message: string) {
    super(message);
    this.name = "AnnotationError";
  }
}

// Something other than a description or a class reached the registry
export class TypeDescriptionError extends TypeError {
  constructor(message: string) {
    super(message);
    this.name = "TypeDescriptionError";
  }
}
