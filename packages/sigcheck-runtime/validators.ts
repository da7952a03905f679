// packages/sigcheck-runtime/validators.ts
// Validator family: one class per description shape

import {
  type Constructor,
  describeType,
  type PrimitiveName,
  primitiveOfConstructor,
} from "sigcheck-type-spec";
import { formatValue, TypeCheckError } from "./errors.ts";
import { Result } from "./result.ts";

// ============================================================================
// Abstract Base Validator
// ============================================================================

/**
 * Abstract base class for all validators.
 *
 * A validator is bound to one description and holds no per-call state.
 * Subclasses implement `explain`, which returns the mismatch instead of
 * throwing it; the throwing and Result-returning forms build on it.
 */
export abstract class Validator<T = unknown> {
  /** Validator kind discriminator */
  abstract readonly kind: string;

  /** Expected-type representation used in mismatch messages */
  readonly expected: string;

  constructor(expected: string) {
    this.expected = expected;
  }

  /**
   * Check a value, returning the chained mismatch or null when it conforms.
   */
  abstract explain(value: unknown): TypeCheckError | null;

  /**
   * Validate value (throws on failure).
   *
   * @returns The value itself; validators never transform.
   * @throws TypeCheckError carrying the full context chain
   */
  test(value: unknown): T {
    const err = this.explain(value);
    if (err) throw err;
    return value as T;
  }

  /**
   * Safe validation that returns Result instead of throwing.
   */
  check(value: unknown): Result<T, TypeCheckError> {
    const err = this.explain(value);
    return err ? Result.err(err) : Result.ok(value as T);
  }

  is(value: unknown): value is T {
    return this.explain(value) === null;
  }

  protected mismatch(value: unknown): TypeCheckError {
    return TypeCheckError.mismatch(this.expected, value);
  }

  toString(): string {
    return `Validator<${this.expected}>`;
  }
}

// ============================================================================
// Accept-All Validator
// ============================================================================

export class AcceptAllValidator extends Validator {
  readonly kind = "any" as const;

  constructor() {
    super("any");
  }

  explain(_value: unknown): null {
    return null;
  }
}

/** The one accept-all validator, shared by every registry. */
export const acceptAll: Validator = new AcceptAllValidator();

// ============================================================================
// Primitive Validator
// ============================================================================

export type RuntimeTest = (value: unknown) => boolean;

const PRIMITIVE_TESTS: Record<PrimitiveName, RuntimeTest> = {
  string: (v) => typeof v === "string",
  number: (v) => typeof v === "number",
  integer: (v) => Number.isInteger(v),
  bigint: (v) => typeof v === "bigint",
  boolean: (v) => typeof v === "boolean",
  symbol: (v) => typeof v === "symbol",
  function: (v) => typeof v === "function",
  object: (v) => (typeof v === "object" && v !== null) || typeof v === "function",
  null: (v) => v === null,
  undefined: (v) => v === undefined,
};

/**
 * Direct runtime-type membership test: a `typeof` tag, `instanceof` a
 * class, or any other shape test supplied by the registry.
 */
export class PrimitiveValidator extends Validator {
  readonly kind = "primitive" as const;

  private readonly accepts: RuntimeTest;

  constructor(expected: string, accepts: RuntimeTest) {
    super(expected);
    this.accepts = accepts;
  }

  static forPrimitive(name: PrimitiveName): PrimitiveValidator {
    return new PrimitiveValidator(name, PRIMITIVE_TESTS[name]);
  }

  static forConstructor(ctor: Constructor): PrimitiveValidator {
    const primitive = primitiveOfConstructor(ctor);
    if (primitive) return PrimitiveValidator.forPrimitive(primitive);
    return new PrimitiveValidator(
      describeType(ctor),
      (value) => value instanceof ctor,
    );
  }

  explain(value: unknown): TypeCheckError | null {
    return this.accepts(value) ? null : this.mismatch(value);
  }
}

// ============================================================================
// Container Validators
// ============================================================================

export class TupleValidator extends Validator<unknown[]> {
  readonly kind = "tuple" as const;

  readonly elements: readonly Validator[];

  constructor(expected: string, elements: readonly Validator[]) {
    super(expected);
    this.elements = elements;
  }

  explain(value: unknown): TypeCheckError | null {
    if (!Array.isArray(value)) return this.mismatch(value);

    const n = this.elements.length;
    if (value.length !== n) {
      return new TypeCheckError(
        `Tuple length mismatch: expected ${n}, got ${value.length}.`,
      );
    }

    for (let i = 0; i < n; i++) {
      const err = this.elements[i].explain(value[i]);
      if (err) return err.wrap(`Element #${i} has incompatible type.`);
    }
    return null;
  }
}

export class ListValidator extends Validator<unknown[]> {
  readonly kind = "list" as const;

  readonly element: Validator;

  constructor(expected: string, element: Validator) {
    super(expected);
    this.element = element;
  }

  explain(value: unknown): TypeCheckError | null {
    if (!Array.isArray(value)) return this.mismatch(value);

    for (let i = 0; i < value.length; i++) {
      const err = this.element.explain(value[i]);
      if (err) return err.wrap(`Element #${i} has incompatible type.`);
    }
    return null;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: object | null = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

// Map entries, or the own enumerable string-keyed entries of a plain object
function mappingEntries(
  value: unknown,
): Iterable<readonly [unknown, unknown]> | null {
  if (value instanceof Map) return value.entries();
  if (isPlainObject(value)) return Object.entries(value);
  return null;
}

export class MapValidator extends Validator<
  Map<unknown, unknown> | Record<string, unknown>
> {
  readonly kind = "map" as const;

  readonly keyValidator: Validator;
  readonly valueValidator: Validator;

  constructor(expected: string, keyValidator: Validator, valueValidator: Validator) {
    super(expected);
    this.keyValidator = keyValidator;
    this.valueValidator = valueValidator;
  }

  explain(value: unknown): TypeCheckError | null {
    const entries = mappingEntries(value);
    if (!entries) return this.mismatch(value);

    for (const [key, item] of entries) {
      const keyErr = this.keyValidator.explain(key);
      if (keyErr) {
        return keyErr.wrap(`Key ${formatValue(key)} has incompatible type.`);
      }
      const valueErr = this.valueValidator.explain(item);
      if (valueErr) {
        return valueErr.wrap(
          `Value of key ${formatValue(key)} has incompatible type.`,
        );
      }
    }
    return null;
  }
}

export class SetValidator extends Validator<Set<unknown>> {
  readonly kind = "set" as const;

  readonly element: Validator;

  constructor(expected: string, element: Validator) {
    super(expected);
    this.element = element;
  }

  explain(value: unknown): TypeCheckError | null {
    if (!(value instanceof Set)) return this.mismatch(value);

    for (const item of value) {
      const err = this.element.explain(item);
      if (err) {
        return err.wrap(`Set element ${formatValue(item)} has incompatible type.`);
      }
    }
    return null;
  }
}
