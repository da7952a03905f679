// packages/sigcheck-runtime/mod.ts
import type { Infer, TypeLike } from "sigcheck-type-spec";
import type { TypeCheckError } from "./errors.ts";
import { sharedRegistry } from "./registry.ts";
import { Result } from "./result.ts";

export {
  describeType,
  type Infer,
  isTypeDesc,
  isTypeLike,
  t,
  type TypeDesc,
  type TypeLike,
} from "sigcheck-type-spec";

export {
  AnnotationError,
  formatValue,
  runtimeTypeName,
  TypeCheckError,
  TypeDescriptionError,
} from "./errors.ts";
export { Result } from "./result.ts";
export {
  AcceptAllValidator,
  acceptAll,
  ListValidator,
  MapValidator,
  PrimitiveValidator,
  SetValidator,
  TupleValidator,
  Validator,
} from "./validators.ts";
export { sharedRegistry, TypeRegistry } from "./registry.ts";
export {
  type CheckOptions,
  DEFAULT_CHECK_OPTIONS,
  type Logger,
  type MismatchPolicy,
  resolveOptions,
  type ResolvedCheckOptions,
} from "./options.ts";
export {
  CallBinding,
  type Invocable,
  type Keywords,
  type ParamSpec,
  type RestParamSpec,
  type Signature,
} from "./call-binding.ts";
export {
  type CheckedCallable,
  type CheckedFunction,
  typeCheck,
  typeCheckFn,
  type TypeChecker,
  typeChecker,
} from "./checked.ts";

// ============================================================================
// One-off validation against a description
// ============================================================================

/**
 * Validate a value against a description (throws on mismatch).
 * @returns The value, typed by the description
 * @throws TypeCheckError with the full context chain
 */
export function conform<D extends TypeLike>(
  desc: D,
  value: unknown,
  registry = sharedRegistry,
): Infer<D> {
  return registry.get(desc).test(value) as Infer<D>;
}

export function matches<D extends TypeLike>(
  desc: D,
  value: unknown,
  registry = sharedRegistry,
): value is Infer<D> {
  return registry.get(desc).is(value);
}

/**
 * Result-returning form of `conform`.
 */
export function checkType<D extends TypeLike>(
  desc: D,
  value: unknown,
  registry = sharedRegistry,
): Result<Infer<D>, TypeCheckError> {
  const result = registry.get(desc).check(value);
  return result.ok ? Result.ok(result.value as Infer<D>) : result;
}
