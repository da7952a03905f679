// packages/sigcheck-runtime/checked.ts
// Explicit wrappers that pair a callable with its call binding

import {
  CallBinding,
  type Invocable,
  type Keywords,
  type Signature,
} from "./call-binding.ts";
import type { CheckOptions } from "./options.ts";

/**
 * Checked form of an `Invocable`. Positional arguments go in `args`,
 * keyword arguments in `kwargs`; both reach `impl` unchanged.
 */
export interface CheckedCallable<R> {
  (args?: readonly unknown[], kwargs?: Keywords): R;
  readonly binding: CallBinding;
  readonly impl: Invocable<R>;
}

export type CheckedFunction<A extends unknown[], R, This = unknown> =
  & ((this: This, ...args: A) => R)
  & { readonly binding: CallBinding };

// An unnamed signature takes the callable's own name
function bindingFor(
  signature: Signature,
  name: string,
  options?: CheckOptions,
): CallBinding {
  return new CallBinding(
    signature.name ? signature : { ...signature, name },
    options,
  );
}

function named<F extends object>(checked: F, name: string): F {
  return Object.defineProperty(checked, "name", { value: name, configurable: true });
}

/**
 * Wrap a keyword-aware callable with argument and return checks.
 *
 * The binding is built here, so bad defaults and missing annotations
 * (under `forceAnnotations`) fail now rather than at the first call.
 *
 * @example
 * ```ts
 * const label = typeCheck(
 *   {
 *     name: "label",
 *     params: [{ name: "id", type: t.integer }],
 *     keywordParams: [{ name: "prefix", type: t.string, default: "#" }],
 *     returns: t.string,
 *   },
 *   ([id], { prefix = "#" }) => `${prefix}${id}`,
 * );
 *
 * label([7], { prefix: "no. " }); // "no. 7"
 * label(["7"]); // throws: Positional argument "id" takes an incompatible value.
 * ```
 */
export function typeCheck<R>(
  signature: Signature,
  impl: Invocable<R>,
  options?: CheckOptions,
): CheckedCallable<R> {
  const binding = bindingFor(signature, impl.name, options);
  const checked = (args: readonly unknown[] = [], kwargs: Keywords = {}): R =>
    binding.invoke(impl, args, kwargs);
  return Object.assign(named(checked, signature.name || impl.name), {
    binding,
    impl,
  });
}

/**
 * Wrap a plain function or method. Only positional parameters and the
 * rest slot apply, since plain calls carry no keyword arguments. The
 * receiver is passed through, so a wrapped method still sees `this`.
 */
export function typeCheckFn<A extends unknown[], R, This = unknown>(
  signature: Signature,
  fn: (this: This, ...args: A) => R,
  options?: CheckOptions,
): CheckedFunction<A, R, This> {
  const binding = bindingFor(signature, fn.name, options);
  const checked = function (this: This, ...args: A): R {
    return binding.invoke(() => fn.apply(this, args), args);
  };
  return Object.assign(named(checked, signature.name || fn.name), { binding });
}

export interface TypeChecker {
  typeCheck<R>(signature: Signature, impl: Invocable<R>): CheckedCallable<R>;
  typeCheckFn<A extends unknown[], R, This = unknown>(
    signature: Signature,
    fn: (this: This, ...args: A) => R,
  ): CheckedFunction<A, R, This>;
}

/**
 * Wrappers sharing one set of options.
 *
 * @example
 * ```ts
 * const lenient = typeChecker({ checkReturn: false, onMismatch: "warn" });
 * const parse = lenient.typeCheckFn(signature, parseRow);
 * ```
 */
export function typeChecker(options: CheckOptions): TypeChecker {
  return {
    typeCheck<R>(signature: Signature, impl: Invocable<R>) {
      return typeCheck(signature, impl, options);
    },
    typeCheckFn<A extends unknown[], R, This = unknown>(
      signature: Signature,
      fn: (this: This, ...args: A) => R,
    ) {
      return typeCheckFn(signature, fn, options);
    },
  };
}
