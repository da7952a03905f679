// packages/sigcheck-runtime/call-binding.ts
// Call binding: parameter validators for one callable, applied per invocation

import type { TypeLike } from "sigcheck-type-spec";
import { AnnotationError, type TypeCheckError } from "./errors.ts";
import {
  type CheckOptions,
  resolveOptions,
  type ResolvedCheckOptions,
} from "./options.ts";
import { acceptAll, type Validator } from "./validators.ts";

/**
 * A named parameter. It has a default when `default` is an own property,
 * even if the default is `undefined`.
 */
export interface ParamSpec {
  readonly name: string;
  readonly type?: TypeLike;
  readonly default?: unknown;
}

export interface RestParamSpec {
  readonly name: string;
  readonly type?: TypeLike;
}

/**
 * Pre-extracted declaration of a callable.
 *
 * @example
 * ```ts
 * // (a: integer, ...b: number, c: [integer, number], **d: integer[]) -> number
 * const signature: Signature = {
 *   name: "total",
 *   params: [{ name: "a", type: t.integer }],
 *   restParam: { name: "b", type: t.number },
 *   keywordParams: [{ name: "c", type: t.tuple(t.integer, t.number) }],
 *   keywordRestParam: { name: "d", type: t.list(t.integer) },
 *   returns: t.number,
 * };
 * ```
 */
export interface Signature {
  readonly name?: string;
  /** Positional-or-keyword parameters, in order */
  readonly params?: readonly ParamSpec[];
  /** Keyword-only parameters */
  readonly keywordParams?: readonly ParamSpec[];
  /** Variadic positional slot */
  readonly restParam?: RestParamSpec;
  /** Variadic keyword slot */
  readonly keywordRestParam?: RestParamSpec;
  readonly returns?: TypeLike;
}

export type Keywords = Readonly<Record<string, unknown>>;

/** Keyword-aware calling convention used by checked callables. */
export type Invocable<R> = (args: readonly unknown[], kwargs: Keywords) => R;

function hasDefault(param: ParamSpec): boolean {
  return Object.prototype.hasOwnProperty.call(param, "default");
}

/**
 * Validators for every declared parameter and the return of one callable.
 *
 * Built once; defaults are validated here rather than at call time, so a
 * bad default fails the binding itself. Arity is left to the callable.
 */
export class CallBinding {
  readonly name: string;
  readonly options: ResolvedCheckOptions;

  readonly params: ReadonlyMap<string, Validator>;
  readonly keywordParams: ReadonlyMap<string, Validator>;
  readonly rest: Validator;
  readonly keywordRest: Validator;
  readonly returns: Validator;

  private readonly positional: ReadonlyArray<readonly [string, Validator]>;

  constructor(readonly signature: Signature, options: CheckOptions = {}) {
    this.name = signature.name || "<anonymous>";
    this.options = resolveOptions(options);

    const positional: Array<readonly [string, Validator]> = [];
    for (const param of signature.params ?? []) {
      const validator = this.validatorFor(`parameter "${param.name}"`, param.type);
      positional.push([param.name, validator]);
      if (hasDefault(param)) {
        this.checkDefault(
          validator,
          param.default,
          `Positional argument "${param.name}" has an incompatible default value.`,
        );
      }
    }
    this.positional = positional;
    this.params = new Map(positional);

    const keywordParams = new Map<string, Validator>();
    for (const param of signature.keywordParams ?? []) {
      const validator = this.validatorFor(`parameter "${param.name}"`, param.type);
      keywordParams.set(param.name, validator);
      if (hasDefault(param)) {
        this.checkDefault(
          validator,
          param.default,
          `Keyword-only argument "${param.name}" has an incompatible default value.`,
        );
      }
    }
    this.keywordParams = keywordParams;

    const { restParam, keywordRestParam } = signature;
    this.rest = restParam
      ? this.validatorFor(`parameter "...${restParam.name}"`, restParam.type)
      : acceptAll;
    this.keywordRest = keywordRestParam
      ? this.validatorFor(`parameter "**${keywordRestParam.name}"`, keywordRestParam.type)
      : acceptAll;
    this.returns = this.validatorFor("return value", signature.returns);
  }

  private validatorFor(what: string, type: TypeLike | undefined): Validator {
    if (type === undefined && this.options.forceAnnotations) {
      throw new AnnotationError(
        `Function "${this.name}" must be fully annotated: ${what} has no type.`,
      );
    }
    return this.options.registry.get(type);
  }

  private checkDefault(validator: Validator, value: unknown, context: string): void {
    const err = validator.explain(value);
    if (err) throw err.wrap(context);
  }

  /**
   * First argument mismatch, or null. Positionals are matched in order,
   * extras go to the rest slot; keywords match positional names, then
   * keyword-only names, then the keyword rest slot.
   */
  explainArguments(
    args: readonly unknown[],
    kwargs: Keywords = {},
  ): TypeCheckError | null {
    const count = Math.min(args.length, this.positional.length);
    for (let i = 0; i < count; i++) {
      const [name, validator] = this.positional[i];
      const err = validator.explain(args[i]);
      if (err) {
        return err.wrap(`Positional argument "${name}" takes an incompatible value.`);
      }
    }

    for (let i = count; i < args.length; i++) {
      const err = this.rest.explain(args[i]);
      if (err) {
        return err.wrap(`Positional argument #${i} takes an incompatible value.`);
      }
    }

    for (const [name, value] of Object.entries(kwargs)) {
      const validator = this.params.get(name) ??
        this.keywordParams.get(name) ?? this.keywordRest;
      const err = validator.explain(value);
      if (err) {
        return err.wrap(`Keyword argument "${name}" takes an incompatible value.`);
      }
    }

    return null;
  }

  explainReturn(value: unknown): TypeCheckError | null {
    const err = this.returns.explain(value);
    return err ? err.wrap("Return value is incompatible.") : null;
  }

  /**
   * @throws TypeCheckError on the first argument mismatch
   */
  checkArguments(args: readonly unknown[], kwargs: Keywords = {}): void {
    const err = this.explainArguments(args, kwargs);
    if (err) throw err;
  }

  checkReturn<R>(value: R): R {
    const err = this.explainReturn(value);
    if (err) throw err;
    return value;
  }

  /**
   * Validate arguments, call `impl`, validate its result.
   *
   * An argument mismatch stops the call before `impl` runs. A return
   * mismatch is raised after `impl` has run, so its side effects stand.
   * Under the "warn" policy both are logged and the call goes on.
   */
  invoke<R>(impl: Invocable<R>, args: readonly unknown[], kwargs: Keywords = {}): R {
    if (this.options.checkArgs) {
      this.enforce(this.explainArguments(args, kwargs));
    }

    const result = impl(args, kwargs);

    if (this.options.checkReturn) {
      this.enforce(this.explainReturn(result));
    }
    return result;
  }

  private enforce(err: TypeCheckError | null): void {
    if (!err) return;
    if (this.options.onMismatch === "throw") throw err;
    this.options.logger.warn(`${this.name}: ${err.trace}`);
  }
}
