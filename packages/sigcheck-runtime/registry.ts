// packages/sigcheck-runtime/registry.ts
// Validator registry: memoized dispatch from description to validator

import { match as patternMatch, P } from "ts-pattern";
import {
  describeType,
  isConstructor,
  isTypeDesc,
  type TypeDesc,
  type TypeLike,
} from "sigcheck-type-spec";
import { formatValue, TypeDescriptionError } from "./errors.ts";
import {
  acceptAll,
  ListValidator,
  MapValidator,
  PrimitiveValidator,
  SetValidator,
  TupleValidator,
  type Validator,
} from "./validators.ts";

/**
 * Cache from description to validator, filled on first use and never
 * evicted. A description object maps to exactly one validator instance
 * for the registry's lifetime; lookup is by identity, so two
 * structurally equal descriptions get separate entries.
 *
 * @example
 * ```ts
 * const registry = new TypeRegistry();
 * const pairs = registry.get(t.list(t.tuple(t.string, t.integer)));
 * pairs.test([["a", 1], ["b", 2]]);
 * ```
 */
export class TypeRegistry {
  private readonly cache = new Map<TypeLike, Validator>();

  /**
   * Validator for `desc`. An absent description accepts anything.
   *
   * @throws TypeDescriptionError if `desc` is neither a description nor a class
   */
  get(desc: TypeLike | undefined): Validator {
    if (desc === undefined) return acceptAll;

    let validator = this.cache.get(desc);
    if (!validator) {
      validator = this.create(desc);
      this.cache.set(desc, validator);
    }
    return validator;
  }

  has(desc: TypeLike): boolean {
    return this.cache.has(desc);
  }

  get size(): number {
    return this.cache.size;
  }

  // Children come from this registry, so nested descriptions are cached too
  private create(desc: TypeLike): Validator {
    if (isConstructor(desc)) return PrimitiveValidator.forConstructor(desc);
    if (!isTypeDesc(desc)) {
      throw new TypeDescriptionError(
        `Not a type description: ${formatValue(desc)}`,
      );
    }

    return patternMatch<TypeDesc, Validator>(desc)
      .with({ kind: P.union("any", "none") }, () => acceptAll)
      // Length and elements of variadic tuples are not checked
      .with(
        { kind: "variadic" },
        (d) => new PrimitiveValidator(describeType(d), Array.isArray),
      )
      .with(
        { kind: "tuple" },
        (d) =>
          new TupleValidator(
            describeType(d),
            d.elements.map((e) => this.get(e)),
          ),
      )
      .with(
        { kind: "list" },
        (d) => new ListValidator(describeType(d), this.get(d.element)),
      )
      .with(
        { kind: "map" },
        (d) =>
          new MapValidator(
            describeType(d),
            this.get(d.key),
            this.get(d.value),
          ),
      )
      .with(
        { kind: "set" },
        (d) => new SetValidator(describeType(d), this.get(d.element)),
      )
      .with({ kind: "primitive" }, (d) => PrimitiveValidator.forPrimitive(d.name))
      .with({ kind: "instance" }, (d) => PrimitiveValidator.forConstructor(d.ctor))
      .exhaustive();
  }
}

/**
 * Registry used when no other is passed. Created once when the module
 * loads; pass a registry of your own to keep caches apart.
 */
export const sharedRegistry = new TypeRegistry();
