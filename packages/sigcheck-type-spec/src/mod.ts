// packages/sigcheck-type-spec/src/mod.ts
// Type-description language: immutable, tagged descriptions with **nested** structure.

export type PrimitiveName =
  | "string"
  | "number"
  | "integer"
  | "bigint"
  | "boolean"
  | "symbol"
  | "function"
  | "object"
  | "null"
  | "undefined";

// Class-like value accepted wherever a description is expected
export type Constructor<T = unknown> = abstract new (...args: never[]) => T;

export interface AnyDesc {
  readonly kind: "any";
}

export interface NoneDesc {
  readonly kind: "none";
}

export interface PrimitiveDesc<N extends PrimitiveName = PrimitiveName> {
  readonly kind: "primitive";
  readonly name: N;
}

export interface InstanceDesc<T = unknown> {
  readonly kind: "instance";
  readonly ctor: Constructor<T>;
}

export interface TupleDesc<E extends readonly TypeLike[] = readonly TypeLike[]> {
  readonly kind: "tuple";
  readonly elements: E;
}

export interface ListDesc<E extends TypeLike = TypeLike> {
  readonly kind: "list";
  readonly element: E;
}

export interface MapDesc<K extends TypeLike = TypeLike, V extends TypeLike = TypeLike> {
  readonly kind: "map";
  readonly key: K;
  readonly value: V;
}

export interface SetDesc<E extends TypeLike = TypeLike> {
  readonly kind: "set";
  readonly element: E;
}

// Tuple of unknown length; only the runtime shape is checked
export interface VariadicDesc<E extends TypeLike = TypeLike> {
  readonly kind: "variadic";
  readonly element: E;
}

export type TypeDesc =
  | AnyDesc
  | NoneDesc
  | PrimitiveDesc
  | InstanceDesc
  | TupleDesc
  | ListDesc
  | MapDesc
  | SetDesc
  | VariadicDesc;

export type TypeKind = TypeDesc["kind"];

export type TypeLike = TypeDesc | Constructor;

const KINDS: ReadonlySet<string> = new Set<TypeKind>([
  "any",
  "none",
  "primitive",
  "instance",
  "tuple",
  "list",
  "map",
  "set",
  "variadic",
]);

type PrimitiveTypes = {
  string: string;
  number: number;
  integer: number;
  bigint: bigint;
  boolean: boolean;
  symbol: symbol;
  function: (...args: never[]) => unknown;
  object: object;
  null: null;
  undefined: undefined;
};

/**
 * Static type of the values a description accepts.
 *
 * @example
 * ```ts
 * const Scores$ = t.map(t.string, t.list(t.integer));
 * type Scores = Infer<typeof Scores$>;
 * // Map<string, number[]> | Record<string, number[]>
 * ```
 */
export type Infer<D> = D extends AnyDesc | NoneDesc ? unknown
  : D extends PrimitiveDesc<infer N extends PrimitiveName> ? PrimitiveTypes[N]
  : D extends InstanceDesc<infer I> ? I
  : D extends TupleDesc<infer E> ? { -readonly [K in keyof E]: Infer<E[K]> }
  : D extends ListDesc<infer E> ? Infer<E>[]
  : D extends MapDesc<infer K, infer V>
    ? Map<Infer<K>, Infer<V>> | Record<string, Infer<V>>
  : D extends SetDesc<infer E> ? Set<Infer<E>>
  : D extends VariadicDesc ? unknown[]
  : D extends NumberConstructor ? number
  : D extends StringConstructor ? string
  : D extends BooleanConstructor ? boolean
  : D extends FunctionConstructor ? (...args: never[]) => unknown
  : D extends ObjectConstructor ? object
  : D extends Constructor<infer I> ? I
  : unknown;

// Builtin wrappers stand for their primitive, not for boxed instances
const CONSTRUCTOR_PRIMITIVES = new Map<Constructor, PrimitiveName>([
  [Number, "number"],
  [String, "string"],
  [Boolean, "boolean"],
  [Function, "function"],
  [Object, "object"],
]);

export function primitiveOfConstructor(
  ctor: Constructor,
): PrimitiveName | undefined {
  return CONSTRUCTOR_PRIMITIVES.get(ctor);
}

export function isConstructor(x: unknown): x is Constructor {
  return typeof x === "function";
}

export function isTypeDesc(x: unknown): x is TypeDesc {
  return typeof x === "object" && x !== null && "kind" in x &&
    typeof x.kind === "string" && KINDS.has(x.kind);
}

export function isTypeLike(x: unknown): x is TypeLike {
  return isConstructor(x) || isTypeDesc(x);
}

function primitive<N extends PrimitiveName>(name: N): PrimitiveDesc<N> {
  return Object.freeze({ kind: "primitive" as const, name });
}

const ANY: AnyDesc = Object.freeze({ kind: "any" as const });
const NONE: NoneDesc = Object.freeze({ kind: "none" as const });

/**
 * Description builders.
 *
 * Leaf descriptions are singletons, so they share one validator per
 * registry. Container builders return a new frozen description per call.
 *
 * @example
 * ```ts
 * const Point$ = t.tuple(t.integer, t.number);
 * const Tags$ = t.set(t.string);
 * const Index$ = t.map(t.string, t.list(Point$));
 * ```
 */
export const t = {
  any: ANY,
  none: NONE,

  string: primitive("string"),
  number: primitive("number"),
  integer: primitive("integer"),
  bigint: primitive("bigint"),
  boolean: primitive("boolean"),
  symbol: primitive("symbol"),
  function: primitive("function"),
  object: primitive("object"),
  null: primitive("null"),
  undefined: primitive("undefined"),

  instance<T>(ctor: Constructor<T>): InstanceDesc<T> {
    return Object.freeze({ kind: "instance" as const, ctor });
  },

  tuple<E extends readonly TypeLike[]>(...elements: E): TupleDesc<E> {
    return Object.freeze({ kind: "tuple" as const, elements });
  },

  list<E extends TypeLike>(element: E): ListDesc<E> {
    return Object.freeze({ kind: "list" as const, element });
  },

  map<K extends TypeLike, V extends TypeLike>(key: K, value: V): MapDesc<K, V> {
    return Object.freeze({ kind: "map" as const, key, value });
  },

  set<E extends TypeLike>(element: E): SetDesc<E> {
    return Object.freeze({ kind: "set" as const, element });
  },

  variadic<E extends TypeLike>(element: E): VariadicDesc<E> {
    return Object.freeze({ kind: "variadic" as const, element });
  },
};

function constructorName(ctor: Constructor): string {
  return ctor.name || "<anonymous class>";
}

/**
 * Human-readable form of a description, as used in mismatch messages.
 *
 * `t.list(t.tuple(t.integer, t.number))` renders as `Array<[integer, number]>`.
 */
export function describeType(desc: TypeLike | undefined): string {
  if (desc === undefined) return "any";
  if (isConstructor(desc)) {
    return primitiveOfConstructor(desc) ?? constructorName(desc);
  }
  switch (desc.kind) {
    case "any":
      return "any";
    case "none":
      return "void";
    case "primitive":
      return desc.name;
    case "instance":
      return constructorName(desc.ctor);
    case "tuple":
      return `[${desc.elements.map(describeType).join(", ")}]`;
    case "list":
      return `Array<${describeType(desc.element)}>`;
    case "map":
      return `Map<${describeType(desc.key)}, ${describeType(desc.value)}>`;
    case "set":
      return `Set<${describeType(desc.element)}>`;
    case "variadic":
      return `[${describeType(desc.element)}, ...]`;
  }
}
