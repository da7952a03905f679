// packages/sigcheck-runtime/call-binding.test.ts
import { expect, test, vi } from "vitest";
import { t } from "sigcheck-type-spec";
import { CallBinding, type Keywords, type Signature } from "./call-binding.ts";
import { AnnotationError, TypeCheckError } from "./errors.ts";
import { TypeRegistry } from "./registry.ts";
import { acceptAll } from "./validators.ts";

// (a: integer, ...b: number, c: [integer, number], **d: integer[]) -> number
const total: Signature = {
  name: "total",
  params: [{ name: "a", type: t.integer }],
  restParam: { name: "b", type: t.number },
  keywordParams: [{ name: "c", type: t.tuple(t.integer, t.number) }],
  keywordRestParam: { name: "d", type: t.list(t.integer) },
  returns: t.number,
};

function sum(args: readonly unknown[], kwargs: Keywords): number {
  const values = [...args, ...Object.values(kwargs).flat()];
  return values.reduce<number>((acc, x) => acc + Number(x), 0);
}

test("CallBinding - conforming call returns the result", () => {
  const binding = new CallBinding(total);
  const result = binding.invoke(sum, [0, 1, 1.5], {
    c: [2, 3.5],
    d0: [3, 4],
    d1: [5, 6],
  });
  expect(result).toBe(26);
});

test("CallBinding - bad positional stops the call", () => {
  const binding = new CallBinding(total);
  const impl = vi.fn(sum);

  expect(() => binding.invoke(impl, [0.5, 1], { c: [2, 3], d: [3] })).toThrow(
    TypeCheckError,
  );
  expect(impl).not.toHaveBeenCalled();
  expect(binding.explainArguments([0.5, 1], { c: [2, 3] })?.chain).toEqual([
    `Positional argument "a" takes an incompatible value.`,
    `Expect: "integer". Actual "number(0.5)".`,
  ]);
});

test("CallBinding - rest positionals report their absolute index", () => {
  const binding = new CallBinding(total);
  expect(binding.explainArguments([0, 1, "x"])?.chain).toEqual([
    "Positional argument #2 takes an incompatible value.",
    `Expect: "number". Actual "string('x')".`,
  ]);
});

test("CallBinding - keyword-only argument mismatch", () => {
  const binding = new CallBinding(total);
  expect(binding.explainArguments([0, 1], { c: 2 })?.chain).toEqual([
    `Keyword argument "c" takes an incompatible value.`,
    `Expect: "[integer, number]". Actual "number(2)".`,
  ]);
  expect(binding.explainArguments([0], { c: [2.5, 3] })?.chain).toEqual([
    `Keyword argument "c" takes an incompatible value.`,
    "Element #0 has incompatible type.",
    `Expect: "integer". Actual "number(2.5)".`,
  ]);
});

test("CallBinding - undeclared keywords go to the keyword rest slot", () => {
  const binding = new CallBinding(total);
  expect(binding.explainArguments([0], { c: [2, 3], d: 3 })?.chain).toEqual([
    `Keyword argument "d" takes an incompatible value.`,
    `Expect: "Array<integer>". Actual "number(3)".`,
  ]);
  expect(binding.explainArguments([0], { e: [1], f: [] })).toBeNull();
});

test("CallBinding - keywords may name positional parameters", () => {
  const binding = new CallBinding(total);
  expect(binding.explainArguments([], { a: 1 })).toBeNull();
  expect(binding.explainArguments([], { a: "x" })?.chain).toEqual([
    `Keyword argument "a" takes an incompatible value.`,
    `Expect: "integer". Actual "string('x')".`,
  ]);
});

test("CallBinding - arity is left to the callable", () => {
  const binding = new CallBinding({
    name: "one",
    params: [{ name: "x", type: t.string }],
  });
  expect(binding.rest).toBe(acceptAll);
  expect(binding.keywordRest).toBe(acceptAll);
  expect(binding.explainArguments(["a", 1, null], { y: 2 })).toBeNull();
  expect(binding.explainArguments([])).toBeNull();
});

test("CallBinding - unannotated slots accept anything", () => {
  const binding = new CallBinding({
    params: [{ name: "x" }],
    restParam: { name: "rest" },
  });
  expect(binding.name).toBe("<anonymous>");
  expect(binding.returns).toBe(acceptAll);
  expect(binding.explainArguments([Symbol("s"), null])).toBeNull();
});

test("CallBinding - bad positional default fails the binding", () => {
  let caught: unknown;
  try {
    new CallBinding({ params: [{ name: "x", type: t.integer, default: "x" }] });
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(TypeCheckError);
  if (caught instanceof TypeCheckError) {
    expect(caught.chain).toEqual([
      `Positional argument "x" has an incompatible default value.`,
      `Expect: "integer". Actual "string('x')".`,
    ]);
  }
});

test("CallBinding - bad keyword-only default fails the binding", () => {
  expect(
    () =>
      new CallBinding({
        keywordParams: [{ name: "k", type: t.set(t.string), default: [] }],
      }),
  ).toThrow(`Keyword-only argument "k" has an incompatible default value.`);
});

test("CallBinding - an explicit undefined default is checked", () => {
  expect(
    () =>
      new CallBinding({
        params: [{ name: "n", type: t.integer, default: undefined }],
      }),
  ).toThrow(TypeCheckError);
  expect(
    () => new CallBinding({ params: [{ name: "n", type: t.integer }] }),
  ).not.toThrow();
});

test("CallBinding - good defaults pass", () => {
  const binding = new CallBinding({
    params: [{ name: "n", type: t.integer, default: 3 }],
    keywordParams: [{ name: "tags", type: t.set(t.string), default: new Set() }],
  });
  expect(binding.params.size).toBe(1);
  expect(binding.keywordParams.size).toBe(1);
});

test("CallBinding - forceAnnotations rejects missing types", () => {
  const options = { forceAnnotations: true };
  expect(
    () =>
      new CallBinding(
        { name: "f", params: [{ name: "x" }], returns: t.none },
        options,
      ),
  ).toThrow(
    new AnnotationError(
      `Function "f" must be fully annotated: parameter "x" has no type.`,
    ),
  );
  expect(
    () => new CallBinding({ name: "f", params: [{ name: "x", type: t.string }] }, options),
  ).toThrow(`Function "f" must be fully annotated: return value has no type.`);
  expect(
    () =>
      new CallBinding(
        { name: "f", restParam: { name: "xs" }, returns: t.none },
        options,
      ),
  ).toThrow(`Function "f" must be fully annotated: parameter "...xs" has no type.`);
});

test("CallBinding - forceAnnotations ignores absent rest slots", () => {
  const binding = new CallBinding(total, { forceAnnotations: true });
  const plain = new CallBinding(
    { name: "g", params: [], returns: t.string },
    { forceAnnotations: true },
  );
  expect(binding.name).toBe("total");
  expect(plain.rest).toBe(acceptAll);
});

test("CallBinding - bad return is raised after the call ran", () => {
  const log: string[] = [];
  const binding = new CallBinding({ name: "h", returns: t.number });
  const impl = () => {
    log.push("ran");
    return "nope";
  };

  expect(() => binding.invoke(impl, [])).toThrow("Return value is incompatible.");
  expect(log).toEqual(["ran"]);
  expect(binding.explainReturn("nope")?.chain).toEqual([
    "Return value is incompatible.",
    `Expect: "number". Actual "string('nope')".`,
  ]);
});

test("CallBinding - checkArguments and checkReturn", () => {
  const binding = new CallBinding(total);
  expect(() => binding.checkArguments([0.5])).toThrow(
    `Positional argument "a" takes an incompatible value.`,
  );
  expect(() => binding.checkArguments([1, 2])).not.toThrow();
  expect(binding.checkReturn(1.5)).toBe(1.5);
  expect(() => binding.checkReturn(null)).toThrow(TypeCheckError);
});

test("CallBinding - disabled checks let mismatches through", () => {
  const noArgs = new CallBinding(total, { checkArgs: false });
  expect(noArgs.invoke(sum, [0.5])).toBe(0.5);

  const noReturn = new CallBinding(
    { returns: t.string },
    { checkReturn: false },
  );
  expect(noReturn.invoke(() => 42, [])).toBe(42);
});

test("CallBinding - warn policy logs and lets the call go on", () => {
  const logger = { warn: vi.fn() };
  const binding = new CallBinding(total, { onMismatch: "warn", logger });
  const impl = vi.fn(() => "done");

  expect(binding.invoke(impl, [0.5, 1])).toBe("done");
  expect(impl).toHaveBeenCalledOnce();
  expect(logger.warn).toHaveBeenCalledTimes(2);
  expect(logger.warn).toHaveBeenNthCalledWith(
    1,
    `total: Positional argument "a" takes an incompatible value.\n` +
      `Expect: "integer". Actual "number(0.5)".`,
  );
  expect(logger.warn).toHaveBeenNthCalledWith(
    2,
    "total: Return value is incompatible.\n" +
      `Expect: "number". Actual "string('done')".`,
  );
});

test("CallBinding - warn policy still throws on construction failures", () => {
  expect(
    () =>
      new CallBinding(
        { params: [{ name: "x", type: t.integer, default: "x" }] },
        { onMismatch: "warn", logger: { warn: () => {} } },
      ),
  ).toThrow(TypeCheckError);
});

test("CallBinding - validators come from the configured registry", () => {
  const registry = new TypeRegistry();
  const binding = new CallBinding(total, { registry });
  expect(binding.params.get("a")).toBe(registry.get(t.integer));
  expect(registry.has(t.number)).toBe(true);
});
