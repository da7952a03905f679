// packages/sigcheck-runtime/options.ts
// Options for call bindings and checked callables

import { sharedRegistry, type TypeRegistry } from "./registry.ts";

/**
 * What an invocation-time mismatch does: abort with the error, or report
 * it through the logger and let the call go on.
 */
export type MismatchPolicy = "throw" | "warn";

export interface Logger {
  warn(message: string): void;
}

export interface CheckOptions {
  /** Validate arguments before the call (default: true) */
  readonly checkArgs?: boolean;
  /** Validate the returned value (default: true) */
  readonly checkReturn?: boolean;
  /** Every parameter and the return must carry a type (default: false) */
  readonly forceAnnotations?: boolean;
  readonly onMismatch?: MismatchPolicy;
  /** Receives warnings when `onMismatch` is "warn" (default: console) */
  readonly logger?: Logger;
  readonly registry?: TypeRegistry;
}

export type ResolvedCheckOptions = Required<CheckOptions>;

export const DEFAULT_CHECK_OPTIONS: ResolvedCheckOptions = Object.freeze({
  checkArgs: true,
  checkReturn: true,
  forceAnnotations: false,
  onMismatch: "throw",
  logger: console,
  registry: sharedRegistry,
});

const POLICIES: readonly MismatchPolicy[] = ["throw", "warn"];

export function resolveOptions(options: CheckOptions = {}): ResolvedCheckOptions {
  const onMismatch = options.onMismatch ?? DEFAULT_CHECK_OPTIONS.onMismatch;
  if (!POLICIES.includes(onMismatch)) {
    throw new TypeError(
      `Unknown mismatch policy "${onMismatch}"; expected one of: ${
        POLICIES.join(", ")
      }`,
    );
  }

  return {
    checkArgs: options.checkArgs ?? DEFAULT_CHECK_OPTIONS.checkArgs,
    checkReturn: options.checkReturn ?? DEFAULT_CHECK_OPTIONS.checkReturn,
    forceAnnotations: options.forceAnnotations ??
      DEFAULT_CHECK_OPTIONS.forceAnnotations,
    onMismatch,
    logger: options.logger ?? DEFAULT_CHECK_OPTIONS.logger,
    registry: options.registry ?? DEFAULT_CHECK_OPTIONS.registry,
  };
}
