/**
 * Conversion strategy taxonomy and per-aggregate plans
 */

import type { FieldAnnotation } from "./annotation.js";
import type { Diagnostic } from "./diagnostic.js";
import type { DomainFieldShape, WireFieldShape } from "./shapes.js";

export type ErrorMode =
  | { readonly kind: "none" }
  | { readonly kind: "panic" }
  | { readonly kind: "error" }
  | { readonly kind: "default"; readonly fn?: string };

export type ConversionStrategy =
  | { readonly kind: "ignore" }
  | {
      readonly kind: "custom";
      readonly from?: string;
      readonly to?: string;
      readonly errorMode: ErrorMode;
    }
  | {
      readonly kind: "direct";
      readonly variant: "assignment" | "withConversion";
    }
  | { readonly kind: "option"; readonly variant: "wrap" | "map" }
  | {
      readonly kind: "option";
      readonly variant: "unwrap";
      readonly errorMode: ErrorMode;
    }
  | { readonly kind: "transparent"; readonly errorMode: ErrorMode }
  | { readonly kind: "collection"; readonly variant: "mapOption" }
  | { readonly kind: "collection"; readonly variant: "directAssignment" }
  | {
      readonly kind: "collection";
      readonly variant: "collect";
      readonly errorMode: ErrorMode;
    };

export const NONE: ErrorMode = { kind: "none" };
export const PANIC: ErrorMode = { kind: "panic" };
export const ERROR: ErrorMode = { kind: "error" };

export const defaultMode = (fn?: string): ErrorMode =>
  fn === undefined ? { kind: "default" } : { kind: "default", fn };

export const errorModeOf = (
  strategy: ConversionStrategy
): ErrorMode | undefined => ("errorMode" in strategy ? strategy.errorMode : undefined);

export const isErrorModed = (strategy: ConversionStrategy): boolean =>
  errorModeOf(strategy)?.kind === "error";

const capitalize = (text: string): string =>
  text.charAt(0).toUpperCase() + text.slice(1);

export const describeErrorMode = (mode: ErrorMode): string => {
  if (mode.kind === "default") {
    return mode.fn === undefined ? "Default" : `Default(${mode.fn})`;
  }
  return capitalize(mode.kind);
};

/**
 * Render a strategy the way diagnostics and `plan` output show it,
 * e.g. `Option.Unwrap(Default(defaultCount))`.
 */
export const describeStrategy = (strategy: ConversionStrategy): string => {
  switch (strategy.kind) {
    case "ignore":
      return "Ignore";
    case "custom": {
      const parts = [
        strategy.from !== undefined ? `from=${strategy.from}` : undefined,
        strategy.to !== undefined ? `to=${strategy.to}` : undefined,
      ].filter((part): part is string => part !== undefined);
      return `Custom{${parts.join(", ")}}`;
    }
    case "direct":
      return `Direct.${capitalize(strategy.variant)}`;
    case "option":
      return strategy.variant === "unwrap"
        ? `Option.Unwrap(${describeErrorMode(strategy.errorMode)})`
        : `Option.${capitalize(strategy.variant)}`;
    case "transparent":
      return `Transparent(${describeErrorMode(strategy.errorMode)})`;
    case "collection":
      return strategy.variant === "collect"
        ? `Collection.Collect(${describeErrorMode(strategy.errorMode)})`
        : `Collection.${capitalize(strategy.variant)}`;
  }
};

export type FieldPlan = {
  readonly field: string; // Domain property name
  readonly wireField: string; // Wire property name after `rename`
  readonly shape: DomainFieldShape;
  readonly wire: WireFieldShape;
  readonly strategy: ConversionStrategy;
  readonly annotation: FieldAnnotation;
};

export type StructConversionPlan = {
  readonly aggregate: string;
  readonly wireName: string;
  readonly namespace: string;
  readonly fields: readonly FieldPlan[];
  readonly needsFallibleConversion: boolean;
  readonly generatedErrorTypeName?: string;
  /** Members of the error union, in first-use order */
  readonly errorTypes: readonly string[];
  readonly warnings: readonly Diagnostic[];
};
