/**
 * Strategy Validator
 *
 * Checks the structural preconditions of a resolved strategy. A strategy
 * that reaches the synthesizer is known to fit its field.
 */

import type { TypeTable } from "../config.js";
import type { FieldAnnotation } from "../types/annotation.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import { ok, error } from "../types/result.js";
import type { DomainFieldShape, WireFieldShape } from "../types/shapes.js";
import { findOpaqueText, isSequenceShaped, isWireOptional } from "../types/shapes.js";
import type { ConversionStrategy } from "../types/strategy.js";
import { describeStrategy } from "../types/strategy.js";
import { domainZeroValue, wireZeroValue } from "./zero-values.js";

export type ValidationInput = {
  readonly aggregate: string;
  readonly field: string;
  readonly shape: DomainFieldShape;
  readonly wire: WireFieldShape;
  readonly annotation: FieldAnnotation;
  readonly strategy: ConversionStrategy;
  readonly table: TypeTable;
  readonly wireNamespace: string;
};

export const validateStrategy = (
  input: ValidationInput
): Result<ConversionStrategy, Diagnostic> => {
  const violation = findViolation(input);
  return violation === undefined ? ok(input.strategy) : error(violation);
};

const findViolation = (input: ValidationInput): Diagnostic | undefined => {
  const { strategy, shape, wire, annotation } = input;

  const violated = (reason: string, suggestedFix: string): Diagnostic =>
    createDiagnostic(
      "StrategyPreconditionViolation",
      input.aggregate,
      input.field,
      `${describeStrategy(strategy)}: ${reason}`,
      suggestedFix
    );

  const missingDefault = (): Diagnostic | undefined =>
    annotation.default?.kind !== "customFn" &&
    domainZeroValue(shape, input.table) === undefined
      ? violated(
          `type '${describeDomainType(shape)}' has no zero value`,
          'Name a default function with default = "fn"'
        )
      : undefined;

  const opaque = findOpaqueText(shape);
  const convertsOpaque =
    strategy.kind === "ignore" ||
    (strategy.kind === "custom" && strategy.from !== undefined && strategy.to !== undefined);
  if (opaque !== undefined && !convertsOpaque) {
    return createDiagnostic(
      "UnsupportedFieldType",
      input.aggregate,
      input.field,
      `No conversion is generated for type '${opaque}'`,
      "Convert it with from_wire_fn and to_wire_fn, or mark the field ignore"
    );
  }

  switch (strategy.kind) {
    case "ignore":
      if (!annotation.ignore) {
        return violated("field does not carry 'ignore'", "Add the 'ignore' directive");
      }
      return missingDefault();

    case "custom":
      if (
        strategy.from === "" ||
        strategy.to === "" ||
        (strategy.from === undefined && strategy.to === undefined)
      ) {
        return createDiagnostic(
          "EmptyCustomFunctionReference",
          input.aggregate,
          input.field,
          "Custom conversion function name is empty",
          'Name the function, e.g. from_wire_fn = "parseValue"'
        );
      }
      return strategy.errorMode.kind === "default" ? missingDefault() : undefined;

    case "direct":
      return undefined;

    case "option":
      if (strategy.variant === "wrap") {
        if (shape.kind !== "nullable") {
          return violated(
            "domain field is not nullable",
            "Declare the field as T | undefined or choose another conversion"
          );
        }
        if (isWireOptional(wire)) {
          return violated(
            "wire field is already optional",
            "Remove the 'required' marker"
          );
        }
        if (
          wireZeroValue(shape, input.table, input.wireNamespace) === undefined
        ) {
          return violated(
            "no wire value exists for an absent domain value",
            "Use custom conversion functions"
          );
        }
        return undefined;
      }
      // A declared default applies wherever optionality sits
      const unwrapsWithDefault =
        strategy.variant === "unwrap" && strategy.errorMode.kind === "default";
      if (!isWireOptional(wire) && !unwrapsWithDefault) {
        return violated(
          "wire field is required",
          "Mark the field 'optional', or drop 'required'"
        );
      }
      if (strategy.variant === "map" && shape.kind !== "nullable") {
        return violated(
          "domain field is not nullable",
          "Declare the field as T | undefined"
        );
      }
      if (
        strategy.variant === "unwrap" &&
        strategy.errorMode.kind === "default"
      ) {
        return missingDefault();
      }
      return undefined;

    case "transparent":
      if (!annotation.transparent) {
        return violated(
          "field does not carry 'transparent'",
          "Add the 'transparent' directive"
        );
      }
      if (strategy.errorMode.kind === "default") {
        return missingDefault();
      }
      return undefined;

    case "collection":
      if (!isSequenceShaped(shape) && wire.mapping !== "repeated") {
        return violated(
          "neither the domain nor the wire field is a sequence",
          "Declare the field as an array"
        );
      }
      if (strategy.variant === "mapOption" && shape.kind !== "nullable") {
        return violated(
          "domain sequence is not nullable",
          "Declare the field as T[] | undefined"
        );
      }
      return undefined;
  }
};

const describeDomainType = (shape: DomainFieldShape): string => {
  switch (shape.kind) {
    case "taggedEnum":
    case "customAggregate":
    case "primitive":
      return shape.name;
    case "opaque":
      return shape.text;
    case "transparent":
      return shape.name ?? "TransparentWrapper";
    case "nullable":
      return `${describeDomainType(shape.inner)} | ${shape.absent}`;
    case "sequence":
      return `${describeDomainType(shape.inner)}[]`;
  }
};
