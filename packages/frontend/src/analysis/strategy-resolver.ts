/**
 * Strategy Resolver
 *
 * First match wins:
 *   1. ignore
 *   2. custom conversion functions
 *   3. transparent wrapper
 *   4. collections
 *   5. declared default
 *   6. (domain nullable, wire optional) matrix
 */

import type { FieldAnnotation } from "../types/annotation.js";
import { defaultFunction, hasCustomFunction } from "../types/annotation.js";
import type { DomainFieldShape, WireFieldShape } from "../types/shapes.js";
import { isSequenceShaped, isWireOptional } from "../types/shapes.js";
import type { ConversionStrategy, ErrorMode } from "../types/strategy.js";
import { ERROR, NONE, PANIC, defaultMode } from "../types/strategy.js";
import { isQualifiedBy } from "./type-text.js";

export type ResolverInput = {
  readonly shape: DomainFieldShape;
  readonly wire: WireFieldShape;
  readonly annotation: FieldAnnotation;
  readonly wireNamespace: string;
};

/**
 * Error mode chosen by `expect` or `default`, or `fallback` when neither
 * directive is present.
 */
export const errorModeFor = (
  annotation: FieldAnnotation,
  fallback: ErrorMode
): ErrorMode => {
  if (annotation.expectMode === "panic") return PANIC;
  if (annotation.expectMode === "error") return ERROR;
  if (annotation.default !== undefined) {
    return defaultMode(defaultFunction(annotation));
  }
  return fallback;
};

/**
 * A type that already lives in the wire module needs no conversion.
 */
export const isWireTyped = (
  shape: DomainFieldShape,
  wireNamespace: string
): boolean =>
  shape.kind === "customAggregate" && isQualifiedBy(shape.name, wireNamespace);

const isStructurallyIdentical = (input: ResolverInput): boolean =>
  (input.shape.kind === "primitive" && input.wire.mapping === "scalar") ||
  isWireTyped(input.shape, input.wireNamespace);

export const resolveStrategy = (input: ResolverInput): ConversionStrategy => {
  const { shape, wire, annotation } = input;
  const domainNullable = shape.kind === "nullable";
  const wireOptional = isWireOptional(wire);

  if (annotation.ignore) {
    return { kind: "ignore" };
  }

  if (hasCustomFunction(annotation)) {
    return {
      kind: "custom",
      ...(annotation.fromWireFn !== undefined ? { from: annotation.fromWireFn } : {}),
      ...(annotation.toWireFn !== undefined ? { to: annotation.toWireFn } : {}),
      errorMode: errorModeFor(
        annotation,
        wireOptional && !domainNullable ? PANIC : NONE
      ),
    };
  }

  if (annotation.transparent) {
    return {
      kind: "transparent",
      errorMode: errorModeFor(annotation, wireOptional && !domainNullable ? PANIC : NONE),
    };
  }

  if (isSequenceShaped(shape) || wire.mapping === "repeated") {
    if (shape.kind === "nullable") {
      return { kind: "collection", variant: "mapOption" };
    }
    if (shape.kind === "sequence" && isWireTyped(shape.inner, input.wireNamespace)) {
      return { kind: "collection", variant: "directAssignment" };
    }
    return {
      kind: "collection",
      variant: "collect",
      errorMode: errorModeFor(annotation, NONE),
    };
  }

  if (annotation.default !== undefined) {
    return {
      kind: "option",
      variant: "unwrap",
      errorMode: defaultMode(defaultFunction(annotation)),
    };
  }

  if (!domainNullable && !wireOptional) {
    return {
      kind: "direct",
      variant: isStructurallyIdentical(input) ? "assignment" : "withConversion",
    };
  }
  if (!domainNullable && wireOptional) {
    // Fail loud rather than drop a missing value
    return {
      kind: "option",
      variant: "unwrap",
      errorMode: annotation.expectMode === "error" ? ERROR : PANIC,
    };
  }
  if (domainNullable && !wireOptional) {
    return { kind: "option", variant: "wrap" };
  }
  return { kind: "option", variant: "map" };
};
