/**
 * Wire Shape Inference Engine
 *
 * Decides how the wire counterpart of a domain field is shaped, trying each
 * tier in order and stopping at the first answer:
 *
 *   1. explicit `optional` / `required` directive
 *   2. side channel lookup
 *   3. structural pattern of the domain shape
 *   4. usage pattern (`expect` / `default`), then the remaining structural
 *      patterns and the aggregate heuristic
 *
 * Nothing resolved means AmbiguousOptionality; there is no silent default.
 */

import type { FieldAnnotation, Optionality } from "../types/annotation.js";
import { hasCustomFunction, hasUsageIndicator } from "../types/annotation.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import { ok, error } from "../types/result.js";
import type {
  DomainFieldShape,
  InferenceTier,
  WireFieldShape,
  WireMapping,
} from "../types/shapes.js";
import { createWireShape } from "../types/shapes.js";
import type { SideChannel } from "./side-channel.js";

export const INFERRED_NOTE = "inferred, not verified";

export type InferenceInput = {
  readonly aggregate: string;
  readonly field: string;
  readonly shape: DomainFieldShape;
  readonly annotation: FieldAnnotation;
  readonly sideChannel: SideChannel;
  /** Refuse to guess the optionality of aggregate-typed fields */
  readonly strictAggregates: boolean;
};

/**
 * Mapping follows the domain shape; optional scalars become `optional`.
 */
export const wireMappingFor = (
  shape: DomainFieldShape,
  annotation: FieldAnnotation,
  optionality: Optionality
): WireMapping => {
  switch (shape.kind) {
    case "nullable":
      return wireMappingFor(shape.inner, annotation, optionality);
    case "sequence":
      return "repeated";
    case "customAggregate":
      return hasCustomFunction(annotation) ? "customDerived" : "message";
    case "opaque":
      return "customDerived";
    case "primitive":
    case "taggedEnum":
    case "transparent":
      return optionality === "optional" ? "optional" : "scalar";
  }
};

const shapeWith = (
  input: InferenceInput,
  optionality: Optionality,
  source: InferenceTier,
  note?: string
): WireFieldShape =>
  createWireShape(
    wireMappingFor(input.shape, input.annotation, optionality),
    optionality,
    source,
    note
  );

export const inferWireShape = (
  input: InferenceInput
): Result<WireFieldShape, Diagnostic> => {
  const { shape, annotation } = input;

  // Tier 1
  if (annotation.explicitOptionality !== undefined) {
    return ok(shapeWith(input, annotation.explicitOptionality, "explicit"));
  }

  // Tier 2
  const answer = input.sideChannel.lookup(input.aggregate, input.field);
  if (answer !== undefined) {
    return ok(shapeWith(input, answer ? "optional" : "required", "sideChannel"));
  }

  // Tier 3
  if (shape.kind === "nullable") {
    return ok(shapeWith(input, "optional", "structural"));
  }
  if (shape.kind === "sequence") {
    return ok(shapeWith(input, "required", "structural"));
  }

  // Tier 4: absence-handling directives only make sense on absentable fields
  if (hasUsageIndicator(annotation)) {
    return ok(shapeWith(input, "optional", "usagePattern"));
  }

  switch (shape.kind) {
    case "primitive":
    case "taggedEnum":
    case "transparent":
    case "opaque":
      return ok(shapeWith(input, "required", "structural"));
    case "customAggregate":
      if (!input.strictAggregates) {
        return ok(shapeWith(input, "optional", "usagePattern", INFERRED_NOTE));
      }
      break;
  }

  return error(
    createDiagnostic(
      "AmbiguousOptionality",
      input.aggregate,
      input.field,
      `Cannot determine whether the wire field for '${input.field}' is optional`,
      "Mark the field 'optional' or 'required'"
    )
  );
};
