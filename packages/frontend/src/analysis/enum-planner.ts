/**
 * Variant matching for tagged enumerations
 */

import type { GenerationConfig } from "../config.js";
import type { EnumDescriptor } from "../types/descriptor.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import { ok, error } from "../types/result.js";
import { parseAggregateDirectives } from "./directive-parser.js";
import { resolveNamespace } from "./field-planner.js";

export type VariantMapping = {
  readonly variant: string; // Domain member
  readonly wireVariant: string; // Wire member
};

export type EnumConversionPlan = {
  readonly name: string;
  readonly wireName: string;
  readonly namespace: string;
  readonly variants: readonly VariantMapping[];
};

/**
 * `InProgress` -> `IN_PROGRESS`, `HTTPStatus` -> `HTTP_STATUS`
 */
export const toScreamingSnake = (name: string): string =>
  name
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
    .toUpperCase();

/**
 * Wire member names tried for a domain variant, in order.
 */
export const wireVariantCandidates = (
  wireEnumName: string,
  variant: string
): readonly string[] => {
  const screaming = toScreamingSnake(variant);
  return [variant, screaming, `${toScreamingSnake(wireEnumName)}_${screaming}`];
};

export const planEnum = (
  descriptor: EnumDescriptor,
  config: GenerationConfig
): Result<EnumConversionPlan, readonly Diagnostic[]> => {
  const parsed = parseAggregateDirectives(descriptor.directives, descriptor.name);
  if (!parsed.ok) {
    return error([parsed.error]);
  }
  const namespace = resolveNamespace(parsed.value, descriptor.name, config);
  if (!namespace.ok) {
    return error([namespace.error]);
  }
  const wireName = parsed.value.wireName ?? descriptor.name;
  const known =
    descriptor.wireVariants !== undefined ? new Set(descriptor.wireVariants) : undefined;

  const diagnostics: Diagnostic[] = [];
  const variants: VariantMapping[] = [];
  for (const variant of descriptor.variants) {
    const candidates = wireVariantCandidates(wireName, variant);
    if (known === undefined) {
      variants.push({ variant, wireVariant: candidates[2] ?? variant });
      continue;
    }
    const match = candidates.find((candidate) => known.has(candidate));
    if (match === undefined) {
      diagnostics.push(
        createDiagnostic(
          "UnmatchedVariant",
          descriptor.name,
          variant,
          `Variant '${variant}' has no counterpart in wire enum '${wireName}'`,
          `Add one of ${candidates.join(", ")} to the wire enum`
        )
      );
      continue;
    }
    variants.push({ variant, wireVariant: match });
  }

  if (diagnostics.length > 0) {
    return error(diagnostics);
  }

  return ok({
    name: descriptor.name,
    wireName,
    namespace: namespace.value,
    variants,
  });
};
