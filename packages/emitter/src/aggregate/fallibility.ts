/**
 * Fallibility across aggregates
 *
 * `xFromWire` returns a ConversionResult when one of its own fields is
 * error-moded or when it converts through another aggregate that does. The
 * union of error types is propagated to a fixed point, own types first.
 */

import type { DomainFieldShape, FieldPlan, StructConversionPlan } from "@wirebridge/frontend";
import { isWireTyped } from "@wirebridge/frontend";

/**
 * Aggregates whose `xFromWire` a field's conversion calls. Transparent
 * wrappers only apply infallible conversions, so they are not followed.
 */
const aggregatesIn = (shape: DomainFieldShape, wireNamespaces: readonly string[]): readonly string[] => {
  switch (shape.kind) {
    case "nullable":
    case "sequence":
      return aggregatesIn(shape.inner, wireNamespaces);
    case "customAggregate":
      return wireNamespaces.some((namespace) => isWireTyped(shape, namespace))
        ? []
        : [shape.name];
    case "primitive":
    case "transparent":
    case "taggedEnum":
    case "opaque":
      return [];
  }
};

export const referencedAggregates = (
  field: FieldPlan,
  wireNamespaces: readonly string[]
): readonly string[] => {
  const { strategy } = field;
  if (
    strategy.kind === "ignore" ||
    (strategy.kind === "custom" && strategy.from !== undefined) ||
    (strategy.kind === "collection" && strategy.variant === "directAssignment")
  ) {
    return [];
  }
  return aggregatesIn(field.shape, wireNamespaces);
};

/**
 * Error union of every aggregate's `xFromWire`, by aggregate name.
 * Aggregates outside `plans` are treated as infallible.
 */
export const propagateErrorTypes = (
  plans: readonly StructConversionPlan[],
  wireNamespaces: readonly string[]
): ReadonlyMap<string, readonly string[]> => {
  const errorTypes = new Map<string, readonly string[]>(
    plans.map((plan) => [plan.aggregate, plan.errorTypes])
  );
  const references = new Map(
    plans.map((plan) => [
      plan.aggregate,
      plan.fields.flatMap((field) => referencedAggregates(field, wireNamespaces)),
    ])
  );

  let changed = true;
  while (changed) {
    changed = false;
    for (const plan of plans) {
      const current = errorTypes.get(plan.aggregate) ?? [];
      const merged = [...current];
      for (const reference of references.get(plan.aggregate) ?? []) {
        for (const type of errorTypes.get(reference) ?? []) {
          if (!merged.includes(type)) {
            merged.push(type);
          }
        }
      }
      if (merged.length !== current.length) {
        errorTypes.set(plan.aggregate, merged);
        changed = true;
      }
    }
  }

  return errorTypes;
};
