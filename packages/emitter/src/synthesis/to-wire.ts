/**
 * Domain -> wire field expressions. Always infallible; `undefined` means the
 * field is left out of the wire message.
 */

import type { DomainFieldShape, FieldPlan } from "@wirebridge/frontend";
import { isWireOptional, wireZeroValue } from "@wirebridge/frontend";
import type { EmitterContext } from "../emitter-types/context.js";
import { namespaceOf, wireNameOf } from "../emitter-types/context.js";
import { propertyAccess } from "../emitter-types/formatting.js";
import { toWireValue } from "./converters.js";

export const VALUE_PARAMETER = "value";

const zeroFor = (
  shape: DomainFieldShape,
  namespace: string,
  context: EmitterContext
): string => {
  const target = shape.kind === "nullable" ? shape.inner : shape;
  const wireNamespace =
    target.kind === "customAggregate" ? namespaceOf(context, target.name) : namespace;
  return (
    wireZeroValue(target, context.table, wireNamespace, (name) => wireNameOf(context, name)) ??
    "undefined"
  );
};

/**
 * A nullable domain value sent on a required wire field: absent becomes
 * the wire zero value.
 */
const wrapExpression = (
  shape: DomainFieldShape,
  source: string,
  namespace: string,
  context: EmitterContext
): string => {
  if (shape.kind !== "nullable") {
    return toWireValue(shape, source, context);
  }
  const zero = zeroFor(shape, namespace, context);
  const inner = toWireValue(shape.inner, source, context);
  return inner === source
    ? `${source} ?? ${zero}`
    : `${source} === ${shape.absent} ? ${zero} : ${inner}`;
};

export const synthesizeToWire = (
  plan: FieldPlan,
  namespace: string,
  context: EmitterContext
): string | undefined => {
  const source = propertyAccess(VALUE_PARAMETER, plan.field);
  const { strategy, shape } = plan;
  const project = (): string =>
    isWireOptional(plan.wire)
      ? toWireValue(shape, source, context)
      : wrapExpression(shape, source, namespace, context);

  switch (strategy.kind) {
    case "ignore":
      return undefined;

    case "custom":
      return strategy.to !== undefined ? `${strategy.to}(${source})` : project();

    case "collection":
      if (strategy.variant === "directAssignment") {
        return source;
      }
      if (strategy.variant === "mapOption" && shape.kind === "nullable") {
        return toWireValue(shape.inner, `(${source} ?? [])`, context);
      }
      return toWireValue(shape, source, context);

    case "direct":
    case "option":
    case "transparent":
      return project();
  }
};
