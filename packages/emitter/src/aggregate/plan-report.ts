/**
 * Human-readable conversion plans, as printed by `wirebridge plan`
 */

import type { EnumConversionPlan, StructConversionPlan } from "@wirebridge/frontend";
import { describeShape, describeStrategy, describeWireShape } from "@wirebridge/frontend";
import { indentLines } from "../emitter-types/formatting.js";

export const formatStructPlan = (
  plan: StructConversionPlan,
  errorTypes: readonly string[] = plan.errorTypes
): string =>
  [
    `${plan.aggregate} <-> ${plan.namespace}.${plan.wireName}`,
    ...indentLines([
      ...plan.fields.map((field) => {
        const target = field.wireField !== field.field ? ` -> ${field.wireField}` : "";
        return `${field.field}${target}: ${describeStrategy(field.strategy)} [${describeShape(field.shape)}; ${describeWireShape(field.wire)}]`;
      }),
      errorTypes.length > 0 ? `fromWire fails with ${errorTypes.join(" | ")}` : "fromWire is infallible",
    ]),
  ].join("\n");

export const formatEnumPlan = (plan: EnumConversionPlan): string =>
  [
    `${plan.name} <-> ${plan.namespace}.${plan.wireName}`,
    ...indentLines(plan.variants.map(({ variant, wireVariant }) => `${variant} = ${wireVariant}`)),
  ].join("\n");
