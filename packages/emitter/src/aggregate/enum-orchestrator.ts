/**
 * Tagged enumeration conversions: one `switch` per direction, keyed by
 * variant name
 */

import type { EnumConversionPlan } from "@wirebridge/frontend";
import { converterName, indentLines, propertyAccess } from "../emitter-types/formatting.js";
import type { AggregateOutput } from "./struct-orchestrator.js";

const switchFunction = (
  signature: string,
  subject: string,
  cases: readonly (readonly [string, string])[],
  unknownMessage: string
): string =>
  [
    `${signature} => {`,
    ...indentLines([
      `switch (${subject}) {`,
      ...indentLines(
        cases.flatMap(([match, result]) => [`case ${match}:`, `  return ${result};`])
      ),
      ...indentLines([
        "default:",
        `  throw new Error(${JSON.stringify(unknownMessage)} + String(${subject}));`,
      ]),
      "}",
    ]),
    "};",
  ].join("\n");

export const emitEnum = (plan: EnumConversionPlan): AggregateOutput => {
  const wireEnum = `${plan.namespace}.${plan.wireName}`;
  const pairs = plan.variants.map(
    ({ variant, wireVariant }) =>
      [propertyAccess(plan.name, variant), propertyAccess(wireEnum, wireVariant)] as const
  );

  return {
    name: plan.name,
    fromWire: switchFunction(
      `export const ${converterName(plan.name, "fromWire")} = (code: ${wireEnum}): ${plan.name}`,
      "code",
      pairs.map(([domain, wire]) => [wire, domain] as const),
      `${plan.name}: unknown wire code `
    ),
    toWire: switchFunction(
      `export const ${converterName(plan.name, "toWire")} = (value: ${plan.name}): ${wireEnum}`,
      "value",
      pairs,
      `${plan.name}: unknown variant `
    ),
  };
};
