/**
 * Aggregate Orchestrator
 *
 * Turns a StructConversionPlan into the `xFromWire` / `xToWire` pair.
 */

import type {
  AggregateDescriptor,
  Diagnostic,
  GenerationConfig,
  Result,
  StructConversionPlan,
  TypeTable,
} from "@wirebridge/frontend";
import { map, planAggregate } from "@wirebridge/frontend";
import type { EmitterContext } from "../emitter-types/context.js";
import { createContext } from "../emitter-types/context.js";
import { converterName, indentLines, propertyKey } from "../emitter-types/formatting.js";
import { emitGeneratedErrorType, resultType } from "../errors/error-scaffolding.js";
import { MESSAGE_PARAMETER, synthesizeFromWire } from "../synthesis/from-wire.js";
import { VALUE_PARAMETER, synthesizeToWire } from "../synthesis/to-wire.js";

export type AggregateOutput = {
  readonly name: string;
  readonly plan?: StructConversionPlan; // Absent for enumerations
  readonly fromWire: string;
  readonly toWire: string;
  readonly errorType?: string; // Generated `<Aggregate>ConversionError`
};

const objectLiteral = (entries: readonly (readonly [string, string])[]): readonly string[] =>
  entries.length === 0
    ? ["{}"]
    : ["{", ...indentLines(entries.map(([key, value]) => `${propertyKey(key)}: ${value},`)), "}"];

/**
 * Prefix the first line and suffix the last line of a block.
 */
const enclose = (lines: readonly string[], prefix: string, suffix: string): readonly string[] =>
  lines.map(
    (line, index) =>
      `${index === 0 ? prefix : ""}${line}${index === lines.length - 1 ? suffix : ""}`
  );

const emitFromWire = (plan: StructConversionPlan, context: EmitterContext): string => {
  const errorTypes = context.aggregates.get(plan.aggregate)?.errorTypes ?? plan.errorTypes;
  const fallible = errorTypes.length > 0;
  const wireType = `${plan.namespace}.${plan.wireName}`;
  const returnType = fallible ? resultType(plan.aggregate, errorTypes) : plan.aggregate;
  const signature = `export const ${converterName(plan.aggregate, "fromWire")} = (${MESSAGE_PARAMETER}: ${wireType}): ${returnType} =>`;

  const templates = plan.fields.map((field) => ({
    field,
    template: synthesizeFromWire(plan.aggregate, field, context),
  }));
  const guards = templates.flatMap(({ template }) => template.guards);
  const body = objectLiteral(
    templates.map(({ field, template }) => [field.field, template.expression] as const)
  );

  if (!fallible && guards.length === 0) {
    return enclose(body, `${signature} (`, ");").join("\n");
  }

  const value = fallible
    ? ["{", "  ok: true,", ...indentLines(enclose(body, "value: ", ",")), "}"]
    : body;
  return [
    `${signature} {`,
    ...indentLines(guards),
    ...indentLines(enclose(value, "return ", ";")),
    "};",
  ].join("\n");
};

const emitToWire = (plan: StructConversionPlan, context: EmitterContext): string => {
  const wireType = `${plan.namespace}.${plan.wireName}`;
  const entries = plan.fields.flatMap((field) => {
    const expression = synthesizeToWire(field, plan.namespace, context);
    return expression !== undefined ? [[field.wireField, expression] as const] : [];
  });
  const signature = `export const ${converterName(plan.aggregate, "toWire")} = (${VALUE_PARAMETER}: ${plan.aggregate}): ${wireType} =>`;
  return enclose(objectLiteral(entries), `${signature} (`, ");").join("\n");
};

export const emitAggregate = (
  plan: StructConversionPlan,
  context: EmitterContext
): AggregateOutput => ({
  name: plan.aggregate,
  plan,
  fromWire: emitFromWire(plan, context),
  toWire: emitToWire(plan, context),
  ...(plan.generatedErrorTypeName !== undefined
    ? { errorType: emitGeneratedErrorType(plan.generatedErrorTypeName) }
    : {}),
});

/**
 * Plan and emit one aggregate on its own; aggregates it references are
 * assumed infallible.
 */
export const orchestrateAggregate = (
  descriptor: AggregateDescriptor,
  table: TypeTable,
  config: GenerationConfig
): Result<AggregateOutput, readonly Diagnostic[]> =>
  map(planAggregate(descriptor, table, config), (plan) =>
    emitAggregate(
      plan,
      createContext(
        config,
        table,
        new Map([
          [
            plan.aggregate,
            { wireName: plan.wireName, namespace: plan.namespace, errorTypes: plan.errorTypes },
          ],
        ])
      )
    )
  );
