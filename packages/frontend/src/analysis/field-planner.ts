/**
 * Per-aggregate planning: directives, shape, wire shape, strategy and
 * validation for every field, in declaration order.
 *
 * Any error-severity diagnostic fails the whole aggregate; no partial plan
 * is returned.
 */

import type { GenerationConfig, TypeTable } from "../config.js";
import type { AggregateAnnotation } from "../types/annotation.js";
import { inheritAggregateDefaults } from "../types/annotation.js";
import type { AggregateDescriptor, FieldDescriptor } from "../types/descriptor.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import { ok, error, collectAll, flatMap, map } from "../types/result.js";
import type { FieldPlan, StructConversionPlan } from "../types/strategy.js";
import { describeStrategy, errorModeOf, isErrorModed } from "../types/strategy.js";
import { parseAggregateDirectives, parseFieldDirectives } from "./directive-parser.js";
import { classifyFieldShape } from "./shape-classifier.js";
import { resolveStrategy } from "./strategy-resolver.js";
import { validateStrategy } from "./strategy-validator.js";
import { inferWireShape } from "./wire-inference.js";

export const generatedErrorTypeName = (aggregate: string): string =>
  `${aggregate}ConversionError`;

export const planField = (
  descriptor: FieldDescriptor,
  aggregateAnnotation: AggregateAnnotation,
  namespace: string,
  table: TypeTable,
  config: GenerationConfig
): Result<FieldPlan, Diagnostic> => {
  const { aggregate, name } = descriptor;

  return flatMap(
    parseFieldDirectives(descriptor.directives, aggregate, name),
    (parsed) => {
      const annotation = inheritAggregateDefaults(parsed, aggregateAnnotation);
      const shape = classifyFieldShape(descriptor.declaredType, table, {
        transparent: annotation.transparent,
      });

      return flatMap(
        inferWireShape({
          aggregate,
          field: name,
          shape,
          annotation,
          sideChannel: config.sideChannel,
          strictAggregates: config.strictAggregates,
        }),
        (wire) =>
          map(
            validateStrategy({
              aggregate,
              field: name,
              shape,
              wire,
              annotation,
              strategy: resolveStrategy({
                shape,
                wire,
                annotation,
                wireNamespace: namespace,
              }),
              table,
              wireNamespace: namespace,
            }),
            (strategy): FieldPlan => ({
              field: name,
              wireField: annotation.rename ?? name,
              shape,
              wire,
              strategy,
              annotation,
            })
          )
      );
    }
  );
};

/**
 * The wire module alias an aggregate or enum converts against.
 */
export const resolveNamespace = (
  annotation: AggregateAnnotation,
  name: string,
  config: GenerationConfig
): Result<string, Diagnostic> => {
  const namespace = annotation.namespace ?? config.wireNamespace;
  if (namespace !== config.wireNamespace && !config.wireAliases.has(namespace)) {
    return error(
      createDiagnostic(
        "MalformedDirectiveValue",
        name,
        undefined,
        `Wire namespace '${namespace}' is not configured`,
        `Add '${namespace}' to wireAliases in the configuration`
      )
    );
  }
  return ok(namespace);
};

/**
 * Error type of one error-moded field: its own or inherited override type,
 * the return type of its error function, or the generated type.
 */
const errorTypeOf = (plan: FieldPlan, aggregate: string): string =>
  plan.annotation.errorType ??
  (plan.annotation.errorFn !== undefined
    ? `ReturnType<typeof ${plan.annotation.errorFn}>`
    : generatedErrorTypeName(aggregate));

/**
 * Non-fatal findings on one planned field.
 */
const fieldWarnings = (plan: FieldPlan, aggregate: string): readonly Diagnostic[] => {
  const warnings: Diagnostic[] = [];
  if (plan.wire.note !== undefined) {
    warnings.push(
      createDiagnostic(
        "InferredOptionality",
        aggregate,
        plan.field,
        `Wire field '${plan.wireField}' treated as optional (${plan.wire.note})`,
        "Mark the field 'optional' or 'required' to confirm"
      )
    );
  }
  // Strategies without an error mode never fail
  if (plan.annotation.expectMode !== "none" && errorModeOf(plan.strategy) === undefined) {
    warnings.push(
      createDiagnostic(
        "IgnoredDirective",
        aggregate,
        plan.field,
        `'expect' has no effect on ${describeStrategy(plan.strategy)}`,
        "Remove 'expect'"
      )
    );
  }
  return warnings;
};

export const planAggregate = (
  descriptor: AggregateDescriptor,
  table: TypeTable,
  config: GenerationConfig
): Result<StructConversionPlan, readonly Diagnostic[]> => {
  const parsed = parseAggregateDirectives(descriptor.directives, descriptor.name);
  if (!parsed.ok) {
    return error([parsed.error]);
  }
  const aggregateAnnotation = parsed.value;

  const namespaceResult = resolveNamespace(aggregateAnnotation, descriptor.name, config);
  if (!namespaceResult.ok) {
    return error([namespaceResult.error]);
  }
  const namespace = namespaceResult.value;

  const planned = collectAll(
    descriptor.fields.map((field): Result<FieldPlan, readonly Diagnostic[]> => {
      const result = planField(field, aggregateAnnotation, namespace, table, config);
      return result.ok ? ok(result.value) : error([result.error]);
    })
  );
  if (!planned.ok) {
    return planned;
  }
  const fields = planned.value;

  const errorTypes: string[] = [];
  for (const plan of fields.filter((field) => isErrorModed(field.strategy))) {
    const type = errorTypeOf(plan, descriptor.name);
    if (!errorTypes.includes(type)) {
      errorTypes.push(type);
    }
  }
  const generatedName = generatedErrorTypeName(descriptor.name);

  const warnings = fields.flatMap((field) => fieldWarnings(field, descriptor.name));

  return ok({
    aggregate: descriptor.name,
    wireName: aggregateAnnotation.wireName ?? descriptor.name,
    namespace,
    fields,
    needsFallibleConversion: errorTypes.length > 0,
    ...(errorTypes.includes(generatedName)
      ? { generatedErrorTypeName: generatedName }
      : {}),
    errorTypes,
    warnings,
  });
};
