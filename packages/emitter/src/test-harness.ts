/**
 * Shared fixtures for emitter tests
 */

import type {
  AggregateDescriptor,
  EnumDescriptor,
  GenerationConfig,
  SourceModel,
  StructConversionPlan,
  TransparentDescriptor,
} from "@wirebridge/frontend";
import {
  DEFAULT_PRIMITIVES,
  buildTypeTable,
  createFieldDescriptor,
  createGenerationConfig,
  createSourceModel,
  formatDiagnostic,
  planAggregate,
} from "@wirebridge/frontend";
import type { AggregateEntry, EmitterContext } from "./emitter-types/context.js";
import { createContext } from "./emitter-types/context.js";
import { propagateErrorTypes } from "./aggregate/fallibility.js";

export const testPrimitives: ReadonlyMap<string, string> = new Map([
  ...DEFAULT_PRIMITIVES,
  ["Text", '""'],
  ["UInt32", "0"],
  ["UInt64", "0n"],
]);

export const testTransparents: readonly TransparentDescriptor[] = [
  { name: "TrackId", inner: "UInt64", construction: "new" },
  { name: "Email", inner: "string", construction: "literal" },
];

export const testEnums: readonly EnumDescriptor[] = [
  { name: "Status", directives: [], variants: ["Active", "Archived"] },
];

export const testConfig = (overrides: Partial<GenerationConfig> = {}): GenerationConfig =>
  createGenerationConfig({ primitives: testPrimitives, ...overrides });

export type FieldEntry = readonly [name: string, type: string, directives?: readonly string[]];

export const aggregate = (
  name: string,
  fields: readonly FieldEntry[],
  directives: readonly string[] = []
): AggregateDescriptor => ({
  name,
  directives,
  fields: fields.map(([field, type, tokens = []]) =>
    createFieldDescriptor(name, field, type, tokens)
  ),
});

export const testModel = (aggregates: readonly AggregateDescriptor[]): SourceModel =>
  createSourceModel(aggregates, testEnums, testTransparents);

/**
 * Plans that are expected to succeed; a failure is a broken fixture.
 */
export const planAll = (
  descriptors: readonly AggregateDescriptor[],
  config: GenerationConfig = testConfig()
): readonly StructConversionPlan[] => {
  const table = buildTypeTable(testModel(descriptors), config);
  return descriptors.map((descriptor) => {
    const result = planAggregate(descriptor, table, config);
    if (!result.ok) {
      throw new Error(result.error.map(formatDiagnostic).join("\n"));
    }
    return result.value;
  });
};

export const contextFor = (
  plans: readonly StructConversionPlan[],
  config: GenerationConfig = testConfig()
): EmitterContext => {
  const errorTypes = propagateErrorTypes(plans, [config.wireNamespace]);
  return createContext(
    config,
    buildTypeTable(testModel([]), config),
    new Map<string, AggregateEntry>(
      plans.map((plan) => [
        plan.aggregate,
        {
          wireName: plan.wireName,
          namespace: plan.namespace,
          errorTypes: errorTypes.get(plan.aggregate) ?? plan.errorTypes,
        },
      ])
    )
  );
};

/**
 * One aggregate, planned and given a context of its own.
 */
export const planOne = (
  fields: readonly FieldEntry[],
  config: GenerationConfig = testConfig()
): { readonly plan: StructConversionPlan; readonly context: EmitterContext } => {
  const [plan] = planAll([aggregate("Track", fields)], config);
  if (plan === undefined) {
    throw new Error("no plan");
  }
  return { plan, context: contextFor([plan], config) };
};
