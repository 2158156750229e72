/**
 * Module Emitter
 *
 * Plans every enumeration and aggregate of a source model and concatenates
 * their conversions into one TypeScript module. Identical inputs yield
 * byte-identical text.
 */

import type {
  Diagnostic,
  DomainFieldShape,
  EnumConversionPlan,
  FieldPlan,
  GenerationConfig,
  Result,
  SourceModel,
  StructConversionPlan,
} from "@wirebridge/frontend";
import {
  buildTypeTable,
  collectAll,
  defaultFunction,
  errorModeOf,
  error,
  isErrorModed,
  isQualifiedBy,
  ok,
  planAggregate,
  planEnum,
} from "@wirebridge/frontend";
import { generateFileHeader } from "./constants.js";
import type { AggregateEntry } from "./emitter-types/context.js";
import { createContext } from "./emitter-types/context.js";
import { importRoot } from "./emitter-types/formatting.js";
import {
  COLLECT_RESULTS_HELPER,
  emitCollectResultsHelper,
  emitConversionResultType,
} from "./errors/error-scaffolding.js";
import { emitEnum } from "./aggregate/enum-orchestrator.js";
import { propagateErrorTypes } from "./aggregate/fallibility.js";
import type { AggregateOutput } from "./aggregate/struct-orchestrator.js";
import { emitAggregate } from "./aggregate/struct-orchestrator.js";

export type ModuleOptions = {
  readonly sourceName?: string; // Shown in the header comment
  readonly includeTimestamp?: boolean;
};

export type GeneratedModule = {
  readonly text: string;
  readonly aggregates: readonly AggregateOutput[];
  readonly enums: readonly AggregateOutput[];
  readonly warnings: readonly Diagnostic[];
};

export type ModulePlans = {
  readonly aggregates: readonly StructConversionPlan[];
  readonly enums: readonly EnumConversionPlan[];
};

// ═══════════════════════════════════════════════════════════════════════════
// PLANNING
// ═══════════════════════════════════════════════════════════════════════════

export const planModule = (
  model: SourceModel,
  config: GenerationConfig
): Result<ModulePlans, readonly Diagnostic[]> => {
  const table = buildTypeTable(model, config);
  const enums = collectAll(model.enums.map((descriptor) => planEnum(descriptor, config)));
  const aggregates = collectAll(
    model.aggregates.map((descriptor) => planAggregate(descriptor, table, config))
  );

  if (enums.ok && aggregates.ok) {
    return ok({ aggregates: aggregates.value, enums: enums.value });
  }
  return error([
    ...(enums.ok ? [] : enums.error),
    ...(aggregates.ok ? [] : aggregates.error),
  ]);
};

// ═══════════════════════════════════════════════════════════════════════════
// IMPORTS
// ═══════════════════════════════════════════════════════════════════════════

const shapeNames = (shape: DomainFieldShape): readonly DomainFieldShape[] => {
  switch (shape.kind) {
    case "nullable":
    case "sequence":
      return [shape, ...shapeNames(shape.inner)];
    case "transparent":
      return shape.inner !== undefined ? [shape, ...shapeNames(shape.inner)] : [shape];
    case "primitive":
    case "taggedEnum":
    case "customAggregate":
    case "opaque":
      return [shape];
  }
};

const collectShapes = (plans: readonly StructConversionPlan[]): readonly DomainFieldShape[] =>
  plans.flatMap((plan) => plan.fields.flatMap((field) => shapeNames(field.shape)));

const helperValues = (field: FieldPlan): readonly string[] => {
  const { strategy, annotation } = field;
  const mode = errorModeOf(strategy);
  const names = [
    strategy.kind === "custom" ? strategy.from : undefined,
    strategy.kind === "custom" ? strategy.to : undefined,
    strategy.kind === "ignore" ? defaultFunction(annotation) : undefined,
    mode?.kind === "default" ? mode.fn : undefined,
    isErrorModed(strategy) ? annotation.errorFn : undefined,
  ];
  return names.flatMap((name) => {
    const root = name !== undefined ? importRoot(name) : undefined;
    return root !== undefined ? [root] : [];
  });
};

const sorted = (names: Iterable<string>): readonly string[] => [...new Set(names)].sort();

const namedImport = (names: readonly string[], from: string, typeOnly: boolean): string[] =>
  names.length === 0
    ? []
    : [`import ${typeOnly ? "type " : ""}{ ${names.join(", ")} } from ${JSON.stringify(from)};`];

const emitImports = (
  plans: ModulePlans,
  errorTypes: ReadonlyMap<string, readonly string[]>,
  config: GenerationConfig
): readonly string[] => {
  const shapes = collectShapes(plans.aggregates);

  const usedNamespaces = new Set([
    ...plans.aggregates.map((plan) => plan.namespace),
    ...plans.enums.map((plan) => plan.namespace),
  ]);
  for (const shape of shapes) {
    for (const alias of config.wireAliases.keys()) {
      if (shape.kind === "customAggregate" && isQualifiedBy(shape.name, alias)) {
        usedNamespaces.add(alias);
      }
    }
  }
  const namespaceLines = [
    [config.wireNamespace, config.wireModule] as const,
    ...config.wireAliases.entries(),
  ]
    .filter(([alias]) => usedNamespaces.has(alias))
    .map(([alias, module]) => `import * as ${alias} from ${JSON.stringify(module)};`);

  const domainValues = new Set([
    ...plans.enums.map((plan) => plan.name),
    ...shapes.flatMap((shape) =>
      shape.kind === "transparent" && shape.construction === "new" && shape.name !== undefined
        ? [shape.name]
        : []
    ),
  ]);
  const domainTypes = new Set(plans.aggregates.map((plan) => plan.aggregate));

  const helperValueNames = new Set(
    plans.aggregates.flatMap((plan) => plan.fields.flatMap(helperValues))
  );
  const generated = new Set(
    plans.aggregates.flatMap((plan) =>
      plan.generatedErrorTypeName !== undefined ? [plan.generatedErrorTypeName] : []
    )
  );
  const helperTypeNames = new Set(
    [...errorTypes.values()]
      .flat()
      .filter((type) => !generated.has(type) && !type.startsWith("ReturnType<"))
      .flatMap((type) => {
        const root = importRoot(type);
        return root !== undefined ? [root] : [];
      })
  );

  const helpersModule = config.helpersModule ?? config.domainModule;
  const modules =
    helpersModule === config.domainModule
      ? [
          {
            from: config.domainModule,
            values: new Set([...domainValues, ...helperValueNames]),
            types: new Set([...domainTypes, ...helperTypeNames]),
          },
        ]
      : [
          { from: config.domainModule, values: domainValues, types: domainTypes },
          { from: helpersModule, values: helperValueNames, types: helperTypeNames },
        ];

  return [
    ...namespaceLines,
    ...modules.flatMap(({ from, values, types }) => [
      ...namedImport(sorted([...types].filter((name) => !values.has(name))), from, true),
      ...namedImport(sorted(values), from, false),
    ]),
  ];
};

// ═══════════════════════════════════════════════════════════════════════════
// MODULE
// ═══════════════════════════════════════════════════════════════════════════

export const generateModule = (
  model: SourceModel,
  config: GenerationConfig,
  options: ModuleOptions = {}
): Result<GeneratedModule, readonly Diagnostic[]> => {
  const planned = planModule(model, config);
  if (!planned.ok) {
    return planned;
  }
  const plans = planned.value;

  // Propagate fallibility through aggregate references
  const errorTypes = propagateErrorTypes(plans.aggregates, [
    config.wireNamespace,
    ...config.wireAliases.keys(),
  ]);
  const entries = new Map<string, AggregateEntry>(
    plans.aggregates.map((plan) => [
      plan.aggregate,
      {
        wireName: plan.wireName,
        namespace: plan.namespace,
        errorTypes: errorTypes.get(plan.aggregate) ?? plan.errorTypes,
      },
    ])
  );
  const context = createContext(config, buildTypeTable(model, config), entries);

  const enums = plans.enums.map(emitEnum);
  const aggregates = plans.aggregates.map((plan) => emitAggregate(plan, context));

  const conversions = [...enums, ...aggregates].flatMap((output) => [
    output.fromWire,
    output.toWire,
  ]);
  const anyFallible = [...entries.values()].some((entry) => entry.errorTypes.length > 0);
  const usesCollect = conversions.some((text) => text.includes(`${COLLECT_RESULTS_HELPER}(`));

  const sections = [
    generateFileHeader(options.sourceName, {
      includeTimestamp: options.includeTimestamp ?? false,
    }),
    emitImports(plans, errorTypes, config).join("\n"),
    anyFallible ? emitConversionResultType() : "",
    usesCollect ? emitCollectResultsHelper() : "",
    ...aggregates.flatMap((output) => (output.errorType !== undefined ? [output.errorType] : [])),
    ...conversions,
  ].filter((section) => section !== "");

  return ok({
    text: `${sections.join("\n\n")}\n`,
    aggregates,
    enums,
    warnings: plans.aggregates.flatMap((plan) => plan.warnings),
  });
};
