/**
 * wirebridge plan command - print the resolved conversion plans
 */

import type { Diagnostic } from "@wirebridge/frontend";
import {
  formatEnumPlan,
  formatStructPlan,
  planModule,
  propagateErrorTypes,
} from "@wirebridge/emitter";
import type { CommandError, ResolvedConfig, Result } from "../types.js";
import { loadSource } from "./source.js";

export type PlanOutput = {
  readonly report: string;
  readonly warnings: readonly Diagnostic[];
};

export const planCommand = (
  config: ResolvedConfig
): Result<PlanOutput, CommandError> => {
  const source = loadSource(config);
  if (!source.ok) {
    return source;
  }

  const planned = planModule(source.value.model, config.generation);
  if (!planned.ok) {
    return {
      ok: false,
      error: {
        kind: "generation",
        message: `Planning failed with ${planned.error.length} diagnostic(s)`,
        diagnostics: planned.error,
      },
    };
  }

  const { aggregates, enums } = planned.value;
  const errorTypes = propagateErrorTypes(aggregates, [
    config.generation.wireNamespace,
    ...config.generation.wireAliases.keys(),
  ]);

  const report = [
    ...enums.map(formatEnumPlan),
    ...aggregates.map((plan) =>
      formatStructPlan(plan, errorTypes.get(plan.aggregate) ?? plan.errorTypes)
    ),
  ].join("\n\n");

  return {
    ok: true,
    value: {
      report,
      warnings: aggregates.flatMap((plan) => plan.warnings),
    },
  };
};
