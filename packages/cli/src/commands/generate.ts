/**
 * wirebridge generate command - write the conversions module
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import type { Diagnostic } from "@wirebridge/frontend";
import { formatStructPlan, generateModule } from "@wirebridge/emitter";
import type { CommandError, ResolvedConfig, Result } from "../types.js";
import { loadSource } from "./source.js";

export type GenerateOutput = {
  readonly text: string;
  /** Absolute path written to; undefined when the caller prints `text` */
  readonly outputPath: string | undefined;
  readonly aggregates: number;
  readonly enums: number;
  readonly warnings: readonly Diagnostic[];
};

export const generateCommand = (
  config: ResolvedConfig
): Result<GenerateOutput, CommandError> => {
  const source = loadSource(config);
  if (!source.ok) {
    return source;
  }

  const { model, sourceName } = source.value;
  if (config.verbose) {
    console.log(
      `Found ${model.aggregates.length} aggregate(s), ${model.enums.length} enum(s), ${model.transparents.length} transparent wrapper(s)`
    );
  }

  const generated = generateModule(model, config.generation, { sourceName });
  if (!generated.ok) {
    return {
      ok: false,
      error: {
        kind: "generation",
        message: `Generation failed with ${generated.error.length} diagnostic(s)`,
        diagnostics: generated.error,
      },
    };
  }

  const { text, aggregates, enums, warnings } = generated.value;
  if (config.verbose) {
    for (const output of aggregates) {
      if (output.plan !== undefined) {
        console.log(formatStructPlan(output.plan));
      }
    }
  }

  if (config.output !== undefined) {
    mkdirSync(dirname(config.output), { recursive: true });
    writeFileSync(config.output, text, "utf-8");
  }

  return {
    ok: true,
    value: {
      text,
      outputPath: config.output,
      aggregates: aggregates.length,
      enums: enums.length,
      warnings,
    },
  };
};
