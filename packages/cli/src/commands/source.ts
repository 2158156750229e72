/**
 * Reading the annotated domain source (and optionally the wire source)
 */

import { existsSync, readFileSync } from "node:fs";
import { basename } from "node:path";
import {
  attachWireVariants,
  readDomainSource,
  readWireEnums,
  type SourceModel,
} from "@wirebridge/frontend";
import type { CommandError, ResolvedConfig, Result } from "../types.js";

export type LoadedSource = {
  readonly model: SourceModel;
  readonly sourceName: string; // File name shown in the generated header
};

const usageError = (message: string): CommandError => ({
  kind: "usage",
  message,
  diagnostics: [],
});

export const loadSource = (
  config: ResolvedConfig
): Result<LoadedSource, CommandError> => {
  const { input, wireSource } = config;
  if (input === undefined) {
    return {
      ok: false,
      error: usageError(
        "No input file given (pass one or set 'input' in wirebridge.json)"
      ),
    };
  }
  if (!existsSync(input)) {
    return { ok: false, error: usageError(`Input file not found: ${input}`) };
  }

  const domain = readDomainSource(input, readFileSync(input, "utf-8"));
  if (!domain.ok) {
    return {
      ok: false,
      error: {
        kind: "generation",
        message: `Could not read declarations from ${input}`,
        diagnostics: domain.error,
      },
    };
  }

  const sourceName = basename(input);
  if (wireSource === undefined) {
    return { ok: true, value: { model: domain.value, sourceName } };
  }
  if (!existsSync(wireSource)) {
    return {
      ok: false,
      error: usageError(`Wire source not found: ${wireSource}`),
    };
  }

  const wireEnums = readWireEnums(wireSource, readFileSync(wireSource, "utf-8"));
  if (config.verbose) {
    console.log(`Read ${wireEnums.size} wire enum(s) from ${wireSource}`);
  }

  return {
    ok: true,
    value: { model: attachWireVariants(domain.value, wireEnums), sourceName },
  };
};
