/**
 * CLI command dispatcher
 */

import { dirname, relative, resolve } from "node:path";
import { formatDiagnostic, type Diagnostic } from "@wirebridge/frontend";
import { loadConfig, findConfig, resolveConfig, CONFIG_FILE_NAME } from "../config.js";
import { generateCommand } from "../commands/generate.js";
import { planCommand } from "../commands/plan.js";
import type { CommandError, ResolvedConfig, Result, WirebridgeConfig } from "../types.js";
import { VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

const COMMANDS: readonly string[] = ["generate", "plan"];

type LoadedConfig = {
  readonly config: WirebridgeConfig;
  readonly configPath: string | undefined;
  readonly projectRoot: string;
};

/**
 * Explicit --config must exist; otherwise walk up from cwd, and fall back
 * to an empty configuration rooted at cwd.
 */
const locateConfig = (
  explicitPath: string | undefined,
  cwd: string
): Result<LoadedConfig, string> => {
  const configPath =
    explicitPath !== undefined ? resolve(cwd, explicitPath) : findConfig(cwd);

  if (configPath === undefined) {
    return { ok: true, value: { config: {}, configPath, projectRoot: cwd } };
  }

  const loaded = loadConfig(configPath);
  if (!loaded.ok) {
    return loaded;
  }
  return {
    ok: true,
    value: { config: loaded.value, configPath, projectRoot: dirname(configPath) },
  };
};

const reportDiagnostics = (diagnostics: readonly Diagnostic[]): void => {
  for (const diagnostic of diagnostics) {
    console.error(formatDiagnostic(diagnostic));
  }
};

/**
 * Exit code for a failed command: 1 for usage, 5 for generation.
 */
const reportFailure = (error: CommandError): number => {
  console.error(`Error: ${error.message}`);
  reportDiagnostics(error.diagnostics);
  return error.kind === "usage" ? 1 : 5;
};

const runCommand = (command: string, config: ResolvedConfig): number => {
  if (command === "plan") {
    const result = planCommand(config);
    if (!result.ok) {
      return reportFailure(result.error);
    }
    reportDiagnostics(result.value.warnings);
    console.log(result.value.report);
    return 0;
  }

  const result = generateCommand(config);
  if (!result.ok) {
    return reportFailure(result.error);
  }

  const { outputPath, aggregates, enums, warnings, text } = result.value;
  reportDiagnostics(warnings);

  if (outputPath === undefined) {
    process.stdout.write(text);
    return 0;
  }

  if (!config.quiet) {
    console.log(
      `✓ Generated ${aggregates} aggregate(s) and ${enums} enum(s) into ${relative(config.projectRoot, outputPath)}`
    );
  }
  return 0;
};

/**
 * Main CLI entry point
 */
export const runCli = (
  args: readonly string[],
  cwd: string = process.cwd()
): number => {
  const parsed = parseArgs(args);

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`wirebridge v${VERSION}`);
    return 0;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return 0;
  }

  if (!COMMANDS.includes(parsed.command)) {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'wirebridge --help' for usage information");
    return 2;
  }

  if (parsed.unknownOptions.length > 0) {
    console.error(`Error: Unknown option(s): ${parsed.unknownOptions.join(", ")}`);
    return 1;
  }

  // Load config
  const located = locateConfig(parsed.options.config, cwd);
  if (!located.ok) {
    console.error(`Error: ${located.error}`);
    return 1;
  }

  const { config, configPath, projectRoot } = located.value;
  const resolved = resolveConfig(
    config,
    parsed.options,
    projectRoot,
    parsed.inputFile,
    cwd
  );
  if (!resolved.ok) {
    console.error(`Error: ${resolved.error}`);
    return 1;
  }

  if (resolved.value.verbose) {
    console.log(
      configPath === undefined
        ? `No ${CONFIG_FILE_NAME} found; using defaults`
        : `Using ${configPath}`
    );
  }

  return runCommand(parsed.command, resolved.value);
};
