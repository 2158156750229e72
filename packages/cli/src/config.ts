/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import {
  DEFAULT_PRIMITIVES,
  combineSideChannels,
  createGenerationConfig,
  createTableSideChannel,
  emptySideChannel,
  parseSideChannelFile,
  type SideChannel,
} from "@wirebridge/frontend";
import type {
  WirebridgeConfig,
  CliOptions,
  ResolvedConfig,
  Result,
} from "./types.js";
import { WirebridgeConfigSchema } from "./types.js";

export const CONFIG_FILE_NAME = "wirebridge.json";

/**
 * Load wirebridge.json from a path
 */
export const loadConfig = (
  configPath: string
): Result<WirebridgeConfig, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  const parsed = WirebridgeConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path} ${issue.message}` : issue.message;
    });
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: ${issues.join("; ")}`,
    };
  }

  return { ok: true, value: parsed.data };
};

/**
 * Find wirebridge.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | undefined => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return undefined;
    }
    currentDir = parentDir;
  }
};

/**
 * Inline entries first, then the lookup file.
 */
const resolveSideChannel = (
  config: WirebridgeConfig,
  projectRoot: string
): Result<SideChannel, string> => {
  const inline =
    config.sideChannel !== undefined
      ? createTableSideChannel(config.sideChannel)
      : emptySideChannel;

  if (config.sideChannelFile === undefined) {
    return { ok: true, value: inline };
  }

  const filePath = resolve(projectRoot, config.sideChannelFile);
  if (!existsSync(filePath)) {
    return { ok: false, error: `Side channel file not found: ${filePath}` };
  }

  const fromFile = parseSideChannelFile(readFileSync(filePath, "utf-8"));
  if (!fromFile.ok) {
    return { ok: false, error: `${filePath}: ${fromFile.error}` };
  }

  return { ok: true, value: combineSideChannels(inline, fromFile.value) };
};

/**
 * Merge the config file with CLI options.
 *
 * Paths from the command line resolve against `cwd`; paths from the file
 * resolve against the project root (the directory holding the file).
 */
export const resolveConfig = (
  config: WirebridgeConfig,
  cliOptions: CliOptions,
  projectRoot: string,
  inputFile?: string,
  cwd: string = projectRoot
): Result<ResolvedConfig, string> => {
  const fromCli = (path: string | undefined): string | undefined =>
    path !== undefined ? resolve(cwd, path) : undefined;
  const fromFile = (path: string | undefined): string | undefined =>
    path !== undefined ? resolve(projectRoot, path) : undefined;

  const sideChannel = resolveSideChannel(config, projectRoot);
  if (!sideChannel.ok) {
    return sideChannel;
  }

  const generation = createGenerationConfig({
    wireNamespace: cliOptions.namespace ?? config.wireNamespace,
    wireModule: config.wireModule,
    wireAliases: new Map(Object.entries(config.wireAliases ?? {})),
    domainModule: config.domainModule,
    helpersModule: config.helpersModule,
    primitives: new Map([
      ...DEFAULT_PRIMITIVES,
      ...Object.entries(config.primitives ?? {}),
    ]),
    strictAggregates:
      cliOptions.strictAggregates ?? config.strictAggregates ?? false,
    sideChannel: sideChannel.value,
  });

  return {
    ok: true,
    value: {
      projectRoot,
      input: fromCli(inputFile) ?? fromFile(config.input),
      output: fromCli(cliOptions.out) ?? fromFile(config.output),
      wireSource: fromCli(cliOptions.wire) ?? fromFile(config.wireSource),
      generation,
      verbose: cliOptions.verbose ?? false,
      quiet: cliOptions.quiet ?? false,
    },
  };
};
