/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  readonly command: string;
  readonly inputFile?: string;
  readonly options: CliOptions;
  readonly unknownOptions: readonly string[];
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  const unknownOptions: string[] = [];
  let command = "";
  let inputFile: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;

    // Commands
    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    // First positional arg after command
    if (command && !inputFile && !arg.startsWith("-")) {
      inputFile = arg;
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {}, unknownOptions: [] };
      case "-v":
      case "--version":
        return { command: "version", options: {}, unknownOptions: [] };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      case "-o":
      case "--out":
        options.out = args[++i] ?? "";
        break;
      case "-w":
      case "--wire":
        options.wire = args[++i] ?? "";
        break;
      case "-n":
      case "--namespace":
        options.namespace = args[++i] ?? "";
        break;
      case "--strict-aggregates":
        options.strictAggregates = true;
        break;
      default:
        unknownOptions.push(arg);
    }
  }

  return { command, inputFile, options, unknownOptions };
};
