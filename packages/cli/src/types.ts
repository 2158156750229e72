/**
 * Type definitions for CLI
 */

import { z } from "zod";
import type { Diagnostic, GenerationConfig } from "@wirebridge/frontend";

/**
 * Configuration file (wirebridge.json)
 */
export const WirebridgeConfigSchema = z
  .object({
    $schema: z.string().optional(),
    input: z.string().optional(), // Annotated domain source
    output: z.string().optional(), // Generated conversions module
    wireModule: z.string().optional(), // Import specifier of the wire module
    wireSource: z.string().optional(), // Wire module source, read for enum members
    wireNamespace: z.string().optional(),
    domainModule: z.string().optional(),
    helpersModule: z.string().optional(),
    wireAliases: z.record(z.string()).optional(), // alias -> import specifier
    primitives: z.record(z.string()).optional(), // type name -> zero literal
    strictAggregates: z.boolean().optional(),
    sideChannel: z.record(z.boolean()).optional(), // "Aggregate.field" -> wire optional
    sideChannelFile: z.string().optional(),
  })
  .strict();

export type WirebridgeConfig = z.infer<typeof WirebridgeConfigSchema>;

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  out?: string;
  wire?: string; // Wire module source
  namespace?: string;
  strictAggregates?: boolean;
};

/**
 * Configuration after merging the config file with CLI options
 */
export type ResolvedConfig = {
  readonly projectRoot: string;
  readonly input: string | undefined; // Absolute
  readonly output: string | undefined; // Absolute; stdout when absent
  readonly wireSource: string | undefined; // Absolute
  readonly generation: GenerationConfig;
  readonly verbose: boolean;
  readonly quiet: boolean;
};

/**
 * Command failure: usage problems or generation diagnostics
 */
export type CommandError = {
  readonly kind: "usage" | "generation";
  readonly message: string;
  readonly diagnostics: readonly Diagnostic[];
};

export type { Result } from "@wirebridge/frontend";
