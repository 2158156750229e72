/**
 * wirebridge CLI - configuration and commands
 */

export * from "./cli/index.js";
export * from "./types.js";
export * from "./config.js";
export { generateCommand, type GenerateOutput } from "./commands/generate.js";
export { planCommand, type PlanOutput } from "./commands/plan.js";
export { loadSource, type LoadedSource } from "./commands/source.js";
