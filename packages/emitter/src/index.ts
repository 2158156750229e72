/**
 * wirebridge emitter - conversion function synthesis and module assembly
 */

export { generateFileHeader, INDENT } from "./constants.js";
export type { AggregateEntry, EmitterContext } from "./emitter-types/context.js";
export { createContext, isFallible } from "./emitter-types/context.js";
export { converterName } from "./emitter-types/formatting.js";
export * from "./errors/error-scaffolding.js";
export * from "./synthesis/index.js";
export * from "./aggregate/fallibility.js";
export * from "./aggregate/struct-orchestrator.js";
export * from "./aggregate/enum-orchestrator.js";
export * from "./aggregate/plan-report.js";
export * from "./module-emitter.js";
