/**
 * wirebridge frontend - directives, shapes, inference and strategy resolution
 */

export {
  type DiagnosticSeverity,
  type DiagnosticKind,
  type Diagnostic,
  createDiagnostic,
  formatDiagnostic,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";
export * from "./types/descriptor.js";
export * from "./types/annotation.js";
export * from "./types/shapes.js";
export * from "./types/strategy.js";

export * from "./config.js";
export * from "./analysis/type-text.js";
export * from "./analysis/side-channel.js";
export * from "./analysis/shape-classifier.js";
export * from "./analysis/directive-parser.js";
export * from "./analysis/wire-inference.js";
export * from "./analysis/strategy-resolver.js";
export * from "./analysis/strategy-validator.js";
export * from "./analysis/zero-values.js";
export * from "./analysis/field-planner.js";
export * from "./analysis/enum-planner.js";

export * from "./source/jsdoc.js";
export * from "./source/declarations.js";
export * from "./source/wire-enums.js";
