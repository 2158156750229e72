/**
 * Diagnostic types for the wirebridge generator
 */

export type DiagnosticSeverity = "error" | "warning";

export type DiagnosticKind =
  | "ConflictingAnnotation" // Mutually exclusive directives on one field
  | "MalformedDirectiveValue" // Value-bearing directive without a usable value
  | "UnknownDirective" // Token that names no directive
  | "AmbiguousOptionality" // Wire optionality could not be determined
  | "StrategyPreconditionViolation" // Resolved strategy does not fit the field
  | "UnmatchedVariant" // Domain enum variant has no wire counterpart
  | "EmptyCustomFunctionReference" // Custom conversion function name is empty
  | "UnsupportedFieldType" // Type with no generated conversion outside custom functions
  | "InferredOptionality" // Optionality came from a heuristic (warning)
  | "IgnoredDirective"; // Directive with no effect on the resolved strategy (warning)

const WARNING_KINDS: ReadonlySet<DiagnosticKind> = new Set([
  "InferredOptionality",
  "IgnoredDirective",
]);

export type Diagnostic = {
  readonly kind: DiagnosticKind;
  readonly severity: DiagnosticSeverity;
  readonly aggregate: string;
  readonly field?: string;
  readonly message: string;
  /** Suggested fix */
  readonly hint?: string;
};

export const createDiagnostic = (
  kind: DiagnosticKind,
  aggregate: string,
  field: string | undefined,
  message: string,
  hint?: string
): Diagnostic => ({
  kind,
  severity: WARNING_KINDS.has(kind) ? "warning" : "error",
  aggregate,
  field,
  message,
  hint,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  parts.push(
    diagnostic.field
      ? `${diagnostic.aggregate}.${diagnostic.field}:`
      : `${diagnostic.aggregate}:`
  );
  parts.push(`${diagnostic.severity} ${diagnostic.kind}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};
