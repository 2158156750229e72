/**
 * Directive Parser
 *
 * Raw directive tokens (`expect(panic)`, `default = "defaultCount"`,
 * `error_type = TrackError`) become typed annotation records. Nothing
 * downstream looks at directive text again.
 */

import type {
  AggregateAnnotation,
  DefaultDirective,
  ExpectMode,
  FieldAnnotation,
  Optionality,
} from "../types/annotation.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import { ok, error } from "../types/result.js";
import { isTypeName, splitTopLevel } from "./type-text.js";

// ═══════════════════════════════════════════════════════════════════════════
// TOKENS
// ═══════════════════════════════════════════════════════════════════════════

export type DirectiveToken = {
  readonly name: string;
  readonly argument?: string; // expect(panic) -> "panic"
  readonly value?: string; // default = "fn" -> "\"fn\""
};

/**
 * Split `a, b = "x, y", expect(panic)` into single directives.
 */
export const splitDirectives = (text: string): readonly string[] =>
  splitTopLevel(text, ",").filter((part) => part !== "");

const TOKEN_PATTERN = /^([A-Za-z_][\w]*)\s*(?:\(\s*([^)]*?)\s*\)|=\s*([\s\S]*?))?\s*$/;

export const readDirectiveToken = (raw: string): DirectiveToken | undefined => {
  const match = TOKEN_PATTERN.exec(raw.trim());
  if (!match) {
    return undefined;
  }
  const [, name = "", argument, value] = match;
  return {
    name,
    ...(argument !== undefined ? { argument } : {}),
    ...(value !== undefined ? { value: value.trim() } : {}),
  };
};

/**
 * A quoted string yields its contents; a bare identifier path yields itself.
 */
export const readDirectiveValue = (value: string): string | undefined => {
  const quoted = /^(["'])(.*)\1$/s.exec(value);
  if (quoted) {
    return quoted[2];
  }
  return isTypeName(value) ? value : undefined;
};

// ═══════════════════════════════════════════════════════════════════════════
// FIELD DIRECTIVES
// ═══════════════════════════════════════════════════════════════════════════

const FLAG_DIRECTIVES = new Set(["ignore", "transparent", "optional", "required"]);

const VALUE_DIRECTIVES = new Set([
  "rename",
  "from_wire_fn",
  "to_wire_fn",
  "error_fn",
  "error_type",
]);

// Custom conversion functions may be empty here; the validator reports them.
const EMPTY_ALLOWED = new Set(["from_wire_fn", "to_wire_fn"]);

type MutableFieldAnnotation = {
  -readonly [K in keyof FieldAnnotation]: FieldAnnotation[K];
};

export const parseFieldDirectives = (
  tokens: readonly string[],
  aggregate: string,
  field: string
): Result<FieldAnnotation, Diagnostic> => {
  const annotation: MutableFieldAnnotation = {
    ignore: false,
    transparent: false,
    expectMode: "none",
  };
  const optionality = new Set<Optionality>();
  const defaults: DefaultDirective[] = [];

  const malformed = (raw: string, detail: string): Diagnostic =>
    createDiagnostic(
      "MalformedDirectiveValue",
      aggregate,
      field,
      `Directive '${raw}' ${detail}`,
      `Write it as ${raw.split(/[\s=(]/)[0] ?? raw} = "value"`
    );

  for (const raw of tokens) {
    const token = readDirectiveToken(raw);
    if (token === undefined) {
      return error(malformed(raw, "cannot be read"));
    }

    if (FLAG_DIRECTIVES.has(token.name)) {
      if (token.argument !== undefined || token.value !== undefined) {
        return error(
          createDiagnostic(
            "MalformedDirectiveValue",
            aggregate,
            field,
            `Directive '${token.name}' takes no value`,
            `Write it as a bare '${token.name}'`
          )
        );
      }
      if (token.name === "ignore") annotation.ignore = true;
      if (token.name === "transparent") annotation.transparent = true;
      if (token.name === "optional") optionality.add("optional");
      if (token.name === "required") optionality.add("required");
      continue;
    }

    if (token.name === "expect") {
      const mode = readExpectMode(token);
      if (mode === undefined) {
        return error(
          createDiagnostic(
            "MalformedDirectiveValue",
            aggregate,
            field,
            `Directive '${raw}' has an unknown expect mode`,
            "Use expect, expect(panic) or expect(error)"
          )
        );
      }
      annotation.expectMode = mode;
      continue;
    }

    if (token.name === "default") {
      if (token.argument !== undefined) {
        return error(malformed(raw, "must use '=' to name its function"));
      }
      if (token.value === undefined) {
        defaults.push({ kind: "defaultValue" });
        continue;
      }
      const fn = readDirectiveValue(token.value);
      if (fn === undefined || fn === "") {
        return error(malformed(raw, "needs a function name"));
      }
      defaults.push({ kind: "customFn", fn });
      continue;
    }

    if (VALUE_DIRECTIVES.has(token.name)) {
      if (token.value === undefined) {
        return error(malformed(raw, "needs a value"));
      }
      const value = readDirectiveValue(token.value);
      if (value === undefined || (value === "" && !EMPTY_ALLOWED.has(token.name))) {
        return error(malformed(raw, "needs a quoted string or identifier"));
      }
      switch (token.name) {
        case "rename":
          annotation.rename = value;
          break;
        case "from_wire_fn":
          annotation.fromWireFn = value;
          break;
        case "to_wire_fn":
          annotation.toWireFn = value;
          break;
        case "error_fn":
          annotation.errorFn = value;
          break;
        case "error_type":
          annotation.errorType = value;
          break;
      }
      continue;
    }

    return error(
      createDiagnostic(
        "UnknownDirective",
        aggregate,
        field,
        `Unknown directive '${token.name}'`
      )
    );
  }

  if (optionality.size > 1) {
    return error(
      createDiagnostic(
        "ConflictingAnnotation",
        aggregate,
        field,
        "Field is marked both 'optional' and 'required'",
        "Keep only one of 'optional' and 'required'"
      )
    );
  }
  const [explicit] = [...optionality];
  if (explicit !== undefined) {
    annotation.explicitOptionality = explicit;
  }

  if (defaults.length > 1) {
    return error(
      createDiagnostic(
        "ConflictingAnnotation",
        aggregate,
        field,
        "Field declares more than one 'default'",
        "Use either a bare 'default' or 'default = \"fn\"'"
      )
    );
  }
  const [declaredDefault] = defaults;
  if (declaredDefault !== undefined) {
    annotation.default = declaredDefault;
  }

  return ok(annotation);
};

const readExpectMode = (token: DirectiveToken): ExpectMode | undefined => {
  if (token.value !== undefined) {
    return undefined;
  }
  switch (token.argument) {
    case undefined:
    case "error":
      return "error";
    case "panic":
      return "panic";
    default:
      return undefined;
  }
};

// ═══════════════════════════════════════════════════════════════════════════
// AGGREGATE DIRECTIVES
// ═══════════════════════════════════════════════════════════════════════════

const AGGREGATE_DIRECTIVES: ReadonlyMap<string, keyof AggregateAnnotation> =
  new Map([
    ["namespace", "namespace"],
    ["wire_name", "wireName"],
    ["error_type", "errorType"],
    ["error_fn", "errorFn"],
  ]);

export const parseAggregateDirectives = (
  tokens: readonly string[],
  aggregate: string
): Result<AggregateAnnotation, Diagnostic> => {
  const annotation: { -readonly [K in keyof AggregateAnnotation]: AggregateAnnotation[K] } = {};

  for (const raw of tokens) {
    const token = readDirectiveToken(raw);
    const key = token !== undefined ? AGGREGATE_DIRECTIVES.get(token.name) : undefined;

    if (token === undefined || key === undefined) {
      return error(
        createDiagnostic(
          "UnknownDirective",
          aggregate,
          undefined,
          `Unknown aggregate directive '${raw}'`,
          "Aggregate directives are namespace, wire_name, error_type and error_fn"
        )
      );
    }

    const value =
      token.value !== undefined ? readDirectiveValue(token.value) : undefined;
    if (value === undefined || value === "") {
      return error(
        createDiagnostic(
          "MalformedDirectiveValue",
          aggregate,
          undefined,
          `Directive '${raw}' needs a quoted string or identifier`,
          `Write it as ${token.name} = "value"`
        )
      );
    }
    annotation[key] = value;
  }

  return ok(annotation);
};
