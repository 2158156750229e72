/**
 * Field Shape Classifier
 *
 * Turns declared-type text into a DomainFieldShape. Purely syntactic and
 * total: an unknown type name is a custom aggregate, any other text it
 * cannot place is opaque.
 */

import type { TypeTable } from "../config.js";
import type { AbsentValue, DomainFieldShape } from "../types/shapes.js";
import {
  isTypeName,
  matchGeneric,
  splitTopLevel,
  stripParens,
} from "./type-text.js";

export const NULLABLE_WRAPPERS: ReadonlySet<string> = new Set([
  "Optional",
  "Maybe",
  "NullableWrapper",
]);

export const SEQUENCE_WRAPPERS: ReadonlySet<string> = new Set([
  "Array",
  "ReadonlyArray",
  "SequenceWrapper",
]);

export const TRANSPARENT_WRAPPER = "TransparentWrapper";

export type ClassifierHints = {
  /** The field carries the `transparent` directive */
  readonly transparent?: boolean;
};

const ABSENT_NAMES: ReadonlySet<string> = new Set(["undefined", "null"]);

export const classifyFieldShape = (
  typeText: string,
  table: TypeTable,
  hints: ClassifierHints = {}
): DomainFieldShape => {
  const text = stripParens(typeText);

  // T | undefined, T | null
  const members = splitTopLevel(text, "|").filter((part) => part !== "");
  if (members.length > 1) {
    const absent = members.filter((part) => ABSENT_NAMES.has(part));
    const present = members.filter((part) => !ABSENT_NAMES.has(part));
    if (absent.length > 0 && present.length > 0) {
      const absentValue: AbsentValue =
        absent.includes("undefined") ? "undefined" : "null";
      return {
        kind: "nullable",
        inner: classifyFieldShape(present.join(" | "), table, hints),
        absent: absentValue,
      };
    }
    return { kind: "opaque", text };
  }

  if (text.startsWith("readonly ")) {
    return classifyFieldShape(text.slice("readonly ".length), table, hints);
  }

  if (text.endsWith("[]")) {
    return {
      kind: "sequence",
      inner: classifyFieldShape(text.slice(0, -2), table),
    };
  }

  const generic = matchGeneric(text);
  if (generic !== undefined && generic.args.length === 1) {
    const [arg = ""] = generic.args;
    if (NULLABLE_WRAPPERS.has(generic.name)) {
      return {
        kind: "nullable",
        inner: classifyFieldShape(arg, table, hints),
        absent: "undefined",
      };
    }
    if (SEQUENCE_WRAPPERS.has(generic.name)) {
      return { kind: "sequence", inner: classifyFieldShape(arg, table) };
    }
    if (generic.name === TRANSPARENT_WRAPPER) {
      return {
        kind: "transparent",
        inner: classifyFieldShape(arg, table),
        construction: "literal",
      };
    }
  }

  const transparent = table.transparents.get(text);
  if (transparent !== undefined) {
    return {
      kind: "transparent",
      name: text,
      inner: classifyFieldShape(transparent.inner, table),
      construction: transparent.construction,
    };
  }
  if (hints.transparent === true && isTypeName(text)) {
    return { kind: "transparent", name: text, construction: "new" };
  }

  if (table.primitives.has(text)) {
    return { kind: "primitive", name: text };
  }

  if (table.enums.has(text)) {
    return { kind: "taggedEnum", name: text };
  }

  return isTypeName(text)
    ? { kind: "customAggregate", name: text }
    : { kind: "opaque", text };
};
