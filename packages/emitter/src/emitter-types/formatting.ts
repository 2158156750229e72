/**
 * Formatting helper functions
 */

import { isIdentifier } from "@wirebridge/frontend";
import { INDENT } from "../constants.js";

export const indentLines = (
  lines: readonly string[],
  level = 1
): readonly string[] =>
  lines.map((line) => (line === "" ? line : `${INDENT.repeat(level)}${line}`));

/**
 * `value.title`, or `value["track-no"]` for names that are not identifiers
 */
export const propertyAccess = (object: string, name: string): string =>
  isIdentifier(name) ? `${object}.${name}` : `${object}[${JSON.stringify(name)}]`;

export const propertyKey = (name: string): string =>
  isIdentifier(name) ? name : JSON.stringify(name);

export const lowerFirst = (name: string): string =>
  name.charAt(0).toLowerCase() + name.slice(1);

export type Direction = "fromWire" | "toWire";

/**
 * `Track` -> `trackFromWire` / `trackToWire`
 */
export const converterName = (name: string, direction: Direction): string =>
  `${lowerFirst(name)}${direction === "fromWire" ? "FromWire" : "ToWire"}`;

/**
 * Leading identifier of a path or type expression: the name that must be
 * imported. `errors.missing` -> `errors`, `AppError<string>` -> `AppError`.
 */
export const importRoot = (path: string): string | undefined =>
  /^[A-Za-z_$][\w$]*/.exec(path)?.[0];

/**
 * A field name usable as part of a local variable name.
 */
export const localName = (field: string, suffix: string): string =>
  `${field.replace(/[^\w$]/g, "_")}${suffix}`;
