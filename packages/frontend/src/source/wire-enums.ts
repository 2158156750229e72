/**
 * Wire enum members read from the generated wire module source
 */

import * as ts from "typescript";
import { parseAggregateDirectives } from "../analysis/directive-parser.js";
import type { EnumDescriptor, SourceModel } from "../types/descriptor.js";
import { parseSource } from "./declarations.js";

export const readWireEnums = (
  fileName: string,
  text: string
): ReadonlyMap<string, readonly string[]> => {
  const sourceFile = parseSource(fileName, text);
  const enums = new Map<string, readonly string[]>();

  for (const statement of sourceFile.statements) {
    if (!ts.isEnumDeclaration(statement)) continue;
    enums.set(
      statement.name.text,
      statement.members.flatMap((member) =>
        ts.isIdentifier(member.name) || ts.isStringLiteral(member.name)
          ? [member.name.text]
          : []
      )
    );
  }

  return enums;
};

const wireNameOf = (entry: EnumDescriptor): string => {
  const parsed = parseAggregateDirectives(entry.directives, entry.name);
  return parsed.ok ? (parsed.value.wireName ?? entry.name) : entry.name;
};

/**
 * Give each domain enum the member list of its wire enum, when known.
 */
export const attachWireVariants = (
  model: SourceModel,
  wireEnums: ReadonlyMap<string, readonly string[]>
): SourceModel => ({
  ...model,
  enums: model.enums.map((entry) => {
    const wireVariants = wireEnums.get(wireNameOf(entry));
    return wireVariants !== undefined ? { ...entry, wireVariants } : entry;
  }),
});
