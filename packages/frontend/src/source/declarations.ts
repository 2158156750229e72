/**
 * Source front end: reads annotated domain declarations into descriptors.
 *
 * Works on syntax alone (`ts.createSourceFile`); no program or type
 * checker is built.
 */

import * as ts from "typescript";
import { splitDirectives } from "../analysis/directive-parser.js";
import { TRANSPARENT_WRAPPER } from "../analysis/shape-classifier.js";
import type {
  AggregateDescriptor,
  EnumDescriptor,
  FieldDescriptor,
  SourceModel,
  TransparentDescriptor,
} from "../types/descriptor.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import { ok, error } from "../types/result.js";
import { readWireTag } from "./jsdoc.js";

export const parseSource = (fileName: string, text: string): ts.SourceFile =>
  ts.createSourceFile(fileName, text, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);

const memberName = (name: ts.PropertyName): string | undefined =>
  ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)
    ? name.text
    : undefined;

const hasTransparentDirective = (directives: readonly string[]): boolean =>
  directives.includes("transparent");

type Collected = {
  readonly aggregates: AggregateDescriptor[];
  readonly enums: EnumDescriptor[];
  readonly transparents: TransparentDescriptor[];
  readonly diagnostics: Diagnostic[];
};

const readFields = (
  aggregate: string,
  members: ts.NodeArray<ts.TypeElement>,
  sourceFile: ts.SourceFile,
  diagnostics: Diagnostic[]
): readonly FieldDescriptor[] => {
  const fields: FieldDescriptor[] = [];
  for (const member of members) {
    if (!ts.isPropertySignature(member)) continue;

    const name = memberName(member.name);
    if (name === undefined) {
      diagnostics.push(
        createDiagnostic(
          "MalformedDirectiveValue",
          aggregate,
          member.name.getText(sourceFile),
          "Computed property names cannot be converted"
        )
      );
      continue;
    }
    if (member.type === undefined) {
      diagnostics.push(
        createDiagnostic(
          "MalformedDirectiveValue",
          aggregate,
          name,
          `Field '${name}' has no declared type`,
          "Add a type annotation"
        )
      );
      continue;
    }

    const typeText = member.type.getText(sourceFile);
    fields.push({
      name,
      declaredType:
        member.questionToken !== undefined ? `${typeText} | undefined` : typeText,
      directives: splitDirectives(readWireTag(member) ?? ""),
      aggregate,
    });
  }
  return fields;
};

/**
 * Inner type of `TransparentWrapper<T>`, or the aliased type itself.
 */
const aliasInner = (type: ts.TypeNode, sourceFile: ts.SourceFile): string => {
  if (
    ts.isTypeReferenceNode(type) &&
    type.typeName.getText(sourceFile) === TRANSPARENT_WRAPPER &&
    type.typeArguments?.length === 1
  ) {
    const [arg] = type.typeArguments;
    if (arg !== undefined) {
      return arg.getText(sourceFile);
    }
  }
  return type.getText(sourceFile);
};

/**
 * Type of the `value` constructor parameter or property of a wrapper class.
 */
const classInner = (
  node: ts.ClassDeclaration,
  sourceFile: ts.SourceFile
): string | undefined => {
  for (const member of node.members) {
    if (ts.isConstructorDeclaration(member)) {
      const param = member.parameters.find(
        (p) => ts.isIdentifier(p.name) && p.name.text === "value"
      );
      if (param?.type !== undefined) {
        return param.type.getText(sourceFile);
      }
    }
    if (
      ts.isPropertyDeclaration(member) &&
      memberName(member.name) === "value" &&
      member.type !== undefined
    ) {
      return member.type.getText(sourceFile);
    }
  }
  return undefined;
};

const visitStatement = (
  statement: ts.Statement,
  sourceFile: ts.SourceFile,
  out: Collected
): void => {
  const tag = readWireTag(statement);
  if (tag === undefined) return;
  const directives = splitDirectives(tag);

  if (ts.isInterfaceDeclaration(statement)) {
    const name = statement.name.text;
    out.aggregates.push({
      name,
      directives,
      fields: readFields(name, statement.members, sourceFile, out.diagnostics),
    });
    return;
  }

  if (ts.isTypeAliasDeclaration(statement)) {
    const name = statement.name.text;
    if (hasTransparentDirective(directives)) {
      out.transparents.push({
        name,
        inner: aliasInner(statement.type, sourceFile),
        construction: "literal",
      });
      return;
    }
    if (ts.isTypeLiteralNode(statement.type)) {
      out.aggregates.push({
        name,
        directives,
        fields: readFields(name, statement.type.members, sourceFile, out.diagnostics),
      });
      return;
    }
    out.diagnostics.push(
      createDiagnostic(
        "MalformedDirectiveValue",
        name,
        undefined,
        `Type alias '${name}' is neither an object type nor transparent`,
        "Write the aggregate as an object type or mark it '@wire transparent'"
      )
    );
    return;
  }

  if (ts.isClassDeclaration(statement) && statement.name !== undefined) {
    const name = statement.name.text;
    const inner = hasTransparentDirective(directives)
      ? classInner(statement, sourceFile)
      : undefined;
    if (inner === undefined) {
      out.diagnostics.push(
        createDiagnostic(
          "MalformedDirectiveValue",
          name,
          undefined,
          `Class '${name}' must be a transparent wrapper with a typed 'value'`,
          "Mark it '@wire transparent' and declare constructor(readonly value: T)"
        )
      );
      return;
    }
    out.transparents.push({ name, inner, construction: "new" });
    return;
  }

  if (ts.isEnumDeclaration(statement)) {
    out.enums.push({
      name: statement.name.text,
      directives,
      variants: statement.members
        .map((member) => memberName(member.name))
        .filter((name): name is string => name !== undefined),
    });
  }
};

export const readDomainSource = (
  fileName: string,
  text: string
): Result<SourceModel, readonly Diagnostic[]> => {
  const sourceFile = parseSource(fileName, text);
  const out: Collected = {
    aggregates: [],
    enums: [],
    transparents: [],
    diagnostics: [],
  };

  for (const statement of sourceFile.statements) {
    visitStatement(statement, sourceFile, out);
  }

  if (out.diagnostics.length > 0) {
    return error(out.diagnostics);
  }

  return ok({
    aggregates: out.aggregates,
    enums: out.enums,
    transparents: out.transparents,
  });
};
