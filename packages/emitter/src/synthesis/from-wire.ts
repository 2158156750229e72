/**
 * Wire -> domain field templates
 *
 * A template is the guard statements that run before the domain object
 * literal is built, plus the expression used as the property value. Guards
 * are emitted as source lines, in order, one field after another.
 */

import type { DomainFieldShape, ErrorMode, FieldPlan } from "@wirebridge/frontend";
import { NONE, defaultFunction, isWireOptional } from "@wirebridge/frontend";
import type { EmitterContext } from "../emitter-types/context.js";
import { localName, propertyAccess } from "../emitter-types/formatting.js";
import type { ValueConversion } from "./converters.js";
import { fromWireValue } from "./converters.js";
import { defaultExpression, missingValueStatement } from "./absence.js";

export const MESSAGE_PARAMETER = "message";

export type FromWireTemplate = {
  readonly guards: readonly string[];
  readonly expression: string;
};

type Converter = (target: DomainFieldShape, source: string) => ValueConversion;

const stripNullable = (shape: DomainFieldShape): DomainFieldShape =>
  shape.kind === "nullable" ? shape.inner : shape;

const ifBlock = (test: string, statement: string): readonly string[] => [
  `if (${test}) {`,
  `  ${statement}`,
  "}",
];

/**
 * Fallible conversions are bound to a local and returned early on failure.
 */
const bind = (conversion: ValueConversion, local: string): FromWireTemplate =>
  conversion.fallible
    ? {
        guards: [
          `const ${local} = ${conversion.expression};`,
          ...ifBlock(`!${local}.ok`, `return ${local};`),
        ],
        expression: `${local}.value`,
      }
    : { guards: [], expression: conversion.expression };

/**
 * `absentTest ? fallback : conversion`, with early return when the
 * conversion is fallible.
 */
const convertUnless = (
  conversion: ValueConversion,
  source: string,
  absentTest: string,
  fallback: string,
  local: string
): FromWireTemplate => {
  if (!conversion.fallible) {
    const passthrough =
      conversion.expression === source &&
      absentTest === `${source} === undefined` &&
      fallback === "undefined";
    return {
      guards: [],
      expression: passthrough
        ? source
        : `${absentTest} ? ${fallback} : ${conversion.expression}`,
    };
  }
  return {
    guards: [
      `const ${local} = ${absentTest} ? undefined : ${conversion.expression};`,
      ...ifBlock(`${local} !== undefined && !${local}.ok`, `return ${local};`),
    ],
    expression: `${local} === undefined ? ${fallback} : ${local}.value`,
  };
};

/**
 * Stop on absence (`panic`, `error`), substitute (`default`) or convert.
 */
const handleAbsence = (
  aggregate: string,
  plan: FieldPlan,
  conversion: ValueConversion,
  source: string,
  absentTest: string,
  mode: ErrorMode,
  context: EmitterContext
): FromWireTemplate => {
  const local = localName(plan.field, "Result");
  switch (mode.kind) {
    case "panic":
    case "error": {
      const bound = bind(conversion, local);
      const statement = missingValueStatement(aggregate, plan, mode);
      const stop = statement !== undefined ? ifBlock(absentTest, statement) : [];
      return {
        guards: [...stop, ...bound.guards],
        expression: bound.expression,
      };
    }
    case "default":
      return convertUnless(
        conversion,
        source,
        absentTest,
        defaultExpression(mode.fn, plan.shape, context),
        local
      );
    case "none":
      return plan.shape.kind === "nullable"
        ? convertUnless(conversion, source, absentTest, plan.shape.absent, local)
        : bind(conversion, local);
  }
};

const withMode = (
  aggregate: string,
  plan: FieldPlan,
  convert: Converter,
  mode: ErrorMode,
  context: EmitterContext
): FromWireTemplate => {
  const source = propertyAccess(MESSAGE_PARAMETER, plan.wireField);
  const conversion = convert(stripNullable(plan.shape), source);
  if (!isWireOptional(plan.wire) && mode.kind !== "default") {
    return bind(conversion, localName(plan.field, "Result"));
  }
  return handleAbsence(
    aggregate,
    plan,
    conversion,
    source,
    `${source} === undefined`,
    mode,
    context
  );
};

export const synthesizeFromWire = (
  aggregate: string,
  plan: FieldPlan,
  context: EmitterContext
): FromWireTemplate => {
  const source = propertyAccess(MESSAGE_PARAMETER, plan.wireField);
  const convert: Converter = (target, value) => fromWireValue(target, value, context);
  const { strategy } = plan;

  switch (strategy.kind) {
    case "ignore":
      return {
        guards: [],
        expression: defaultExpression(defaultFunction(plan.annotation), plan.shape, context),
      };

    case "custom": {
      const { from } = strategy;
      if (from === undefined) {
        return withMode(aggregate, plan, convert, strategy.errorMode, context);
      }
      if (strategy.errorMode.kind === "none") {
        return { guards: [], expression: `${from}(${source})` };
      }
      return withMode(
        aggregate,
        plan,
        (_target, value) => ({ expression: `${from}(${value})`, fallible: false }),
        strategy.errorMode,
        context
      );
    }

    case "direct":
      return withMode(aggregate, plan, convert, NONE, context);

    case "option":
      return withMode(
        aggregate,
        plan,
        convert,
        strategy.variant === "unwrap" ? strategy.errorMode : NONE,
        context
      );

    case "transparent":
      return withMode(aggregate, plan, convert, strategy.errorMode, context);

    case "collection": {
      if (strategy.variant === "directAssignment") {
        return { guards: [], expression: source };
      }
      const emptyTest = `${source}.length === 0`;
      if (strategy.variant === "mapOption") {
        return handleAbsence(
          aggregate,
          plan,
          convert(stripNullable(plan.shape), source),
          source,
          emptyTest,
          NONE,
          context
        );
      }
      return handleAbsence(
        aggregate,
        plan,
        convert(plan.shape, source),
        source,
        emptyTest,
        strategy.errorMode,
        context
      );
    }
  }
};
