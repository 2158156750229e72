/**
 * What generated code does when a wire value is missing
 */

import type { DomainFieldShape, ErrorMode, FieldPlan } from "@wirebridge/frontend";
import { domainZeroValue } from "@wirebridge/frontend";
import type { EmitterContext } from "../emitter-types/context.js";
import { MISSING_FIELD_KIND } from "../errors/error-scaffolding.js";

export const missingFieldMessage = (aggregate: string, field: string): string =>
  `${aggregate}.${field}: required wire field is missing`;

/**
 * `errorFn("field")`, or the generated error literal.
 */
export const errorExpression = (plan: FieldPlan): string => {
  const field = JSON.stringify(plan.field);
  return plan.annotation.errorFn !== undefined
    ? `${plan.annotation.errorFn}(${field})`
    : `{ kind: "${MISSING_FIELD_KIND}", field: ${field} }`;
};

/**
 * The statement run for a missing value under `panic` or `error`;
 * undefined for modes that do not stop the conversion.
 */
export const missingValueStatement = (
  aggregate: string,
  plan: FieldPlan,
  mode: ErrorMode
): string | undefined => {
  switch (mode.kind) {
    case "panic":
      return `throw new Error(${JSON.stringify(missingFieldMessage(aggregate, plan.field))});`;
    case "error":
      return `return { ok: false, error: ${errorExpression(plan)} };`;
    case "default":
    case "none":
      return undefined;
  }
};

/**
 * `fn()` for `default = "fn"`, else the zero value of the domain type.
 */
export const defaultExpression = (
  fn: string | undefined,
  shape: DomainFieldShape,
  context: EmitterContext
): string =>
  fn !== undefined ? `${fn}()` : domainZeroValue(shape, context.table) ?? "undefined";
