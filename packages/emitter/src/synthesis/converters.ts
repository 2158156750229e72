/**
 * Value conversions by domain shape
 *
 * Aggregates and enums convert through the generated `xFromWire` /
 * `xToWire` functions, transparent wrappers through their `value`, and
 * primitives or wire-typed values not at all.
 */

import type { DomainFieldShape } from "@wirebridge/frontend";
import type { EmitterContext } from "../emitter-types/context.js";
import { hasWireType, isFallible } from "../emitter-types/context.js";
import { converterName } from "../emitter-types/formatting.js";
import { COLLECT_RESULTS_HELPER } from "../errors/error-scaffolding.js";

export type ValueConversion = {
  readonly expression: string;
  /** The expression is a ConversionResult rather than the value */
  readonly fallible: boolean;
};

const plain = (expression: string): ValueConversion => ({ expression, fallible: false });

const ITEM = "item";

/**
 * Object literals need parentheses as an arrow body.
 */
const itemArrow = (body: string): string =>
  body.startsWith("{") ? `(${ITEM}) => (${body})` : `(${ITEM}) => ${body}`;

const wrapTransparent = (
  shape: Extract<DomainFieldShape, { kind: "transparent" }>,
  inner: string
): string =>
  shape.construction === "new" && shape.name !== undefined
    ? `new ${shape.name}(${inner})`
    : `{ value: ${inner} }`;

export const fromWireValue = (
  shape: DomainFieldShape,
  source: string,
  context: EmitterContext
): ValueConversion => {
  switch (shape.kind) {
    case "primitive":
      return plain(source);

    case "nullable": {
      const inner = fromWireValue(shape.inner, source, context);
      if (!inner.fallible && inner.expression === source && shape.absent === "undefined") {
        return plain(source);
      }
      const absent = inner.fallible
        ? `{ ok: true as const, value: ${shape.absent} }`
        : shape.absent;
      return {
        expression: `${source} === undefined ? ${absent} : ${inner.expression}`,
        fallible: inner.fallible,
      };
    }

    case "sequence": {
      const inner = fromWireValue(shape.inner, ITEM, context);
      if (!inner.fallible && inner.expression === ITEM) {
        return plain(`[...${source}]`);
      }
      const mapped = `${source}.map(${itemArrow(inner.expression)})`;
      return inner.fallible
        ? { expression: `${COLLECT_RESULTS_HELPER}(${mapped})`, fallible: true }
        : plain(mapped);
    }

    case "transparent": {
      // Only infallible inner conversions are applied inside a wrapper
      const inner =
        shape.inner !== undefined ? fromWireValue(shape.inner, source, context) : plain(source);
      return plain(wrapTransparent(shape, inner.fallible ? source : inner.expression));
    }

    case "taggedEnum":
      return plain(`${converterName(shape.name, "fromWire")}(${source})`);

    case "customAggregate":
      if (hasWireType(context, shape)) {
        return plain(source);
      }
      return {
        expression: `${converterName(shape.name, "fromWire")}(${source})`,
        fallible: isFallible(context, shape.name),
      };

    // Only reached under custom functions, which convert the value themselves
    case "opaque":
      return plain(source);
  }
};

export const toWireValue = (
  shape: DomainFieldShape,
  source: string,
  context: EmitterContext
): string => {
  switch (shape.kind) {
    case "primitive":
      return source;

    case "nullable": {
      const inner = toWireValue(shape.inner, source, context);
      if (shape.absent === "undefined") {
        return inner === source ? source : `${source} === undefined ? undefined : ${inner}`;
      }
      return inner === source
        ? `${source} ?? undefined`
        : `${source} === null ? undefined : ${inner}`;
    }

    case "sequence": {
      const inner = toWireValue(shape.inner, ITEM, context);
      return inner === ITEM ? `[...${source}]` : `${source}.map(${itemArrow(inner)})`;
    }

    case "transparent": {
      const unwrapped = `${source}.value`;
      return shape.inner !== undefined
        ? toWireValue(shape.inner, unwrapped, context)
        : unwrapped;
    }

    case "taggedEnum":
      return `${converterName(shape.name, "toWire")}(${source})`;

    case "customAggregate":
      return hasWireType(context, shape)
        ? source
        : `${converterName(shape.name, "toWire")}(${source})`;

    case "opaque":
      return source;
  }
};
