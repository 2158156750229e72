/**
 * Zero-value literals used when a value must be produced from nothing
 */

import type { TypeTable } from "../config.js";
import type { DomainFieldShape } from "../types/shapes.js";
import { isQualifiedBy } from "./type-text.js";

/**
 * The domain value for an ignored field or a bare `default`.
 */
export const domainZeroValue = (
  shape: DomainFieldShape,
  table: TypeTable
): string | undefined => {
  switch (shape.kind) {
    case "primitive":
      return table.primitives.get(shape.name);
    case "nullable":
      return shape.absent;
    case "sequence":
      return "[]";
    case "transparent": {
      const inner =
        shape.inner !== undefined ? domainZeroValue(shape.inner, table) : undefined;
      if (inner === undefined) {
        return undefined;
      }
      return shape.construction === "new" && shape.name !== undefined
        ? `new ${shape.name}(${inner})`
        : `{ value: ${inner} }`;
    }
    case "taggedEnum":
    case "customAggregate":
    case "opaque":
      return undefined;
  }
};

/**
 * The wire value sent for an absent domain value on a required wire field.
 * Messages are built with the wire module's `create()` factory.
 */
export const wireZeroValue = (
  shape: DomainFieldShape,
  table: TypeTable,
  wireNamespace: string,
  wireNameOf: (aggregate: string) => string = (aggregate) => aggregate
): string | undefined => {
  switch (shape.kind) {
    case "primitive":
      return table.primitives.get(shape.name);
    case "nullable":
      return wireZeroValue(shape.inner, table, wireNamespace, wireNameOf);
    case "sequence":
      return "[]";
    case "transparent":
      return shape.inner !== undefined
        ? wireZeroValue(shape.inner, table, wireNamespace, wireNameOf)
        : undefined;
    case "taggedEnum":
      return "0";
    case "opaque":
      return undefined;
    case "customAggregate":
      return isQualifiedBy(shape.name, wireNamespace)
        ? `${shape.name}.create()`
        : `${wireNamespace}.${wireNameOf(shape.name)}.create()`;
  }
};
