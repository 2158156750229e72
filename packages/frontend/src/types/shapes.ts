/**
 * Domain and wire field shapes
 */

import type { Optionality } from "./annotation.js";
import type { TransparentConstruction } from "./descriptor.js";

export type AbsentValue = "undefined" | "null";

export type DomainFieldShape =
  | { readonly kind: "primitive"; readonly name: string }
  | {
      readonly kind: "nullable";
      readonly inner: DomainFieldShape;
      readonly absent: AbsentValue;
    }
  | { readonly kind: "sequence"; readonly inner: DomainFieldShape }
  | {
      readonly kind: "transparent";
      readonly name?: string; // Absent for an inline TransparentWrapper<T>
      readonly inner?: DomainFieldShape; // Absent when the wrapped type is unknown
      readonly construction: TransparentConstruction;
    }
  | { readonly kind: "taggedEnum"; readonly name: string }
  | { readonly kind: "customAggregate"; readonly name: string }
  // Maps, records and unions of several types: converted only by custom
  // functions
  | { readonly kind: "opaque"; readonly text: string };

export type WireMapping =
  | "scalar"
  | "optional"
  | "repeated"
  | "message"
  | "customDerived";

export type InferenceTier =
  | "explicit"
  | "sideChannel"
  | "structural"
  | "usagePattern";

export type WireFieldShape = {
  readonly mapping: WireMapping;
  readonly optionality: Optionality;
  readonly source: InferenceTier;
  readonly note?: string;
};

/**
 * Repeated fields signal absence by emptiness, so they are always required.
 */
export const createWireShape = (
  mapping: WireMapping,
  optionality: Optionality,
  source: InferenceTier,
  note?: string
): WireFieldShape => ({
  mapping,
  optionality: mapping === "repeated" ? "required" : optionality,
  source,
  ...(note !== undefined ? { note } : {}),
});

export const isWireOptional = (shape: WireFieldShape): boolean =>
  shape.optionality === "optional" && shape.mapping !== "repeated";

export const isSequenceShaped = (shape: DomainFieldShape): boolean =>
  shape.kind === "sequence" ||
  (shape.kind === "nullable" && shape.inner.kind === "sequence");

export const describeShape = (shape: DomainFieldShape): string => {
  switch (shape.kind) {
    case "primitive":
      return `Primitive(${shape.name})`;
    case "nullable":
      return `Nullable(${describeShape(shape.inner)})`;
    case "sequence":
      return `Sequence(${describeShape(shape.inner)})`;
    case "transparent":
      return `Transparent(${shape.name ?? "TransparentWrapper"})`;
    case "taggedEnum":
      return `TaggedEnum(${shape.name})`;
    case "customAggregate":
      return `CustomAggregate(${shape.name})`;
    case "opaque":
      return `Opaque(${shape.text})`;
  }
};

/**
 * The first opaque type text inside a shape, if any.
 */
export const findOpaqueText = (shape: DomainFieldShape): string | undefined => {
  switch (shape.kind) {
    case "opaque":
      return shape.text;
    case "nullable":
    case "sequence":
      return findOpaqueText(shape.inner);
    case "transparent":
      return shape.inner !== undefined ? findOpaqueText(shape.inner) : undefined;
    case "primitive":
    case "taggedEnum":
    case "customAggregate":
      return undefined;
  }
};

export const describeWireShape = (shape: WireFieldShape): string =>
  `${shape.mapping}/${shape.optionality} via ${shape.source}`;
