/**
 * Descriptors handed to the generator by the source front end
 */

export type FieldDescriptor = {
  readonly name: string;
  readonly declaredType: string; // Type text exactly as written
  readonly directives: readonly string[]; // One raw directive per entry
  readonly aggregate: string; // Enclosing aggregate name
};

export type AggregateDescriptor = {
  readonly name: string;
  readonly directives: readonly string[];
  readonly fields: readonly FieldDescriptor[];
};

export type EnumDescriptor = {
  readonly name: string;
  readonly directives: readonly string[];
  readonly variants: readonly string[];
  readonly wireVariants?: readonly string[]; // Member names of the wire enum, when known
};

/**
 * How a transparent wrapper is rebuilt from its inner value:
 * `new W(inner)` for classes, `{ value: inner }` for structural aliases.
 */
export type TransparentConstruction = "new" | "literal";

export type TransparentDescriptor = {
  readonly name: string;
  readonly inner: string;
  readonly construction: TransparentConstruction;
};

export type SourceModel = {
  readonly aggregates: readonly AggregateDescriptor[];
  readonly enums: readonly EnumDescriptor[];
  readonly transparents: readonly TransparentDescriptor[];
};

export const createFieldDescriptor = (
  aggregate: string,
  name: string,
  declaredType: string,
  directives: readonly string[] = []
): FieldDescriptor => ({ name, declaredType, directives, aggregate });

export const createSourceModel = (
  aggregates: readonly AggregateDescriptor[] = [],
  enums: readonly EnumDescriptor[] = [],
  transparents: readonly TransparentDescriptor[] = []
): SourceModel => ({ aggregates, enums, transparents });
