/**
 * Typed directive records produced once by the directive parser
 */

export type ExpectMode = "none" | "panic" | "error";

export type DefaultDirective =
  | { readonly kind: "defaultValue" } // bare `default`
  | { readonly kind: "customFn"; readonly fn: string }; // `default = "fn"`

export type Optionality = "optional" | "required";

export type FieldAnnotation = {
  readonly ignore: boolean;
  readonly transparent: boolean;
  readonly expectMode: ExpectMode;
  readonly default?: DefaultDirective;
  readonly rename?: string;
  readonly explicitOptionality?: Optionality;
  readonly fromWireFn?: string;
  readonly toWireFn?: string;
  readonly errorFn?: string;
  readonly errorType?: string;
};

export type AggregateAnnotation = {
  readonly namespace?: string; // Wire module alias used for this aggregate
  readonly wireName?: string;
  readonly errorType?: string;
  readonly errorFn?: string;
};

export const emptyFieldAnnotation: FieldAnnotation = {
  ignore: false,
  transparent: false,
  expectMode: "none",
};

export const hasCustomFunction = (annotation: FieldAnnotation): boolean =>
  annotation.fromWireFn !== undefined || annotation.toWireFn !== undefined;

/**
 * `expect` and `default` only make sense on a field that can be absent.
 */
export const hasUsageIndicator = (annotation: FieldAnnotation): boolean =>
  annotation.expectMode !== "none" || annotation.default !== undefined;

export const defaultFunction = (
  annotation: FieldAnnotation
): string | undefined =>
  annotation.default?.kind === "customFn" ? annotation.default.fn : undefined;

/**
 * Fill in the error type and function a field does not set itself.
 */
export const inheritAggregateDefaults = (
  field: FieldAnnotation,
  aggregate: AggregateAnnotation
): FieldAnnotation => ({
  ...field,
  errorType: field.errorType ?? aggregate.errorType,
  errorFn: field.errorFn ?? aggregate.errorFn,
});
