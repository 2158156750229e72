/**
 * Error-type scaffolding shared by fallible conversions
 */

export const CONVERSION_RESULT_TYPE = "ConversionResult";

export const COLLECT_RESULTS_HELPER = "collectResults";

export const emitConversionResultType = (): string =>
  [
    `export type ${CONVERSION_RESULT_TYPE}<T, E> =`,
    "  | { readonly ok: true; readonly value: T }",
    "  | { readonly ok: false; readonly error: E };",
  ].join("\n");

/**
 * Stops at the first failed element.
 */
export const emitCollectResultsHelper = (): string =>
  [
    `const ${COLLECT_RESULTS_HELPER} = <T, E>(`,
    `  results: readonly ${CONVERSION_RESULT_TYPE}<T, E>[]`,
    `): ${CONVERSION_RESULT_TYPE}<T[], E> => {`,
    "  const values: T[] = [];",
    "  for (const result of results) {",
    "    if (!result.ok) {",
    "      return result;",
    "    }",
    "    values.push(result.value);",
    "  }",
    "  return { ok: true, value: values };",
    "};",
  ].join("\n");

export const MISSING_FIELD_KIND = "missingField";

export const emitGeneratedErrorType = (name: string): string =>
  [
    `export type ${name} = {`,
    `  readonly kind: "${MISSING_FIELD_KIND}";`,
    "  readonly field: string;",
    "};",
  ].join("\n");

export const errorUnion = (types: readonly string[]): string => types.join(" | ");

export const resultType = (value: string, errorTypes: readonly string[]): string =>
  `${CONVERSION_RESULT_TYPE}<${value}, ${errorUnion(errorTypes)}>`;
