/**
 * Shared fixtures for frontend tests
 */

import type { GenerationConfig, TypeTable } from "./config.js";
import { DEFAULT_PRIMITIVES, createGenerationConfig, createTypeTable } from "./config.js";
import type { FieldAnnotation } from "./types/annotation.js";
import { emptyFieldAnnotation } from "./types/annotation.js";

export const testPrimitives: ReadonlyMap<string, string> = new Map([
  ...DEFAULT_PRIMITIVES,
  ["Text", '""'],
  ["UInt32", "0"],
  ["UInt64", "0n"],
]);

export const testTable: TypeTable = createTypeTable(
  testPrimitives,
  new Map([
    ["TrackId", { inner: "UInt64", construction: "new" }],
    ["Email", { inner: "string", construction: "literal" }],
  ]),
  ["Status", "Genre"]
);

export const testConfig = (
  overrides: Partial<GenerationConfig> = {}
): GenerationConfig =>
  createGenerationConfig({ primitives: testPrimitives, ...overrides });

export const annotation = (
  overrides: Partial<FieldAnnotation> = {}
): FieldAnnotation => ({ ...emptyFieldAnnotation, ...overrides });
