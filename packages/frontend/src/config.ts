/**
 * Generation configuration threaded explicitly through every phase
 */

import type { SideChannel } from "./analysis/side-channel.js";
import { emptySideChannel } from "./analysis/side-channel.js";
import type { SourceModel, TransparentConstruction } from "./types/descriptor.js";

export type TransparentEntry = {
  readonly inner: string;
  readonly construction: TransparentConstruction;
};

/**
 * Names the shape classifier knows about. Primitive names map to the
 * literal used as their zero value.
 */
export type TypeTable = {
  readonly primitives: ReadonlyMap<string, string>;
  readonly transparents: ReadonlyMap<string, TransparentEntry>;
  readonly enums: ReadonlySet<string>;
};

export type GenerationConfig = {
  readonly wireNamespace: string;
  readonly wireModule: string;
  /** Further wire modules, by import alias, for aggregate `namespace` overrides */
  readonly wireAliases: ReadonlyMap<string, string>;
  readonly domainModule: string;
  readonly helpersModule?: string;
  readonly primitives: ReadonlyMap<string, string>;
  readonly strictAggregates: boolean;
  readonly sideChannel: SideChannel;
};

export const DEFAULT_PRIMITIVES: ReadonlyMap<string, string> = new Map([
  ["string", '""'],
  ["number", "0"],
  ["boolean", "false"],
  ["bigint", "0n"],
  ["Uint8Array", "new Uint8Array()"],
]);

export const createGenerationConfig = (
  overrides: Partial<GenerationConfig> = {}
): GenerationConfig => ({
  wireNamespace: overrides.wireNamespace ?? "wire",
  wireModule: overrides.wireModule ?? "./wire.js",
  wireAliases: overrides.wireAliases ?? new Map(),
  domainModule: overrides.domainModule ?? "./domain.js",
  helpersModule: overrides.helpersModule,
  primitives: overrides.primitives ?? DEFAULT_PRIMITIVES,
  strictAggregates: overrides.strictAggregates ?? false,
  sideChannel: overrides.sideChannel ?? emptySideChannel,
});

export const createTypeTable = (
  primitives: ReadonlyMap<string, string> = DEFAULT_PRIMITIVES,
  transparents: ReadonlyMap<string, TransparentEntry> = new Map(),
  enums: Iterable<string> = []
): TypeTable => ({
  primitives,
  transparents,
  enums: new Set(enums),
});

export const buildTypeTable = (
  model: SourceModel,
  config: GenerationConfig
): TypeTable =>
  createTypeTable(
    config.primitives,
    new Map(
      model.transparents.map((entry) => [
        entry.name,
        { inner: entry.inner, construction: entry.construction },
      ])
    ),
    model.enums.map((entry) => entry.name)
  );
