/**
 * Emitter context: what one generation pass knows about its aggregates
 */

import type { DomainFieldShape, GenerationConfig, TypeTable } from "@wirebridge/frontend";
import { isWireTyped } from "@wirebridge/frontend";

export type AggregateEntry = {
  readonly wireName: string;
  readonly namespace: string;
  /** Error union members; empty when `xFromWire` cannot fail */
  readonly errorTypes: readonly string[];
};

export type EmitterContext = {
  readonly config: GenerationConfig;
  readonly table: TypeTable;
  readonly aggregates: ReadonlyMap<string, AggregateEntry>;
};

export const createContext = (
  config: GenerationConfig,
  table: TypeTable,
  aggregates: ReadonlyMap<string, AggregateEntry> = new Map()
): EmitterContext => ({ config, table, aggregates });

export const isFallible = (context: EmitterContext, aggregate: string): boolean =>
  (context.aggregates.get(aggregate)?.errorTypes.length ?? 0) > 0;

export const wireNameOf = (context: EmitterContext, aggregate: string): string =>
  context.aggregates.get(aggregate)?.wireName ?? aggregate;

export const namespaceOf = (context: EmitterContext, aggregate: string): string =>
  context.aggregates.get(aggregate)?.namespace ?? context.config.wireNamespace;

/**
 * The value already has a wire type from one of the configured wire modules.
 */
export const hasWireType = (context: EmitterContext, shape: DomainFieldShape): boolean =>
  [context.config.wireNamespace, ...context.config.wireAliases.keys()].some(
    (namespace) => isWireTyped(shape, namespace)
  );
