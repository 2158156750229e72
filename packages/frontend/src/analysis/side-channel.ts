/**
 * Side channel for wire optionality answers gathered outside the source.
 *
 * Keys are `Aggregate.field` using domain names. `true` means the wire
 * field is optional, `false` required; a missing key is "no answer".
 */

import type { Result } from "../types/result.js";
import { ok, error } from "../types/result.js";

export type SideChannel = {
  readonly lookup: (aggregate: string, field: string) => boolean | undefined;
};

export const emptySideChannel: SideChannel = {
  lookup: () => undefined,
};

export const createTableSideChannel = (
  entries: Readonly<Record<string, boolean>>
): SideChannel => {
  const table = new Map(Object.entries(entries));
  return {
    lookup: (aggregate, field) => table.get(`${aggregate}.${field}`),
  };
};

/**
 * Earlier channels win; a later one is only asked when they have no answer.
 */
export const combineSideChannels = (
  ...channels: readonly SideChannel[]
): SideChannel => ({
  lookup: (aggregate, field) => {
    for (const channel of channels) {
      const answer = channel.lookup(aggregate, field);
      if (answer !== undefined) {
        return answer;
      }
    }
    return undefined;
  },
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Parse a lookup file of the form `{ "Track.title": true, ... }`.
 */
export const parseSideChannelFile = (
  text: string
): Result<SideChannel, string> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    return error(
      `Invalid side channel file: ${e instanceof Error ? e.message : String(e)}`
    );
  }

  if (!isRecord(parsed)) {
    return error("Side channel file must contain a JSON object");
  }

  const entries: Record<string, boolean> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== "boolean") {
      return error(`Side channel entry "${key}" must be true or false`);
    }
    if (!/^[^.]+\.[^.]+$/.test(key)) {
      return error(`Side channel key "${key}" must look like Aggregate.field`);
    }
    entries[key] = value;
  }

  return ok(createTableSideChannel(entries));
};
