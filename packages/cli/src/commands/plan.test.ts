/**
 * Tests for the plan command
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { resolveConfig } from "../config.js";
import type { CliOptions, ResolvedConfig } from "../types.js";
import { planCommand } from "./plan.js";

const domainSource = `
/** @wire */
export enum Status {
  Active,
  Archived,
}

/** @wire */
export interface Album {
  readonly name: string;
}

/** @wire */
export interface Track {
  /** @wire expect */
  readonly title: string;
  readonly album: Album;
}
`;

const withDomain = (cliOptions: CliOptions, body: (config: ResolvedConfig) => void): void => {
  const dir = mkdtempSync(join(tmpdir(), "wirebridge-plan-"));
  try {
    writeFileSync(join(dir, "domain.ts"), domainSource, "utf-8");
    const result = resolveConfig({ input: "domain.ts" }, cliOptions, dir);
    if (!result.ok) {
      throw new Error(result.error);
    }
    body(result.value);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
};

describe("Plan command", () => {
  it("should list enum mappings before aggregate plans", () => {
    withDomain({}, (config) => {
      const result = planCommand(config);
      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      const lines = result.value.report.split("\n");
      expect(lines.slice(0, 4)).to.deep.equal([
        "Status <-> wire.Status",
        "  Active = STATUS_ACTIVE",
        "  Archived = STATUS_ARCHIVED",
        "",
      ]);
      expect(lines).to.include("Album <-> wire.Album");
      expect(lines).to.include("Track <-> wire.Track");
      expect(lines[lines.length - 1]).to.equal("  fromWire fails with TrackConversionError");
    });
  });

  it("should return inferred-optionality warnings", () => {
    withDomain({}, (config) => {
      const result = planCommand(config);
      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(
        result.value.warnings.map((warning) => [warning.kind, warning.aggregate, warning.field])
      ).to.deep.equal([["InferredOptionality", "Track", "album"]]);
    });
  });

  it("should fail under strict aggregates", () => {
    withDomain({ strictAggregates: true }, (config) => {
      const result = planCommand(config);
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.kind).to.equal("generation");
      expect(
        result.error.diagnostics.map((diagnostic) => [diagnostic.kind, diagnostic.field])
      ).to.deep.equal([["AmbiguousOptionality", "album"]]);
    });
  });
});
