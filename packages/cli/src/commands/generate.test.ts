/**
 * Tests for the generate command
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { resolveConfig } from "../config.js";
import type { CliOptions, ResolvedConfig } from "../types.js";
import { generateCommand } from "./generate.js";

const domainSource = `
/** @wire */
export enum Status {
  Active,
  Archived,
}

/** @wire */
export interface Track {
  readonly title: string;
  readonly status: Status;
}
`;

const withProject = (
  files: Readonly<Record<string, string>>,
  body: (dir: string) => void
): void => {
  const dir = mkdtempSync(join(tmpdir(), "wirebridge-generate-"));
  try {
    for (const [name, text] of Object.entries(files)) {
      writeFileSync(join(dir, name), text, "utf-8");
    }
    body(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
};

const configFor = (dir: string, cliOptions: CliOptions = {}): ResolvedConfig => {
  const result = resolveConfig({ input: "domain.ts" }, cliOptions, dir);
  if (!result.ok) {
    throw new Error(result.error);
  }
  return result.value;
};

describe("Generate command", () => {
  it("should return the module text when no output is configured", () => {
    withProject({ "domain.ts": domainSource }, (dir) => {
      const result = generateCommand(configFor(dir));
      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      const lines = result.value.text.split("\n");
      expect(lines[0]).to.equal("// Generated by wirebridge from: domain.ts");
      expect(lines).to.include("export const trackFromWire = (message: wire.Track): Track => ({");
      expect(lines).to.include("    case wire.Status.STATUS_ACTIVE:");
      expect(result.value.outputPath).to.equal(undefined);
      expect(result.value.aggregates).to.equal(1);
      expect(result.value.enums).to.equal(1);
    });
  });

  it("should write the module to the output path", () => {
    withProject({ "domain.ts": domainSource }, (dir) => {
      const result = generateCommand(configFor(dir, { out: join(dir, "gen", "conversions.ts") }));
      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      const outputPath = join(dir, "gen", "conversions.ts");
      expect(result.value.outputPath).to.equal(outputPath);
      expect(existsSync(outputPath)).to.equal(true);
      expect(readFileSync(outputPath, "utf-8")).to.equal(result.value.text);
    });
  });

  it("should match enum members read from the wire source", () => {
    const wireSource = `
export enum Status {
  UNSPECIFIED = 0,
  ACTIVE = 1,
  ARCHIVED = 2,
}
`;
    withProject({ "domain.ts": domainSource, "wire.ts": wireSource }, (dir) => {
      const result = generateCommand(configFor(dir, { wire: join(dir, "wire.ts") }));
      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      const lines = result.value.text.split("\n");
      expect(lines).to.include("    case wire.Status.ACTIVE:");
      expect(lines).to.include("      return wire.Status.ARCHIVED;");
    });
  });

  it("should fail with generation diagnostics", () => {
    const wireSource = "export enum Status { ACTIVE = 1 }\n";
    withProject({ "domain.ts": domainSource, "wire.ts": wireSource }, (dir) => {
      const result = generateCommand(configFor(dir, { wire: join(dir, "wire.ts") }));
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.kind).to.equal("generation");
      expect(result.error.message).to.equal("Generation failed with 1 diagnostic(s)");
      expect(
        result.error.diagnostics.map((diagnostic) => [diagnostic.kind, diagnostic.field])
      ).to.deep.equal([["UnmatchedVariant", "Archived"]]);
    });
  });

  it("should fail with a usage error for a missing input file", () => {
    withProject({}, (dir) => {
      const result = generateCommand(configFor(dir));
      expect(result).to.deep.equal({
        ok: false,
        error: {
          kind: "usage",
          message: `Input file not found: ${join(dir, "domain.ts")}`,
          diagnostics: [],
        },
      });
    });
  });

  it("should fail with a usage error when no input is configured", () => {
    withProject({}, (dir) => {
      const resolved = resolveConfig({}, {}, dir);
      expect(resolved.ok).to.equal(true);
      if (!resolved.ok) return;
      const result = generateCommand(resolved.value);
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.kind).to.equal("usage");
    });
  });

  it("should report unreadable declarations", () => {
    const source = "/** @wire */\nexport type Code = string;\n";
    withProject({ "domain.ts": source }, (dir) => {
      const result = generateCommand(configFor(dir));
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.kind).to.equal("generation");
      expect(result.error.diagnostics.map((diagnostic) => diagnostic.kind)).to.deep.equal([
        "MalformedDirectiveValue",
      ]);
    });
  });
});
