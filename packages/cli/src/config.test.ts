/**
 * Tests for configuration loading and resolution
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CONFIG_FILE_NAME, findConfig, loadConfig, resolveConfig } from "./config.js";
import type { CliOptions, WirebridgeConfig } from "./types.js";

const withTempDir = (prefix: string, body: (dir: string) => void): void => {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  try {
    body(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
};

const resolveOk = (
  config: WirebridgeConfig,
  cliOptions: CliOptions = {},
  inputFile?: string,
  cwd = "/work/sub"
) => {
  const result = resolveConfig(config, cliOptions, "/work", inputFile, cwd);
  if (!result.ok) {
    throw new Error(result.error);
  }
  return result.value;
};

describe("Config", () => {
  describe("loadConfig", () => {
    it("should load a valid config file", () => {
      withTempDir("wirebridge-config-valid-", (dir) => {
        const path = join(dir, CONFIG_FILE_NAME);
        writeFileSync(
          path,
          JSON.stringify({ input: "src/domain.ts", strictAggregates: true }),
          "utf-8"
        );
        const result = loadConfig(path);
        expect(result).to.deep.equal({
          ok: true,
          value: { input: "src/domain.ts", strictAggregates: true },
        });
      });
    });

    it("should report a missing file", () => {
      withTempDir("wirebridge-config-missing-", (dir) => {
        const path = join(dir, CONFIG_FILE_NAME);
        expect(loadConfig(path)).to.deep.equal({
          ok: false,
          error: `Config file not found: ${path}`,
        });
      });
    });

    it("should report invalid JSON", () => {
      withTempDir("wirebridge-config-json-", (dir) => {
        const path = join(dir, CONFIG_FILE_NAME);
        writeFileSync(path, "{ input: ", "utf-8");
        const result = loadConfig(path);
        expect(result.ok).to.equal(false);
        if (!result.ok) {
          expect(result.error.startsWith("Failed to parse wirebridge.json: ")).to.equal(true);
        }
      });
    });

    it("should reject fields of the wrong type", () => {
      withTempDir("wirebridge-config-type-", (dir) => {
        const path = join(dir, CONFIG_FILE_NAME);
        writeFileSync(path, JSON.stringify({ strictAggregates: "yes" }), "utf-8");
        const result = loadConfig(path);
        expect(result.ok).to.equal(false);
        if (!result.ok) {
          expect(result.error.startsWith("wirebridge.json: strictAggregates ")).to.equal(true);
        }
      });
    });

    it("should reject unknown fields", () => {
      withTempDir("wirebridge-config-unknown-", (dir) => {
        const path = join(dir, CONFIG_FILE_NAME);
        writeFileSync(path, JSON.stringify({ rootNamespace: "App" }), "utf-8");
        const result = loadConfig(path);
        expect(result.ok).to.equal(false);
        if (!result.ok) {
          expect(result.error.includes("rootNamespace")).to.equal(true);
        }
      });
    });
  });

  describe("findConfig", () => {
    it("should find the config file in a parent directory", () => {
      withTempDir("wirebridge-config-find-", (dir) => {
        const nested = join(dir, "src", "models");
        mkdirSync(nested, { recursive: true });
        writeFileSync(join(dir, CONFIG_FILE_NAME), "{}", "utf-8");
        expect(findConfig(nested)).to.equal(join(dir, CONFIG_FILE_NAME));
      });
    });
  });

  describe("resolveConfig", () => {
    it("should use defaults for an empty config", () => {
      const result = resolveOk({});
      expect(result.input).to.equal(undefined);
      expect(result.output).to.equal(undefined);
      expect(result.wireSource).to.equal(undefined);
      expect(result.generation.wireNamespace).to.equal("wire");
      expect(result.generation.wireModule).to.equal("./wire.js");
      expect(result.generation.domainModule).to.equal("./domain.js");
      expect(result.generation.strictAggregates).to.equal(false);
      expect(result.generation.primitives.get("string")).to.equal('""');
      expect(result.verbose).to.equal(false);
      expect(result.quiet).to.equal(false);
    });

    it("should resolve config paths against the project root", () => {
      const result = resolveOk({
        input: "src/domain.ts",
        output: "src/conversions.ts",
        wireSource: "gen/wire.ts",
      });
      expect(result.input).to.equal("/work/src/domain.ts");
      expect(result.output).to.equal("/work/src/conversions.ts");
      expect(result.wireSource).to.equal("/work/gen/wire.ts");
    });

    it("should override config with CLI options resolved against cwd", () => {
      const result = resolveOk(
        {
          input: "src/domain.ts",
          output: "src/conversions.ts",
          wireNamespace: "wire",
          strictAggregates: false,
        },
        { out: "out.ts", wire: "wire.ts", namespace: "pb", strictAggregates: true },
        "models.ts"
      );
      expect(result.input).to.equal("/work/sub/models.ts");
      expect(result.output).to.equal("/work/sub/out.ts");
      expect(result.wireSource).to.equal("/work/sub/wire.ts");
      expect(result.generation.wireNamespace).to.equal("pb");
      expect(result.generation.strictAggregates).to.equal(true);
    });

    it("should carry module specifiers and aliases", () => {
      const result = resolveOk({
        wireModule: "./gen/track_pb.js",
        domainModule: "./model.js",
        helpersModule: "./helpers.js",
        wireAliases: { legacy: "./gen/legacy_pb.js" },
      });
      expect(result.generation.wireModule).to.equal("./gen/track_pb.js");
      expect(result.generation.domainModule).to.equal("./model.js");
      expect(result.generation.helpersModule).to.equal("./helpers.js");
      expect([...result.generation.wireAliases]).to.deep.equal([
        ["legacy", "./gen/legacy_pb.js"],
      ]);
    });

    it("should merge configured primitives over the defaults", () => {
      const result = resolveOk({ primitives: { UInt32: "0", string: "''" } });
      expect(result.generation.primitives.get("UInt32")).to.equal("0");
      expect(result.generation.primitives.get("string")).to.equal("''");
      expect(result.generation.primitives.get("boolean")).to.equal("false");
    });

    it("should answer from the inline side channel", () => {
      const { sideChannel } = resolveOk({ sideChannel: { "Track.album": true } }).generation;
      expect(sideChannel.lookup("Track", "album")).to.equal(true);
      expect(sideChannel.lookup("Track", "title")).to.equal(undefined);
    });

    it("should prefer inline side channel entries over the lookup file", () => {
      withTempDir("wirebridge-config-side-", (dir) => {
        writeFileSync(
          join(dir, "optionality.json"),
          JSON.stringify({ "Track.album": false, "Track.cover": true }),
          "utf-8"
        );
        const result = resolveConfig(
          { sideChannel: { "Track.album": true }, sideChannelFile: "optionality.json" },
          {},
          dir
        );
        expect(result.ok).to.equal(true);
        if (result.ok) {
          const { sideChannel } = result.value.generation;
          expect(sideChannel.lookup("Track", "album")).to.equal(true);
          expect(sideChannel.lookup("Track", "cover")).to.equal(true);
        }
      });
    });

    it("should fail for a missing side channel file", () => {
      withTempDir("wirebridge-config-side-missing-", (dir) => {
        const result = resolveConfig({ sideChannelFile: "absent.json" }, {}, dir);
        expect(result).to.deep.equal({
          ok: false,
          error: `Side channel file not found: ${join(dir, "absent.json")}`,
        });
      });
    });

    it("should fail for a malformed side channel file", () => {
      withTempDir("wirebridge-config-side-bad-", (dir) => {
        writeFileSync(join(dir, "optionality.json"), JSON.stringify({ Track: true }), "utf-8");
        const result = resolveConfig({ sideChannelFile: "optionality.json" }, {}, dir);
        expect(result).to.deep.equal({
          ok: false,
          error: `${join(dir, "optionality.json")}: Side channel key "Track" must look like Aggregate.field`,
        });
      });
    });

    it("should pass through verbose and quiet", () => {
      const result = resolveOk({}, { verbose: true, quiet: true });
      expect(result.verbose).to.equal(true);
      expect(result.quiet).to.equal(true);
    });
  });
});
