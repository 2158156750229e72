/**
 * Tests for CLI argument parser
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { parseArgs } from "./parser.js";

describe("CLI Parser", () => {
  describe("parseArgs", () => {
    describe("Commands", () => {
      it("should parse generate command", () => {
        const result = parseArgs(["generate"]);
        expect(result.command).to.equal("generate");
      });

      it("should parse plan command", () => {
        const result = parseArgs(["plan"]);
        expect(result.command).to.equal("plan");
      });

      it("should return an empty command for no arguments", () => {
        const result = parseArgs([]);
        expect(result.command).to.equal("");
      });

      it("should parse help command from --help and -h", () => {
        expect(parseArgs(["--help"]).command).to.equal("help");
        expect(parseArgs(["generate", "-h"]).command).to.equal("help");
      });

      it("should parse version command from --version and -v", () => {
        expect(parseArgs(["--version"]).command).to.equal("version");
        expect(parseArgs(["-v"]).command).to.equal("version");
      });
    });

    describe("Input File", () => {
      it("should parse input file after command", () => {
        const result = parseArgs(["generate", "src/domain.ts"]);
        expect(result.command).to.equal("generate");
        expect(result.inputFile).to.equal("src/domain.ts");
      });

      it("should parse input file after options", () => {
        const result = parseArgs(["plan", "-V", "domain.ts"]);
        expect(result.inputFile).to.equal("domain.ts");
        expect(result.options.verbose).to.equal(true);
      });

      it("should leave input file undefined when absent", () => {
        expect(parseArgs(["generate", "-q"]).inputFile).to.equal(undefined);
      });
    });

    describe("Options", () => {
      it("should parse value options in short and long form", () => {
        const result = parseArgs([
          "generate",
          "-c",
          "conf/wirebridge.json",
          "--out",
          "out/conversions.ts",
          "-w",
          "gen/wire.ts",
          "--namespace",
          "pb",
        ]);
        expect(result.options).to.deep.equal({
          config: "conf/wirebridge.json",
          out: "out/conversions.ts",
          wire: "gen/wire.ts",
          namespace: "pb",
        });
      });

      it("should parse boolean flags", () => {
        const result = parseArgs(["plan", "--verbose", "--quiet", "--strict-aggregates"]);
        expect(result.options).to.deep.equal({
          verbose: true,
          quiet: true,
          strictAggregates: true,
        });
      });

      it("should use an empty value when a value option ends the arguments", () => {
        expect(parseArgs(["generate", "-o"]).options.out).to.equal("");
      });

      it("should not take an option value as the input file", () => {
        const result = parseArgs(["generate", "-o", "out.ts", "domain.ts"]);
        expect(result.options.out).to.equal("out.ts");
        expect(result.inputFile).to.equal("domain.ts");
      });

      it("should collect unknown options", () => {
        const result = parseArgs(["generate", "--rid", "-x"]);
        expect(result.unknownOptions).to.deep.equal(["--rid", "-x"]);
      });
    });
  });
});
