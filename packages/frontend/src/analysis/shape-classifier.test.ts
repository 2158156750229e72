/**
 * Tests for the field shape classifier
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { classifyFieldShape } from "./shape-classifier.js";
import { testTable } from "../test-harness.js";

const classify = (text: string, transparent = false) =>
  classifyFieldShape(text, testTable, { transparent });

describe("Field Shape Classifier", () => {
  describe("primitives and names", () => {
    it("should classify known primitive names", () => {
      expect(classify("string")).to.deep.equal({ kind: "primitive", name: "string" });
      expect(classify("  UInt32 ")).to.deep.equal({ kind: "primitive", name: "UInt32" });
    });

    it("should classify enum names from the table", () => {
      expect(classify("Status")).to.deep.equal({ kind: "taggedEnum", name: "Status" });
    });

    it("should default unknown names to custom aggregates", () => {
      expect(classify("Album")).to.deep.equal({ kind: "customAggregate", name: "Album" });
      expect(classify("wire.Album")).to.deep.equal({
        kind: "customAggregate",
        name: "wire.Album",
      });
    });

    it("should unwrap parentheses", () => {
      expect(classify("((string))")).to.deep.equal({ kind: "primitive", name: "string" });
    });
  });

  describe("nullable", () => {
    it("should read T | undefined", () => {
      expect(classify("string | undefined")).to.deep.equal({
        kind: "nullable",
        inner: { kind: "primitive", name: "string" },
        absent: "undefined",
      });
    });

    it("should remember a null spelling", () => {
      expect(classify("null | Album")).to.deep.equal({
        kind: "nullable",
        inner: { kind: "customAggregate", name: "Album" },
        absent: "null",
      });
    });

    it("should read wrapper generics", () => {
      for (const wrapper of ["Optional", "Maybe", "NullableWrapper"]) {
        expect(classify(`${wrapper}<Text>`)).to.deep.equal({
          kind: "nullable",
          inner: { kind: "primitive", name: "Text" },
          absent: "undefined",
        });
      }
    });

    it("should treat a union without absence as opaque", () => {
      expect(classify('"a" | "b"')).to.deep.equal({ kind: "opaque", text: '"a" | "b"' });
    });

    it("should treat records and maps as opaque", () => {
      expect(classify("Record<string, string>")).to.deep.equal({
        kind: "opaque",
        text: "Record<string, string>",
      });
      expect(classify("Map<string, Album> | undefined")).to.deep.equal({
        kind: "nullable",
        inner: { kind: "opaque", text: "Map<string, Album>" },
        absent: "undefined",
      });
    });
  });

  describe("sequence", () => {
    it("should read every array spelling", () => {
      const expected = { kind: "sequence", inner: { kind: "primitive", name: "Text" } };
      expect(classify("Text[]")).to.deep.equal(expected);
      expect(classify("readonly Text[]")).to.deep.equal(expected);
      expect(classify("Array<Text>")).to.deep.equal(expected);
      expect(classify("ReadonlyArray<Text>")).to.deep.equal(expected);
      expect(classify("SequenceWrapper<Text>")).to.deep.equal(expected);
    });

    it("should nest nullable and sequence", () => {
      expect(classify("readonly Album[] | undefined")).to.deep.equal({
        kind: "nullable",
        inner: {
          kind: "sequence",
          inner: { kind: "customAggregate", name: "Album" },
        },
        absent: "undefined",
      });
      expect(classify("(string | undefined)[]")).to.deep.equal({
        kind: "sequence",
        inner: {
          kind: "nullable",
          inner: { kind: "primitive", name: "string" },
          absent: "undefined",
        },
      });
    });
  });

  describe("transparent", () => {
    it("should read table entries with their inner shape", () => {
      expect(classify("TrackId")).to.deep.equal({
        kind: "transparent",
        name: "TrackId",
        inner: { kind: "primitive", name: "UInt64" },
        construction: "new",
      });
    });

    it("should read inline TransparentWrapper<T>", () => {
      expect(classify("TransparentWrapper<UInt64>")).to.deep.equal({
        kind: "transparent",
        inner: { kind: "primitive", name: "UInt64" },
        construction: "literal",
      });
    });

    it("should trust the transparent hint for unknown names", () => {
      expect(classify("SessionKey", true)).to.deep.equal({
        kind: "transparent",
        name: "SessionKey",
        construction: "new",
      });
    });
  });
});
