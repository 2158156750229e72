/**
 * Tests for diagnostic types
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  createDiagnostic,
  formatDiagnostic,
  isError,
} from "./diagnostic.js";

describe("Diagnostics", () => {
  describe("createDiagnostic", () => {
    it("should create an error diagnostic with all fields", () => {
      const diagnostic = createDiagnostic(
        "ConflictingAnnotation",
        "Track",
        "title",
        "Field is marked both 'optional' and 'required'",
        "Keep only one"
      );

      expect(diagnostic.kind).to.equal("ConflictingAnnotation");
      expect(diagnostic.severity).to.equal("error");
      expect(diagnostic.aggregate).to.equal("Track");
      expect(diagnostic.field).to.equal("title");
      expect(diagnostic.hint).to.equal("Keep only one");
    });

    it("should make inferred optionality a warning", () => {
      const diagnostic = createDiagnostic(
        "InferredOptionality",
        "Track",
        "album",
        "treated as optional"
      );

      expect(diagnostic.severity).to.equal("warning");
      expect(isError(diagnostic)).to.equal(false);
    });

    it("should make an ignored directive a warning", () => {
      expect(createDiagnostic("IgnoredDirective", "Track", "name", "no effect").severity).to.equal(
        "warning"
      );
    });

    it("should make an unsupported field type an error", () => {
      expect(
        isError(createDiagnostic("UnsupportedFieldType", "Track", "labels", "no conversion"))
      ).to.equal(true);
    });
  });

  describe("formatDiagnostic", () => {
    it("should format a field diagnostic with hint", () => {
      const diagnostic = createDiagnostic(
        "UnknownDirective",
        "Track",
        "title",
        "Unknown directive 'bogus'",
        "Remove it"
      );

      expect(formatDiagnostic(diagnostic)).to.equal(
        "Track.title: error UnknownDirective: Unknown directive 'bogus' Hint: Remove it"
      );
    });

    it("should format an aggregate diagnostic without hint", () => {
      const diagnostic = createDiagnostic(
        "MalformedDirectiveValue",
        "Track",
        undefined,
        "bad namespace"
      );

      expect(formatDiagnostic(diagnostic)).to.equal(
        "Track: error MalformedDirectiveValue: bad namespace"
      );
    });
  });
});
