/**
 * Tests for fallibility propagation between aggregates
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { propagateErrorTypes, referencedAggregates } from "./fallibility.js";
import { aggregate, planAll } from "../test-harness.js";

const credit = aggregate("Credit", [["role", "string", ["expect"]]]);

describe("Fallibility", () => {
  describe("referencedAggregates", () => {
    it("should find aggregates inside sequences and nullables", () => {
      const [, track] = planAll([
        credit,
        aggregate("Track", [
          ["credits", "Credit[]"],
          ["lead", "Credit | undefined"],
          ["title", "string"],
        ]),
      ]);
      expect(track?.fields.map((field) => referencedAggregates(field, ["wire"]))).to.deep.equal([
        ["Credit"],
        ["Credit"],
        [],
      ]);
    });

    it("should not follow wire types or custom conversions", () => {
      const [plan] = planAll([
        aggregate("Track", [
          ["createdAt", "wire.Timestamp", ["required"]],
          ["history", "wire.Timestamp[]"],
          ["album", "Album", ['from_wire_fn = "readAlbum"']],
        ]),
      ]);
      expect(plan?.fields.map((field) => referencedAggregates(field, ["wire"]))).to.deep.equal([
        [],
        [],
        [],
      ]);
    });
  });

  describe("propagateErrorTypes", () => {
    it("should carry error types through references to a fixed point", () => {
      const plans = planAll([
        aggregate("Album", [["tracks", "Track[]"]]),
        aggregate("Track", [
          ["title", "string", ["expect", "error_type = TitleError"]],
          ["credits", "Credit[]"],
        ]),
        credit,
        aggregate("Label", [["name", "string"]]),
      ]);
      const errorTypes = propagateErrorTypes(plans, ["wire"]);
      expect(errorTypes.get("Credit")).to.deep.equal(["CreditConversionError"]);
      expect(errorTypes.get("Track")).to.deep.equal(["TitleError", "CreditConversionError"]);
      expect(errorTypes.get("Album")).to.deep.equal(["TitleError", "CreditConversionError"]);
      expect(errorTypes.get("Label")).to.deep.equal([]);
    });

    it("should terminate on reference cycles", () => {
      const plans = planAll([
        aggregate("Artist", [
          ["name", "string", ["expect"]],
          ["bands", "Band[]"],
        ]),
        aggregate("Band", [["members", "Artist[]"]]),
      ]);
      const errorTypes = propagateErrorTypes(plans, ["wire"]);
      expect(errorTypes.get("Artist")).to.deep.equal(["ArtistConversionError"]);
      expect(errorTypes.get("Band")).to.deep.equal(["ArtistConversionError"]);
    });
  });
});
