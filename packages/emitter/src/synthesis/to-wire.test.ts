/**
 * Tests for domain -> wire field expressions
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { synthesizeToWire } from "./to-wire.js";
import type { FieldEntry } from "../test-harness.js";
import { planOne } from "../test-harness.js";

const toWire = (fieldEntry: FieldEntry): string | undefined => {
  const { plan, context } = planOne([fieldEntry]);
  return plan.fields.map((field) => synthesizeToWire(field, plan.namespace, context))[0];
};

describe("Domain to wire expressions", () => {
  it("should copy identical values", () => {
    expect(toWire(["title", "string"])).to.equal("value.title");
    expect(toWire(["name", "NullableWrapper<Text>"])).to.equal("value.name");
  });

  it("should omit ignored fields", () => {
    expect(toWire(["cache", "string", ["ignore"]])).to.equal(undefined);
  });

  it("should send the wire zero value for an absent value on a required wire field", () => {
    expect(toWire(["name", "Text | undefined", ["required"]])).to.equal('value.name ?? ""');
    expect(toWire(["status", "Status | undefined", ["required"]])).to.equal(
      "value.status === undefined ? 0 : statusToWire(value.status)"
    );
    expect(toWire(["album", "Album | undefined", ["required"]])).to.equal(
      "value.album === undefined ? wire.Album.create() : albumToWire(value.album)"
    );
  });

  it("should convert through generated functions", () => {
    expect(toWire(["album", "Album"])).to.equal("albumToWire(value.album)");
  });

  it("should call the custom function when one is named", () => {
    expect(
      toWire(["genre", "string", ['from_wire_fn = "parseGenre"', 'to_wire_fn = "formatGenre"']])
    ).to.equal("formatGenre(value.genre)");
    expect(toWire(["genre", "string", ["optional", 'from_wire_fn = "parseGenre"']])).to.equal(
      "value.genre"
    );
  });

  it("should unwrap transparent values", () => {
    expect(toWire(["id", "TrackId", ["transparent"]])).to.equal("value.id.value");
  });

  it("should send an empty sequence for an absent nullable sequence", () => {
    expect(toWire(["tags", "Text[] | undefined"])).to.equal("[...(value.tags ?? [])]");
    expect(toWire(["tags", "Text[]", ["expect"]])).to.equal("[...value.tags]");
  });
});
