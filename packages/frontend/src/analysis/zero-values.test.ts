/**
 * Tests for zero-value literals
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { domainZeroValue, wireZeroValue } from "./zero-values.js";
import { classifyFieldShape } from "./shape-classifier.js";
import { testTable } from "../test-harness.js";

const domainZero = (text: string) =>
  domainZeroValue(classifyFieldShape(text, testTable), testTable);

const wireZero = (text: string) =>
  wireZeroValue(classifyFieldShape(text, testTable), testTable, "wire", (name) =>
    name === "Album" ? "AlbumMessage" : name
  );

describe("Zero values", () => {
  it("should build domain zeros", () => {
    expect(domainZero("string")).to.equal('""');
    expect(domainZero("UInt64 | null")).to.equal("null");
    expect(domainZero("Text[]")).to.equal("[]");
    expect(domainZero("TrackId")).to.equal("new TrackId(0n)");
    expect(domainZero("Email")).to.equal('{ value: "" }');
    expect(domainZero("Status")).to.equal(undefined);
    expect(domainZero("Album")).to.equal(undefined);
  });

  it("should build wire zeros", () => {
    expect(wireZero("UInt32 | undefined")).to.equal("0");
    expect(wireZero("TrackId")).to.equal("0n");
    expect(wireZero("Status")).to.equal("0");
    expect(wireZero("Album")).to.equal("wire.AlbumMessage.create()");
    expect(wireZero("wire.Artist")).to.equal("wire.Artist.create()");
  });
});
