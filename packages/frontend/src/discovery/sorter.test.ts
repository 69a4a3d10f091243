/**
 * Tests for record ordering
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { compareOrdinal, sortHandlerRecords } from "./sorter.js";
import type { HandlerRecord } from "./types.js";
import { STRING, handlerType, named } from "./test-fixtures.js";

const record = (handlerName: string, signature: string): HandlerRecord => ({
  handler: handlerType(handlerName),
  handlerName,
  inputType: named("Req"),
  outputType: STRING,
  signature,
});

describe("Sorter", () => {
  it("should compare by code unit, not locale", () => {
    expect(compareOrdinal("B", "a")).to.equal(-1);
    expect(compareOrdinal("a", "B")).to.equal(1);
    expect(compareOrdinal("a", "a")).to.equal(0);
  });

  it("should order by handler name, then signature", () => {
    const sorted = sortHandlerRecords([
      record("b", "x|y"),
      record("a", "z|z"),
      record("a", "m|n"),
    ]);

    expect(sorted.map((r) => `${r.handlerName} ${r.signature}`)).to.deep.equal(
      ["a m|n", "a z|z", "b x|y"]
    );
  });

  it("should not reorder its input", () => {
    const input = [record("b", "s"), record("a", "s")];
    sortHandlerRecords(input);
    expect(input.map((r) => r.handlerName)).to.deep.equal(["b", "a"]);
  });
});
