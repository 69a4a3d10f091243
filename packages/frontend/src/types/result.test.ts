/**
 * Tests for Result helpers
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { ok, error, map, mapError, collectErrors, type Result } from "./result.js";

describe("Result", () => {
  describe("map", () => {
    it("should transform the value of a success", () => {
      expect(map(ok<number, string>(2), (n) => n * 3)).to.deep.equal({
        ok: true,
        value: 6,
      });
    });

    it("should leave a failure untouched", () => {
      const failed: Result<number, string> = error("boom");
      expect(map(failed, (n) => n * 3)).to.deep.equal({
        ok: false,
        error: "boom",
      });
    });
  });

  describe("mapError", () => {
    it("should transform the error of a failure", () => {
      const failed: Result<number, string> = error("boom");
      expect(mapError(failed, (e) => [e, e])).to.deep.equal({
        ok: false,
        error: ["boom", "boom"],
      });
    });

    it("should leave a success untouched", () => {
      expect(mapError(ok<number, string>(1), (e) => e.length)).to.deep.equal({
        ok: true,
        value: 1,
      });
    });
  });

  describe("collectErrors", () => {
    it("should concatenate failures in order and skip successes", () => {
      const results: readonly Result<unknown, readonly string[]>[] = [
        error(["a", "b"]),
        ok(1),
        error(["c"]),
      ];
      expect(collectErrors(results)).to.deep.equal(["a", "b", "c"]);
    });

    it("should return nothing when every result succeeded", () => {
      const results: readonly Result<string, readonly string[]>[] = [
        ok("x"),
        ok("y"),
      ];
      expect(collectErrors(results)).to.deep.equal([]);
    });
  });
});
