/**
 * Tests for Result type
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  ok,
  error,
  map,
  flatMap,
  mapError,
  type Result,
} from "./result.js";

describe("Result", () => {
  describe("ok and error constructors", () => {
    it("should create ok result", () => {
      const result = ok<number, string>(42);
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value).to.equal(42);
      }
    });

    it("should create error result", () => {
      const result = error<number, string>("Something went wrong");
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error).to.equal("Something went wrong");
      }
    });
  });

  describe("map", () => {
    it("should map ok value", () => {
      const mapped = map(ok<number, string>(5), (x) => x * 2);
      expect(mapped).to.deep.equal({ ok: true, value: 10 });
    });

    it("should pass through error", () => {
      const mapped = map(error<number, string>("Error"), (x) => x * 2);
      expect(mapped).to.deep.equal({ ok: false, error: "Error" });
    });
  });

  describe("flatMap", () => {
    const half = (x: number): Result<number, string> =>
      x % 2 === 0 ? ok(x / 2) : error(`${x} is odd`);

    it("should chain ok results", () => {
      expect(flatMap(ok<number, string>(8), half)).to.deep.equal({
        ok: true,
        value: 4,
      });
    });

    it("should return the inner error", () => {
      expect(flatMap(ok<number, string>(3), half)).to.deep.equal({
        ok: false,
        error: "3 is odd",
      });
    });

    it("should not call fn on error", () => {
      let called = false;
      flatMap(error<number, string>("Initial"), (x) => {
        called = true;
        return ok<number, string>(x);
      });
      expect(called).to.equal(false);
    });
  });

  describe("mapError", () => {
    it("should map the error value", () => {
      const mapped = mapError(error<number, string>("bad"), (e) => e.length);
      expect(mapped).to.deep.equal({ ok: false, error: 3 });
    });

    it("should leave ok untouched", () => {
      const mapped = mapError(ok<number, string>(1), (e) => e.length);
      expect(mapped).to.deep.equal({ ok: true, value: 1 });
    });
  });
});
