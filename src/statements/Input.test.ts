import { describe, expect, it } from "vitest";
import { splitInputItems } from "./Input.ts";

describe("splitInputItems", () => {
  it("splits on commas and trims each item", () => {
    expect(splitInputItems(" 1 , 2,x ")).toEqual(["1", "2", "x"]);
  });

  it("keeps commas inside quotes and drops the quotes", () => {
    expect(splitInputItems('"A,B", C')).toEqual(["A,B", "C"]);
  });

  it("accepts an unterminated quote", () => {
    expect(splitInputItems('"open')).toEqual(["open"]);
  });

  it("returns one empty item for an empty line", () => {
    expect(splitInputItems("")).toEqual([""]);
  });
});
