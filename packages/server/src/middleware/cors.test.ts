import { describe, it, expect } from "vitest";
import { parseCorsOrigin } from "./cors.js";

describe("@vouch/server - parseCorsOrigin", () => {
  it("should keep the wildcard", () => {
    expect(parseCorsOrigin("*")).toBe("*");
  });

  it("should split a list and drop blanks", () => {
    expect(parseCorsOrigin("https://a.example, https://b.example,")).toEqual([
      "https://a.example",
      "https://b.example",
    ]);
  });
});
