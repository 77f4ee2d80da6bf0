import { describe, it, expect } from "vitest";
import { isHiddenArticle } from "./is-hidden-article";

describe("isHiddenArticle", () => {
  it("is visible without a hidden key", () => {
    expect(isHiddenArticle({ title: "A" })).toBe(false);
  });

  it("is hidden for any other value", () => {
    expect(isHiddenArticle({ hidden: "yes" })).toBe(true);
    expect(isHiddenArticle({ hidden: "" })).toBe(true);
    expect(isHiddenArticle({ hidden: true })).toBe(true);
    expect(isHiddenArticle({ hidden: ["a", "b"] })).toBe(true);
  });

  it("is visible for explicit negatives", () => {
    expect(isHiddenArticle({ hidden: false })).toBe(false);
    expect(isHiddenArticle({ hidden: "False" })).toBe(false);
    expect(isHiddenArticle({ hidden: "no" })).toBe(false);
    expect(isHiddenArticle({ hidden: "0" })).toBe(false);
    expect(isHiddenArticle({ hidden: 0 })).toBe(false);
  });
});
