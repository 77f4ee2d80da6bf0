import { describe, it, expect } from "vitest";
import { joinSiteUrl, relativeRoot, toHref } from "./site-url";

describe("joinSiteUrl", () => {
  it("joins onto a site URL without a trailing slash", () => {
    expect(joinSiteUrl("https://example.org/blog", "a.html")).toBe(
      "https://example.org/blog/a.html",
    );
  });

  it("joins onto a site URL with a trailing slash", () => {
    expect(joinSiteUrl("https://example.org/", "2024/a.html")).toBe(
      "https://example.org/2024/a.html",
    );
  });
});

describe("toHref", () => {
  it("escapes each path segment", () => {
    expect(toHref("notes/first post.html")).toBe("notes/first%20post.html");
  });
});

describe("relativeRoot", () => {
  it("is empty at the site root", () => {
    expect(relativeRoot("a.html")).toBe("");
  });

  it("climbs one level per directory", () => {
    expect(relativeRoot("2024/03/a.html")).toBe("../../");
  });
});
