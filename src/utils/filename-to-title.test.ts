import { describe, it, expect } from "vitest";
import { filenameToTitle } from "./filename-to-title";

describe("filenameToTitle", () => {
  it("drops a date prefix", () => {
    expect(filenameToTitle("2024-03-01-first-post")).toBe("First Post");
  });

  it("drops a numeric prefix", () => {
    expect(filenameToTitle("01-introduction")).toBe("Introduction");
  });

  it("splits on underscores and dots", () => {
    expect(filenameToTitle("notes_on.vim")).toBe("Notes On Vim");
  });

  it("keeps a number that is the whole name", () => {
    expect(filenameToTitle("1984")).toBe("1984");
  });
});
