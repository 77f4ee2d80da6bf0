import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "node:path";
import { ZodError } from "zod";
import { loadConfig, loadDefaultConfig, mergeConfig } from "./load-config";

describe("loadDefaultConfig", () => {
  it("loads the built-in defaults", async () => {
    const config = await loadDefaultConfig();
    expect(config.input).toBe("articles");
    expect(config.templates).toBeNull();
    expect(config.files.markdownExtensions).toEqual(["", ".md", ".markdown"]);
    expect(config.embed.suffix).toBe(".embed");
    expect(config.feed.filename).toBe("rss.xml");
  });
});

describe("mergeConfig", () => {
  it("merges each section key by key", async () => {
    const base = await loadDefaultConfig();
    const merged = mergeConfig(base, {
      output: "public",
      templates: "themes/plain",
      site: { title: "Elsewhere" },
    });

    expect(merged.input).toBe("articles");
    expect(merged.output).toBe("public");
    expect(merged.templates).toBe("themes/plain");
    expect(merged.site).toEqual({ ...base.site, title: "Elsewhere" });
    expect(merged.feed).toEqual(base.feed);
  });

  it("lets a layer reset templates to null", async () => {
    const base = mergeConfig(await loadDefaultConfig(), { templates: "t" });
    expect(mergeConfig(base, { templates: null }).templates).toBeNull();
    expect(mergeConfig(base, {}).templates).toBe("t");
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "mdsite-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("applies a custom config file", async () => {
    const custom = path.join(dir, "custom.json");
    await writeFile(custom, JSON.stringify({ feed: { limit: 5 } }));

    const { config, errors } = await loadConfig(custom);
    expect(config.feed.limit).toBe(5);
    expect(errors.filter((e) => e.path === custom)).toEqual([]);
  });

  it("reports and skips a malformed custom file", async () => {
    const custom = path.join(dir, "broken.json");
    await writeFile(custom, "{ not json");

    const { errors } = await loadConfig(custom);
    const error = errors.find((e) => e.path === custom)?.error;
    expect(error).toBeInstanceOf(SyntaxError);
  });

  it("reports a custom file that fails validation", async () => {
    const custom = path.join(dir, "invalid.json");
    await writeFile(custom, JSON.stringify({ feed: { limit: -1 } }));

    const { errors } = await loadConfig(custom);
    const error = errors.find((e) => e.path === custom)?.error;
    expect(error).toBeInstanceOf(ZodError);
  });
});
