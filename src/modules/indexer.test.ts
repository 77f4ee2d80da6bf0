import { describe, it, expect, beforeEach } from "vitest";
import { buildFeedContext, buildIndexContext } from "./indexer";
import { loadDefaultConfig, mergeConfig } from "../utils";
import type { Article, SiteBuildConfig } from "../types";

const now = new Date("2024-04-02T10:00:00Z");

const articles: Article[] = [
  {
    title: "First",
    description: "Intro",
    date: new Date("2024-03-01T00:00:00Z"),
    href: "first.html",
    embedHref: "first.embed.html",
    hidden: false,
    metadata: {},
  },
  {
    title: "Draft",
    description: "Not yet",
    href: "draft.html",
    hidden: true,
    metadata: { hidden: "yes" },
  },
  {
    title: "C D",
    description: "",
    href: "notes/c%20d.html",
    hidden: false,
    metadata: {},
  },
];

describe("indexer", () => {
  let config: SiteBuildConfig;

  beforeEach(async () => {
    config = mergeConfig(await loadDefaultConfig(), {
      site: { title: "Notes", url: "https://example.org/blog" },
    });
  });

  describe("buildIndexContext", () => {
    it("lists visible articles in order", () => {
      const context = buildIndexContext(articles, config, now);
      expect(context.date).toBe("2024-04-02");
      expect(context.feed).toBe("rss.xml");
      expect(context.articles).toEqual([
        {
          title: "First",
          description: "Intro",
          date: "2024-03-01",
          href: "first.html",
          embedHref: "first.embed.html",
        },
        {
          title: "C D",
          description: "",
          date: undefined,
          href: "notes/c%20d.html",
          embedHref: undefined,
        },
      ]);
    });

    it("omits the feed link when the feed is disabled", () => {
      config.feed.enabled = false;
      expect(buildIndexContext(articles, config, now).feed).toBeUndefined();
    });
  });

  describe("buildFeedContext", () => {
    it("builds absolute links and RFC 822 dates", () => {
      const context = buildFeedContext(articles, config, now);
      expect(context.lastBuildDate).toBe("Tue, 02 Apr 2024 10:00:00 GMT");
      expect(context.feedUrl).toBe("https://example.org/blog/rss.xml");
      expect(context.items).toEqual([
        {
          title: "First",
          description: "Intro",
          link: "https://example.org/blog/first.html",
          pubDate: "Fri, 01 Mar 2024 00:00:00 GMT",
        },
        {
          title: "C D",
          description: "",
          link: "https://example.org/blog/notes/c%20d.html",
          pubDate: undefined,
        },
      ]);
    });

    it("applies the item limit", () => {
      config.feed.limit = 1;
      const context = buildFeedContext(articles, config, now);
      expect(context.items.map((item) => item.title)).toEqual(["First"]);
    });
  });
});
