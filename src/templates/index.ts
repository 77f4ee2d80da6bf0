/**
 * Template utilities for Handlebars template rendering
 */

import Handlebars from "handlebars";
import { readFile } from "fs/promises";
import { readFileSync } from "fs";
import path from "node:path";
import {
  getDefaultPageTemplate,
  getDefaultEmbedTemplate,
  getDefaultIndexTemplate,
  getDefaultFeedTemplate,
} from "./defaults";
import { fileToDataUri } from "../utils/data-uri";
import type {
  TemplateSet,
  PageTemplateContext,
  IndexTemplateContext,
  FeedTemplateContext,
} from "../types";

export interface CompiledTemplates {
  page: Handlebars.TemplateDelegate<PageTemplateContext>;
  embed: Handlebars.TemplateDelegate<PageTemplateContext>;
  index: Handlebars.TemplateDelegate<IndexTemplateContext>;
  feed: Handlebars.TemplateDelegate<FeedTemplateContext>;
}

/**
 * Create a Handlebars environment whose file helpers resolve against
 * the template directory
 */
export function createTemplateEnvironment(directory: string): typeof Handlebars {
  const env = Handlebars.create();

  // Comparison helpers
  env.registerHelper("eq", (a: unknown, b: unknown) => a === b);
  env.registerHelper("not", (a: unknown) => !a);

  // Usage: {{formatDate date}} or {{formatDate date "fr"}}
  env.registerHelper("formatDate", (value: unknown, ...args: unknown[]) => {
    if (typeof value !== "string" && !(value instanceof Date)) return "";
    const date = new Date(value);
    if (Number.isNaN(date.getTime())) return "";

    const locale = typeof args[0] === "string" ? args[0] : "en";
    return date.toLocaleDateString(locale, {
      year: "numeric",
      month: "long",
      day: "numeric",
      timeZone: "UTC",
    });
  });

  // Raw contents of a file, e.g. a stylesheet: <style>{{includeFile "site.css"}}</style>
  env.registerHelper("includeFile", (file: unknown) => {
    const contents = readFileSync(path.resolve(directory, String(file)), "utf-8");
    return new env.SafeString(contents);
  });

  // Data URI of an image: <img src="{{includeImage "logo.png"}}">
  env.registerHelper("includeImage", (file: unknown) => {
    return new env.SafeString(
      fileToDataUri(path.resolve(directory, String(file))),
    );
  });

  return env;
}

/**
 * Load and compile a template from file path or use default
 * Throws error if custom template fails to load
 */
export async function loadTemplate<T>(
  env: typeof Handlebars,
  templatePath: string | null,
  defaultTemplate: string,
): Promise<Handlebars.TemplateDelegate<T>> {
  if (templatePath === null) {
    return env.compile<T>(defaultTemplate);
  }

  // Load custom template - let errors bubble up to module level
  const templateContent = await readFile(templatePath, "utf-8");
  return env.compile<T>(templateContent);
}

/**
 * Compile every template of a set, falling back to the built-in defaults
 */
export async function loadTemplates(
  set: TemplateSet,
): Promise<CompiledTemplates> {
  const env = createTemplateEnvironment(set.directory);

  return {
    page: await loadTemplate<PageTemplateContext>(
      env,
      set.page,
      getDefaultPageTemplate(),
    ),
    embed: await loadTemplate<PageTemplateContext>(
      env,
      set.embed,
      getDefaultEmbedTemplate(),
    ),
    index: await loadTemplate<IndexTemplateContext>(
      env,
      set.index,
      getDefaultIndexTemplate(),
    ),
    feed: await loadTemplate<FeedTemplateContext>(
      env,
      set.feed,
      getDefaultFeedTemplate(),
    ),
  };
}
