/**
 * Render command - Print a single article as an HTML fragment
 */

import { readFile } from "fs/promises";
import path from "node:path";
import { z } from "zod";
import { createMarkdownRenderer } from "../../markdown";
import { loadConfig, renderArticle, embedAssets, Logger } from "../../utils";

const RenderOptionsSchema = z.object({
  config: z.string().optional(),
  embed: z.boolean().optional(),
});

type Options = z.infer<typeof RenderOptionsSchema>;

export async function renderCommand(file: string, opts: Options): Promise<void> {
  const options = RenderOptionsSchema.parse(opts);
  const { config, errors } = await loadConfig(options.config);
  const logger = new Logger(config.logging.level);

  for (const err of errors) {
    logger.warn(`Ignoring config ${err.path}`);
  }

  try {
    const source = await readFile(file, config.files.encoding);
    const renderer = createMarkdownRenderer(config.markdown);
    const article = await renderArticle(source, renderer);

    for (const warning of article.warnings) {
      logger.warn(`${file}: ${warning.reason}`);
    }

    let html = article.html;
    if (options.embed) {
      const baseDir = path.dirname(path.resolve(file));
      const result = await embedAssets(html, {
        baseDir,
        rootDir: baseDir,
        fragment: true,
        fetchRemote: config.embed.fetchRemote,
        stripScripts: config.embed.stripScripts,
        maxSize: config.embed.maxSize,
        timeout: config.embed.timeout,
        retries: config.embed.retries,
      });
      for (const failure of result.failures) {
        logger.warn(`Unable to inline ${failure.src}`);
      }
      html = result.html;
    }

    process.stdout.write(html);
  } catch (error) {
    logger.error(`Failed to render ${file}`, error);
    process.exit(1);
  }
}
