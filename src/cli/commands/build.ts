/**
 * Build command - Loads config and runs the site pipeline
 */

import ora from "ora";
import { z } from "zod";
import { loadConfig, Tracker, Logger } from "../../utils";
import { buildSite } from "../../converter";
import * as modules from "../../modules";

const BuildOptionsSchema = z.object({
  input: z.string().optional(),
  output: z.string().optional(),
  config: z.string().optional(),
  siteUrl: z.url().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof BuildOptionsSchema>;

export async function buildCommand(opts: Options): Promise<void> {
  // Debug logging and a spinner fight over the terminal
  const spinner = ora({
    text: "Initializing...",
    indent: 2,
    isEnabled: !opts.verbose,
  }).start();

  try {
    // Validate CLI options
    const options = BuildOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);

    // Override with CLI options
    if (options.input) {
      config.input = options.input;
    }
    if (options.output) {
      config.output = options.output;
    }
    if (options.siteUrl) {
      config.site.url = options.siteUrl;
    }

    const tracker = new Tracker();
    const logger = new Logger(options.verbose ? "debug" : config.logging.level);

    // Add any config loading errors to tracker
    for (const err of errors) {
      tracker.trackError(err.path, err.error, "resource");
    }

    const ctx = await buildSite(config, {
      tracker,
      logger,
      verbose: options.verbose,
      onStage: (stage) => {
        spinner.text = stage;
        logger.debug(stage);
      },
    });

    // Clear and stop spinner before displaying stats
    spinner.clear();
    spinner.stop();

    // Export and display stats
    await modules.stats(ctx);
  } catch (error) {
    spinner.fail("Build failed");
    console.error(error);
    process.exit(1);
  }
}
