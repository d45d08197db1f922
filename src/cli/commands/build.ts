/**
 * Build command - Loads config and runs the build pipeline
 */

import ora from "ora";
import { z } from "zod";
import { HandbookBuilder, ContentRootNotFoundError } from "../../builder";
import { loadConfig, Logger, Tracker } from "../../utils";
import * as modules from "../../modules";

const BuildOptionsSchema = z.object({
  repoPath: z.string().optional(),
  output: z.string().optional(),
  cover: z.string().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof BuildOptionsSchema>;

export async function buildCommand(opts: Options): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();

  try {
    // Validate CLI options
    const options = BuildOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);

    // Override with CLI options
    if (options.repoPath) {
      config.repoPath = options.repoPath;
    }
    if (options.output) {
      config.output = options.output;
    }
    if (options.cover) {
      config.cover.image = options.cover;
    }
    if (options.verbose) {
      config.logging.level = "debug";
    }

    const tracker = new Tracker();
    const logger = new Logger(config.logging.level, (line) => {
      spinner.clear();
      console.error(line);
      spinner.render();
    });

    // Add any config loading errors to tracker
    for (const err of errors) {
      tracker.trackError(err.path, err.error, "resource");
      logger.warn(`Ignoring invalid config ${err.path}`);
    }

    const builder = new HandbookBuilder(config, {
      tracker,
      logger,
      verbose: options.verbose,
    });

    const ctx = await builder.run((label) => {
      spinner.text = label;
    });

    // Clear and stop spinner before displaying stats
    spinner.clear();
    spinner.stop();

    await modules.stats(ctx);
  } catch (error) {
    if (error instanceof ContentRootNotFoundError) {
      spinner.fail(error.message);
    } else {
      spinner.fail("Build failed");
      console.error(error);
    }
    process.exit(1);
  }
}
