/**
 * Build command - Loads config and runs the generator
 */

import ora from "ora";
import { z } from "zod";
import { Generator } from "../../generator";
import * as modules from "../../modules";
import { BuildError, Logger, Tracker, loadConfig } from "../../utils";
import { InputConfigSchema, TitlesConfigSchema } from "../../types/config";

const BuildOptionsSchema = z.object({
  cssSource: z.string().optional(),
  mdSources: z.string().optional(),
  renderedOutputs: z.string().optional(),
  baseUrl: z.string().optional(),
  orderBy: InputConfigSchema.shape.orderBy.optional(),
  onMissingTitle: TitlesConfigSchema.shape.missing.optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof BuildOptionsSchema>;

const REQUIRED_PATHS = [
  ["--css-source", "style.path"],
  ["--md-sources", "input.directory"],
  ["--rendered-outputs", "output.directory"],
] as const;

export async function buildCommand(opts: Options): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();

  try {
    // Validate CLI options
    const options = BuildOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);

    // Override with CLI options
    if (options.cssSource) config.style.path = options.cssSource;
    if (options.mdSources) config.input.directory = options.mdSources;
    if (options.renderedOutputs) {
      config.output.directory = options.renderedOutputs;
    }
    if (options.baseUrl !== undefined) config.site.baseUrl = options.baseUrl;
    if (options.orderBy) config.input.orderBy = options.orderBy;
    if (options.onMissingTitle) config.titles.missing = options.onMissingTitle;
    if (options.verbose) config.logging.level = "debug";

    const values = {
      "style.path": config.style.path,
      "input.directory": config.input.directory,
      "output.directory": config.output.directory,
    };
    const missing = REQUIRED_PATHS.filter(([, key]) => !values[key]);
    if (missing.length > 0) {
      throw new Error(
        `Missing required option(s): ${missing.map(([flag]) => flag).join(", ")}`,
      );
    }

    const tracker = new Tracker();
    const logger = new Logger(config.logging.level);

    // Add any config loading errors to tracker
    for (const err of errors) {
      tracker.trackError(err.path, err.error, "resource");
    }

    const generator = new Generator(config, { tracker, logger });

    spinner.text = "Rendering pages...";
    await generator.run();

    spinner.clear();
    spinner.stop();

    modules.stats(generator.context, options.verbose);
  } catch (error) {
    spinner.fail("Build failed");
    if (error instanceof BuildError || error instanceof z.ZodError) {
      console.error(error.message);
    } else {
      console.error(error);
    }
    process.exit(1);
  }
}
