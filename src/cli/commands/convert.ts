/**
 * Convert command - Loads config and runs the prepress pipeline
 */

import { mkdir, rm } from "fs/promises";
import path from "node:path";
import ora from "ora";
import { z } from "zod";
import { createNodeCollaborators } from "../../collaborators";
import * as modules from "../../modules";
import type { ConversionContext } from "../../types";
import { Logger, Tracker, loadConfig } from "../../utils";

const ConvertOptionsSchema = z.object({
  output: z.string().optional(),
  assets: z.string().optional(),
  config: z.string().optional(),
  clean: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof ConvertOptionsSchema>;

export async function convertCommand(
  issue: string,
  exportPath: string,
  opts: Options,
): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();

  try {
    // Validate CLI options
    const options = ConvertOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);

    // Override with CLI options
    if (options.output) {
      config.output.file = options.output;
    }
    if (options.assets) {
      config.output.assets = options.assets;
    }

    const assetDir = path.resolve(config.output.assets);
    if (options.clean) {
      await rm(assetDir, { recursive: true, force: true });
    }
    await mkdir(path.join(assetDir, "img"), { recursive: true });
    await mkdir(path.join(assetDir, "pdf"), { recursive: true });

    const logger = new Logger(options.verbose ? "debug" : config.logging.level);
    const tracker = new Tracker();

    // Add any config loading errors to tracker
    for (const err of errors) {
      tracker.trackError(err.path, err.error, "resource");
    }

    const ctx: ConversionContext = {
      config,
      issue,
      exportPath,
      logger,
      tracker,
      collaborators: createNodeCollaborators(config, assetDir),
      verbose: options.verbose,
    };

    spinner.text = "Scanning export...";
    await modules.scan(ctx);

    spinner.text = "Importing articles...";
    await modules.importArticles(ctx);

    spinner.text = `Processing ${ctx.articles?.length ?? 0} articles...`;
    await modules.process(ctx);

    spinner.text = "Writing issue...";
    await modules.write(ctx);

    // Clear and stop spinner before displaying stats
    spinner.clear();
    spinner.stop();

    await modules.stats(ctx);
  } catch (error) {
    spinner.fail("Export failed");
    console.error(error);
    process.exit(1);
  }
}
