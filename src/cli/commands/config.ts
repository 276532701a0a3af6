/**
 * Config command - Show where settings are read from
 */

import chalk from "chalk";
import { existsSync } from "fs";
import { getUserConfigPath, loadDefaultConfig } from "../../utils";

interface ConfigOptions {
  defaults?: boolean;
}

export async function configCommand(opts: ConfigOptions): Promise<void> {
  if (opts.defaults) {
    console.log(JSON.stringify(await loadDefaultConfig(), null, 2));
    return;
  }

  const configPath = getUserConfigPath();
  const status = existsSync(configPath) ? chalk.green("found") : chalk.dim("not created yet");
  console.log(`User configuration: ${configPath} (${status})`);
  console.log("\nSettings in this file override the defaults; `--config <path>` overrides both.");
  console.log("Run `prepress config --defaults` to print every available option.");
}
