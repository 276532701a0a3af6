#!/usr/bin/env tsx

/**
 * CLI entry point for the issue prepress tool
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { convertCommand } from "./commands/convert";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("prepress")
  .description("Prepare approved blog articles for desktop-publishing import")
  .version("0.1.0");

// Main conversion command (default action)
program
  .argument("<issue>", "Issue tag to export, e.g. v141i3")
  .argument("<export>", "WordPress export file, or a directory of them")
  .option("-o, --output <path>", "Issue XML file to write")
  .option("-a, --assets <path>", "Directory to store images and formulas in")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--clean", "Empty the asset directory first")
  .option("-v, --verbose", "Verbose output")
  .action(convertCommand);

// Config command - show config location, or the defaults
program
  .command("config")
  .description("Show the configuration file location")
  .option("--defaults", "Print the default configuration")
  .action(configCommand);

await program.parseAsync();
