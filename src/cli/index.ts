#!/usr/bin/env tsx

/**
 * CLI entry point for the Markdown blog generator
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { buildCommand } from "./commands/build";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("mdblog")
  .description("Render a directory of Markdown posts into a static HTML blog")
  .version("0.1.0");

// Main build command (default action)
program
  .option("-c, --css-source <path>", "Path to the CSS source file")
  .option("-m, --md-sources <path>", "Directory containing the Markdown files")
  .option(
    "-r, --rendered-outputs <path>",
    "Directory the rendered HTML files are written into",
  )
  .option("-b, --base-url <url>", "Prefix for page links in the index")
  .option("--order-by <key>", "Creation time source: birthtime or mtime")
  .option(
    "--on-missing-title <policy>",
    "Documents without a level-1 heading: filename or skip",
  )
  .option("--config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output")
  .action(buildCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
