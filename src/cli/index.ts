#!/usr/bin/env -S npx tsx

/**
 * CLI entry point for the markdown site generator
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { buildCommand } from "./commands/build";
import { renderCommand } from "./commands/render";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("mdsite")
  .description("Turn a directory of markdown articles into a static website")
  .version("0.1.0");

// Main build command (default action)
program
  .command("build", { isDefault: true })
  .description("Render every article, copy other files, write index and feed")
  .option("-i, --input <path>", "Input directory containing markdown files")
  .option("-o, --output <path>", "Output directory for the generated site")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--site-url <url>", "Absolute URL the site is published at")
  .option("-v, --verbose", "Verbose output")
  .action(buildCommand);

// Render command - print a single article as HTML
program
  .command("render <file>")
  .description("Print the HTML rendering of a single markdown file")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--embed", "Inline images next to the file as data URIs")
  .action(renderCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
