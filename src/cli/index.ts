#!/usr/bin/env tsx

/**
 * CLI entry point for issue-images
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { fetchCommand } from "./commands/fetch";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("issue-images")
  .description("Extract images from GitHub issues and pull requests")
  .version("0.1.0");

// Main extraction command (default action)
program
  .argument("<target>", "OWNER/REPO#NUM or an issue/pull request URL")
  .option("-o, --out <dir>", "Output directory for images (default: print base64)")
  .option("--send <prompt>", "Send images to Claude with this prompt")
  .option("--continue", "Continue the previous Claude session")
  .option("--max-size <mb>", "Maximum image size in MB")
  .option("--timeout <seconds>", "Download timeout per attempt in seconds")
  .option("--concurrency <n>", "Parallel downloads")
  .option("--retries <n>", "Retries per image after the first attempt")
  .option("--force", "Overwrite existing files")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output")
  .option("-q, --quiet", "Quiet mode (errors only)")
  .option("--debug", "Debug output")
  .addHelpText(
    "after",
    `
Examples:
  issue-images OWNER/REPO#123
  issue-images https://github.com/OWNER/REPO/issues/123
  issue-images OWNER/REPO#123 --out ./images
  issue-images OWNER/REPO#123 --send "Analyze these screenshots"`,
  )
  .action(fetchCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
