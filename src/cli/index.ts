#!/usr/bin/env node

/**
 * CLI entry point for the handbook EPUB builder
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { buildCommand } from "./commands/build";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("handbook-epub")
  .description("Build an EPUB e-book from a markdown handbook")
  .version("0.1.0");

// Main build command (default action)
program
  .option("-r, --repo-path <path>", "Handbook repository root")
  .option("-o, --output <path>", "Output EPUB file")
  .option("--cover <path>", "Cover image (JPG/PNG); generated when omitted")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output")
  .action(buildCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
