#!/usr/bin/env node

/**
 * CLI entry point for the aerial survey fetcher
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { fetchCommand } from "./commands/fetch";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("aerial-survey-fetch")
  .description(
    "Fetch aerial survey imagery, orthos, DEMs and lidar for one flight",
  )
  .version("0.1.0");

// Main fetch command (default action)
program
  .argument("<output>", "Output folder")
  .option("--year <year>", "Flight year")
  .option("--month <month>", "Flight month")
  .option("--day <day>", "Flight day")
  .option("--yyyymmdd <date>", "Flight date in one YYYYMMDD string")
  .option("--site <site>", "Location of the images (AN or GR)")
  .option("--start-frame <frame>", "Frame number or start of frame sequence")
  .option("--stop-frame <frame>", "End of frame sequence to download")
  .option("--all-frames", "Fetch all frames for this flight")
  .option("--type <type>", "File type to download (image, ortho, dem, lidar)", "image")
  .option("--dry-run", "Just print the batches that would be downloaded")
  .option(
    "--require-complete",
    "Wipe invalid images and fail unless every file is present and valid",
  )
  .option("--refetch-index", "Force refetch of the index file")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output")
  .action(fetchCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
