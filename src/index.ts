#!/usr/bin/env node
import process from "node:process";
import { resolve } from "node:path";
import { Command, InvalidArgumentError, Option } from "commander";
import { classifyTitle } from "./classifier.js";
import { loadConfigFromFile } from "./config.js";
import { expectedKeySpace } from "./keys.js";
import { describeError, LEVELS, logger } from "./logger.js";
import type { Level } from "./logger.js";
import { runHarvest } from "./pipeline.js";

interface RunCliOptions {
  config: string;
  out: string;
  concurrency: number;
  dryRun: boolean;
  fallback: boolean;
  logLevel?: Level;
}

const DEFAULT_CONFIG = "config/harvest.json";

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

function buildProgram(): Command {
  const program = new Command();
  program
    .name("exam-harvester")
    .description("Collects national exam papers and corrections into a verified local inventory")
    .version("0.1.0");

  program
    .command("run")
    .description("Harvest, reconcile, fill gaps, download and write the manifest")
    .option("--config <path>", "Path to the harvest configuration", DEFAULT_CONFIG)
    .option("--out <dir>", "Output directory for subject folders and manifests", ".")
    .option("--concurrency <n>", "Parallel network calls", parsePositiveInt, 1)
    .option("--dry-run", "Plan only: no folders, downloads or manifest", false)
    .option("--no-fallback", "Skip template-based gap filling")
    .addOption(new Option("--log-level <level>", "Minimum log level").choices(LEVELS))
    .action(async (opts: RunCliOptions) => {
      if (opts.logLevel) {
        logger.setLevel(opts.logLevel);
      }
      const config = await loadConfigFromFile(opts.config);
      const summary = await runHarvest(config, {
        outDir: resolve(opts.out),
        concurrency: opts.concurrency,
        dryRun: opts.dryRun,
        fallback: opts.fallback,
      });
      logger.info("Run summary", {
        harvested: summary.harvested,
        reconciled: summary.reconciled,
        synthesized: summary.synthesized,
        missing: summary.missing,
        downloaded: summary.downloaded,
        skipped: summary.skipped,
        failed: summary.failed,
        accepted: summary.accepted.length,
      });
    });

  program
    .command("classify")
    .description("Show how a link title would be classified")
    .argument("<text...>", "Display text of the link")
    .option("--config <path>", "Path to the harvest configuration", DEFAULT_CONFIG)
    .action(async (words: string[], opts: { config: string }) => {
      const config = await loadConfigFromFile(opts.config);
      const text = words.join(" ");
      process.stdout.write(`${JSON.stringify({ text, ...classifyTitle(text, config) }, null, 2)}\n`);
    });

  program
    .command("keys")
    .description("Count the expected inventory per subject")
    .option("--config <path>", "Path to the harvest configuration", DEFAULT_CONFIG)
    .action(async (opts: { config: string }) => {
      const config = await loadConfigFromFile(opts.config);
      const keys = expectedKeySpace(config);
      const perSubject = Object.fromEntries(
        config.subjects.map((subject) => [subject.code, keys.filter((key) => key.subject === subject.code).length])
      );
      process.stdout.write(`${JSON.stringify({ total: keys.length, perSubject }, null, 2)}\n`);
    });

  return program;
}

async function main() {
  await buildProgram().parseAsync(process.argv);
}

main().catch((error) => {
  logger.error("Fatal error", { error: describeError(error) });
  process.exitCode = 1;
});
