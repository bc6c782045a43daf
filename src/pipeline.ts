import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import pLimit from "p-limit";
import type { Candidate, HarvestConfig, RunSummary } from "./types.js";
import { HttpClient } from "./http.js";
import { fillGaps, reportMissing } from "./gapFill.js";
import { logger } from "./logger.js";
import { materialize, sortForDownload } from "./downloader.js";
import { writeManifest } from "./manifest.js";
import { reconcile } from "./reconcile.js";
import { harvestSubject } from "./scraper.js";

export interface RunOptions {
  outDir: string;
  concurrency: number;
  dryRun: boolean;
  fallback: boolean;
  http?: HttpClient;
}

export async function runHarvest(config: HarvestConfig, options: RunOptions): Promise<RunSummary> {
  const http = options.http ?? new HttpClient(config.http);
  const limit = pLimit(options.concurrency);

  if (!options.dryRun) {
    for (const subject of config.subjects) {
      await mkdir(join(options.outDir, subject.folder), { recursive: true });
    }
  }

  // Reconciliation only starts once every page has been harvested, and the
  // list keeps configuration order, so tie-breaks never depend on fetch timing.
  const perSubject = await Promise.all(
    config.subjects.map((subject) => harvestSubject(http, subject, config, options.outDir, limit))
  );
  const harvested: Candidate[] = perSubject.flat();
  const map = reconcile(harvested, config.preferredHosts);
  const reconciled = map.size;
  logger.info("Reconciliation complete", { harvested: harvested.length, keys: reconciled });

  let synthesized = 0;
  if (options.fallback) {
    const states = await fillGaps(map, config, http, options.outDir, limit);
    synthesized = states.filter((state) => state.stage === "committed").length;
  }
  const missing = reportMissing(map, config).length;

  const summary: RunSummary = {
    harvested: harvested.length,
    reconciled,
    synthesized,
    missing,
    downloaded: 0,
    skipped: 0,
    failed: 0,
    accepted: [],
  };

  if (options.dryRun) {
    for (const candidate of sortForDownload(map.values())) {
      logger.info("Planned download", {
        subject: candidate.subjectCode,
        year: candidate.year,
        session: candidate.session,
        type: candidate.assetType,
        url: candidate.resourceUrl,
        destination: candidate.destinationPath,
      });
    }
    return summary;
  }

  const result = await materialize(map, http, config.download, limit);
  await writeManifest(result.accepted, options.outDir, config.manifest);

  logger.info("Completed", {
    accepted: result.accepted.length,
    downloaded: result.downloaded,
    skipped: result.skipped,
    failed: result.failed,
    missing,
  });
  return {
    ...summary,
    downloaded: result.downloaded,
    skipped: result.skipped,
    failed: result.failed,
    accepted: result.accepted,
  };
}
