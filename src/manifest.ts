import { rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { stringify } from "csv-stringify/sync";
import type { Candidate, HarvestConfig } from "./types.js";
import { describeError, logger } from "./logger.js";

export class ManifestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ManifestError";
  }
}

export interface ManifestRecord {
  subjectCode: string;
  subjectLabel: string;
  year: string;
  session: string;
  assetType: string;
  sourceTitle: string;
  sourcePage: string;
  resourceUrl: string;
  destinationPath: string;
}

export const MANIFEST_COLUMNS: readonly (keyof ManifestRecord)[] = [
  "subjectCode",
  "subjectLabel",
  "year",
  "session",
  "assetType",
  "sourceTitle",
  "sourcePage",
  "resourceUrl",
  "destinationPath",
];

export function toManifestRecord(candidate: Candidate): ManifestRecord {
  return {
    subjectCode: candidate.subjectCode,
    subjectLabel: candidate.subjectLabel,
    year: candidate.year ?? "",
    session: candidate.session ?? "",
    assetType: candidate.assetType,
    sourceTitle: candidate.sourceTitle,
    sourcePage: candidate.sourcePage,
    resourceUrl: candidate.resourceUrl,
    destinationPath: candidate.destinationPath,
  };
}

export interface ManifestPaths {
  json: string;
  csv: string;
}

/**
 * Writes the JSON and CSV manifests. Both are rendered and staged before
 * either is moved into place, so a run leaves both files or neither.
 */
export async function writeManifest(
  accepted: readonly Candidate[],
  outDir: string,
  names: HarvestConfig["manifest"]
): Promise<ManifestPaths | null> {
  if (!accepted.length) {
    logger.warn("No metadata to write");
    return null;
  }

  const records = accepted.map(toManifestRecord);
  const paths: ManifestPaths = { json: join(outDir, names.json), csv: join(outDir, names.csv) };
  const staged = { json: `${paths.json}.tmp`, csv: `${paths.csv}.tmp` };

  const json = `${JSON.stringify(records, null, 2)}\n`;
  const csv = stringify(records, { header: true, columns: [...MANIFEST_COLUMNS] });

  try {
    await writeFile(staged.json, json, "utf8");
    await writeFile(staged.csv, csv, "utf8");
    await rename(staged.json, paths.json);
    try {
      await rename(staged.csv, paths.csv);
    } catch (error) {
      await rm(paths.json, { force: true });
      throw error;
    }
  } catch (error) {
    await Promise.all([rm(staged.json, { force: true }), rm(staged.csv, { force: true })]);
    throw new ManifestError(`Failed to write manifest in ${outDir}: ${describeError(error)}`);
  }

  logger.info("Wrote JSON manifest", { path: paths.json, entries: records.length });
  logger.info("Wrote CSV manifest", { path: paths.csv, entries: records.length });
  return paths;
}
