import type { LimitFunction } from "p-limit";
import type { Candidate, CanonicalKey, HarvestConfig, ReconciledMap, SubjectSource } from "./types.js";
import type { HttpClient } from "./http.js";
import { keyId, offer } from "./reconcile.js";
import { expectedKeySpace, missingKeys } from "./keys.js";
import { logger } from "./logger.js";
import { destinationFor, fillTemplate } from "./naming.js";
import { quotePathSegment } from "./urls.js";

/**
 * Lifecycle of one absent key:
 *   missing -> synthesized -> probed(ok)   -> committed
 *   missing -> synthesized -> probed(fail) -> missing
 * Only `commit` writes to the map, and only from a successful probe.
 */
export type GapState =
  | { stage: "missing"; key: CanonicalKey }
  | { stage: "synthesized"; key: CanonicalKey; candidate: Candidate }
  | { stage: "probed"; key: CanonicalKey; candidate: Candidate; ok: boolean }
  | { stage: "committed"; key: CanonicalKey; candidate: Candidate };

type SynthesisConfig = Pick<HarvestConfig, "labels" | "extraction">;

export function synthesize(
  key: CanonicalKey,
  subject: SubjectSource,
  config: SynthesisConfig,
  outDir: string
): GapState {
  const pattern = subject.template;
  if (!pattern) {
    return { stage: "missing", key };
  }
  const values = {
    year: key.year,
    sessionLabel: config.labels.session[key.session],
    typeLabel: config.labels.type[key.assetType],
  };
  const filename = fillTemplate(pattern.fileTemplate, values);
  const year = String(key.year);
  const candidate: Candidate = {
    subjectCode: subject.code,
    subjectLabel: subject.label,
    year,
    session: key.session,
    assetType: key.assetType,
    sourceTitle: fillTemplate(pattern.titleTemplate, values),
    sourcePage: pattern.baseUrl,
    resourceUrl: new URL(pattern.baseUrl + quotePathSegment(filename)).toString(),
    destinationPath: destinationFor(
      outDir,
      subject,
      year,
      key.session,
      key.assetType,
      config.extraction.documentExtension
    ),
  };
  return { stage: "synthesized", key, candidate };
}

export async function probe(state: GapState, http: Pick<HttpClient, "probe">): Promise<GapState> {
  if (state.stage !== "synthesized") {
    return state;
  }
  const ok = await http.probe(state.candidate.resourceUrl);
  return { stage: "probed", key: state.key, candidate: state.candidate, ok };
}

export function commit(state: GapState, map: ReconciledMap, preferredHosts: readonly string[]): GapState {
  if (state.stage !== "probed") {
    return state;
  }
  if (!state.ok) {
    return { stage: "missing", key: state.key };
  }
  const result = offer(map, state.candidate, preferredHosts);
  if (result === "claimed" || result === "replaced") {
    return { stage: "committed", key: state.key, candidate: state.candidate };
  }
  return { stage: "missing", key: state.key };
}

/**
 * Attempts one template-built fallback per expected key the harvest did not
 * cover. Probes may run concurrently; commits happen afterwards in key order.
 */
export async function fillGaps(
  map: ReconciledMap,
  config: Pick<HarvestConfig, "labels" | "extraction" | "subjects" | "years" | "preferredHosts">,
  http: Pick<HttpClient, "probe">,
  outDir: string,
  limit: LimitFunction
): Promise<GapState[]> {
  const subjects = new Map(config.subjects.map((subject) => [subject.code, subject]));
  const gaps = missingKeys(map, config);

  const probed = await Promise.all(
    gaps.map((key) =>
      limit(async (): Promise<GapState> => {
        const subject = subjects.get(key.subject);
        if (!subject) {
          return { stage: "missing", key };
        }
        return probe(synthesize(key, subject, config, outDir), http);
      })
    )
  );

  const states = probed.map((state) => commit(state, map, config.preferredHosts));
  const filled = states.filter((state) => state.stage === "committed").length;
  logger.info("Fallback synthesis complete", { gaps: gaps.length, filled });
  return states;
}

/** Logs every expected key still absent. Missing assets are not a failure. */
export function reportMissing(map: ReconciledMap, config: Pick<HarvestConfig, "subjects" | "years">): CanonicalKey[] {
  const missing = missingKeys(map, config);
  if (!missing.length) {
    logger.info("All target assets located", {
      years: `${config.years.from}-${config.years.to}`,
      keys: expectedKeySpace(config).length,
    });
    return missing;
  }
  for (const key of missing) {
    logger.warn("Missing asset after fallback search", { key: keyId(key), ...key });
  }
  return missing;
}
