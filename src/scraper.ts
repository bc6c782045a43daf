import { load } from "cheerio";
import type { LimitFunction } from "p-limit";
import type { Candidate, HarvestConfig, SubjectSource } from "./types.js";
import type { HttpClient } from "./http.js";
import { identifyAssetType, identifySession, identifyYear, isExcludedTitle, valueOf } from "./classifier.js";
import { logger } from "./logger.js";
import { destinationFor } from "./naming.js";
import { isAcceptedResource, normalizeResourceUrl } from "./urls.js";

export interface AnchorLink {
  href: string;
  text: string;
}

type ParseConfig = Pick<HarvestConfig, "extraction" | "classification">;

/** Yields anchors under the content selectors, in document order. */
export function* extractAnchors(html: string, selectors: readonly string[]): Generator<AnchorLink> {
  const $ = load(html);
  for (const element of $(selectors.join(", ")).toArray()) {
    const href = $(element).attr("href")?.trim();
    if (!href) {
      continue;
    }
    yield { href, text: $(element).text().replace(/\s+/g, " ").trim() };
  }
}

export function parseExamLinks(
  html: string,
  pageUrl: string,
  subject: SubjectSource,
  config: ParseConfig,
  outDir: string
): Candidate[] {
  const { extraction, classification } = config;
  const candidates: Candidate[] = [];
  const seenUrls = new Set<string>();

  for (const anchor of extractAnchors(html, extraction.selectors)) {
    const resourceUrl = normalizeResourceUrl(anchor.href, pageUrl, extraction);
    if (!resourceUrl || !isAcceptedResource(resourceUrl, extraction)) {
      continue;
    }
    const title = anchor.text;
    if (!title) {
      continue;
    }
    if (isExcludedTitle(title, extraction.excludeKeywords)) {
      logger.debug("Skipping practice material", { page: pageUrl, title });
      continue;
    }
    const assetType = valueOf(identifyAssetType(title, classification.typeKeywords));
    if (!assetType) {
      continue;
    }
    if (seenUrls.has(resourceUrl)) {
      continue;
    }
    seenUrls.add(resourceUrl);

    const year = valueOf(identifyYear(title));
    const session = valueOf(identifySession(title, classification.sessionKeywords));
    candidates.push({
      subjectCode: subject.code,
      subjectLabel: subject.label,
      year,
      session,
      assetType,
      sourceTitle: title,
      sourcePage: pageUrl,
      resourceUrl,
      destinationPath: destinationFor(outDir, subject, year, session, assetType, extraction.documentExtension),
    });
  }

  return candidates;
}

/**
 * Collects the candidates of every configured page of a subject. Pages may be
 * fetched concurrently, but the result keeps page order then anchor order.
 */
export async function harvestSubject(
  http: HttpClient,
  subject: SubjectSource,
  config: ParseConfig,
  outDir: string,
  limit: LimitFunction
): Promise<Candidate[]> {
  const log = logger.child({ subject: subject.code });
  const perPage = await Promise.all(
    subject.pages.map((pageUrl) =>
      limit(async () => {
        log.info("Processing page", { url: pageUrl });
        const html = await http.getText(pageUrl);
        if (html === null) {
          return [];
        }
        const found = parseExamLinks(html, pageUrl, subject, config, outDir);
        if (!found.length) {
          log.warn("No document links detected", { url: pageUrl });
        }
        return found;
      })
    )
  );
  return perPage.flat();
}
