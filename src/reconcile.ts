import type { Candidate, CanonicalKey, ReconciledMap } from "./types.js";
import { isAssetType, isSession } from "./classifier.js";
import { hostOf } from "./urls.js";

export type OfferResult = "claimed" | "replaced" | "kept" | "unkeyed";

/**
 * The identity a candidate competes under. Candidates without a parsed year
 * or session have none and never enter the reconciled map.
 */
export function canonicalKey(candidate: Candidate): CanonicalKey | null {
  if (candidate.year === undefined || candidate.session === undefined) {
    return null;
  }
  const year = Number.parseInt(candidate.year, 10);
  if (!/^\d{4}$/.test(candidate.year) || Number.isNaN(year)) {
    return null;
  }
  if (!isSession(candidate.session) || !isAssetType(candidate.assetType)) {
    return null;
  }
  return { subject: candidate.subjectCode, year, session: candidate.session, assetType: candidate.assetType };
}

export function keyId(key: CanonicalKey): string {
  return `${key.subject}|${key.year}|${key.session}|${key.assetType}`;
}

/** Position in the trust list; lower is better, unlisted hosts rank last. */
export function hostRank(url: string, preferredHosts: readonly string[]): number {
  const host = hostOf(url);
  const index = preferredHosts.findIndex((domain) => host === domain || host.endsWith(`.${domain}`));
  return index === -1 ? preferredHosts.length : index;
}

export function prefers(challenger: Candidate, incumbent: Candidate, preferredHosts: readonly string[]): boolean {
  return hostRank(challenger.resourceUrl, preferredHosts) < hostRank(incumbent.resourceUrl, preferredHosts);
}

/**
 * Sole write path into a reconciled map: an empty key is claimed, an occupied
 * one changes hands only to a strictly better-ranked host.
 */
export function offer(map: ReconciledMap, candidate: Candidate, preferredHosts: readonly string[]): OfferResult {
  const key = canonicalKey(candidate);
  if (!key) {
    return "unkeyed";
  }
  const id = keyId(key);
  const incumbent = map.get(id);
  if (!incumbent) {
    map.set(id, candidate);
    return "claimed";
  }
  if (prefers(candidate, incumbent, preferredHosts)) {
    map.set(id, candidate);
    return "replaced";
  }
  return "kept";
}

/** Expects the complete, ordered harvest; not an online merge. */
export function reconcile(candidates: readonly Candidate[], preferredHosts: readonly string[]): ReconciledMap {
  const map: ReconciledMap = new Map();
  for (const candidate of candidates) {
    offer(map, candidate, preferredHosts);
  }
  return map;
}
