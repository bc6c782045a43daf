import type { AssetType, Classified, ClassificationRules, HarvestConfig, Session } from "./types.js";
import { ASSET_TYPES, SESSIONS } from "./types.js";

// First 19xx/20xx token wins; titles listing several years are tagged with
// the first one.
const EXAM_YEAR_RE = /(20\d{2}|19\d{2})/;

// Correction is checked first so "Examen ... corrigé" is filed as a correction.
const TYPE_PRIORITY: readonly AssetType[] = ["Correction", "MainExam"];

export const present = <T>(value: T): Classified<T> => ({ kind: "present", value });
export const absent: Classified<never> = { kind: "absent" };

export function valueOf<T>(result: Classified<T>): T | undefined {
  return result.kind === "present" ? result.value : undefined;
}

function fold(text: string): string {
  return text.normalize("NFC").toLowerCase();
}

function containsAny(haystack: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => haystack.includes(fold(keyword)));
}

export function identifyYear(text: string): Classified<string> {
  const match = EXAM_YEAR_RE.exec(text);
  return match ? present(match[1]) : absent;
}

export function identifySession(text: string, keywords: ClassificationRules["sessionKeywords"]): Classified<Session> {
  const lowered = fold(text);
  for (const session of SESSIONS) {
    if (containsAny(lowered, keywords[session])) {
      return present(session);
    }
  }
  return absent;
}

export function identifyAssetType(text: string, keywords: ClassificationRules["typeKeywords"]): Classified<AssetType> {
  const lowered = fold(text);
  for (const type of TYPE_PRIORITY) {
    if (containsAny(lowered, keywords[type])) {
      return present(type);
    }
  }
  return absent;
}

/** Drill sheets and practice material are not exam papers. */
export function isExcludedTitle(text: string, excludeKeywords: readonly string[]): boolean {
  return containsAny(fold(text), excludeKeywords);
}

export interface TitleClassification {
  excluded: boolean;
  year: string | null;
  session: Session | null;
  assetType: AssetType | null;
}

export function classifyTitle(text: string, config: Pick<HarvestConfig, "classification" | "extraction">): TitleClassification {
  const { sessionKeywords, typeKeywords } = config.classification;
  return {
    excluded: isExcludedTitle(text, config.extraction.excludeKeywords),
    year: valueOf(identifyYear(text)) ?? null,
    session: valueOf(identifySession(text, sessionKeywords)) ?? null,
    assetType: valueOf(identifyAssetType(text, typeKeywords)) ?? null,
  };
}

export function isSession(value: string): value is Session {
  return SESSIONS.some((session) => session === value);
}

export function isAssetType(value: string): value is AssetType {
  return ASSET_TYPES.some((type) => type === value);
}
