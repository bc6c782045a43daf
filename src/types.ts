export const SESSIONS = ["Normale", "Rattrapage"] as const;
export const ASSET_TYPES = ["MainExam", "Correction"] as const;

export type Session = (typeof SESSIONS)[number];
export type AssetType = (typeof ASSET_TYPES)[number];
export type SubjectCode = string;

export type Classified<T> = { kind: "present"; value: T } | { kind: "absent" };

export interface SubjectTemplate {
  baseUrl: string;
  fileTemplate: string;
  titleTemplate: string;
}

export interface SubjectSource {
  code: SubjectCode;
  label: string;
  folder: string;
  pages: string[];
  template?: SubjectTemplate;
}

export interface ExtractionRules {
  selectors: string[];
  documentExtension: string;
  excludeKeywords: string[];
  redirect: {
    pathMarker: string;
    param: string;
  };
  cloudStorage: {
    hosts: string[];
    directDownload: string;
  };
}

export interface ClassificationRules {
  sessionKeywords: Record<Session, string[]>;
  typeKeywords: Record<AssetType, string[]>;
}

export interface HttpSettings {
  userAgent: string;
  pageTimeoutMs: number;
  probeTimeoutMs: number;
  downloadTimeoutMs: number;
}

export interface DownloadRules {
  signature: string;
  sniffBytes: number;
  /** Expected substring of the Content-Type header; a mismatch is only logged. */
  contentTypeHint: string;
}

export interface HarvestConfig {
  years: { from: number; to: number };
  preferredHosts: string[];
  extraction: ExtractionRules;
  classification: ClassificationRules;
  labels: {
    session: Record<Session, string>;
    type: Record<AssetType, string>;
  };
  subjects: SubjectSource[];
  http: HttpSettings;
  download: DownloadRules;
  manifest: { json: string; csv: string };
}

/**
 * One located exam or correction. Never mutated once built: the reconciled
 * map swaps whole entries.
 */
export interface Candidate {
  readonly subjectCode: SubjectCode;
  readonly subjectLabel: string;
  readonly year?: string;
  readonly session?: Session;
  readonly assetType: AssetType;
  readonly sourceTitle: string;
  readonly sourcePage: string;
  readonly resourceUrl: string;
  readonly destinationPath: string;
}

export interface CanonicalKey {
  subject: SubjectCode;
  year: number;
  session: Session;
  assetType: AssetType;
}

export type ReconciledMap = Map<string, Candidate>;

export type DownloadOutcome =
  | { status: "downloaded"; bytes: number }
  | { status: "skipped" }
  | { status: "failed"; reason: "signature" | "http" | "transport" | "empty"; error: string };

export interface RunSummary {
  harvested: number;
  reconciled: number;
  synthesized: number;
  missing: number;
  downloaded: number;
  skipped: number;
  failed: number;
  accepted: Candidate[];
}
