import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { vi } from "vitest";
import type { Candidate, HarvestConfig } from "../types.js";
import { parseConfig } from "../config.js";

export function rawTestConfig() {
  return {
    years: { from: 2020, to: 2021 },
    preferredHosts: ["telmidtice.com", "men.gov.ma", "drive.google.com", "docs.google.com"],
    extraction: {
      selectors: ["article a[href]", "main a[href]", ".entry-content a[href]"],
      documentExtension: ".pdf",
      excludeKeywords: ["préparation", "preparation"],
      redirect: { pathMarker: "telecharger", param: "url" },
      cloudStorage: {
        hosts: ["drive.google.com", "docs.google.com"],
        directDownload: "https://drive.google.com/uc?export=download&id={id}",
      },
    },
    classification: {
      sessionKeywords: {
        Normale: ["normale", "normal", "principale", "main", "regular"],
        Rattrapage: ["rattrap", "retake", "extraordinaire"],
      },
      typeKeywords: {
        Correction: ["corrig"],
        MainExam: ["sujet", "examen"],
      },
    },
    labels: {
      session: { Normale: "Normale", Rattrapage: "Rattrapage" },
      type: { MainExam: "Sujet", Correction: "Corrigé" },
    },
    subjects: [
      {
        code: "Math",
        label: "Mathématiques",
        folder: "Math",
        pages: ["https://telmidtice.com/math/", "https://mirror.example.org/math/"],
        template: {
          baseUrl: "https://telmidtice.com/assets/maths-fr/Examens Nationaux/",
          fileTemplate: "Examen Maths {year} {sessionLabel} - {typeLabel}.pdf",
          titleTemplate: "Maths {year} {sessionLabel} – {typeLabel}",
        },
      },
      {
        code: "SVT",
        label: "Sciences de la Vie et de la Terre (SVT)",
        folder: "SVT",
        pages: ["https://mirror.example.org/svt/"],
        template: {
          baseUrl: "https://telmidtice.com/assets/svt-fr/Examens Nationaux/",
          fileTemplate: "Examen SVT {year} {sessionLabel} - {typeLabel}.pdf",
          titleTemplate: "SVT {year} {sessionLabel} – {typeLabel}",
        },
      },
    ],
    http: {
      userAgent: "test-agent/1.0",
      pageTimeoutMs: 1000,
      probeTimeoutMs: 1000,
      downloadTimeoutMs: 1000,
    },
    download: { signature: "%PDF", sniffBytes: 16 },
    manifest: { json: "exams_metadata.json", csv: "exams_metadata.csv" },
  };
}

export function testConfig(): HarvestConfig {
  return parseConfig(rawTestConfig());
}

export function makeCandidate(overrides: Partial<Candidate> = {}): Candidate {
  return {
    subjectCode: "Math",
    subjectLabel: "Mathématiques",
    year: "2021",
    session: "Normale",
    assetType: "MainExam",
    sourceTitle: "Examen national 2021 session normale",
    sourcePage: "https://mirror.example.org/math/",
    resourceUrl: "https://mirror.example.org/files/math-2021.pdf",
    destinationPath: "/out/Math/Math_2021_Normale_MainExam.pdf",
    ...overrides,
  };
}

export const PDF_BODY = "%PDF-1.4\n% test document\n";

export function pdfResponse(body: string = PDF_BODY): Response {
  return new Response(body, { status: 200, headers: { "Content-Type": "application/pdf" } });
}

export function htmlResponse(html: string): Response {
  return new Response(html, { status: 200, headers: { "Content-Type": "text/html" } });
}

type Route = (init: RequestInit | undefined) => Response | Promise<Response>;

/**
 * Replaces the global fetch with a router keyed by "METHOD url". Unknown
 * routes answer 404.
 */
export function stubFetch(routes: Record<string, Route>) {
  const spy = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url;
    const method = init?.method ?? "GET";
    const route = routes[`${method} ${url}`];
    return route ? route(init) : new Response("not found", { status: 404 });
  });
  globalThis.fetch = spy;
  return spy;
}

export function calledUrls(spy: ReturnType<typeof stubFetch>, method = "GET"): string[] {
  return spy.mock.calls
    .filter(([, init]) => (init?.method ?? "GET") === method)
    .map(([input]) => (typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url));
}

export async function makeTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), "exam-harvester-"));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}
