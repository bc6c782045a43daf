import { access, readFile, writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ManifestError, toManifestRecord, writeManifest } from "../manifest.js";
import { makeCandidate, makeTempDir, testConfig } from "./helpers.js";

const names = testConfig().manifest;

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

describe("toManifestRecord", () => {
  it("flattens absent facets to empty strings", () => {
    expect(toManifestRecord(makeCandidate({ year: undefined, session: undefined }))).toEqual({
      subjectCode: "Math",
      subjectLabel: "Mathématiques",
      year: "",
      session: "",
      assetType: "MainExam",
      sourceTitle: "Examen national 2021 session normale",
      sourcePage: "https://mirror.example.org/math/",
      resourceUrl: "https://mirror.example.org/files/math-2021.pdf",
      destinationPath: "/out/Math/Math_2021_Normale_MainExam.pdf",
    });
  });
});

describe("writeManifest", () => {
  let dir = "";
  let cleanup: () => Promise<void> = async () => undefined;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  it("writes matching JSON and CSV manifests", async () => {
    const first = makeCandidate({ destinationPath: "/out/Math/a.pdf" });
    const second = makeCandidate({
      assetType: "Correction",
      sourceTitle: 'Corrigé 2021, "normale"',
      destinationPath: "/out/Math/b.pdf",
    });

    const paths = await writeManifest([first, second], dir, names);

    expect(paths).toEqual({ json: join(dir, "exams_metadata.json"), csv: join(dir, "exams_metadata.csv") });
    const json: unknown = JSON.parse(await readFile(join(dir, "exams_metadata.json"), "utf8"));
    expect(json).toEqual([toManifestRecord(first), toManifestRecord(second)]);

    const csv = await readFile(join(dir, "exams_metadata.csv"), "utf8");
    expect(csv.split("\n")).toEqual([
      "subjectCode,subjectLabel,year,session,assetType,sourceTitle,sourcePage,resourceUrl,destinationPath",
      "Math,Mathématiques,2021,Normale,MainExam,Examen national 2021 session normale,https://mirror.example.org/math/,https://mirror.example.org/files/math-2021.pdf,/out/Math/a.pdf",
      'Math,Mathématiques,2021,Normale,Correction,"Corrigé 2021, ""normale""",https://mirror.example.org/math/,https://mirror.example.org/files/math-2021.pdf,/out/Math/b.pdf',
      "",
    ]);
    expect(await exists(join(dir, "exams_metadata.json.tmp"))).toBe(false);
  });

  it("writes nothing for an empty accepted set", async () => {
    await expect(writeManifest([], dir, names)).resolves.toBeNull();
    expect(await exists(join(dir, "exams_metadata.json"))).toBe(false);
    expect(await exists(join(dir, "exams_metadata.csv"))).toBe(false);
  });

  it("leaves neither file behind when one cannot be placed", async () => {
    // a directory squatting on the CSV name makes the final rename fail
    await mkdir(join(dir, "exams_metadata.csv"));
    await writeFile(join(dir, "exams_metadata.csv", "keep"), "x");

    await expect(writeManifest([makeCandidate()], dir, names)).rejects.toBeInstanceOf(ManifestError);
    expect(await exists(join(dir, "exams_metadata.json"))).toBe(false);
    expect(await exists(join(dir, "exams_metadata.json.tmp"))).toBe(false);
    expect(await exists(join(dir, "exams_metadata.csv.tmp"))).toBe(false);
  });
});
