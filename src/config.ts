import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { z } from "zod";
import type { HarvestConfig } from "./types.js";
import { describeError } from "./logger.js";

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length ? `${message}\n${issues.join("\n")}` : message);
    this.name = "ConfigError";
  }
}

const keywordList = z.array(z.string().min(1)).min(1);

const TemplateSchema = z.object({
  baseUrl: z.string().url(),
  fileTemplate: z.string().min(1),
  titleTemplate: z.string().min(1),
});

const SubjectSchema = z.object({
  code: z.string().regex(/^[A-Za-z0-9]+$/, "subject code must be ASCII alphanumeric"),
  label: z.string().min(1),
  folder: z.string().min(1),
  pages: z.array(z.string().url()),
  template: TemplateSchema.optional(),
});

const ConfigSchema = z
  .object({
    years: z
      .object({
        from: z.number().int().min(1900).max(2099),
        to: z.number().int().min(1900).max(2099),
      })
      .refine((value) => value.from <= value.to, { message: "years.from must not exceed years.to" }),
    preferredHosts: z.array(z.string().min(1)),
    extraction: z.object({
      selectors: z.array(z.string().min(1)).min(1),
      documentExtension: z.string().regex(/^\.[A-Za-z0-9]+$/),
      excludeKeywords: z.array(z.string().min(1)).default([]),
      redirect: z.object({
        pathMarker: z.string().min(1),
        param: z.string().min(1),
      }),
      cloudStorage: z.object({
        hosts: z.array(z.string().min(1)),
        directDownload: z.string().includes("{id}"),
      }),
    }),
    classification: z.object({
      sessionKeywords: z.object({ Normale: keywordList, Rattrapage: keywordList }),
      typeKeywords: z.object({ MainExam: keywordList, Correction: keywordList }),
    }),
    labels: z.object({
      session: z.object({ Normale: z.string().min(1), Rattrapage: z.string().min(1) }),
      type: z.object({ MainExam: z.string().min(1), Correction: z.string().min(1) }),
    }),
    subjects: z.array(SubjectSchema).min(1),
    http: z.object({
      userAgent: z.string().min(1),
      pageTimeoutMs: z.number().int().positive().default(30000),
      probeTimeoutMs: z.number().int().positive().default(20000),
      downloadTimeoutMs: z.number().int().positive().default(45000),
    }),
    download: z.object({
      signature: z.string().min(1),
      sniffBytes: z.number().int().positive().default(1024),
      contentTypeHint: z.string().min(1).default("pdf"),
    }),
    manifest: z.object({
      json: z.string().min(1),
      csv: z.string().min(1),
    }),
  })
  .refine(
    (value) => new Set(value.subjects.map((subject) => subject.code)).size === value.subjects.length,
    { message: "subject codes must be unique", path: ["subjects"] }
  );

export function parseConfig(json: unknown): HarvestConfig {
  const result = ConfigSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigError("Invalid harvest configuration", issues);
  }
  return deepFreeze(result.data);
}

export async function loadConfigFromFile(path: string): Promise<HarvestConfig> {
  const absPath = resolve(path);
  let raw: string;
  try {
    raw = await readFile(absPath, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read configuration ${absPath}: ${describeError(error)}`);
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Configuration ${absPath} is not valid JSON: ${describeError(error)}`);
  }
  return parseConfig(json);
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}
