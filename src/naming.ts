import { join } from "node:path";
import type { AssetType, Session, SubjectSource } from "./types.js";

export function sanitizeFilename(parts: readonly string[], suffix: string): string {
  const safeParts = parts
    .map((part) => part.replace(/[^A-Za-z0-9]+/g, "_").replace(/^_+|_+$/g, ""))
    .filter(Boolean);
  const combined = safeParts.length ? safeParts.join("_") : "document";
  return `${combined}${suffix}`;
}

export function destinationFor(
  outDir: string,
  subject: Pick<SubjectSource, "code" | "folder">,
  year: string | undefined,
  session: Session | undefined,
  assetType: AssetType,
  extension: string
): string {
  const filename = sanitizeFilename([subject.code, year ?? "unknown_year", session ?? "session", assetType], extension);
  return join(outDir, subject.folder, filename);
}

export function fillTemplate(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (token, name: string) =>
    Object.hasOwn(values, name) ? String(values[name]) : token
  );
}
