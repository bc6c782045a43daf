import type { ExtractionRules } from "./types.js";

type UrlRules = Pick<ExtractionRules, "documentExtension" | "redirect" | "cloudStorage">;

const FETCHABLE_PROTOCOLS = new Set(["http:", "https:"]);

/**
 * Turns an anchor href into a directly fetchable resource URL.
 *
 * Download-helper links (`.../telecharger?url=<encoded>`) are unwrapped, and
 * cloud-storage share pages (`/file/d/<id>/view`) are rewritten to the
 * provider's direct-download endpoint. Returns `null` when the href cannot be
 * parsed.
 */
export function normalizeResourceUrl(href: string, pageUrl: string, rules: UrlRules): string | null {
  const absolute = parseUrl(href, pageUrl);
  if (!absolute) {
    return null;
  }

  if (absolute.pathname.includes(rules.redirect.pathMarker)) {
    const target = absolute.searchParams.get(rules.redirect.param);
    if (target) {
      const decoded = safeDecode(target);
      const unwrapped = decoded === null ? null : parseUrl(decoded, pageUrl);
      return unwrapped ? unwrapped.toString() : null;
    }
  }

  if (rules.cloudStorage.hosts.includes(absolute.hostname.toLowerCase())) {
    const fileId = cloudFileId(absolute.pathname);
    if (fileId) {
      return rules.cloudStorage.directDownload.replace("{id}", encodeURIComponent(fileId));
    }
  }

  return absolute.toString();
}

export function isAcceptedResource(url: string, rules: UrlRules): boolean {
  const parsed = parseUrl(url);
  if (!parsed || !FETCHABLE_PROTOCOLS.has(parsed.protocol)) {
    return false;
  }
  if (rules.cloudStorage.hosts.includes(parsed.hostname.toLowerCase())) {
    return true;
  }
  return parsed.pathname.toLowerCase().endsWith(rules.documentExtension.toLowerCase());
}

export function hostOf(url: string): string {
  return parseUrl(url)?.hostname.toLowerCase() ?? "";
}

/** Percent-encodes a filename the way it must appear in a URL path. */
export function quotePathSegment(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

function cloudFileId(pathname: string): string | null {
  const parts = pathname.split("/").filter(Boolean);
  const fileIndex = parts.indexOf("file");
  if (fileIndex === -1 || parts[fileIndex + 1] !== "d") {
    return null;
  }
  return parts[fileIndex + 2] ?? null;
}

function parseUrl(value: string, base?: string): URL | null {
  try {
    return new URL(value, base);
  } catch {
    return null;
  }
}

function safeDecode(value: string): string | null {
  try {
    return decodeURIComponent(value);
  } catch {
    return null;
  }
}
