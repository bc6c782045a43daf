import { access, mkdir, open, rename, rm } from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import { basename, dirname } from "node:path";
import type { LimitFunction } from "p-limit";
import type { Candidate, DownloadOutcome, DownloadRules, ReconciledMap } from "./types.js";
import type { HttpClient } from "./http.js";
import { HttpStatusError } from "./http.js";
import { describeError, logger } from "./logger.js";

const SESSION_ORDER: Record<string, number> = { Normale: 0, Rattrapage: 1 };
const TYPE_ORDER: Record<string, number> = { MainExam: 0, Correction: 1 };

// ASCII whitespace allowed before the signature.
const LEADING_WHITESPACE = new Set([0x20, 0x09, 0x0a, 0x0b, 0x0c, 0x0d]);

class SignatureMismatchError extends Error {
  constructor(readonly url: string) {
    super(`Downloaded content for ${url} does not carry the expected signature`);
    this.name = "SignatureMismatchError";
  }
}

class EmptyBodyError extends Error {
  constructor(readonly url: string) {
    super(`Empty response body for ${url}`);
    this.name = "EmptyBodyError";
  }
}

export interface MaterializeResult {
  accepted: Candidate[];
  outcomes: Map<string, DownloadOutcome>;
  downloaded: number;
  skipped: number;
  failed: number;
}

function numericYear(candidate: Candidate): number {
  return candidate.year && /^\d+$/.test(candidate.year) ? Number(candidate.year) : 0;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Subject, year, session, type, then file name. */
export function sortForDownload(candidates: Iterable<Candidate>): Candidate[] {
  return [...candidates].sort(
    (a, b) =>
      compareText(a.subjectCode, b.subjectCode) ||
      numericYear(a) - numericYear(b) ||
      (SESSION_ORDER[a.session ?? ""] ?? 99) - (SESSION_ORDER[b.session ?? ""] ?? 99) ||
      (TYPE_ORDER[a.assetType] ?? 99) - (TYPE_ORDER[b.assetType] ?? 99) ||
      compareText(basename(a.destinationPath), basename(b.destinationPath))
  );
}

/** True once the leading bytes (whitespace ignored) are known to start with the signature. */
export function matchesSignature(head: Uint8Array, signature: Uint8Array): boolean {
  let offset = 0;
  while (offset < head.length && LEADING_WHITESPACE.has(head[offset])) {
    offset++;
  }
  if (head.length - offset < signature.length) {
    return false;
  }
  return signature.every((byte, index) => head[offset + index] === byte);
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Streams the body into `<dest>.part`, checking the leading bytes against the
 * signature before the rest is accepted. The destination only ever appears
 * through the final rename.
 */
async function streamToFile(
  response: Response,
  url: string,
  partPath: string,
  rules: DownloadRules
): Promise<number> {
  const body = response.body;
  if (!body) {
    throw new EmptyBodyError(url);
  }
  const signature = new TextEncoder().encode(rules.signature);
  const sniffLimit = Math.max(rules.sniffBytes, signature.length);

  let file: FileHandle;
  try {
    file = await open(partPath, "w");
  } catch (error) {
    await cancelQuietly(() => body.cancel(), url);
    throw error;
  }
  const reader = body.getReader();
  let head: Uint8Array = new Uint8Array(0);
  let verified = false;
  let bytes = 0;

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }
      if (!value.length) {
        continue;
      }
      await file.write(value);
      bytes += value.length;
      if (!verified) {
        head = concat(head, value);
        if (matchesSignature(head, signature)) {
          verified = true;
        } else if (head.length >= sniffLimit || !couldStillMatch(head, signature)) {
          throw new SignatureMismatchError(url);
        }
      }
    }
  } catch (error) {
    // release the connection
    await cancelQuietly(() => reader.cancel(), url);
    throw error;
  } finally {
    await file.close();
  }

  if (bytes === 0) {
    throw new EmptyBodyError(url);
  }
  if (!verified) {
    throw new SignatureMismatchError(url);
  }
  return bytes;
}

async function cancelQuietly(cancel: () => Promise<void>, url: string): Promise<void> {
  try {
    await cancel();
  } catch (error) {
    logger.debug("Response body cancel failed", { url, error: describeError(error) });
  }
}

function warnOnContentType(response: Response, url: string, hint: string): void {
  const contentType = response.headers.get("Content-Type") ?? "";
  if (!contentType.toLowerCase().includes(hint.toLowerCase())) {
    logger.warn("Unexpected content-type", { url, contentType });
  }
}

// Whitespace-only heads, or heads that are a prefix of the signature, may
// still turn into a match once more bytes arrive.
function couldStillMatch(head: Uint8Array, signature: Uint8Array): boolean {
  let offset = 0;
  while (offset < head.length && LEADING_WHITESPACE.has(head[offset])) {
    offset++;
  }
  const rest = head.subarray(offset);
  return rest.length < signature.length && rest.every((byte, index) => signature[index] === byte);
}

function concat(a: Uint8Array, b: Uint8Array): Uint8Array {
  const out = new Uint8Array(a.length + b.length);
  out.set(a, 0);
  out.set(b, a.length);
  return out;
}

function failureReason(error: unknown): Extract<DownloadOutcome, { status: "failed" }>["reason"] {
  if (error instanceof SignatureMismatchError) {
    return "signature";
  }
  if (error instanceof EmptyBodyError) {
    return "empty";
  }
  if (error instanceof HttpStatusError) {
    return "http";
  }
  return "transport";
}

async function removePartial(partPath: string): Promise<void> {
  try {
    await rm(partPath, { force: true });
  } catch (error) {
    logger.warn("Could not remove partial file", { path: partPath, error: describeError(error) });
  }
}

export async function fetchAndValidate(
  candidate: Candidate,
  http: Pick<HttpClient, "stream">,
  rules: DownloadRules
): Promise<DownloadOutcome> {
  const destination = candidate.destinationPath;
  const name = basename(destination);
  if (await exists(destination)) {
    logger.info("Skipping existing file", { file: name });
    return { status: "skipped" };
  }

  const partPath = `${destination}.part`;
  try {
    await mkdir(dirname(destination), { recursive: true });
    const bytes = await http.stream(candidate.resourceUrl, (response) => {
      warnOnContentType(response, candidate.resourceUrl, rules.contentTypeHint);
      return streamToFile(response, candidate.resourceUrl, partPath, rules);
    });
    await rename(partPath, destination);
    logger.info("Downloaded", { file: name, bytes });
    return { status: "downloaded", bytes };
  } catch (error) {
    await removePartial(partPath);
    const reason = failureReason(error);
    logger.error(reason === "signature" ? "Downloaded content failed validation" : "Failed to download", {
      file: name,
      url: candidate.resourceUrl,
      reason,
      error: describeError(error),
    });
    return { status: "failed", reason, error: describeError(error) };
  }
}

/**
 * Downloads every reconciled candidate. Keys are unique, so destinations
 * are too, and each path has a single writer even when fanned out.
 */
export async function materialize(
  map: ReconciledMap,
  http: Pick<HttpClient, "stream">,
  rules: DownloadRules,
  limit: LimitFunction
): Promise<MaterializeResult> {
  const ordered = sortForDownload(map.values());
  const results = await Promise.all(
    ordered.map((candidate) => limit(() => fetchAndValidate(candidate, http, rules)))
  );

  const outcomes = new Map<string, DownloadOutcome>();
  const accepted: Candidate[] = [];
  const counts = { downloaded: 0, skipped: 0, failed: 0 };
  ordered.forEach((candidate, index) => {
    const outcome = results[index];
    outcomes.set(candidate.destinationPath, outcome);
    counts[outcome.status] += 1;
    if (outcome.status !== "failed") {
      accepted.push(candidate);
    }
  });

  return { accepted, outcomes, ...counts };
}
