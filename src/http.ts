import type { HttpSettings } from "./types.js";
import { describeError, logger } from "./logger.js";

export class HttpStatusError extends Error {
  constructor(
    readonly url: string,
    readonly status: number
  ) {
    super(`HTTP ${status} for ${url}`);
    this.name = "HttpStatusError";
  }
}

/**
 * Thin wrapper over the global fetch that stamps every request with the
 * configured browser identity and bounds it with a timeout.
 */
export class HttpClient {
  constructor(private readonly settings: HttpSettings) {}

  /** Fetches a source page. Returns `null` on any HTTP or transport failure. */
  async getText(url: string): Promise<string | null> {
    return this.withTimeout(this.settings.pageTimeoutMs, async (signal) => {
      try {
        const response = await fetch(url, {
          headers: this.headers("text/html,application/xhtml+xml"),
          redirect: "follow",
          signal,
        });
        if (!response.ok) {
          logger.error("Page fetch failed", { url, status: response.status });
          return null;
        }
        return await response.text();
      } catch (error) {
        logger.error("Page fetch error", { url, error: describeError(error) });
        return null;
      }
    });
  }

  /** Metadata-only existence check; the body is never read. */
  async probe(url: string): Promise<boolean> {
    return this.withTimeout(this.settings.probeTimeoutMs, async (signal) => {
      try {
        const response = await fetch(url, {
          method: "HEAD",
          headers: this.headers("*/*"),
          redirect: "follow",
          signal,
        });
        return response.status === 200;
      } catch (error) {
        logger.debug("Probe error", { url, error: describeError(error) });
        return false;
      }
    });
  }

  /**
   * Opens a GET and hands the response to `consume`. The download timeout
   * covers the whole body, not just the headers.
   */
  async stream<T>(url: string, consume: (response: Response) => Promise<T>): Promise<T> {
    return this.withTimeout(this.settings.downloadTimeoutMs, async (signal) => {
      const response = await fetch(url, {
        headers: this.headers("application/pdf,application/octet-stream,*/*"),
        redirect: "follow",
        signal,
      });
      if (!response.ok) {
        await response.body?.cancel();
        throw new HttpStatusError(url, response.status);
      }
      return consume(response);
    });
  }

  private headers(accept: string): Record<string, string> {
    return {
      "User-Agent": this.settings.userAgent,
      Accept: accept,
    };
  }

  private async withTimeout<T>(timeoutMs: number, run: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      return await run(controller.signal);
    } finally {
      clearTimeout(timer);
    }
  }
}
