import fetch from "node-fetch";
import type { Response } from "node-fetch";
import http from "http";
import https from "https";
import { NetworkError, errorMessage } from "../errors.js";

export interface HtmlClient {
  getText(url: string): Promise<string>;
}

export type HtmlClientOptions = {
  timeoutMs: number;
  userAgent?: string | null;
};

const DEFAULT_HEADERS = {
  "Accept": "text/html,application/xhtml+xml",
  "Accept-Language": "en-US,en;q=0.9",
};

/**
 * One keep-alive agent pair per client, so the directory page and every
 * profile page share pooled connections. No retries: a failed request
 * surfaces as a NetworkError.
 */
export function createHtmlClient(opts: HtmlClientOptions): HtmlClient & { close(): void } {
  const httpAgent = new http.Agent({ keepAlive: true });
  const httpsAgent = new https.Agent({ keepAlive: true });
  const agent = (parsed: URL) => (parsed.protocol === "http:" ? httpAgent : httpsAgent);
  const headers: Record<string, string> = opts.userAgent
    ? { ...DEFAULT_HEADERS, "User-Agent": opts.userAgent }
    : { ...DEFAULT_HEADERS };

  async function send(url: string): Promise<Response> {
    try {
      return await fetch(url, { headers, agent, signal: AbortSignal.timeout(opts.timeoutMs) });
    } catch (e) {
      throw new NetworkError(`GET ${url} failed: ${errorMessage(e)}`, { url, cause: e });
    }
  }

  return {
    async getText(url: string): Promise<string> {
      const res = await send(url);
      if (!res.ok) throw new NetworkError(`GET ${url} -> ${res.status}`, { url, status: res.status });
      try {
        return await res.text();
      } catch (e) {
        throw new NetworkError(`GET ${url} body unreadable: ${errorMessage(e)}`, { url, status: res.status, cause: e });
      }
    },
    close() {
      httpAgent.destroy();
      httpsAgent.destroy();
    },
  };
}
