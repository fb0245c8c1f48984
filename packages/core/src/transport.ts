import http from "node:http";
import https from "node:https";

/** Reports whether a dev server answered at `url`. */
export type ProbeFn = (url: string) => Promise<boolean>;

/** Downloads `url` as text; rejects on transport failure or an error status. */
export type FetchTextFn = (url: string) => Promise<string>;

export const DEFAULT_PROBE_TIMEOUT_MS = 500;
export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;

export interface HttpTextResponse {
  status: number;
  body: string;
}

/**
 * Single GET with no retries. Rejects when the socket errors or the whole
 * exchange, body included, takes longer than `timeoutMs`.
 */
export function httpGet(url: string, timeoutMs: number): Promise<HttpTextResponse> {
  return new Promise<HttpTextResponse>((resolve, reject) => {
    let target: URL;
    try {
      target = new URL(url);
    } catch (error) {
      reject(error);
      return;
    }

    if (target.protocol !== "http:" && target.protocol !== "https:") {
      reject(new Error(`Unsupported protocol ${target.protocol} in ${url}`));
      return;
    }

    const lib = target.protocol === "https:" ? https : http;
    const fail = (error: Error) => {
      clearTimeout(deadline);
      reject(error);
    };

    const req = lib.get(target, (res) => {
      const chunks: Buffer[] = [];
      res.on("data", (chunk: Buffer) => chunks.push(chunk));
      res.on("end", () => {
        clearTimeout(deadline);
        resolve({
          status: res.statusCode ?? 0,
          body: Buffer.concat(chunks).toString("utf-8"),
        });
      });
      res.on("error", fail);
    });
    req.on("error", fail);

    // Caps the whole request; a server trickling bytes never resets it.
    const deadline = setTimeout(() => {
      fail(new Error(`GET ${url} timed out after ${timeoutMs} ms`));
      req.destroy();
    }, timeoutMs);
  });
}

/**
 * Probe for a running Vite dev server. Vite answers its root with 404 when
 * no index.html is served, so only that status counts as "up"; any other
 * status, connection error or timeout means it is not.
 */
export function createHttpProbe(timeoutMs: number = DEFAULT_PROBE_TIMEOUT_MS): ProbeFn {
  return async (url) => {
    try {
      const res = await httpGet(url, timeoutMs);
      return res.status === 404;
    } catch {
      return false;
    }
  };
}

export function createHttpFetcher(timeoutMs: number = DEFAULT_FETCH_TIMEOUT_MS): FetchTextFn {
  return async (url) => {
    const res = await httpGet(url, timeoutMs);
    if (res.status >= 400) {
      throw new Error(`GET ${url} responded with status ${res.status}`);
    }
    return res.body;
  };
}
