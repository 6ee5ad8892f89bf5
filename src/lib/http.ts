import { fetch, type Dispatcher } from "undici";
import { logger as rootLogger, type Logger } from "./logger.js";

export type HttpOpts = {
  headers?: Record<string, string>;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
  logger?: Logger;
};

export class HttpStatusError extends Error {
  readonly status: number;
  readonly url: string;
  readonly body: string;

  constructor(url: string, status: number, body: string) {
    super(`HTTP ${status}: ${body.slice(0, 200)}`);
    this.name = "HttpStatusError";
    this.url = url;
    this.status = status;
    this.body = body;
  }
}

export class HttpBodyError extends Error {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    super(`Malformed JSON body from ${url}`, { cause });
    this.name = "HttpBodyError";
    this.url = url;
  }
}

/**
 * Single GET returning parsed JSON. Non-2xx responses throw HttpStatusError;
 * network failures and timeouts reject with undici's own error.
 * No retries: callers own retry policy.
 */
export async function httpGetJson(url: string, opts: HttpOpts = {}): Promise<unknown> {
  const { headers = {}, timeoutMs = 15000, dispatcher, logger = rootLogger } = opts;
  const started = Date.now();
  const res = await fetch(url, {
    headers: { Accept: "application/json", ...headers },
    signal: AbortSignal.timeout(timeoutMs),
    dispatcher,
  });
  logger.debug({ url, status: res.status, ms: Date.now() - started }, "HTTP GET");

  if (res.status < 200 || res.status >= 300) {
    const txt = await res.text().catch(() => "");
    throw new HttpStatusError(url, res.status, txt);
  }
  const txt = await res.text();
  try {
    const data: unknown = JSON.parse(txt);
    return data;
  } catch (err) {
    throw new HttpBodyError(url, err);
  }
}
