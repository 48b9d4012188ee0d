import { setTimeout as sleep } from "node:timers/promises";

export type FetchRetryOptions = {
  retries: number;
  baseDelayMs: number;
  timeoutMs: number;
  headers?: Readonly<Record<string, string>>;
  fetchImpl?: typeof fetch;
};

export type FetchJsonResult =
  | { ok: true; payload: unknown }
  | { ok: false; status: number | null; reason: string };

const parseRetryAfterMs = (value: string | null): number | null => {
  if (value === null) {
    return null;
  }

  const seconds = Number.parseInt(value, 10);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    return null;
  }

  return seconds * 1000;
};

const shouldRetryStatus = (status: number): boolean => status === 429 || status >= 500;

const describeRequestError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.name === "TimeoutError" ? "request timed out" : error.message;
  }

  return "request failed";
};

export const fetchJsonWithRetry = async (
  url: string,
  options: FetchRetryOptions,
): Promise<FetchJsonResult> => {
  const fetchImpl = options.fetchImpl ?? fetch;

  for (let attempt = 0; attempt <= options.retries; attempt += 1) {
    let response: Response;
    try {
      response = await fetchImpl(url, {
        headers: { ...options.headers },
        signal: AbortSignal.timeout(options.timeoutMs),
      });
    } catch (error) {
      return { ok: false, status: null, reason: describeRequestError(error) };
    }

    if (response.ok) {
      try {
        return { ok: true, payload: await response.json() };
      } catch {
        return { ok: false, status: response.status, reason: "response body is not valid JSON" };
      }
    }

    if (!shouldRetryStatus(response.status) || attempt === options.retries) {
      return { ok: false, status: response.status, reason: `HTTP ${response.status}` };
    }

    const retryAfterMs = parseRetryAfterMs(response.headers.get("retry-after"));
    const backoffMs = retryAfterMs ?? options.baseDelayMs * 2 ** attempt;
    await sleep(backoffMs);
  }

  return { ok: false, status: null, reason: "retries exhausted" };
};
