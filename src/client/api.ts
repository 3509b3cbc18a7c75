import { MESSAGES, UPLOAD_FIELD } from "../shared/contract.js";

export const DEFAULT_TIMEOUT_MS = 30_000;

/** The message is always safe to show to the user. */
export class SummarizeRequestError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SummarizeRequestError";
    this.status = status;
  }
}

export class TimeoutError extends SummarizeRequestError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(MESSAGES.timeout, null);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export interface SummarizeApiClientOptions {
  /** Service origin, e.g. `http://127.0.0.1:5000`; empty means same origin. */
  baseUrl: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

export class SummarizeApiClient {
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: SummarizeApiClientOptions) {
    this.endpoint = `${options.baseUrl.trim().replace(/\/$/, "")}/summarize`;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    // Wrapped so browsers see `fetch` called on the window, not on this client.
    this.fetchImpl = options.fetch ?? ((input: RequestInfo | URL, init?: RequestInit) => fetch(input, init));
  }

  /**
   * One attempt, no retries. A timeout only stops the wait here; the server
   * may still finish the work.
   */
  async summarizeDocument(file: Blob, fileName: string): Promise<string> {
    const form = new FormData();
    form.append(UPLOAD_FIELD, file, fileName);

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    let body: unknown;
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: "POST",
        body: form,
        signal: controller.signal,
      });
      body = await readJson(response);
    } catch (error) {
      if (controller.signal.aborted) {
        throw new TimeoutError(this.timeoutMs);
      }
      throw new SummarizeRequestError(MESSAGES.summarizeFailed, null, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      const message = readString(body, "error") ?? MESSAGES.summarizeFailed;
      throw new SummarizeRequestError(message, response.status);
    }
    return readString(body, "summary") || MESSAGES.noSummary;
  }
}

async function readJson(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return null;
  }
}

function readString(body: unknown, key: string): string | undefined {
  if (typeof body !== "object" || body === null || !(key in body)) {
    return undefined;
  }
  const value: unknown = Reflect.get(body, key);
  return typeof value === "string" ? value : undefined;
}
