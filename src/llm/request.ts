export class ProviderTimeoutError extends Error {
  constructor(provider: string, timeoutMs: number) {
    super(`${provider} did not respond within ${timeoutMs}ms`);
    this.name = "ProviderTimeoutError";
  }
}

/**
 * POSTs JSON and returns the parsed body. Non-2xx responses throw with the
 * provider's response text; an expired timer aborts the request.
 */
export async function postJson(
  provider: string,
  url: string,
  payload: unknown,
  options: { timeoutMs: number; headers?: Record<string, string> },
): Promise<unknown> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetch(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
        ...options.headers,
      },
      body: JSON.stringify(payload),
      signal: controller.signal,
    });

    if (!response.ok) {
      const detail = await response.text();
      throw new Error(`${provider} error ${response.status}: ${detail}`);
    }

    const body: unknown = await response.json();
    return body;
  } catch (error) {
    if (controller.signal.aborted) {
      throw new ProviderTimeoutError(provider, options.timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
