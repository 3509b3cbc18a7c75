import { describe, expect, it, vi } from "vitest";
import { SummarizeApiClient, SummarizeRequestError, TimeoutError } from "../src/client/api.js";
import { MESSAGES } from "../src/shared/contract.js";

function respond(status: number, body: string): typeof fetch {
  return vi.fn(async () => new Response(body, { status, headers: { "Content-Type": "application/json" } }));
}

const file = () => new Blob(["Hello world."], { type: "text/plain" });

describe("SummarizeApiClient", () => {
  it("posts the file as multipart form data", async () => {
    const fetchImpl = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      Response.json({ summary: "Short." }),
    );
    const client = new SummarizeApiClient({ baseUrl: "http://summarizer.test/", fetch: fetchImpl });

    const summary = await client.summarizeDocument(file(), "notes.txt");

    expect(summary).toBe("Short.");
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe("http://summarizer.test/summarize");
    expect(init?.method).toBe("POST");
    const form = init?.body;
    expect(form).toBeInstanceOf(FormData);
    if (form instanceof FormData) {
      const part = form.get("file");
      expect(part).toBeInstanceOf(Blob);
      expect(part instanceof File ? part.name : undefined).toBe("notes.txt");
    }
  });

  it("uses a relative endpoint when no base URL is configured", async () => {
    const fetchImpl = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      Response.json({ summary: "ok" }),
    );
    const client = new SummarizeApiClient({ baseUrl: "", fetch: fetchImpl });

    await client.summarizeDocument(file(), "notes.txt");

    expect(fetchImpl.mock.calls[0][0]).toBe("/summarize");
  });

  it("surfaces the server's error message", async () => {
    const client = new SummarizeApiClient({
      baseUrl: "http://summarizer.test",
      fetch: respond(422, JSON.stringify({ error: MESSAGES.emptyText })),
    });

    const error = await client.summarizeDocument(file(), "empty.txt").catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SummarizeRequestError);
    expect(error).toMatchObject({ message: MESSAGES.emptyText, status: 422 });
  });

  it("falls back to a generic message when the error body is unusable", async () => {
    const client = new SummarizeApiClient({
      baseUrl: "http://summarizer.test",
      fetch: respond(500, "<html>Internal Server Error</html>"),
    });

    await expect(client.summarizeDocument(file(), "notes.txt")).rejects.toMatchObject({
      message: "Failed to summarize the document. Please try again.",
      status: 500,
    });
  });

  it("reports network failures with the generic message", async () => {
    const client = new SummarizeApiClient({
      baseUrl: "http://summarizer.test",
      fetch: async () => {
        throw new TypeError("fetch failed");
      },
    });

    await expect(client.summarizeDocument(file(), "notes.txt")).rejects.toMatchObject({
      message: MESSAGES.summarizeFailed,
      status: null,
    });
  });

  it("replaces an empty summary with the fallback marker", async () => {
    const client = new SummarizeApiClient({
      baseUrl: "http://summarizer.test",
      fetch: respond(200, JSON.stringify({ summary: "" })),
    });

    await expect(client.summarizeDocument(file(), "notes.txt")).resolves.toBe("No summary available.");
  });

  it("gives up after the timeout", async () => {
    const hanging: typeof fetch = (_input, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new DOMException("aborted", "AbortError")));
      });
    const client = new SummarizeApiClient({ baseUrl: "http://summarizer.test", timeoutMs: 20, fetch: hanging });

    const error = await client.summarizeDocument(file(), "notes.txt").catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ message: MESSAGES.timeout, timeoutMs: 20 });
  });
});
