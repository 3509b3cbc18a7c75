import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { createServer, type AddressInfo, type Server } from "node:net";
import { runServe } from "../src/commands/serve.js";

const originalFetch = globalThis.fetch;

type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

let fetchMock: Mock<FetchFn>;
let occupied: Server;

function listen(server: Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      const address: AddressInfo | string | null = server.address();
      resolve(typeof address === "object" && address ? address.port : 0);
    });
  });
}

describe("runServe", () => {
  beforeEach(() => {
    fetchMock = vi.fn<FetchFn>(async () => Response.json({ done: true }));
    globalThis.fetch = fetchMock;
    occupied = createServer();
  });

  afterEach(async () => {
    globalThis.fetch = originalFetch;
    await new Promise<void>((resolve) => occupied.close(() => resolve()));
  });

  it("releases the summarizer when the port cannot be bound", async () => {
    const port = await listen(occupied);

    await expect(
      runServe(
        { port, host: "127.0.0.1", provider: "ollama" },
        { LOG_LEVEL: "silent", OLLAMA_BASE_URL: "http://ollama.test:11434", OLLAMA_MODEL: "llama3.2" },
      ),
    ).rejects.toMatchObject({ code: "EADDRINUSE" });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://ollama.test:11434/api/generate");
    expect(typeof init?.body === "string" ? JSON.parse(init.body) : undefined).toEqual({ model: "llama3.2", keep_alive: 0 });
  });
});
