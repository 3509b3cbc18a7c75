import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { DEFAULT_TIMEOUT_MS, SummarizeApiClient } from "../client/api.js";
import { apiUrlFromEnv } from "../config.js";
import { isAcceptedMimeType, MESSAGES } from "../shared/contract.js";
import { parseDuration } from "../utils/duration.js";
import { mimeTypeForPath } from "../utils/path.js";

export interface SummarizeCommandOptions {
  apiUrl?: string;
  type?: string;
  timeout?: string;
  fetch?: typeof fetch;
}

/** Sends a local file to a running service and returns the summary. */
export async function runSummarize(
  filePath: string,
  options: SummarizeCommandOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): Promise<string> {
  const mimeType = options.type?.trim() || mimeTypeForPath(filePath);
  if (!isAcceptedMimeType(mimeType)) {
    throw new Error(MESSAGES.invalidType);
  }

  const timeoutMs = options.timeout ? parseDuration(options.timeout, "--timeout") : DEFAULT_TIMEOUT_MS;
  const baseUrl = options.apiUrl?.trim() || apiUrlFromEnv(env);
  const bytes = await readFile(filePath);

  const client = new SummarizeApiClient({ baseUrl, timeoutMs, fetch: options.fetch });
  return client.summarizeDocument(new Blob([new Uint8Array(bytes)], { type: mimeType }), basename(filePath));
}
