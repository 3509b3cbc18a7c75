import { isRecord, postJson } from "./request.js";
import type { SummaryLengthOptions, SummaryResult, Summarizer } from "./types.js";

export interface OllamaClientOptions {
  model: string;
  baseUrl?: string;
  timeoutMs?: number;
  length?: SummaryLengthOptions;
}

export class OllamaClient implements Summarizer {
  readonly id = "ollama";
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxWords: number;

  constructor(options: OllamaClientOptions) {
    if (!options.model.trim()) {
      throw new Error("Ollama model is required; set OLLAMA_MODEL in .env");
    }
    this.model = options.model.trim();
    this.baseUrl = (options.baseUrl?.trim() || "http://127.0.0.1:11434").replace(/\/$/, "");
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.maxWords = options.length?.maxLength ?? 130;
  }

  async summarize(text: string): Promise<SummaryResult> {
    const data = await postJson(
      "Ollama",
      `${this.baseUrl}/api/generate`,
      {
        model: this.model,
        system: `Summarize the document you are given in plain prose, at most ${this.maxWords} words. Output the summary only.`,
        prompt: text.trim(),
        stream: false,
        options: { temperature: 0 },
      },
      { timeoutMs: this.timeoutMs },
    );

    if (isRecord(data) && typeof data.error === "string") {
      throw new Error(`Ollama error: ${data.error}`);
    }
    const raw = isRecord(data) && typeof data.response === "string" ? data.response : "";
    return { summary: stripThinking(raw), rawResponse: raw };
  }

  /** Asks the server to drop the model from memory. */
  async close(): Promise<void> {
    await postJson(
      "Ollama",
      `${this.baseUrl}/api/generate`,
      { model: this.model, keep_alive: 0 },
      { timeoutMs: this.timeoutMs },
    );
  }
}

// Reasoning models (deepseek-r1 and friends) prefix their answer with a <think> block.
function stripThinking(raw: string): string {
  return raw.replace(/<think>[\s\S]*?<\/think>/g, "").trim();
}
