import { isRecord, postJson } from "./request.js";
import type { SummaryLengthOptions, SummaryResult, Summarizer } from "./types.js";

export interface DeepSeekClientOptions {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  timeoutMs?: number;
  length?: SummaryLengthOptions;
}

export class DeepSeekClient implements Summarizer {
  readonly id = "deepseek";
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxWords: number;

  constructor(options: DeepSeekClientOptions) {
    if (!options.apiKey?.trim()) {
      throw new Error("DeepSeek API key is required; set DEEPSEEK_API_KEY in .env");
    }
    this.apiKey = options.apiKey.trim();
    this.model = options.model?.trim() || "deepseek-chat";
    this.baseUrl = (options.baseUrl?.trim() || "https://api.deepseek.com").replace(/\/$/, "");
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.maxWords = options.length?.maxLength ?? 130;
  }

  async summarize(text: string): Promise<SummaryResult> {
    const systemPrompt = [
      "You write abstractive summaries of documents.",
      `Summarize the user's document in plain prose, at most ${this.maxWords} words.`,
      "Rules:",
      "- Use new sentences; do not copy long passages verbatim.",
      "- No headings, lists or preamble. Output the summary only.",
    ].join("\n\n");

    const payload = {
      model: this.model,
      messages: [
        { role: "system", content: systemPrompt },
        { role: "user", content: text.trim() },
      ],
      max_tokens: Math.ceil(this.maxWords * 2),
      temperature: 0,
      stream: false,
    } as const;

    const data = await postJson("DeepSeek", `${this.baseUrl}/chat/completions`, payload, {
      timeoutMs: this.timeoutMs,
      headers: { Authorization: `Bearer ${this.apiKey}` },
    });

    if (isRecord(data) && isRecord(data.error) && typeof data.error.message === "string") {
      throw new Error(`DeepSeek error: ${data.error.message}`);
    }
    const raw = readContent(data);
    return { summary: raw, rawResponse: raw };
  }
}

function readContent(data: unknown): string {
  if (!isRecord(data) || !Array.isArray(data.choices)) {
    return "";
  }
  const first: unknown = data.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) {
    return "";
  }
  const content = first.message.content;
  return typeof content === "string" ? content.trim() : "";
}
