import { isRecord, postJson } from "./request.js";
import type { SummaryLengthOptions, SummaryResult, Summarizer } from "./types.js";

export const DEFAULT_HF_MODEL = "facebook/bart-large-cnn";
export const DEFAULT_HF_BASE_URL = "https://router.huggingface.co/hf-inference/models";

export interface HuggingFaceClientOptions {
  apiToken: string;
  model?: string;
  baseUrl?: string;
  timeoutMs?: number;
  length?: SummaryLengthOptions;
}

/** Seq2seq summarization through the Hugging Face inference API (BART by default). */
export class HuggingFaceSummarizer implements Summarizer {
  readonly id = "huggingface";
  private readonly apiToken: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly length: SummaryLengthOptions;

  constructor(options: HuggingFaceClientOptions) {
    if (!options.apiToken?.trim()) {
      throw new Error("Hugging Face API token is required; set HF_API_TOKEN in .env");
    }
    this.apiToken = options.apiToken.trim();
    this.model = options.model?.trim() || DEFAULT_HF_MODEL;
    this.baseUrl = (options.baseUrl?.trim() || DEFAULT_HF_BASE_URL).replace(/\/$/, "");
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.length = options.length ?? { minLength: 30, maxLength: 130 };
  }

  async summarize(text: string): Promise<SummaryResult> {
    const payload = {
      inputs: text,
      parameters: {
        min_length: this.length.minLength,
        max_length: this.length.maxLength,
        do_sample: false,
      },
      options: { wait_for_model: true },
    };

    const data = await postJson("Hugging Face", `${this.baseUrl}/${this.model}`, payload, {
      timeoutMs: this.timeoutMs,
      headers: { Authorization: `Bearer ${this.apiToken}` },
    });

    if (isRecord(data) && typeof data.error === "string") {
      throw new Error(`Hugging Face error: ${data.error}`);
    }

    const first: unknown = Array.isArray(data) ? data[0] : data;
    const summary = isRecord(first) && typeof first.summary_text === "string" ? first.summary_text.trim() : "";
    return { summary, rawResponse: JSON.stringify(data) };
  }
}
