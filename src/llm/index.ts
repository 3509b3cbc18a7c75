import type { SummarizerConfig } from "../config.js";
import { DeepSeekClient } from "./deepseek.js";
import { HuggingFaceSummarizer } from "./huggingface.js";
import { OllamaClient } from "./ollama.js";
import type { Summarizer } from "./types.js";

export const SUMMARIZER_PROVIDERS = ["huggingface", "ollama", "deepseek"] as const;

export type SummarizerProvider = (typeof SUMMARIZER_PROVIDERS)[number];

export function isSummarizerProvider(value: string): value is SummarizerProvider {
  return SUMMARIZER_PROVIDERS.some((provider) => provider === value);
}

export function createSummarizer(config: SummarizerConfig): Summarizer {
  const { timeoutMs, length } = config;
  switch (config.provider) {
    case "huggingface":
      return new HuggingFaceSummarizer({
        apiToken: config.huggingface.apiToken,
        model: config.huggingface.model,
        baseUrl: config.huggingface.baseUrl,
        timeoutMs,
        length,
      });
    case "ollama":
      return new OllamaClient({
        model: config.ollama.model,
        baseUrl: config.ollama.baseUrl,
        timeoutMs,
        length,
      });
    case "deepseek":
      return new DeepSeekClient({
        apiKey: config.deepseek.apiKey,
        baseUrl: config.deepseek.baseUrl,
        timeoutMs,
        length,
      });
  }
}
