import { tmpdir } from "node:os";
import { DEFAULT_HF_BASE_URL, DEFAULT_HF_MODEL } from "./llm/huggingface.js";
import { isSummarizerProvider, type SummarizerProvider } from "./llm/index.js";
import type { SummaryLengthOptions } from "./llm/types.js";
import { parseDuration } from "./utils/duration.js";
import { isLogLevel, type LogLevel } from "./utils/log.js";

export interface SummarizerConfig {
  provider: SummarizerProvider;
  timeoutMs: number;
  length: SummaryLengthOptions;
  huggingface: { apiToken: string; model: string; baseUrl: string };
  ollama: { baseUrl: string; model: string };
  deepseek: { apiKey: string; baseUrl: string };
}

export interface ServerConfig {
  host: string;
  port: number;
  corsOrigin: string;
  maxUploadMb: number;
  tempDir: string;
  maxInputChars: number;
  publicApiBaseUrl: string;
}

export interface AppConfig {
  server: ServerConfig;
  summarizer: SummarizerConfig;
  apiUrl: string;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
  const provider = (env.SUMMARIZER_PROVIDER ?? "huggingface").trim().toLowerCase();
  if (!isSummarizerProvider(provider)) {
    throw new Error(`Invalid SUMMARIZER_PROVIDER value: ${provider}. Allowed: huggingface, ollama, deepseek.`);
  }

  const minLength = intFromEnv(env.SUMMARY_MIN_LENGTH, 30, 1);
  const maxLength = Math.max(minLength, intFromEnv(env.SUMMARY_MAX_LENGTH, 130, 1));
  const logLevel = (env.LOG_LEVEL ?? "info").trim().toLowerCase();

  return {
    server: {
      host: stringFromEnv(env.HOST, "127.0.0.1"),
      port: intFromEnv(env.PORT, 5000, 0),
      corsOrigin: stringFromEnv(env.CORS_ORIGIN, "*"),
      maxUploadMb: numberFromEnv(env.MAX_UPLOAD_MB, 10),
      tempDir: stringFromEnv(env.UPLOAD_TEMP_DIR, tmpdir()),
      maxInputChars: intFromEnv(env.MAX_INPUT_CHARS, 1024, 1),
      publicApiBaseUrl: (env.PUBLIC_API_BASE_URL ?? "").trim().replace(/\/$/, ""),
    },
    summarizer: {
      provider,
      timeoutMs: env.SUMMARIZER_TIMEOUT?.trim()
        ? parseDuration(env.SUMMARIZER_TIMEOUT, "SUMMARIZER_TIMEOUT")
        : 60_000,
      length: { minLength, maxLength },
      huggingface: {
        apiToken: (env.HF_API_TOKEN ?? "").trim(),
        model: stringFromEnv(env.HF_MODEL, DEFAULT_HF_MODEL),
        baseUrl: stringFromEnv(env.HF_BASE_URL, DEFAULT_HF_BASE_URL),
      },
      ollama: {
        baseUrl: stringFromEnv(env.OLLAMA_BASE_URL, "http://127.0.0.1:11434"),
        model: stringFromEnv(env.OLLAMA_MODEL, "llama3.2"),
      },
      deepseek: {
        apiKey: (env.DEEPSEEK_API_KEY ?? "").trim(),
        baseUrl: stringFromEnv(env.DEEPSEEK_BASE_URL, "https://api.deepseek.com"),
      },
    },
    apiUrl: apiUrlFromEnv(env),
    logLevel: isLogLevel(logLevel) ? logLevel : "info",
  };
}

/** The service URL the CLI client talks to; needs none of the server settings. */
export function apiUrlFromEnv(env: Env = process.env): string {
  return stringFromEnv(env.SUMMARIZER_API_URL, "http://127.0.0.1:5000");
}

function stringFromEnv(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : fallback;
}

function numberFromEnv(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function intFromEnv(value: string | undefined, fallback: number, min: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
}
