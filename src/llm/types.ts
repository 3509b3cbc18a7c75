export interface SummaryResult {
  summary: string;
  rawResponse: string;
}

export interface SummaryLengthOptions {
  minLength: number;
  maxLength: number;
}

/**
 * A loaded model behind a single call. One instance is created at startup and
 * shared by every request; implementations must not keep per-request state.
 */
export interface Summarizer {
  readonly id: string;
  summarize(text: string): Promise<SummaryResult>;
  close?(): Promise<void>;
}
