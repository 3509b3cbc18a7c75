import { isAcceptedMimeType, MESSAGES } from "../shared/contract.js";

export interface SelectedDocument {
  name: string;
  type: string;
}

export interface ClientSummaryState<D extends SelectedDocument = SelectedDocument> {
  document: D | null;
  summary: string;
  error: string;
  isSummarizing: boolean;
}

export type SummaryEvent<D extends SelectedDocument = SelectedDocument> =
  | { type: "fileSelected"; file: D | null }
  | { type: "submitted" }
  | { type: "succeeded"; summary: string }
  | { type: "failed"; message: string };

export type SummaryPhase = "idle" | "ready" | "summarizing" | "result" | "error";

export type VisibleOutput = { kind: "none" } | { kind: "error"; message: string } | { kind: "summary"; text: string };

export function initialState<D extends SelectedDocument>(): ClientSummaryState<D> {
  return { document: null, summary: "", error: "", isSummarizing: false };
}

export function reduce<D extends SelectedDocument>(
  state: ClientSummaryState<D>,
  event: SummaryEvent<D>,
): ClientSummaryState<D> {
  switch (event.type) {
    case "fileSelected":
      // The document being summarized stays selected until its response arrives.
      if (state.isSummarizing) {
        return state;
      }
      // The previous summary stays put; it is only replaced by the next submission.
      if (event.file && isAcceptedMimeType(event.file.type)) {
        return { ...state, document: event.file, error: "" };
      }
      return { ...state, document: null, error: MESSAGES.invalidType };
    case "submitted":
      if (state.isSummarizing) {
        return state;
      }
      if (!state.document) {
        return { ...state, error: MESSAGES.noDocument };
      }
      return { ...state, summary: "", error: "", isSummarizing: true };
    case "succeeded":
      return { ...state, summary: event.summary || MESSAGES.noSummary, error: "", isSummarizing: false };
    case "failed":
      return { ...state, summary: "", error: event.message, isSummarizing: false };
  }
}

export function canSubmit(state: ClientSummaryState): boolean {
  return state.document !== null && !state.isSummarizing;
}

export function submitLabel(state: ClientSummaryState): string {
  return state.isSummarizing ? "Summarizing..." : "Summarize";
}

export function visibleOutput(state: ClientSummaryState): VisibleOutput {
  if (state.error) {
    return { kind: "error", message: state.error };
  }
  if (state.summary) {
    return { kind: "summary", text: state.summary };
  }
  return { kind: "none" };
}

export function phaseOf(state: ClientSummaryState): SummaryPhase {
  if (state.isSummarizing) {
    return "summarizing";
  }
  if (state.error) {
    return "error";
  }
  if (state.summary) {
    return "result";
  }
  return state.document ? "ready" : "idle";
}
