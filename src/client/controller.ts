import { MESSAGES } from "../shared/contract.js";
import { SummarizeRequestError, type SummarizeApiClient } from "./api.js";
import { initialState, reduce, type ClientSummaryState, type SummaryEvent } from "./state.js";

export type UploadFile = Blob & { name: string; type: string };

type Listener<F extends UploadFile> = (state: ClientSummaryState<F>) => void;

type SummarizeClient = Pick<SummarizeApiClient, "summarizeDocument">;

export class SummaryController<F extends UploadFile = File> {
  private state: ClientSummaryState<F> = initialState<F>();
  private readonly listeners = new Set<Listener<F>>();
  private readonly client: SummarizeClient;

  constructor(client: SummarizeClient) {
    this.client = client;
  }

  getState(): ClientSummaryState<F> {
    return this.state;
  }

  subscribe(listener: Listener<F>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  selectFile(file: F | null): void {
    this.dispatch({ type: "fileSelected", file });
  }

  /** Resolves once the response (or failure) has been applied. Ignored while a request is in flight. */
  async submit(): Promise<void> {
    if (this.state.isSummarizing) {
      return;
    }
    this.dispatch({ type: "submitted" });
    const { document, isSummarizing } = this.getState();
    if (!isSummarizing || !document) {
      return;
    }

    try {
      const summary = await this.client.summarizeDocument(document, document.name);
      this.dispatch({ type: "succeeded", summary });
    } catch (error) {
      const message = error instanceof SummarizeRequestError ? error.message : MESSAGES.summarizeFailed;
      this.dispatch({ type: "failed", message });
    }
  }

  private dispatch(event: SummaryEvent<F>): void {
    const next = reduce(this.state, event);
    if (next === this.state) {
      return;
    }
    this.state = next;
    for (const listener of this.listeners) {
      listener(next);
    }
  }
}
