import { MESSAGES } from "./shared/contract.js";

/** Base for failures whose message is safe to show to the user as-is. */
export class SummarizerAppError extends Error {
  readonly status: number;

  constructor(message: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
  }
}

export class ValidationError extends SummarizerAppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 400, options);
  }
}

export class ExtractionError extends SummarizerAppError {
  constructor(message: string = MESSAGES.unreadable, options?: { cause?: unknown }) {
    super(message, 422, options);
  }
}

export class SummarizationError extends SummarizerAppError {
  constructor(options?: { cause?: unknown }) {
    super(MESSAGES.summarizeFailed, 502, options);
  }
}

export function toErrorBody(error: unknown): { status: number; body: { error: string } } {
  if (error instanceof SummarizerAppError) {
    return { status: error.status, body: { error: error.message } };
  }
  return { status: 500, body: { error: MESSAGES.unexpected } };
}
