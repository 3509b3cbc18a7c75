// Loaded by the browser bundle as well as the server: keep this file free of imports.

export const UPLOAD_FIELD = "file";

export const ACCEPTED_MIME_TYPES = ["application/pdf", "text/plain"] as const;

export type AcceptedMimeType = (typeof ACCEPTED_MIME_TYPES)[number];

export function isAcceptedMimeType(value: string | undefined | null): value is AcceptedMimeType {
  return ACCEPTED_MIME_TYPES.some((type) => type === value);
}

export const MESSAGES = {
  invalidType: "Please upload a valid PDF or TXT file.",
  noDocument: "Please upload a document.",
  noFileUploaded: "No file uploaded.",
  unexpectedFiles: 'Please upload exactly one file in the "file" field.',
  emptyText: "No text could be extracted from the file.",
  unreadable: "The file could not be read. It may be corrupt or not valid UTF-8 text.",
  summarizeFailed: "Failed to summarize the document. Please try again.",
  unexpected: "An error occurred while processing the file.",
  timeout: "The request timed out. Please try again.",
  noSummary: "No summary available.",
} as const;

export function fileTooLargeMessage(limitMb: number): string {
  return `The file is too large. The limit is ${limitMb} MB.`;
}

export interface SummarizeSuccessBody {
  summary: string;
}

export interface SummarizeErrorBody {
  error: string;
}
