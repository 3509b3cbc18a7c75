import { ExtractionError, SummarizationError, ValidationError } from "../errors.js";
import type { DocumentExtractor } from "../extract/extractor.js";
import type { Summarizer } from "../llm/types.js";
import { isAcceptedMimeType, MESSAGES } from "../shared/contract.js";
import { formatDuration } from "../utils/duration.js";
import type { Logger } from "../utils/log.js";
import { withTempFile } from "../utils/temp.js";
import { clip, truncate } from "../utils/text.js";

export interface UploadedDocument {
  bytes: Uint8Array;
  mimeType: string;
  fileName: string;
}

export interface SummarizeDeps {
  extractor: DocumentExtractor;
  summarizer: Summarizer;
  tempDir: string;
  maxInputChars: number;
  logger: Logger;
}

export async function handleSummarizeRequest(
  upload: UploadedDocument | undefined,
  deps: SummarizeDeps,
): Promise<string> {
  const document = validateUpload(upload);
  const { logger } = deps;
  const startedAt = Date.now();

  const extracted = await withTempFile(deps.tempDir, document.fileName, document.bytes, (filePath) =>
    deps.extractor.extractFile(filePath, document.mimeType),
  );

  const trimmed = extracted.trim();
  if (!trimmed) {
    throw new ExtractionError(MESSAGES.emptyText);
  }

  const input = clip(trimmed, deps.maxInputChars);
  if (input.clipped) {
    logger.info(`input truncated from ${trimmed.length} to ${deps.maxInputChars} characters`, {
      file: document.fileName,
    });
  }
  logger.debug(`summarizing "${truncate(input.text, 80)}"`);

  let summary: string;
  try {
    const result = await deps.summarizer.summarize(input.text);
    summary = result.summary.trim();
  } catch (error) {
    throw new SummarizationError({ cause: error });
  }

  logger.info(`summarized ${document.fileName} in ${formatDuration(Date.now() - startedAt)}`, {
    provider: deps.summarizer.id,
    inputChars: input.text.length,
    summaryChars: summary.length,
  });

  if (!summary) {
    logger.warn(`${deps.summarizer.id} returned an empty summary for ${document.fileName}`);
    return MESSAGES.noSummary;
  }
  return summary;
}

function validateUpload(upload: UploadedDocument | undefined): UploadedDocument {
  if (!upload) {
    throw new ValidationError(MESSAGES.noFileUploaded);
  }
  if (!isAcceptedMimeType(upload.mimeType)) {
    throw new ValidationError(MESSAGES.invalidType);
  }
  return upload;
}
