import { readFile } from "node:fs/promises";
import { ValidationError } from "../errors.js";
import { MESSAGES } from "../shared/contract.js";
import { extractPdfText, readPdfPages, type PdfPageReader } from "./pdf.js";
import { decodePlainText } from "./plain-text.js";

export interface DocumentExtractor {
  extract(bytes: Uint8Array, declaredType: string): Promise<string>;
  extractFile(filePath: string, declaredType: string): Promise<string>;
}

export interface DocumentTextExtractorOptions {
  readPdfPages?: PdfPageReader;
}

export class DocumentTextExtractor implements DocumentExtractor {
  private readonly readPdfPages: PdfPageReader;

  constructor(options: DocumentTextExtractorOptions = {}) {
    this.readPdfPages = options.readPdfPages ?? readPdfPages;
  }

  async extract(bytes: Uint8Array, declaredType: string): Promise<string> {
    switch (declaredType) {
      case "application/pdf":
        return extractPdfText(bytes, this.readPdfPages);
      case "text/plain":
        return decodePlainText(bytes);
      default:
        throw new ValidationError(MESSAGES.invalidType);
    }
  }

  async extractFile(filePath: string, declaredType: string): Promise<string> {
    const bytes = await readFile(filePath);
    return this.extract(bytes, declaredType);
  }
}
