import { ExtractionError } from "../errors.js";
import { MESSAGES } from "../shared/contract.js";

/** Returns the text of each page, in page order. */
export type PdfPageReader = (bytes: Uint8Array) => Promise<string[]>;

export const readPdfPages: PdfPageReader = async (bytes) => {
  // pdf.js is large; only pay for it once a PDF actually arrives.
  const { extractText, getDocumentProxy } = await import("unpdf");
  const pdf = await getDocumentProxy(new Uint8Array(bytes));
  try {
    const { text } = await extractText(pdf, { mergePages: false });
    return text;
  } finally {
    await pdf.destroy();
  }
};

export const PAGE_SEPARATOR = "\n\n";

export async function extractPdfText(bytes: Uint8Array, readPages: PdfPageReader = readPdfPages): Promise<string> {
  let pages: string[];
  try {
    pages = await readPages(bytes);
  } catch (error) {
    throw new ExtractionError(MESSAGES.unreadable, { cause: error });
  }

  const text = pages
    .map((page) => page.trim())
    .filter(Boolean)
    .join(PAGE_SEPARATOR);

  if (!text) {
    throw new ExtractionError(MESSAGES.emptyText);
  }
  return text;
}
