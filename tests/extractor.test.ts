import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ExtractionError, ValidationError } from "../src/errors.js";
import { DocumentTextExtractor } from "../src/extract/extractor.js";
import { MESSAGES } from "../src/shared/contract.js";

const encode = (text: string) => new TextEncoder().encode(text);

/** Builds a minimal PDF with one Helvetica text line per page; "" gives a blank page. */
function buildPdf(pages: string[]): Uint8Array {
  const objects: string[] = [];
  const kids: string[] = [];
  objects[1] = "<< /Type /Catalog /Pages 2 0 R >>";
  objects[3] = "<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>";
  pages.forEach((text, index) => {
    const pageId = 4 + index * 2;
    const contentId = pageId + 1;
    const escaped = text.replace(/[\\()]/g, (char) => `\\${char}`);
    const stream = text ? `BT /F1 12 Tf 72 720 Td (${escaped}) Tj ET` : "";
    kids.push(`${pageId} 0 R`);
    objects[pageId] =
      `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Resources << /Font << /F1 3 0 R >> >> /Contents ${contentId} 0 R >>`;
    objects[contentId] = `<< /Length ${stream.length} >>\nstream\n${stream}\nendstream`;
  });
  objects[2] = `<< /Type /Pages /Kids [${kids.join(" ")}] /Count ${pages.length} >>`;

  let pdf = "%PDF-1.4\n";
  const offsets: number[] = [];
  for (let id = 1; id < objects.length; id += 1) {
    offsets[id] = pdf.length;
    pdf += `${id} 0 obj\n${objects[id]}\nendobj\n`;
  }
  const xrefOffset = pdf.length;
  pdf += `xref\n0 ${objects.length}\n0000000000 65535 f \n`;
  for (let id = 1; id < objects.length; id += 1) {
    pdf += `${String(offsets[id]).padStart(10, "0")} 00000 n \n`;
  }
  pdf += `trailer\n<< /Size ${objects.length} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;
  return encode(pdf);
}

describe("DocumentTextExtractor", () => {
  describe("plain text", () => {
    it("returns the decoded content unchanged", async () => {
      const text = "Hello world.\n  Ünïcode ✓ stays as-is, trailing space included  ";
      const extractor = new DocumentTextExtractor();

      await expect(extractor.extract(encode(text), "text/plain")).resolves.toBe(text);
    });

    it("rejects bytes that are not UTF-8", async () => {
      const extractor = new DocumentTextExtractor();

      const result = extractor.extract(new Uint8Array([0x48, 0xc3, 0x28]), "text/plain");

      await expect(result).rejects.toBeInstanceOf(ExtractionError);
      await expect(result).rejects.toThrow(MESSAGES.unreadable);
    });
  });

  describe("pdf", () => {
    it("joins page texts in page order and skips empty pages", async () => {
      const readPdfPages = vi.fn(async () => [" First page. ", "", "   ", "Second page.", "Third page."]);
      const extractor = new DocumentTextExtractor({ readPdfPages });

      const text = await extractor.extract(new Uint8Array([1]), "application/pdf");

      expect(text).toBe("First page.\n\nSecond page.\n\nThird page.");
      expect(readPdfPages).toHaveBeenCalledTimes(1);
    });

    it("fails when no page has text", async () => {
      const extractor = new DocumentTextExtractor({ readPdfPages: async () => ["", " \n "] });

      const result = extractor.extract(new Uint8Array([1]), "application/pdf");

      await expect(result).rejects.toBeInstanceOf(ExtractionError);
      await expect(result).rejects.toThrow(MESSAGES.emptyText);
    });

    it("wraps reader failures", async () => {
      const failure = new Error("bad xref table");
      const extractor = new DocumentTextExtractor({
        readPdfPages: async () => {
          throw failure;
        },
      });

      const error = await extractor.extract(new Uint8Array([1]), "application/pdf").catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ExtractionError);
      expect(error).toMatchObject({ message: MESSAGES.unreadable, status: 422, cause: failure });
    });

    it("reads a generated multi-page file through the bundled reader", async () => {
      const extractor = new DocumentTextExtractor();

      const text = await extractor.extract(buildPdf(["Alpha page.", "", "Gamma page."]), "application/pdf");

      expect(text).toBe("Alpha page.\n\nGamma page.");
    });

    it("rejects a generated file whose pages are all blank", async () => {
      const extractor = new DocumentTextExtractor();

      const result = extractor.extract(buildPdf(["", ""]), "application/pdf");

      await expect(result).rejects.toBeInstanceOf(ExtractionError);
      await expect(result).rejects.toThrow(MESSAGES.emptyText);
    });

    it("reports a corrupt file through the bundled reader", async () => {
      const extractor = new DocumentTextExtractor();

      await expect(extractor.extract(encode("%PDF-1.7 this is not really a pdf"), "application/pdf")).rejects.toBeInstanceOf(
        ExtractionError,
      );
    });
  });

  it("refuses other declared types", async () => {
    const extractor = new DocumentTextExtractor();

    await expect(extractor.extract(encode("x"), "image/png")).rejects.toBeInstanceOf(ValidationError);
  });

  describe("extractFile", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "extractor-test-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("reads the file from disk", async () => {
      const filePath = join(dir, "notes.txt");
      await writeFile(filePath, "Stored on disk.");

      await expect(new DocumentTextExtractor().extractFile(filePath, "text/plain")).resolves.toBe("Stored on disk.");
    });
  });
});
