import { extname } from "node:path";

export function sanitizeFileName(input: string | undefined, fallback = "upload"): string {
  const trimmed = (input ?? "").trim();
  if (!trimmed) {
    return fallback;
  }

  const replaced = trimmed.replace(/[\\/]+/g, "-");
  const cleaned = replaced.replace(/[^a-zA-Z0-9._-]/g, "-");
  const collapsed = cleaned.replace(/-+/g, "-").replace(/^[-.]+|[-.]+$/g, "");

  return collapsed || fallback;
}

const EXTENSION_TO_MIME: Record<string, string> = {
  ".pdf": "application/pdf",
  ".txt": "text/plain",
};

export function mimeTypeForPath(filePath: string): string {
  return EXTENSION_TO_MIME[extname(filePath).toLowerCase()] ?? "application/octet-stream";
}
