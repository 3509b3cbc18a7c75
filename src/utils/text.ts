export function escapeHtml(input: string): string {
  return input
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** Hard cut for model input. Unlike `truncate`, adds nothing to the text. */
export function clip(text: string, max: number): { text: string; clipped: boolean } {
  if (text.length <= max) {
    return { text, clipped: false };
  }
  let end = Math.max(0, max);
  // Never split a surrogate pair.
  if (end > 0 && isHighSurrogate(text.charCodeAt(end - 1))) {
    end -= 1;
  }
  return { text: text.slice(0, end), clipped: true };
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

export function truncate(text: string, max = 180): string {
  if (text.length <= max) {
    return text;
  }
  return `${text.slice(0, Math.max(0, max - 1))}…`;
}
