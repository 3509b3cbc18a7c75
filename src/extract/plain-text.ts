import { ExtractionError } from "../errors.js";
import { MESSAGES } from "../shared/contract.js";

export function decodePlainText(bytes: Uint8Array): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (error) {
    throw new ExtractionError(MESSAGES.unreadable, { cause: error });
  }
}
