import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { sanitizeFileName } from "./path.js";

/**
 * Writes `bytes` into a fresh directory under `root` and hands the file path to
 * `fn`. The directory is removed once `fn` settles, whether it resolved or threw.
 */
export async function withTempFile<T>(
  root: string,
  fileName: string | undefined,
  bytes: Uint8Array,
  fn: (filePath: string) => Promise<T>,
): Promise<T> {
  await mkdir(root, { recursive: true });
  const dir = await mkdtemp(join(root, "docsum-"));
  try {
    const filePath = join(dir, sanitizeFileName(fileName));
    await writeFile(filePath, bytes);
    return await fn(filePath);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
