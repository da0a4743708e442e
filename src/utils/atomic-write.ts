import { open, rename, rm } from "node:fs/promises";

export function tempPathFor(filePath: string): string {
  return `${filePath}.tmp`;
}

/**
 * Replaces `filePath` with `data` so that a reader sees either the old or the
 * new content in full: write a sibling temp file, fsync it, then rename.
 * On failure the temp file is removed and the original is left untouched.
 */
export async function writeFileAtomic(filePath: string, data: string): Promise<void> {
  const tmpPath = tempPathFor(filePath);
  try {
    const handle = await open(tmpPath, "w");
    try {
      await handle.writeFile(data, "utf-8");
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tmpPath, filePath);
  } catch (err) {
    const cleanupError = await rm(tmpPath, { force: true }).then(
      () => undefined,
      (cleanupErr: unknown) => cleanupErr,
    );
    if (cleanupError !== undefined) {
      throw new AggregateError(
        [err, cleanupError],
        `Failed to write ${filePath} (temp file ${tmpPath} could not be removed)`,
      );
    }
    throw err;
  }
}
