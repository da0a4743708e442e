import * as lockfile from "proper-lockfile";

export interface FileLockOptions {
  readonly retries?: number;
  readonly staleMs?: number;
}

/**
 * Runs `fn` while holding an advisory lock on `filePath`. The target file
 * does not need to exist; only its directory does.
 */
export async function withFileLock<T>(
  filePath: string,
  fn: () => T | Promise<T>,
  options: FileLockOptions = {},
): Promise<T> {
  let release: (() => Promise<void>) | undefined;
  try {
    release = await lockfile.lock(filePath, {
      retries: { retries: options.retries ?? 3, minTimeout: 100 },
      stale: options.staleMs ?? 10_000,
      realpath: false,
    });
    return await fn();
  } finally {
    await release?.();
  }
}
