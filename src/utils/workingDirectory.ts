/**
 * Scoped working-directory changes.
 *
 * Sample setup and user checks may `chdir` into a checkout. Every attempt
 * runs inside `withRestoredWorkingDirectory` so the harness always returns
 * to where it started, including when the attempt throws.
 */

export async function withRestoredWorkingDirectory<T>(fn: () => Promise<T>): Promise<T> {
  const startDir = process.cwd();
  try {
    return await fn();
  } finally {
    if (process.cwd() !== startDir) {
      process.chdir(startDir);
    }
  }
}
