import { promises as fs } from 'fs';
import { join } from 'path';

/**
 * Runs `work` inside a freshly created directory under `root` and removes the
 * directory recursively once `work` settles, whatever the outcome.
 *
 * The directory name is `<label>-XXXXXX`, unique even when the same label is
 * seen twice. A failed removal is reported through `onCleanupError` and never
 * replaces the result or error of `work`.
 */
export async function withScratchDirectory<T>(
  root: string,
  label: string,
  work: (directory: string) => Promise<T>,
  onCleanupError: (error: unknown, directory: string) => void,
): Promise<T> {
  await fs.mkdir(root, { recursive: true });
  const directory = await fs.mkdtemp(join(root, `${sanitizeLabel(label)}-`));

  try {
    return await work(directory);
  } finally {
    try {
      await fs.rm(directory, { recursive: true, force: true });
    } catch (error) {
      onCleanupError(error, directory);
    }
  }
}

function sanitizeLabel(label: string): string {
  const safe = label.replace(/[^A-Za-z0-9._-]/g, '_');
  return safe.length > 0 ? safe : 'request';
}
