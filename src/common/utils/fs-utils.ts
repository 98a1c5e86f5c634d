import { promises as fs } from 'node:fs';
import * as path from 'node:path';

/**
 * Write a file so that readers see either the old or the new content,
 * never a partial write: the content goes to a temporary file in the same
 * directory, which is then renamed over the target.
 */
export async function writeFileAtomic(
  filePath: string,
  content: string,
): Promise<void> {
  const directory = path.dirname(filePath);
  const tempPath = path.join(
    directory,
    `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`,
  );

  await fs.mkdir(directory, { recursive: true });
  try {
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * True if the path exists and is readable
 */
export async function isReadable(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Node system errors carry a string `code` (ENOENT, EACCES, ...).
 * Checked by shape: errors raised inside Node's own realm fail `instanceof Error`
 * in sandboxed contexts such as Jest.
 */
export function isErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  );
}
