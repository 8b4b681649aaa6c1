import { promises as fs } from 'node:fs';
import path from 'node:path';

/**
 * Write a file atomically (temp file + rename pattern).
 *
 * The temp file is created in the target's own directory so the rename never
 * crosses a filesystem boundary. A reader sees either the previous file or the
 * complete new one. The temp file is removed when the write fails.
 *
 * @param filePath - Destination file
 * @param content - Full file content
 */
export async function writeFileAtomic(
  filePath: string,
  content: string
): Promise<void> {
  const temporaryPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.tmp`
  );

  try {
    await fs.writeFile(temporaryPath, content, 'utf8');
    await fs.rename(temporaryPath, filePath);
  } catch (error) {
    await fs.rm(temporaryPath, { force: true });
    throw error;
  }
}

/**
 * Serialize a document the way every waymark state file is stored:
 * two-space indented JSON with a trailing newline.
 */
export function serializeDocument(document: unknown): string {
  return `${JSON.stringify(document, null, 2)}\n`;
}
