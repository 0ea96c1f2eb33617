/**
 * Change-only descriptor writes.
 */
import { readFileIfExists, writeFile } from '../../utils/file-system.js';

/**
 * Write `content` unless the file already holds exactly that text.
 * Returns whether the file was written.
 */
export async function writeIfChanged(filePath: string, content: string): Promise<boolean> {
  const current = await readFileIfExists(filePath);
  if (current === content) return false;
  await writeFile(filePath, content);
  return true;
}
