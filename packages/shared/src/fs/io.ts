import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir as ensureDirectory } from 'fs-extra';

export async function ensureDir(filePath: string): Promise<void> {
  await ensureDirectory(dirname(filePath));
}

/** Appends `text` to `filePath`, creating the file and its directory on first use. */
export async function appendText(filePath: string, text: string): Promise<void> {
  await ensureDir(filePath);
  await fs.appendFile(filePath, text, 'utf8');
}

/**
 * Replaces `filePath` with `content` through a rename, so readers see either the old
 * file or the new one. The temporary file is removed if the rename fails.
 */
export async function atomicWrite(filePath: string, content: string | Buffer): Promise<void> {
  await ensureDir(filePath);
  const tempPath = await tmpName({ dir: dirname(filePath), prefix: '.rebisect-', postfix: '.tmp' });
  await fs.writeFile(tempPath, content);
  try {
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
