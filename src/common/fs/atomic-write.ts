import { closeSync, fsyncSync, openSync, renameSync, rmSync, writeSync } from 'fs';
import { open, rename, rm } from 'fs/promises';

let tempCounter = 0;

function tempPathFor(target: string): string {
  tempCounter += 1;
  return `${target}.${process.pid}.${tempCounter}.tmp`;
}

/**
 * Writes `content` beside `target`, flushes it to disk and renames it over
 * `target`. Readers see either the old file or the new one, never a mix.
 */
export async function writeFileAtomic(target: string, content: string): Promise<void> {
  const tempPath = tempPathFor(target);
  try {
    const handle = await open(tempPath, 'w', 0o644);
    try {
      await handle.writeFile(content, 'utf8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tempPath, target);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

export function writeFileAtomicSync(target: string, content: string): void {
  const tempPath = tempPathFor(target);
  try {
    const fd = openSync(tempPath, 'w', 0o644);
    try {
      writeSync(fd, content, null, 'utf8');
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tempPath, target);
  } catch (error) {
    rmSync(tempPath, { force: true });
    throw error;
  }
}
