import fs from "node:fs";
import path from "node:path";

export interface AtomicWriteOptions {
  tempSuffix?: string;
}

/**
 * Writes to a sibling temp file, flushes it, then renames it over the target.
 * Readers see either the previous content or the new content, never a mix.
 */
export async function writeFileAtomic(filePath: string, data: string | Uint8Array, options: AtomicWriteOptions = {}): Promise<void> {
  const targetPath = path.resolve(filePath);
  const tempPath = `${targetPath}${options.tempSuffix ?? ".tmp"}`;
  await fs.promises.mkdir(path.dirname(targetPath), { recursive: true });

  try {
    const handle = await fs.promises.open(tempPath, "w");
    try {
      await handle.writeFile(data);
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.promises.rename(tempPath, targetPath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
}
