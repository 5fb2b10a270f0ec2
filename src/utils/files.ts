import fs from "node:fs/promises";
import path from "node:path";
import { FileSystemError, isErrnoException } from "./errors.js";

/**
 * Read a UTF-8 file
 * @throws FileSystemError
 */
export async function readTextFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (isErrnoException(err)) {
      throw FileSystemError.fromNodeError(err, filePath, "read");
    }
    throw err;
  }
}

/**
 * Atomic save: write to a temp file beside the target, then rename over it.
 * Readers see either the previous file or the complete new one.
 */
export async function writeFileAtomic(filePath: string, data: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.tmp`;
  try {
    await fs.writeFile(tempPath, data, "utf-8");
    await fs.rename(tempPath, filePath);
  } catch (err) {
    await fs.rm(tempPath, { force: true });
    throw err;
  }
}
