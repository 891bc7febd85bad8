import type { Dirent } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";

export const TRACE_FILE_EXTENSION = ".darshan";

async function isLinkedFile(entry: Dirent, path: string): Promise<boolean> {
  if (!entry.isSymbolicLink()) {
    return false;
  }
  const target = await stat(path).catch(() => null);
  return target !== null && !target.isDirectory();
}

/**
 * Recursively lists files ending in `extension`, in directory-listing order.
 * Symlinked files are listed; symlinked directories are not followed.
 * Unreadable directories and dangling links are passed over.
 */
export async function findTraceFiles(
  inputDir: string,
  extension: string = TRACE_FILE_EXTENSION,
): Promise<string[]> {
  const output: string[] = [];

  async function walk(currentPath: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(currentPath, { withFileTypes: true });
    } catch {
      return;
    }

    for (const entry of entries) {
      const absolutePath = join(currentPath, entry.name);
      if (entry.isDirectory()) {
        await walk(absolutePath);
        continue;
      }

      if (!entry.name.endsWith(extension)) {
        continue;
      }

      if (entry.isFile() || (await isLinkedFile(entry, absolutePath))) {
        output.push(absolutePath);
      }
    }
  }

  await walk(inputDir);
  return output;
}
