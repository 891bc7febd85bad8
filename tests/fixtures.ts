import { readFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

export const TESTDATA_DIR = join(
  dirname(fileURLToPath(import.meta.url)),
  "..",
  "testdata",
);

export async function readFixture(...segments: string[]): Promise<string> {
  return readFile(join(TESTDATA_DIR, ...segments), "utf-8");
}
