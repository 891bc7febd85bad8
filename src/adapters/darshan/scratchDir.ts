import { mkdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

export function defaultScratchDir(): string {
  return join(tmpdir(), `darshan_parse_${process.pid}`);
}

/** Creates `dir`, runs `work`, then removes `dir` even when `work` threw. */
export async function withScratchDir<T>(
  dir: string,
  work: (dir: string) => Promise<T>,
): Promise<T> {
  await mkdir(dir, { recursive: true });
  try {
    return await work(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
