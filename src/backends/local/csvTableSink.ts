import { once } from "node:events";
import { createWriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import type { Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { stringify } from "csv-stringify";
import type { FeatureTableSink } from "../../core/interfaces.js";

/**
 * Streams CSV records into `destination`: the header first, then one record
 * per `writeRow`. `close` resolves once the destination has flushed.
 */
export function createCsvTableSink(
  destination: Writable,
  header: readonly string[],
): FeatureTableSink {
  const stringifier = stringify();
  let failure: unknown = null;
  const completion = pipeline(stringifier, destination);
  void completion.catch((error: unknown) => {
    failure = error;
  });

  async function write(record: Array<string | number>): Promise<void> {
    if (failure !== null) {
      throw failure;
    }
    if (!stringifier.write(record)) {
      await once(stringifier, "drain");
    }
  }

  stringifier.write([...header]);

  return {
    async writeRow(row) {
      await write([...row]);
    },
    async close() {
      stringifier.end();
      await completion;
    },
  };
}

export async function openFileFeatureTableSink(
  path: string,
  header: readonly string[],
): Promise<FeatureTableSink> {
  await mkdir(dirname(path), { recursive: true });
  const stream = createWriteStream(path, { encoding: "utf-8" });
  return createCsvTableSink(stream, header);
}
