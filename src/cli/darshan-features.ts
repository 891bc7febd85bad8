#!/usr/bin/env node

import { processDarshanCorpus } from "../backends/index.js";
import { UsageError, parseRunArgs, usageLines } from "./args.js";

function printHelp(stream: NodeJS.WriteStream = process.stdout): void {
  stream.write(`${usageLines().join("\n")}\n`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp(process.stderr);
    process.exitCode = 2;
    return;
  }

  if (args[0] === "--help" || args[0] === "-h" || args.includes("--help")) {
    printHelp();
    return;
  }

  if (args[0] !== "run") {
    printHelp(process.stderr);
    process.exitCode = 2;
    return;
  }

  const options = parseRunArgs(args.slice(1));
  const result = await processDarshanCorpus({
    inputDir: options.inputDir,
    output: options.output,
    schemaPath: options.schemaPath,
    scratchDir: options.scratchDir,
    parserBin: options.parserBin,
    logMissing: options.logMissing,
    topMissing: options.topMissing,
  });

  console.log(JSON.stringify(result, null, 2));
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`${message}\n`);
  if (error instanceof UsageError) {
    printHelp(process.stderr);
  }
  process.exitCode = 2;
});
