import { spawnSync } from "node:child_process";
import { closeSync, openSync } from "node:fs";

export interface CommandResult {
  status: number | null;
  error?: Error;
}

/** Runs a command with its stdout written to `stdoutPath`. */
export type CommandRunner = (
  command: string,
  args: string[],
  stdoutPath: string,
) => CommandResult;

export const spawnToFile: CommandRunner = (command, args, stdoutPath) => {
  const fd = openSync(stdoutPath, "w");
  try {
    const result = spawnSync(command, args, {
      stdio: ["ignore", fd, "ignore"],
      env: process.env,
    });
    return {
      status: result.status,
      error: result.error,
    };
  } finally {
    closeSync(fd);
  }
};

export function describeCommandFailure(
  command: string,
  args: string[],
  result: CommandResult,
): string | null {
  const invocation = `${command} ${args.join(" ")}`;
  if (result.error) {
    return `${invocation}: ${result.error.message}`;
  }
  if (result.status !== 0) {
    return `command failed (${result.status ?? "unknown"}): ${invocation}`;
  }
  return null;
}
