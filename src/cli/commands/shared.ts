import type { Command } from "commander";
import { log } from "../log";
import { PostguideError, errorMessage } from "../../core/errors";

export type GlobalOptions = {
  config?: string;
};

export function globalOptions(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

/** Reports a command failure and sets the exit code; the process is left to exit on its own. */
export function reportFailure(error: unknown): void {
  if (error instanceof PostguideError) {
    log.error(error.message);
    process.exitCode = error.exitCode;
    return;
  }

  log.error(`Unexpected error: ${errorMessage(error)}`);
  if (error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exitCode = 1;
}
