import path from "node:path";
import { constants as fsConstants, promises as fs } from "node:fs";
import { USER_CONFIG_FILE } from "../../core/config-loader";
import { errorMessage } from "../../core/errors";
import { isNotFound } from "../../utils/fs";
import { log } from "../log";

type InitOptions = {
  force?: boolean;
  cwd?: string;
};

export function getDefaultConfigPath(): string {
  return path.resolve(__dirname, "..", "..", "..", "config.default.json");
}

export async function runInitCommand(options: InitOptions = {}): Promise<void> {
  const cwd = options.cwd ?? process.cwd();
  const sourcePath = getDefaultConfigPath();
  const targetPath = path.resolve(cwd, USER_CONFIG_FILE);
  const copyMode = options.force ? 0 : fsConstants.COPYFILE_EXCL;

  try {
    await fs.copyFile(sourcePath, targetPath, copyMode);
    log.success(`Created ${targetPath}`);
  } catch (error) {
    process.exitCode = 1;

    if (error instanceof Error && "code" in error && error.code === "EEXIST") {
      log.error(`${USER_CONFIG_FILE} already exists at ${targetPath}. Use --force to overwrite.`);
      return;
    }

    if (isNotFound(error)) {
      log.error(`Could not find the default config at ${sourcePath}. Is postguide installed correctly?`);
      return;
    }

    log.error(`Failed to create ${USER_CONFIG_FILE}: ${errorMessage(error)}`);
  }
}
