import { spawn } from "child_process";

type Stream = "stdout" | "stderr";

export type CommandResult = {
  ok: boolean;
  stdout: string;
  stderr: string;
  code: number;
};

export type RunCommandOptions = {
  env?: NodeJS.ProcessEnv;
  onStdout?: (chunk: string) => void;
  onStderr?: (chunk: string) => void;
};

/** Anything that can run a shell command line; tests pass a fake. */
export type CommandRunner = (
  cmd: string,
  cwd: string,
  options?: RunCommandOptions
) => Promise<CommandResult>;

async function runSingleCommand(
  cmd: string,
  cwd: string,
  options: RunCommandOptions = {}
): Promise<CommandResult> {
  return new Promise<CommandResult>((resolve) => {
    const child = spawn(cmd, {
      cwd,
      env: { ...process.env, ...(options.env ?? {}) },
      shell: true,
    });

    let stdout = "";
    let stderr = "";

    const handleStream = (stream: Stream, chunk: Buffer | string): void => {
      const text = chunk.toString();
      if (stream === "stdout") {
        stdout += text;
        options.onStdout?.(text);
      } else {
        stderr += text;
        options.onStderr?.(text);
      }
    };

    child.stdout?.on("data", (data: Buffer) => handleStream("stdout", data));
    child.stderr?.on("data", (data: Buffer) => handleStream("stderr", data));

    child.on("error", (err: Error) => {
      resolve({
        ok: false,
        stdout,
        stderr: `${stderr}${err.message}`,
        code: 1,
      });
    });

    child.on("close", (code) => {
      const exitCode = typeof code === "number" ? code : 1;
      resolve({
        ok: exitCode === 0,
        stdout,
        stderr,
        code: exitCode,
      });
    });
  });
}

export const runCommand: CommandRunner = (cmd, cwd, options = {}) =>
  runSingleCommand(cmd, cwd, options);

export function quotePosix(value: string): string {
  if (value.length === 0) return "''";
  return `'${value.replace(/'/g, "'\"'\"'")}'`;
}

export function quoteWindows(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

const SAFE_ARG = /^[A-Za-z0-9_\-./:=@%+,]+$/;

/** Quotes one argument for the shell `spawn(..., { shell: true })` uses. */
export function quoteArg(value: string, platform: NodeJS.Platform = process.platform): string {
  if (SAFE_ARG.test(value)) return value;
  return platform === "win32" ? quoteWindows(value) : quotePosix(value);
}
