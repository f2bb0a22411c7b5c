const STDERR_TAIL_CHARS = 2000;

function tail(text: string, maxChars = STDERR_TAIL_CHARS): string {
  if (text.length <= maxChars) return text;
  return text.slice(-maxChars);
}

export class PostguideError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "PostguideError";
    this.exitCode = exitCode;
  }
}

export class ValidationError extends PostguideError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class ConfigError extends PostguideError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class ExternalToolError extends PostguideError {
  readonly command: string;
  readonly code: number;
  readonly stderr: string;

  constructor(command: string, code: number, reason: string, stderr = "") {
    super(`${command} failed (exit ${code}): ${reason}`, code === 0 ? 1 : code);
    this.name = "ExternalToolError";
    this.command = command;
    this.code = code;
    this.stderr = tail(stderr);
  }
}

export class FilesystemError extends PostguideError {
  readonly path: string;

  constructor(message: string, filePath: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : "";
    super(`${message} (${filePath})${detail}`, 1, cause);
    this.name = "FilesystemError";
    this.path = filePath;
  }
}

export class ParseError extends PostguideError {
  readonly file: string;
  readonly reason: string;

  constructor(file: string, reason: string) {
    super(`Could not parse ${file}: ${reason}`);
    this.name = "ParseError";
    this.file = file;
    this.reason = reason;
  }
}

export class PortInUseError extends PostguideError {
  readonly host: string;
  readonly port: number;

  constructor(host: string, port: number) {
    super(`Port ${port} on ${host} is already in use.`);
    this.name = "PortInUseError";
    this.host = host;
    this.port = port;
  }
}

export class DraftBatchError extends PostguideError {
  readonly created: string[];
  readonly failedTitle: string;

  constructor(failedTitle: string, created: string[], cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const done = created.length > 0 ? ` Created before the failure: ${created.join(", ")}.` : "";
    super(
      `Draft "${failedTitle}" failed: ${reason}${done}`,
      cause instanceof PostguideError ? cause.exitCode : 1,
      cause
    );
    this.name = "DraftBatchError";
    this.failedTitle = failedTitle;
    this.created = created;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
