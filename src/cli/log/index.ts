import { COLORS, RESET, type ColorKey } from "./constants";

function formatTimestamp(): string {
  return new Date().toISOString().slice(11, 19); // HH:MM:SS
}

function colorEnabled(): boolean {
  if (process.env.NO_COLOR !== undefined) return false;
  return Boolean(process.stdout.isTTY);
}

export function paint(text: string, colorKey: ColorKey): string {
  return colorEnabled() ? `${COLORS[colorKey]}${text}${RESET}` : text;
}

function write(message: string, colorKey?: ColorKey): void {
  const stamped = `[${formatTimestamp()}] ${message}`;
  const lines = stamped.split(/\r?\n/);
  const sink = colorKey === "error" ? console.error : console.log;
  for (const line of lines) {
    sink(colorKey ? paint(line, colorKey) : line);
  }
}

/**
 * Returns a chunk callback that prints each non-empty line of an external
 * command's output, prefixed with the command label.
 */
function stream(label: string, colorKey: ColorKey = "muted"): (chunk: string) => void {
  return (chunk: string) => {
    const lines = chunk.split(/\r?\n/).filter(Boolean);
    for (const line of lines) {
      console.log(paint(`[${label}] ${line}`, colorKey));
    }
  };
}

export const log = {
  info: (message: string) => write(message),
  success: (message: string) => write(message, "success"),
  warn: (message: string) => write(message, "warn"),
  error: (message: string) => write(message, "error"),
  stream,
};
