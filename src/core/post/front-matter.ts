import { ParseError } from "../errors";

const DELIMITER = "---";
const KEY_LINE = /^([A-Za-z0-9_-]+):(?:[ \t]+(.*?))?[ \t]*$/;
const CONTINUATION_LINE = /^(?:[ \t]+\S|-(?:[ \t]|$))/;
const DATE_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/i;
const ZONE_PATTERN = /^([+-])(\d{2}):?(\d{2})$/;
const NEEDS_QUOTES =
  /^[\s\-?:,[\]{}#&*!|>'"%@`]|[:#](?:\s|$)|\s$|^(?:true|false|yes|no|null|~|[-+]?\d[\d._]*)$/i;

export type FrontMatterScalar = string | boolean | number | Date;

export type FrontMatterEntry = {
  key: string;
  /** Inline value after `key:`, unquoted. Empty when the value is a block. */
  value: string;
  /** Indented or list lines that follow the key. */
  block: string[];
};

type StoredEntry = {
  key: string;
  inline: string;
  /** Original header line; null once the entry has been rewritten. */
  raw: string | null;
  continuation: string[];
};

export type PostDocument = {
  frontMatter: FrontMatter;
  body: string;
};

function pad(n: number): string {
  return n.toString().padStart(2, "0");
}

/** Formats a date the way the generator writes it: `YYYY-MM-DD HH:mm:ss`, local time. */
export function formatDate(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/** Minutes east of UTC for `Z`, `+08:00` or `-0500`. */
function zoneOffsetMinutes(zone: string): number {
  const match = ZONE_PATTERN.exec(zone);
  if (!match) return 0;
  const [, sign, hours, minutes] = match;
  const offset = Number(hours) * 60 + Number(minutes);
  return sign === "-" ? -offset : offset;
}

/**
 * Parses `YYYY-MM-DD[ HH:mm[:ss]]` (or with `T`). Without a zone the value is
 * local time; with `Z` or an offset it names that instant.
 */
export function parseDate(text: string): Date | null {
  const match = DATE_PATTERN.exec(text.trim());
  if (!match) return null;

  const [, y, mo, d, h = "0", mi = "0", s = "0", zone] = match;
  const year = Number(y);
  const month = Number(mo) - 1;
  const day = Number(d);

  // Reject rollovers such as 2024-02-31.
  const calendar = new Date(Date.UTC(year, month, day, Number(h), Number(mi), Number(s)));
  if (calendar.getUTCMonth() !== month || calendar.getUTCDate() !== day) {
    return null;
  }

  if (zone) {
    return new Date(calendar.getTime() - zoneOffsetMinutes(zone) * 60_000);
  }
  return new Date(year, month, day, Number(h), Number(mi), Number(s));
}

function unquote(text: string): string {
  if (text.length >= 2 && text.startsWith('"') && text.endsWith('"')) {
    try {
      const parsed: unknown = JSON.parse(text);
      if (typeof parsed === "string") return parsed;
    } catch {
      return text.slice(1, -1);
    }
  }
  if (text.length >= 2 && text.startsWith("'") && text.endsWith("'")) {
    return text.slice(1, -1).replace(/''/g, "'");
  }
  return text;
}

function formatScalar(value: FrontMatterScalar): string {
  if (value instanceof Date) return formatDate(value);
  if (typeof value === "boolean" || typeof value === "number") return String(value);
  if (value.length > 0 && NEEDS_QUOTES.test(value)) return JSON.stringify(value);
  return value;
}

export class FrontMatter {
  private readonly leading: string[];
  private readonly items: StoredEntry[];
  private readonly source: string;

  private constructor(items: StoredEntry[], leading: string[], source: string) {
    this.items = items;
    this.leading = leading;
    this.source = source;
  }

  static parseBlock(lines: string[], source: string): FrontMatter {
    const leading: string[] = [];
    const items: StoredEntry[] = [];
    const seen = new Set<string>();

    lines.forEach((line, index) => {
      const lineNo = index + 2; // the opening delimiter is line 1
      const current = items[items.length - 1];

      if (line.trim() === "") {
        if (current) current.continuation.push(line);
        else leading.push(line);
        return;
      }

      if (CONTINUATION_LINE.test(line)) {
        if (!current) {
          throw new ParseError(source, `line ${lineNo} is indented but no key precedes it`);
        }
        current.continuation.push(line);
        return;
      }

      if (line.trimStart().startsWith("#")) {
        if (current) current.continuation.push(line);
        else leading.push(line);
        return;
      }

      const match = KEY_LINE.exec(line);
      if (!match) {
        throw new ParseError(source, `line ${lineNo} is not a "key: value" pair`);
      }

      const key = match[1];
      if (seen.has(key)) {
        throw new ParseError(source, `key "${key}" appears more than once`);
      }
      seen.add(key);
      items.push({ key, inline: match[2] ?? "", raw: line, continuation: [] });
    });

    return new FrontMatter(items, leading, source);
  }

  has(key: string): boolean {
    return this.items.some((item) => item.key === key);
  }

  keys(): string[] {
    return this.items.map((item) => item.key);
  }

  entries(): FrontMatterEntry[] {
    return this.items.map((item) => ({
      key: item.key,
      value: unquote(item.inline),
      block: item.continuation.filter((line) => line.trim() !== ""),
    }));
  }

  getString(key: string): string | undefined {
    const item = this.find(key);
    return item ? unquote(item.inline) : undefined;
  }

  getBoolean(key: string): boolean | undefined {
    const text = this.getString(key);
    if (text === undefined || text === "") return undefined;
    const lowered = text.toLowerCase();
    if (lowered === "true" || lowered === "yes") return true;
    if (lowered === "false" || lowered === "no") return false;
    throw new ParseError(this.source, `"${key}" must be true or false, got "${text}"`);
  }

  getDate(key: string): Date | undefined {
    const text = this.getString(key);
    if (text === undefined || text === "") return undefined;
    const date = parseDate(text);
    if (!date) {
      throw new ParseError(this.source, `"${key}" is not a date: "${text}"`);
    }
    return date;
  }

  /** Replaces the value in place, or appends the key when it is absent. */
  set(key: string, value: FrontMatterScalar): void {
    const inline = formatScalar(value);
    const item = this.find(key);
    if (!item) {
      this.items.push({ key, inline, raw: null, continuation: [] });
      return;
    }
    if (item.raw !== null && item.inline === inline && item.continuation.every(isBlank)) {
      return;
    }
    item.inline = inline;
    item.raw = null;
    item.continuation = item.continuation.filter(isBlank);
  }

  remove(key: string): boolean {
    const index = this.items.findIndex((item) => item.key === key);
    if (index < 0) return false;
    this.items.splice(index, 1);
    return true;
  }

  toLines(): string[] {
    const lines = [...this.leading];
    for (const item of this.items) {
      lines.push(item.raw ?? (item.inline ? `${item.key}: ${item.inline}` : `${item.key}:`));
      lines.push(...item.continuation);
    }
    return lines;
  }

  private find(key: string): StoredEntry | undefined {
    return this.items.find((item) => item.key === key);
  }
}

function isBlank(line: string): boolean {
  return line.trim() === "";
}

/**
 * Splits a post into its front matter and body. The document must open with
 * a `---` line and the block ends at the next `---` line.
 */
export function parseDocument(text: string, source = "post"): PostDocument {
  const lines = text.replace(/\r\n/g, "\n").split("\n");

  if (lines[0].trimEnd() !== DELIMITER) {
    throw new ParseError(source, "front matter must start with a --- line");
  }

  const close = lines.findIndex((line, index) => index > 0 && line.trimEnd() === DELIMITER);
  if (close < 0) {
    throw new ParseError(source, "front matter is not closed by a --- line");
  }

  const frontMatter = FrontMatter.parseBlock(lines.slice(1, close), source);
  const rest = lines.slice(close + 1);

  return {
    frontMatter,
    body: rest.length === 0 ? "" : rest.join("\n"),
  };
}

export function serializeDocument(doc: PostDocument): string {
  const block = doc.frontMatter
    .toLines()
    .map((line) => `${line}\n`)
    .join("");
  return `${DELIMITER}\n${block}${DELIMITER}\n${doc.body}`;
}
