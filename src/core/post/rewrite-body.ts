export type BodyRewriteRules = {
  rewriteImagePaths: boolean;
  imageDir: string;
  stripFirstLevelHeadings: boolean;
  linkCards: boolean;
  /** Lowercased shorthand → icon URL. */
  linkCardIcons: Record<string, string>;
};

type MapOutsideCodeOptions = {
  skipInlineCode?: boolean;
};

const FENCED_CODE = "~~~[\\s\\S]*?~~~|```[\\s\\S]*?```";
const INLINE_CODE = "`[^`]*`";

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Applies `transform` to every stretch of `content` outside fenced code
 * blocks (and inline code spans unless `skipInlineCode` is false). Code is
 * passed through untouched.
 */
export function mapOutsideCode(
  content: string,
  transform: (text: string) => string,
  options: MapOutsideCodeOptions = {}
): string {
  const { skipInlineCode = true } = options;
  const pattern = new RegExp(skipInlineCode ? `${FENCED_CODE}|${INLINE_CODE}` : FENCED_CODE, "g");

  const parts: string[] = [];
  let lastEnd = 0;

  for (const match of content.matchAll(pattern)) {
    const start = match.index ?? 0;
    if (start > lastEnd) {
      parts.push(transform(content.slice(lastEnd, start)));
    }
    parts.push(match[0]);
    lastEnd = start + match[0].length;
  }

  if (lastEnd < content.length) {
    parts.push(transform(content.slice(lastEnd)));
  }

  return parts.join("");
}

/**
 * Drops the image folder prefix from markdown image links and `<img src>`
 * attributes, since published assets sit directly in the post's asset folder.
 */
export function stripImageDir(content: string, imageDir = "img/"): string {
  const dir = escapeRegExp(imageDir);
  const markdownLink = new RegExp(`\\[(.*?)\\]\\(${dir}([^)]+)\\)`, "g");
  const htmlImg = new RegExp(`<img\\s+src=["']${dir}([^"']+)["']`, "g");

  return mapOutsideCode(content, (text) =>
    text
      .replace(markdownLink, (_match, alt: string, file: string) => `[${alt}](${file})`)
      .replace(htmlImg, (_match, file: string) => `<img src="${file}"`)
  );
}

/**
 * Removes `# Heading` lines; the generator renders the title from front
 * matter. A blank line directly after the heading goes with it.
 */
export function stripFirstLevelHeadings(content: string): string {
  return mapOutsideCode(
    content,
    (text) => text.replace(/^#[ \t]+[^\n]*(?:\n|$)(?:[ \t]*\n)?/gm, ""),
    { skipInlineCode: false }
  );
}

/**
 * Turns
 *
 *     <!-- github -->
 *     [Title](https://example.com)
 *
 * into `{% externalLinkCard "Title" "https://example.com" "<icon>" %}`. The
 * comment is either an icon URL or a shorthand from `icons`.
 */
export function linkCardsFromComments(content: string, icons: Record<string, string>): string {
  const lookup = new Map(
    Object.entries(icons).map(([name, url]) => [name.toLowerCase(), url] as const)
  );

  return content.replace(
    /<!--\s([^>]+?)\s-->\n\[(.*?)\]\((.*?)\)/gs,
    (_match, icon: string, title: string, url: string) => {
      const iconKey = icon.trim();
      const iconUrl = lookup.get(iconKey.toLowerCase()) ?? iconKey;
      return `{% externalLinkCard "${title.trim()}" "${url.trim()}" "${iconUrl}" %}`;
    }
  );
}

export function rewriteBody(body: string, rules: BodyRewriteRules): string {
  let result = body;
  if (rules.rewriteImagePaths) {
    result = stripImageDir(result, rules.imageDir);
  }
  if (rules.stripFirstLevelHeadings) {
    result = stripFirstLevelHeadings(result);
  }
  if (rules.linkCards) {
    result = linkCardsFromComments(result, rules.linkCardIcons);
  }
  return result;
}
