import path from "path";
import { promises as fs } from "fs";
import { log, paint } from "../../cli/log";
import type { PostguideConfig } from "../config-loader";
import {
  DraftBatchError,
  ExternalToolError,
  FilesystemError,
  ValidationError,
  errorMessage,
} from "../errors";
import { parseDocument, serializeDocument } from "../post/front-matter";
import { Generator } from "../site/generator";
import { deriveSlug } from "../utils/slug";
import type { CommandRunner } from "../utils/run-commands";
import {
  isDirectory,
  isNotFound,
  movePath,
  pathExists,
  readTextFile,
  writeFileAtomic,
} from "../../utils/fs";

export type DraftStoreDeps = {
  runner?: CommandRunner;
  now?: () => Date;
};

export type CreatedDraft = {
  title: string;
  slug: string;
  /** The draft's markdown file. */
  file: string;
};

export type DraftBatchResult = {
  created: CreatedDraft[];
};

/** A draft on disk: `<drafts>/<slug>/<slug>.md` with an optional image folder. */
export type DraftEntry = {
  slug: string;
  dir: string;
  file: string;
  assetsDir: string;
};

export type DraftListing = {
  drafts: DraftEntry[];
  /** Folders under the draft location that hold no `<name>.md`. */
  skipped: string[];
};

function pad(n: number): string {
  return n.toString().padStart(2, "0");
}

export function coverPath(date: Date, slug: string): string {
  return `${date.getFullYear()}/${pad(date.getMonth() + 1)}/${slug}/cover.jpg`;
}

export class DraftStore {
  private readonly config: PostguideConfig;
  private readonly generator: Generator;
  private readonly now: () => Date;

  constructor(config: PostguideConfig, deps: DraftStoreDeps = {}) {
    this.config = config;
    this.generator = new Generator(config, deps.runner);
    this.now = deps.now ?? (() => new Date());
  }

  draftDir(slug: string): string {
    return path.join(this.config.paths.drafts, slug);
  }

  draftFile(slug: string): string {
    return path.join(this.draftDir(slug), `${slug}.md`);
  }

  imageDir(slug: string): string {
    const folder = this.config.finalize.imageDir.replace(/\/+$/, "") || "img";
    return path.join(this.draftDir(slug), folder);
  }

  /**
   * Creates one draft per title, in order. Stops at the first failure; the
   * thrown DraftBatchError lists the drafts that were already created.
   */
  async createDrafts(titles: string[]): Promise<DraftBatchResult> {
    if (titles.length === 0) {
      throw new ValidationError("Give at least one title.");
    }
    for (const title of titles) {
      if (title.trim().length === 0) {
        throw new ValidationError("Titles must not be empty.");
      }
      deriveSlug(title);
    }

    const created: CreatedDraft[] = [];
    for (const title of titles) {
      try {
        created.push(await this.createDraft(title));
      } catch (error) {
        throw new DraftBatchError(
          title,
          created.map((draft) => draft.slug),
          error
        );
      }
    }
    return { created };
  }

  async createDraft(title: string): Promise<CreatedDraft> {
    const { slug, warnings } = deriveSlug(title);
    log.info(`Title: ${title}`);
    log.info(`Slug:  ${slug}`);
    warnings.forEach((warning) => log.warn(warning));

    const targetDir = this.draftDir(slug);
    if (await pathExists(targetDir)) {
      throw new FilesystemError("Draft already exists", targetDir);
    }

    await this.generator.newPost(slug);

    const generated = path.join(this.config.paths.posts, `${slug}.md`);
    if (!(await pathExists(generated))) {
      throw new ExternalToolError(
        `${this.config.generator.command} new`,
        0,
        `expected ${generated} to be created`
      );
    }

    const file = this.draftFile(slug);
    try {
      await fs.mkdir(targetDir, { recursive: true });
      await movePath(generated, file);
    } catch (error) {
      await this.discardGenerated(slug, targetDir);
      throw new FilesystemError("Could not move the new post into the draft folder", generated, error);
    }

    const generatedAssets = path.join(this.config.paths.posts, slug);
    if (await isDirectory(generatedAssets)) {
      try {
        await fs.rm(generatedAssets, { recursive: true, force: true });
      } catch (error) {
        throw new FilesystemError("Could not remove the generated asset folder", generatedAssets, error);
      }
    }

    await this.prepareFrontMatter(file, title, slug);

    log.success(`Draft ${paint(title, "accent")} created at ${paint(targetDir, "path")}.`);
    return { title, slug, file };
  }

  /**
   * Lists drafts directly under the draft location. Dot-prefixed folders are
   * working files of an interrupted finalize and are ignored.
   */
  async list(): Promise<DraftListing> {
    let names: string[];
    try {
      const dirents = await fs.readdir(this.config.paths.drafts, { withFileTypes: true });
      names = dirents
        .filter((dirent) => dirent.isDirectory() && !dirent.name.startsWith("."))
        .map((dirent) => dirent.name)
        .sort();
    } catch (error) {
      if (isNotFound(error)) {
        return { drafts: [], skipped: [] };
      }
      throw new FilesystemError("Could not read the draft folder", this.config.paths.drafts, error);
    }

    const drafts: DraftEntry[] = [];
    const skipped: string[] = [];
    for (const slug of names) {
      const file = this.draftFile(slug);
      if (await pathExists(file)) {
        drafts.push({ slug, dir: this.draftDir(slug), file, assetsDir: this.imageDir(slug) });
      } else {
        skipped.push(slug);
      }
    }
    return { drafts, skipped };
  }

  /**
   * Undoes a half-finished create: the generator's output leaves the posts
   * folder and the draft folder made for it is removed, so the title can be
   * retried.
   */
  private async discardGenerated(slug: string, targetDir: string): Promise<void> {
    const leftovers = [
      path.join(this.config.paths.posts, `${slug}.md`),
      path.join(this.config.paths.posts, slug),
      targetDir,
    ];
    for (const target of leftovers) {
      try {
        await fs.rm(target, { recursive: true, force: true });
      } catch (error) {
        log.warn(`Could not remove ${target}; delete it before retrying: ${errorMessage(error)}`);
      }
    }
  }

  private async prepareFrontMatter(file: string, title: string, slug: string): Promise<void> {
    let text: string;
    try {
      text = await readTextFile(file);
    } catch (error) {
      throw new FilesystemError("Could not read the new draft", file, error);
    }

    const doc = parseDocument(text, file);
    const { frontMatter } = doc;

    frontMatter.set("title", title);
    if (frontMatter.has("cover")) {
      const date = frontMatter.getDate("date") ?? this.now();
      frontMatter.set("cover", coverPath(date, slug));
    }
    frontMatter.set("draft", true);

    try {
      await writeFileAtomic(file, serializeDocument(doc));
    } catch (error) {
      throw new FilesystemError("Could not write the draft's front matter", file, error);
    }
  }
}
