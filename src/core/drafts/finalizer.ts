import path from "path";
import { promises as fs } from "fs";
import { log, paint } from "../../cli/log";
import type { PostguideConfig } from "../config-loader";
import { FilesystemError, PostguideError, errorMessage } from "../errors";
import { parseDocument, serializeDocument } from "../post/front-matter";
import { rewriteBody, type BodyRewriteRules } from "../post/rewrite-body";
import { isDirectory, pathExists, readTextFile } from "../../utils/fs";
import { DraftStore, type DraftEntry } from "./draft-store";

export type FinalizerDeps = {
  now?: () => Date;
};

export type FinalizedPost = {
  slug: string;
  /** Published markdown file. */
  file: string;
  /** Published asset folder. */
  assetsDir: string;
};

export type FailedPost = {
  slug: string;
  error: PostguideError;
};

export type FinalizeReport = {
  finalized: FinalizedPost[];
  failed: FailedPost[];
  skipped: string[];
};

/**
 * Marks the post as published and applies the body rules. Throws ParseError
 * when the front matter is malformed.
 */
export function finalizeDocument(
  text: string,
  source: string,
  rules: BodyRewriteRules,
  now: Date
): string {
  const doc = parseDocument(text, source);
  const { frontMatter } = doc;

  // Read first so an unreadable flag or date is reported, not overwritten.
  frontMatter.getBoolean("draft");
  const date = frontMatter.getDate("date") ?? now;

  frontMatter.set("draft", false);
  frontMatter.set("date", date);

  return serializeDocument({ frontMatter, body: rewriteBody(doc.body, rules) });
}

type Move = { from: string; to: string };

export class Finalizer {
  private readonly config: PostguideConfig;
  private readonly store: DraftStore;
  private readonly now: () => Date;

  constructor(config: PostguideConfig, deps: FinalizerDeps = {}) {
    this.config = config;
    this.store = new DraftStore(config, deps);
    this.now = deps.now ?? (() => new Date());
  }

  async finalizeAll(): Promise<FinalizeReport> {
    const { drafts, skipped } = await this.store.list();
    const report: FinalizeReport = { finalized: [], failed: [], skipped };

    for (const slug of skipped) {
      log.warn(`Skipping ${slug}: no ${slug}.md inside.`);
    }

    for (const draft of drafts) {
      try {
        report.finalized.push(await this.finalizeOne(draft));
      } catch (error) {
        if (!(error instanceof PostguideError)) throw error;
        log.error(`Draft ${draft.slug} was not finalized: ${error.message}`);
        report.failed.push({ slug: draft.slug, error });
      }
    }

    return report;
  }

  async finalizeOne(draft: DraftEntry): Promise<FinalizedPost> {
    const postsDir = this.config.paths.posts;
    const file = path.join(postsDir, `${draft.slug}.md`);
    const assetsDir = path.join(postsDir, draft.slug);

    log.info(`Finalizing ${paint(draft.slug, "accent")} to ${paint(file, "path")}...`);

    let text: string;
    try {
      text = await readTextFile(draft.file);
    } catch (error) {
      throw new FilesystemError("Could not read draft", draft.file, error);
    }

    const output = finalizeDocument(text, draft.file, this.config.finalize, this.now());

    const stagedFile = path.join(postsDir, `.${draft.slug}.md.partial`);
    const stagedAssets = path.join(postsDir, `.${draft.slug}.partial`);
    const backupFile = path.join(postsDir, `.${draft.slug}.md.previous`);
    const backupAssets = path.join(postsDir, `.${draft.slug}.previous`);
    const retiredDraft = path.join(this.config.paths.drafts, `.${draft.slug}.finalized`);

    const backedUp: Move[] = [];
    const committed: string[] = [];

    try {
      await removeAll([stagedFile, stagedAssets, backupFile, backupAssets, retiredDraft]);

      await fs.writeFile(stagedFile, output, "utf8");
      await this.stageAssets(draft, stagedAssets);

      for (const move of [
        { from: file, to: backupFile },
        { from: assetsDir, to: backupAssets },
      ]) {
        if (await pathExists(move.from)) {
          await fs.rename(move.from, move.to);
          backedUp.push(move);
        }
      }

      await fs.rename(stagedFile, file);
      committed.push(file);
      await fs.rename(stagedAssets, assetsDir);
      committed.push(assetsDir);

      await fs.rename(draft.dir, retiredDraft);
    } catch (error) {
      await this.rollback(draft.slug, committed, backedUp, [stagedFile, stagedAssets]);
      throw new FilesystemError(`Could not publish ${draft.slug}; the draft was left in place`, draft.dir, error);
    }

    await this.cleanup(draft.slug, [backupFile, backupAssets, retiredDraft]);

    log.success(`Draft ${paint(draft.slug, "accent")} finalized to ${paint(file, "path")}.`);
    return { slug: draft.slug, file, assetsDir };
  }

  /**
   * Images go to the top of the published asset folder. Anything else kept
   * beside the draft is carried along under its own name.
   */
  private async stageAssets(draft: DraftEntry, stagedAssets: string): Promise<void> {
    if (await isDirectory(draft.assetsDir)) {
      await fs.cp(draft.assetsDir, stagedAssets, { recursive: true });
    } else {
      await fs.mkdir(stagedAssets);
    }

    const own = new Set([path.basename(draft.file), path.basename(draft.assetsDir)]);
    for (const name of await fs.readdir(draft.dir)) {
      if (own.has(name)) continue;
      await fs.cp(path.join(draft.dir, name), path.join(stagedAssets, name), {
        recursive: true,
        errorOnExist: true,
        force: false,
      });
    }
  }

  private async rollback(
    slug: string,
    committed: string[],
    backedUp: Move[],
    staged: string[]
  ): Promise<void> {
    try {
      await removeAll([...committed, ...staged]);
      for (const move of [...backedUp].reverse()) {
        await fs.rename(move.to, move.from);
      }
    } catch (error) {
      log.error(`Rolling back ${slug} failed; check ${this.config.paths.posts} by hand: ${errorMessage(error)}`);
    }
  }

  private async cleanup(slug: string, leftovers: string[]): Promise<void> {
    try {
      await removeAll(leftovers);
    } catch (error) {
      log.warn(`${slug} is published, but temporary files remain: ${errorMessage(error)}`);
    }
  }
}

async function removeAll(targets: string[]): Promise<void> {
  for (const target of targets) {
    await fs.rm(target, { recursive: true, force: true });
  }
}
