export {
  defaultConfig,
  ensureSiteLayout,
  loadConfig,
  USER_CONFIG_FILE,
  type LoadConfigOptions,
  type PostguideConfig,
} from "./core/config-loader";
export {
  DraftStore,
  coverPath,
  type CreatedDraft,
  type DraftEntry,
  type DraftListing,
} from "./core/drafts/draft-store";
export {
  Finalizer,
  finalizeDocument,
  type FinalizeReport,
  type FinalizedPost,
  type FailedPost,
} from "./core/drafts/finalizer";
export {
  FrontMatter,
  formatDate,
  parseDate,
  parseDocument,
  serializeDocument,
  type PostDocument,
} from "./core/post/front-matter";
export {
  linkCardsFromComments,
  rewriteBody,
  stripFirstLevelHeadings,
  stripImageDir,
  type BodyRewriteRules,
} from "./core/post/rewrite-body";
export { Generator } from "./core/site/generator";
export { Site, isPortInUse, openerCommand, type SiteActions } from "./core/site/site-commands";
export { deriveSlug, toSlug } from "./core/utils/slug";
export { runCommand, type CommandResult, type CommandRunner } from "./core/utils/run-commands";
export * from "./core/errors";
