import path from "path";
import { promises as fs } from "fs";
import defaultConfigJson from "../../config.default.json";
import configSchemaJson from "../../assets/schemas/config.schema.json";
import { validateAgainstSchema, SchemaValidationError } from "../utils/schema-validator";
import { isDirectory, isNotFound } from "../utils/fs";
import { ConfigError, FilesystemError } from "./errors";
import type { BodyRewriteRules } from "./post/rewrite-body";

export const USER_CONFIG_FILE = "postguide.config.json";

export type SitePaths = {
  /** Holding area for unfinished posts. */
  drafts: string;
  /** Directory the generator renders posts from. */
  posts: string;
};

export type GeneratorConfig = {
  command: string;
  newPostLayout: string;
};

export type ServerConfig = {
  host: string;
  port: number;
};

export type PreviewConfig = {
  command?: string;
};

export type PostguideConfig = {
  root: string;
  paths: SitePaths;
  generator: GeneratorConfig;
  server: ServerConfig;
  preview: PreviewConfig;
  finalize: BodyRewriteRules;
  /** The user config file that was merged in, if any. */
  source?: string;
};

export type LoadConfigOptions = {
  cwd?: string;
  /** Explicit config file; must exist when given. */
  configPath?: string;
};

type RawConfigObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is RawConfigObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(base: unknown, override: unknown): unknown {
  if (override === undefined || override === null) {
    return base;
  }

  if (isPlainObject(base) && isPlainObject(override)) {
    const result: RawConfigObject = { ...base };
    for (const [key, overrideValue] of Object.entries(override)) {
      result[key] = key in base ? deepMerge(base[key], overrideValue) : overrideValue;
    }
    return result;
  }

  return override;
}

function validate(raw: unknown, schemaName: string, allowPartial: boolean): void {
  try {
    validateAgainstSchema(raw, configSchemaJson, { schemaName, allowPartial });
  } catch (error) {
    if (error instanceof SchemaValidationError) {
      throw new ConfigError(error.message);
    }
    throw error;
  }
}

/** The shape of a config file once the schema has accepted it. */
type ConfigFile = Omit<PostguideConfig, "source">;

function assertConfigFile(raw: unknown, schemaName: string): asserts raw is ConfigFile {
  validate(raw, schemaName, false);
}

function normalizeConfig(raw: unknown, baseDir: string, source?: string): PostguideConfig {
  assertConfigFile(raw, source ? `Config ${path.basename(source)}` : "Default config");

  const root = path.resolve(baseDir, raw.root);
  const { preview, finalize } = raw;

  return {
    root,
    paths: {
      drafts: path.resolve(root, raw.paths.drafts),
      posts: path.resolve(root, raw.paths.posts),
    },
    generator: { ...raw.generator },
    server: { ...raw.server },
    preview: preview.command === undefined ? {} : { command: preview.command },
    finalize: { ...finalize, linkCardIcons: { ...finalize.linkCardIcons } },
    source,
  };
}

async function readUserConfigFile(filePath: string, required: boolean): Promise<unknown> {
  let contents: string;
  try {
    contents = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (isNotFound(error) && !required) {
      return undefined;
    }
    if (isNotFound(error)) {
      throw new ConfigError(`Config file not found: ${filePath}`);
    }
    throw new FilesystemError("Could not read config file", filePath, error);
  }

  try {
    return JSON.parse(contents) as unknown;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to parse ${filePath}: ${reason}`);
  }
}

export function defaultConfig(cwd: string = process.cwd()): PostguideConfig {
  return normalizeConfig(defaultConfigJson, cwd);
}

/**
 * Merges the user's config file over the bundled defaults. Relative paths in
 * the user file resolve against the directory that holds it.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<PostguideConfig> {
  const cwd = options.cwd ?? process.cwd();
  const explicit = options.configPath !== undefined;
  const userConfigPath = path.resolve(cwd, options.configPath ?? USER_CONFIG_FILE);
  const rawUserConfig = await readUserConfigFile(userConfigPath, explicit);

  if (rawUserConfig === undefined) {
    return defaultConfig(cwd);
  }

  validate(rawUserConfig, `Config ${path.basename(userConfigPath)}`, true);
  const merged = deepMerge(defaultConfigJson, rawUserConfig);
  return normalizeConfig(merged, path.dirname(userConfigPath), userConfigPath);
}

/**
 * Checks that the configured root looks like a generator site and makes sure
 * the draft folder exists.
 */
export async function ensureSiteLayout(config: PostguideConfig): Promise<void> {
  if (!(await isDirectory(config.paths.posts))) {
    throw new ConfigError(
      `Posts directory ${config.paths.posts} not found. Run postguide from the site root or set "root" in ${USER_CONFIG_FILE}.`
    );
  }

  try {
    await fs.mkdir(config.paths.drafts, { recursive: true });
  } catch (error) {
    throw new FilesystemError("Could not create the draft folder", config.paths.drafts, error);
  }
}
