import { describe, expect, it } from "@jest/globals";
import os from "node:os";
import path from "node:path";
import { promises as fs } from "node:fs";
import { ensureSiteLayout, loadConfig } from "../src/core/config-loader";
import { ConfigError } from "../src/core/errors";

async function withTempDir(run: (dir: string) => Promise<void>) {
  const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "postguide-config-"));
  try {
    await run(tempDir);
  } finally {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
}

async function writeUserConfig(dir: string, config: unknown, name = "postguide.config.json") {
  const file = path.join(dir, name);
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, JSON.stringify(config), "utf8");
  return file;
}

describe("loadConfig", () => {
  it("returns defaults rooted at cwd when no user config is present", async () => {
    await withTempDir(async (dir) => {
      const config = await loadConfig({ cwd: dir });

      expect(config.root).toBe(dir);
      expect(config.paths.drafts).toBe(path.join(dir, "_draft"));
      expect(config.paths.posts).toBe(path.join(dir, "source", "_posts"));
      expect(config.generator).toEqual({ command: "hexo", newPostLayout: "post" });
      expect(config.server).toEqual({ host: "localhost", port: 4000 });
      expect(config.preview).toEqual({});
      expect(config.finalize.imageDir).toBe("img/");
      expect(config.source).toBeUndefined();
    });
  });

  it("merges a partial user config over the defaults", async () => {
    await withTempDir(async (dir) => {
      const file = await writeUserConfig(dir, {
        paths: { drafts: "drafts" },
        server: { port: 4010 },
        finalize: { linkCardIcons: { blog: "https://example.com/blog.png" } },
      });

      const config = await loadConfig({ cwd: dir });

      expect(config.source).toBe(file);
      expect(config.paths.drafts).toBe(path.join(dir, "drafts"));
      expect(config.paths.posts).toBe(path.join(dir, "source", "_posts"));
      expect(config.server).toEqual({ host: "localhost", port: 4010 });
      expect(config.finalize.linkCardIcons.blog).toBe("https://example.com/blog.png");
      expect(typeof config.finalize.linkCardIcons.github).toBe("string");
    });
  });

  it("resolves root against the directory of an explicit config file", async () => {
    await withTempDir(async (dir) => {
      await writeUserConfig(dir, { root: "../site", preview: { command: "firefox" } }, "conf/custom.json");

      const config = await loadConfig({ cwd: dir, configPath: "conf/custom.json" });

      expect(config.root).toBe(path.join(dir, "site"));
      expect(config.paths.drafts).toBe(path.join(dir, "site", "_draft"));
      expect(config.preview).toEqual({ command: "firefox" });
    });
  });

  it("fails when an explicit config file is missing", async () => {
    await withTempDir(async (dir) => {
      await expect(loadConfig({ cwd: dir, configPath: "missing.json" })).rejects.toThrow(
        `Config file not found: ${path.join(dir, "missing.json")}`
      );
    });
  });

  it("fails on malformed JSON", async () => {
    await withTempDir(async (dir) => {
      await fs.writeFile(path.join(dir, "postguide.config.json"), "{ nope", "utf8");
      await expect(loadConfig({ cwd: dir })).rejects.toThrow(ConfigError);
      await expect(loadConfig({ cwd: dir })).rejects.toThrow(/^Failed to parse /);
    });
  });

  it("rejects unknown keys", async () => {
    await withTempDir(async (dir) => {
      await writeUserConfig(dir, { serve: {} });
      await expect(loadConfig({ cwd: dir })).rejects.toThrow(
        'Config postguide.config.json is invalid at $: unknown key "serve"'
      );
    });
  });

  it("rejects values of the wrong type", async () => {
    await withTempDir(async (dir) => {
      await writeUserConfig(dir, { server: { port: "4000" } });
      await expect(loadConfig({ cwd: dir })).rejects.toThrow(
        "Config postguide.config.json is invalid at $.server.port: expected a number"
      );
    });
  });
});

describe("loadConfig schema checks", () => {
  it("rejects an out-of-range port", async () => {
    await withTempDir(async (dir) => {
      await writeUserConfig(dir, { server: { port: 0 } });
      await expect(loadConfig({ cwd: dir })).rejects.toThrow(
        "Config postguide.config.json is invalid at $.server.port: must be >= 1"
      );
    });
  });

  it("rejects a non-string link card icon", async () => {
    await withTempDir(async (dir) => {
      await writeUserConfig(dir, { finalize: { linkCardIcons: { blog: 42 } } });
      await expect(loadConfig({ cwd: dir })).rejects.toThrow(
        "Config postguide.config.json is invalid at $.finalize.linkCardIcons.blog: expected a string"
      );
    });
  });

  it("copies validated sections instead of sharing the parsed objects", async () => {
    await withTempDir(async (dir) => {
      const first = await loadConfig({ cwd: dir });
      first.finalize.linkCardIcons.extra = "https://example.com/x.png";

      const second = await loadConfig({ cwd: dir });
      expect(second.finalize.linkCardIcons.extra).toBeUndefined();
    });
  });
});

describe("ensureSiteLayout", () => {
  it("fails when the posts directory is missing", async () => {
    await withTempDir(async (dir) => {
      const config = await loadConfig({ cwd: dir });
      await expect(ensureSiteLayout(config)).rejects.toThrow(ConfigError);
    });
  });

  it("creates the draft folder", async () => {
    await withTempDir(async (dir) => {
      await fs.mkdir(path.join(dir, "source", "_posts"), { recursive: true });
      const config = await loadConfig({ cwd: dir });

      await ensureSiteLayout(config);

      const stat = await fs.stat(path.join(dir, "_draft"));
      expect(stat.isDirectory()).toBe(true);
    });
  });
});
