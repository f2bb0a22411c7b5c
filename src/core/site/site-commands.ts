import net from "node:net";
import { log } from "../../cli/log";
import type { PostguideConfig } from "../config-loader";
import { ExternalToolError, PortInUseError } from "../errors";
import { quoteArg, runCommand, type CommandRunner } from "../utils/run-commands";
import { Generator } from "./generator";

const PORT_CHECK_TIMEOUT_MS = 1000;

export type SiteDeps = {
  runner?: CommandRunner;
  isPortInUse?: (host: string, port: number) => Promise<boolean>;
  platform?: NodeJS.Platform;
};

export type SiteActions = {
  refresh?: boolean;
  preview?: boolean;
  start?: boolean;
};

/** Resolves true when something accepts a TCP connection on host:port. */
export function isPortInUse(host: string, port: number): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    const socket = net.createConnection({ host, port });
    const finish = (inUse: boolean) => {
      socket.destroy();
      resolve(inUse);
    };
    socket.setTimeout(PORT_CHECK_TIMEOUT_MS, () => finish(false));
    socket.once("connect", () => finish(true));
    socket.once("error", () => finish(false));
  });
}

export function openerCommand(url: string, platform: NodeJS.Platform, override?: string): string {
  if (override) return `${override} ${quoteArg(url, platform)}`;
  if (platform === "win32") return `start "" ${quoteArg(url, platform)}`;
  if (platform === "darwin") return `open ${quoteArg(url, platform)}`;
  return `xdg-open ${quoteArg(url, platform)}`;
}

export class Site {
  private readonly config: PostguideConfig;
  private readonly generator: Generator;
  private readonly runner: CommandRunner;
  private readonly portInUse: (host: string, port: number) => Promise<boolean>;
  private readonly platform: NodeJS.Platform;

  constructor(config: PostguideConfig, deps: SiteDeps = {}) {
    this.config = config;
    this.runner = deps.runner ?? runCommand;
    this.generator = new Generator(config, this.runner);
    this.portInUse = deps.isPortInUse ?? isPortInUse;
    this.platform = deps.platform ?? process.platform;
  }

  url(): string {
    return `http://${this.config.server.host}:${this.config.server.port}`;
  }

  /** Clean, then generate. */
  async refresh(): Promise<void> {
    await this.generator.clean();
    await this.generator.generate();
    log.success("Site regenerated.");
  }

  async start(): Promise<void> {
    const { host, port } = this.config.server;
    if (await this.portInUse(host, port)) {
      throw new PortInUseError(host, port);
    }
    log.info(`Serving at ${this.url()} (Ctrl+C to stop).`);
    await this.generator.server(port);
  }

  async preview(): Promise<void> {
    const cmd = openerCommand(this.url(), this.platform, this.config.preview.command);
    log.info(`Opening ${this.url()}`);
    const result = await this.runner(cmd, this.config.root);
    if (!result.ok) {
      const reason = (result.stderr || result.stdout).trim() || "no output";
      throw new ExternalToolError("preview", result.code, reason, result.stderr);
    }
  }

  async deploy(): Promise<void> {
    await this.generator.deploy();
    log.success("Site deployed.");
  }

  /**
   * Runs the chosen steps in a fixed order: refresh, preview, start. The
   * server step blocks until the generator's server exits.
   */
  async run(actions: SiteActions): Promise<void> {
    if (actions.refresh) await this.refresh();
    if (actions.preview) await this.preview();
    if (actions.start) await this.start();
  }
}
